import { DEFAULT_FONT_RANGE, fontClass, fontSize, type FontRange } from "./font.ts";
import type { SelectedSubset } from "./ranker.ts";

export interface RenderOptions {
  /** External stylesheet; when null the font classes are inlined. */
  stylesheetHref?: string | null;
  escapeHtml?: boolean;
  fontRange?: FontRange;
}

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => HTML_ENTITIES[ch] ?? ch);
}

export function stylesheetFor(range: FontRange = DEFAULT_FONT_RANGE): string {
  const rules = [
    ".cdiv{margin:0 auto;width:80%}",
    ".cbox{line-height:1.6;text-align:center}",
    ".cbox span{margin:0 0.25em}",
  ];
  for (let size = range.min; size <= range.max; size++) {
    rules.push(`.${fontClass(size)}{font-size:${size}px}`);
  }
  return rules.join("");
}

function headAsset(options: RenderOptions, range: FontRange): string {
  if (options.stylesheetHref) {
    return `<link href="${escapeHtml(options.stylesheetHref)}" rel="stylesheet" type="text/css">`;
  }
  return `<style type="text/css">${stylesheetFor(range)}</style>`;
}

export function renderTagCloud(
  subset: SelectedSubset,
  documentTitle: string,
  requestedCount: number,
  options: RenderOptions = {},
): string {
  const range = options.fontRange ?? DEFAULT_FONT_RANGE;
  const text = options.escapeHtml === false ? (s: string) => s : escapeHtml;
  const shown = Math.min(requestedCount, subset.entries.length);
  const heading = `Top ${shown} words in ${text(documentTitle)}`;

  const lines: string[] = [];
  lines.push(`<html><head><title>${heading}</title>${headAsset(options, range)}</head>`);
  lines.push(`<body><h2>${heading}</h2><hr></hr>`);
  lines.push(`<div class="cdiv">`);
  lines.push(`<p class="cbox">`);
  for (const entry of subset.entries) {
    const size = fontSize(entry.count, subset.minCount, subset.maxCount, range);
    lines.push(
      `<span style="cursor:default" class="${fontClass(size)}" title="count: ${entry.count}">` +
        `${text(entry.word)}</span>`,
    );
  }
  lines.push(`</p></div></body></html>`);
  return lines.join("\n") + "\n";
}
