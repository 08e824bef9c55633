import Table from "cli-table3";
import kleur from "kleur";

import type { TagCloudResult, TopWord } from "../core/generator.ts";

export function isInteractive(): boolean {
  return !!process.stdout.isTTY;
}

const dim = (s: string) => kleur.dim(s);
const bold = (s: string) => kleur.bold(s);
const green = (s: string) => kleur.green(s);
const yellow = (s: string) => kleur.yellow(s);
const red = (s: string) => kleur.red(s);
const cyan = (s: string) => kleur.cyan(s);

export function formatGenerateSummary(result: TagCloudResult, outputPath: string): string {
  if (!isInteractive()) {
    return JSON.stringify({
      output: outputPath,
      title: result.documentTitle,
      requested: result.requestedCount,
      words: result.effectiveCount,
      distinctWords: result.table.size,
      totalWords: result.totalWords,
      minCount: result.subset.minCount,
      maxCount: result.subset.maxCount,
    });
  }

  const lines: string[] = [];
  lines.push(green("  Tag cloud written") + dim(` → ${outputPath}`));
  lines.push(`  ${bold(`Top ${result.effectiveCount} words in ${result.documentTitle}`)}`);
  if (result.effectiveCount < result.requestedCount) {
    lines.push(
      yellow(`  requested ${result.requestedCount}, document has ${result.table.size} distinct words`),
    );
  }
  lines.push(
    dim(
      `  total words: ${result.totalWords} | distinct: ${result.table.size}` +
        (result.effectiveCount > 0
          ? ` | counts: ${result.subset.minCount}–${result.subset.maxCount}`
          : ""),
    ),
  );
  return lines.join("\n");
}

export interface FontBounds {
  min: number;
  max: number;
}

export function fontBounds(words: readonly TopWord[]): FontBounds {
  let min = Infinity;
  let max = -Infinity;
  for (const w of words) {
    if (w.fontSize < min) min = w.fontSize;
    if (w.fontSize > max) max = w.fontSize;
  }
  return { min, max };
}

function fontColor(size: number, { min, max }: FontBounds): (s: string) => string {
  if (max === min) return dim;
  if (size === max) return red;
  if (size > (max + min) / 2) return yellow;
  return cyan;
}

export function formatTopWords(words: TopWord[], source: string): string {
  if (!isInteractive()) {
    return JSON.stringify(words);
  }

  if (words.length === 0) {
    return dim(`  No words found in ${source}`);
  }

  const table = new Table({
    head: ["#", "word", "count", "font"],
    style: { head: ["dim"], border: ["dim"] },
    chars: {
      top: "─",
      "top-mid": "┬",
      "top-left": "┌",
      "top-right": "┐",
      bottom: "─",
      "bottom-mid": "┴",
      "bottom-left": "└",
      "bottom-right": "┘",
      left: "│",
      "left-mid": "├",
      mid: "─",
      "mid-mid": "┼",
      right: "│",
      "right-mid": "┤",
      middle: "│",
    },
  });

  const bounds = fontBounds(words);
  for (const w of words) {
    const color = fontColor(w.fontSize, bounds);
    table.push([dim(String(w.rank)), bold(w.word), String(w.count), color(`f${w.fontSize}`)]);
  }

  return table.toString();
}
