import { DEFAULT_CONFIG, fontRangeOf, type TagCloudConfig } from "../config/defaults.ts";
import { buildFrequencyTable, totalWords, type FrequencyTable } from "./frequency.ts";
import { fontSize } from "./font.ts";
import {
  assertValidCount,
  rankByCount,
  selectTopWords,
  type SelectedSubset,
} from "./ranker.ts";
import { renderTagCloud } from "./render.ts";
import { createSeparatorSet } from "./separators.ts";

export interface TagCloudInput {
  text: string;
  title: string;
  count: number;
}

export interface TagCloudResult {
  html: string;
  subset: SelectedSubset;
  table: FrequencyTable;
  requestedCount: number;
  effectiveCount: number;
  documentTitle: string;
  totalWords: number;
}

export function generateTagCloud(
  input: TagCloudInput,
  config: TagCloudConfig = DEFAULT_CONFIG,
): TagCloudResult {
  assertValidCount(input.count);

  const separators = createSeparatorSet(config.separators);
  const table = buildFrequencyTable(input.text, separators);
  const subset = selectTopWords(table, input.count);

  const html = renderTagCloud(subset, input.title, input.count, {
    stylesheetHref: config.stylesheetHref,
    escapeHtml: config.escapeHtml,
    fontRange: fontRangeOf(config),
  });

  return {
    html,
    subset,
    table,
    requestedCount: input.count,
    effectiveCount: subset.entries.length,
    documentTitle: input.title,
    totalWords: totalWords(table),
  };
}

export interface TopWord {
  rank: number;
  word: string;
  count: number;
  fontSize: number;
}

/** The selected words in rank order, each with the font size it renders at. */
export function topWords(
  text: string,
  count: number,
  config: TagCloudConfig = DEFAULT_CONFIG,
): TopWord[] {
  assertValidCount(count);

  const table = buildFrequencyTable(text, createSeparatorSet(config.separators));
  const { minCount, maxCount } = selectTopWords(table, count);
  const range = fontRangeOf(config);

  return rankByCount(table)
    .slice(0, count)
    .map((entry, i) => ({
      rank: i + 1,
      word: entry.word,
      count: entry.count,
      fontSize: fontSize(entry.count, minCount, maxCount, range),
    }));
}
