export {
  generateTagCloud,
  topWords,
  type TagCloudInput,
  type TagCloudResult,
  type TopWord,
} from "./core/generator.ts";
export { DEFAULT_SEPARATORS, SeparatorSet, createSeparatorSet } from "./core/separators.ts";
export { nextRun, tokenize, type Run } from "./core/tokenizer.ts";
export {
  buildFrequencyTable,
  canonicalWord,
  totalWords,
  type FrequencyTable,
} from "./core/frequency.ts";
export {
  selectTopWords,
  rankByCount,
  assertValidCount,
  type RankedEntry,
  type SelectedSubset,
} from "./core/ranker.ts";
export {
  fontSize,
  fontClass,
  MIN_FONT,
  MAX_FONT,
  DEFAULT_FONT_RANGE,
  type FontRange,
} from "./core/font.ts";
export { renderTagCloud, escapeHtml, stylesheetFor, type RenderOptions } from "./core/render.ts";
export {
  TagCloudError,
  InvalidCountError,
  InvalidConfigError,
  ErrorCode,
  isTagCloudError,
} from "./core/errors.ts";
export {
  DEFAULT_CONFIG,
  loadConfig,
  parseCount,
  fontRangeOf,
  type TagCloudConfig,
} from "./config/defaults.ts";
export { readDocument, resolveOutputPath, writeTagCloud } from "./io/document.ts";
