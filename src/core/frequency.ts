import type { SeparatorSet } from "./separators.ts";
import { tokenize } from "./tokenizer.ts";

/** Canonical (lower-cased) word to occurrence count. */
export type FrequencyTable = ReadonlyMap<string, number>;

export function canonicalWord(word: string): string {
  return word.toLowerCase();
}

export function buildFrequencyTable(text: string, separators: SeparatorSet): FrequencyTable {
  const table = new Map<string, number>();
  for (const run of tokenize(text, separators)) {
    if (run.isSeparator) continue;
    const word = canonicalWord(run.text);
    table.set(word, (table.get(word) ?? 0) + 1);
  }
  return table;
}

export function totalWords(table: FrequencyTable): number {
  let total = 0;
  for (const count of table.values()) total += count;
  return total;
}
