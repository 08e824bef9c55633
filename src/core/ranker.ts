import { InvalidCountError } from "./errors.ts";
import type { FrequencyTable } from "./frequency.ts";

export interface RankedEntry {
  word: string;
  count: number;
}

export interface SelectedSubset {
  /** Alphabetical display order. */
  entries: readonly RankedEntry[];
  /** Lowest count among `entries`, 0 when empty. */
  minCount: number;
  /** Highest count among `entries`, 0 when empty. */
  maxCount: number;
}

function compareWords(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la < lb) return -1;
  if (la > lb) return 1;
  return 0;
}

export function assertValidCount(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidCountError(n);
  }
}

/** Count descending; equal counts fall back to alphabetical order. */
export function rankByCount(table: FrequencyTable): RankedEntry[] {
  return [...table.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count || compareWords(a.word, b.word));
}

export function selectTopWords(table: FrequencyTable, n: number): SelectedSubset {
  assertValidCount(n);

  const take = Math.min(n, table.size);
  if (take === 0) {
    return { entries: [], minCount: 0, maxCount: 0 };
  }

  const selected = rankByCount(table).slice(0, take);
  const maxCount = selected[0]?.count ?? 0;
  const minCount = selected[selected.length - 1]?.count ?? 0;

  return {
    entries: selected.sort((a, b) => compareWords(a.word, b.word)),
    minCount,
    maxCount,
  };
}
