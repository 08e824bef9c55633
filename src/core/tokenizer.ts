import type { SeparatorSet } from "./separators.ts";

export interface Run {
  text: string;
  isSeparator: boolean;
}

/**
 * Returns the maximal run starting at `start` whose characters all share the
 * separator classification of `text[start]`.
 */
export function nextRun(text: string, start: number, separators: SeparatorSet): Run {
  if (!Number.isInteger(start) || start < 0 || start >= text.length) {
    throw new RangeError(`start must be in [0, ${text.length}), got ${start}`);
  }

  const isSeparator = separators.isSeparator(text.charAt(start));
  let end = start + 1;
  while (end < text.length && separators.isSeparator(text.charAt(end)) === isSeparator) {
    end++;
  }
  return { text: text.slice(start, end), isSeparator };
}

export function tokenize(text: string, separators: SeparatorSet): Iterable<Run> {
  return {
    *[Symbol.iterator]() {
      let position = 0;
      while (position < text.length) {
        const run = nextRun(text, position, separators);
        yield run;
        position += run.text.length;
      }
    },
  };
}
