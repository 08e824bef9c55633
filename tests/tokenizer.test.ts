import { describe, expect, test } from "vitest";

import { createSeparatorSet } from "../src/core/separators.ts";
import { nextRun, tokenize } from "../src/core/tokenizer.ts";

const separators = createSeparatorSet();

const samples = [
  "",
  "word",
  "   ",
  "Hello, world!",
  "  leading and trailing  ",
  "the cat the dog the cat",
  "snake_case and kebab-case (mixed) [brackets] {braces}",
  "line one\nline two\r\n\ttabbed",
  "naïve café — ok?",
  "emoji 🎉 stays; whole",
];

describe("nextRun", () => {
  test("returns the word run at the start position", () => {
    expect(nextRun("Hello, world!", 0, separators)).toEqual({ text: "Hello", isSeparator: false });
  });

  test("returns the separator run at the start position", () => {
    expect(nextRun("Hello, world!", 5, separators)).toEqual({ text: ", ", isSeparator: true });
  });

  test("runs to the end of the text", () => {
    expect(nextRun("Hello, world", 7, separators)).toEqual({ text: "world", isSeparator: false });
  });

  test("starts mid-run", () => {
    expect(nextRun("abc--def", 1, separators)).toEqual({ text: "bc", isSeparator: false });
    expect(nextRun("abc--def", 3, separators)).toEqual({ text: "--", isSeparator: true });
  });

  test("rejects positions outside the text", () => {
    expect(() => nextRun("abc", -1, separators)).toThrow(RangeError);
    expect(() => nextRun("abc", 3, separators)).toThrow(RangeError);
    expect(() => nextRun("abc", 1.5, separators)).toThrow(RangeError);
    expect(() => nextRun("", 0, separators)).toThrow(RangeError);
  });
});

describe("tokenize", () => {
  test("splits into alternating word and separator runs", () => {
    expect([...tokenize("Hello, world!", separators)]).toEqual([
      { text: "Hello", isSeparator: false },
      { text: ", ", isSeparator: true },
      { text: "world", isSeparator: false },
      { text: "!", isSeparator: true },
    ]);
  });

  test("empty text yields no runs", () => {
    expect([...tokenize("", separators)]).toEqual([]);
  });

  test("concatenated runs reconstruct the text", () => {
    for (const text of samples) {
      const joined = [...tokenize(text, separators)].map((r) => r.text).join("");
      expect(joined).toBe(text);
    }
  });

  test("every run is non-empty and adjacent runs differ in kind", () => {
    for (const text of samples) {
      const runs = [...tokenize(text, separators)];
      for (let i = 0; i < runs.length; i++) {
        expect(runs[i]?.text.length).toBeGreaterThan(0);
        if (i > 0) {
          expect(runs[i]?.isSeparator).not.toBe(runs[i - 1]?.isSeparator);
        }
      }
    }
  });

  test("non-separator characters outside the alphabet stay inside words", () => {
    const words = [...tokenize("emoji 🎉 stays; whole", separators)]
      .filter((r) => !r.isSeparator)
      .map((r) => r.text);
    expect(words).toEqual(["emoji", "🎉", "stays", "whole"]);
  });

  test("is restartable", () => {
    const runs = tokenize("a b", separators);
    expect([...runs]).toHaveLength(3);
    expect([...runs]).toHaveLength(3);
  });
});
