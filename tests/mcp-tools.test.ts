import { describe, expect, test } from "vitest";

import { DEFAULT_CONFIG, type TagCloudConfig } from "../src/config/defaults.ts";
import { handleTagCloud } from "../src/mcp/tools.ts";

const config: TagCloudConfig = { ...DEFAULT_CONFIG, stylesheetHref: "tagcloud.css" };

function parseResult(result: { content: { type: string; text: string }[] }): unknown {
  const first = result.content[0];
  if (!first) throw new Error("empty tool result");
  return JSON.parse(first.text);
}

describe("tag_cloud generate", () => {
  test("returns the page and the selected words", () => {
    const result = handleTagCloud(config, {
      action: "generate",
      text: "the cat the dog the cat",
      title: "pets",
      count: 2,
    });

    expect(result.isError).toBeUndefined();
    expect(parseResult(result)).toMatchObject({
      words: [
        { word: "cat", count: 2 },
        { word: "the", count: 3 },
      ],
      requested: 2,
      shown: 2,
      minCount: 2,
      maxCount: 3,
      totalWords: 6,
    });
  });

  test("html carries the title", () => {
    const result = handleTagCloud(config, { action: "generate", text: "a", title: "notes", count: 1 });
    expect(parseResult(result)).toMatchObject({
      html: expect.stringContaining("<body><h2>Top 1 words in notes</h2><hr></hr>\n"),
    });
  });

  test("defaults the count from config", () => {
    const result = handleTagCloud(
      { ...config, defaultCount: 1 },
      { action: "generate", text: "b a b" },
    );
    expect(parseResult(result)).toMatchObject({ words: [{ word: "b", count: 2 }], shown: 1 });
  });

  test("negative count returns an error result", () => {
    const result = handleTagCloud(config, { action: "generate", text: "a b", count: -1 });
    expect(result.isError).toBe(true);
    expect(result.content[0]?.text).toBe("Invalid word count: -1. Expected a non-negative integer");
  });
});

describe("tag_cloud top", () => {
  test("returns ranked words with font sizes", () => {
    const result = handleTagCloud(config, { action: "top", text: "the cat the dog the cat", count: 2 });
    expect(parseResult(result)).toEqual([
      { rank: 1, word: "the", count: 3, fontSize: 48 },
      { rank: 2, word: "cat", count: 2, fontSize: 11 },
    ]);
  });

  test("fractional count returns an error result", () => {
    const result = handleTagCloud(config, { action: "top", text: "a", count: 1.5 });
    expect(result.isError).toBe(true);
  });
});
