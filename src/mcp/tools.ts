import type { TagCloudConfig } from "../config/defaults.ts";
import { isTagCloudError } from "../core/errors.ts";
import { generateTagCloud, topWords } from "../core/generator.ts";

export interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

export interface TagCloudToolArgs {
  action: "generate" | "top";
  text: string;
  title?: string;
  count?: number;
}

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function errorResult(text: string): ToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

export function handleTagCloud(config: TagCloudConfig, args: TagCloudToolArgs): ToolResult {
  try {
    switch (args.action) {
      case "generate":
        return handleGenerate(config, args);
      case "top":
        return handleTop(config, args);
      default:
        return errorResult(`Unknown tag cloud action: ${String(args.action)}`);
    }
  } catch (error) {
    if (isTagCloudError(error)) return errorResult(error.message);
    throw error;
  }
}

function handleGenerate(config: TagCloudConfig, args: TagCloudToolArgs): ToolResult {
  const result = generateTagCloud(
    {
      text: args.text,
      title: args.title ?? "document",
      count: args.count ?? config.defaultCount,
    },
    config,
  );

  return textResult(
    JSON.stringify({
      html: result.html,
      words: result.subset.entries,
      requested: result.requestedCount,
      shown: result.effectiveCount,
      minCount: result.subset.minCount,
      maxCount: result.subset.maxCount,
      totalWords: result.totalWords,
    }),
  );
}

function handleTop(config: TagCloudConfig, args: TagCloudToolArgs): ToolResult {
  return textResult(JSON.stringify(topWords(args.text, args.count ?? config.defaultCount, config)));
}
