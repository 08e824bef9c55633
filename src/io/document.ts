import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

import { ErrorCode, TagCloudError } from "../core/errors.ts";

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readDocument(path: string): Promise<string> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      throw new TagCloudError(ErrorCode.DocumentNotFound, `Unable to find the file ${path}`, {
        cause: error,
      });
    }
    throw error;
  }
  return content.split(/\r?\n/).join("\n");
}

export function resolveOutputPath(output: string, folder?: string): string {
  return folder ? join(folder, output) : output;
}

/** Writes the document, creating parent directories. Resolves with the absolute path. */
export async function writeTagCloud(path: string, html: string): Promise<string> {
  const absolute = resolve(path);
  await mkdir(dirname(absolute), { recursive: true });
  await writeFile(absolute, html, "utf-8");
  return absolute;
}
