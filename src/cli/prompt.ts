import { consola } from "consola";

import { parseCount } from "../config/defaults.ts";
import { InvalidCountError } from "../core/errors.ts";

export function canPrompt(): boolean {
  return !!process.stdin.isTTY && !!process.stdout.isTTY;
}

export async function ask(message: string, placeholder?: string): Promise<string> {
  const answer: unknown = await consola.prompt(message, { type: "text", placeholder });
  if (typeof answer !== "string") process.exit(0);
  return answer.trim();
}

/** Re-asks until the answer is a non-negative integer. */
export async function askCount(message: string): Promise<number> {
  for (;;) {
    const answer = await ask(message);
    try {
      return parseCount(answer);
    } catch (error) {
      if (!(error instanceof InvalidCountError)) throw error;
      consola.warn("Sorry, please enter a non-negative integer.");
    }
  }
}
