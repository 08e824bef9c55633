import { afterEach, describe, expect, test, vi } from "vitest";

const { prompt, warn } = vi.hoisted(() => ({
  prompt: vi.fn<(message: string, options?: unknown) => Promise<unknown>>(),
  warn: vi.fn<(message: string) => void>(),
}));

vi.mock("consola", () => ({ consola: { prompt, warn } }));

import { ask, askCount } from "../src/cli/prompt.ts";

afterEach(() => {
  prompt.mockReset();
  warn.mockReset();
  vi.restoreAllMocks();
});

describe("ask", () => {
  test("returns the trimmed answer", async () => {
    prompt.mockResolvedValueOnce("  notes.txt  ");
    expect(await ask("File?")).toBe("notes.txt");
    expect(prompt).toHaveBeenCalledWith("File?", { type: "text", placeholder: undefined });
  });

  test("exits quietly when the prompt is cancelled", async () => {
    prompt.mockResolvedValueOnce(Symbol("cancel"));
    const exit = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });
    await expect(ask("File?")).rejects.toThrow("process.exit");
    expect(exit).toHaveBeenCalledWith(0);
  });
});

describe("askCount", () => {
  test("asks again until the count is a non-negative integer", async () => {
    prompt.mockResolvedValueOnce("-1").mockResolvedValueOnce("3");
    expect(await askCount("How many?")).toBe(3);
    expect(prompt).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Sorry, please enter a non-negative integer.");
  });

  test("accepts a valid first answer", async () => {
    prompt.mockResolvedValueOnce("12");
    expect(await askCount("How many?")).toBe(12);
    expect(warn).not.toHaveBeenCalled();
  });

  test("skips fractional and empty answers", async () => {
    prompt.mockResolvedValueOnce("2.5").mockResolvedValueOnce("").mockResolvedValueOnce("0");
    expect(await askCount("How many?")).toBe(0);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
