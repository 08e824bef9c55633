import { z } from "zod/v4";

import { InvalidConfigError, InvalidCountError } from "../core/errors.ts";
import { MAX_FONT, MIN_FONT, type FontRange } from "../core/font.ts";
import { DEFAULT_SEPARATORS, isSingleUnitAlphabet } from "../core/separators.ts";

export interface TagCloudConfig {
  minFont: number;
  maxFont: number;
  separators: string;
  stylesheetHref: string | null;
  escapeHtml: boolean;
  defaultCount: number;
}

export const DEFAULT_CONFIG: TagCloudConfig = {
  minFont: MIN_FONT,
  maxFont: MAX_FONT,
  separators: DEFAULT_SEPARATORS,
  stylesheetHref: null,
  escapeHtml: true,
  defaultCount: 10,
};

const ConfigSchema = z
  .object({
    minFont: z.number().int().min(1),
    maxFont: z.number().int().min(1),
    separators: z.string().min(1).refine(isSingleUnitAlphabet, {
      message: "separators must be Basic Multilingual Plane characters",
    }),
    stylesheetHref: z.string().min(1).nullable(),
    escapeHtml: z.boolean(),
    defaultCount: z.number().int().min(0),
  })
  .refine((c) => c.minFont <= c.maxFont, {
    message: "minFont must not exceed maxFont",
    path: ["minFont"],
  });

const CountSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().min(0).max(Number.MAX_SAFE_INTEGER));

function parseFlag(value: string): boolean {
  return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
}

export function loadConfig(overrides?: Partial<TagCloudConfig>): TagCloudConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };

  if (process.env.TAGCLOUD_MIN_FONT) config.minFont = Number(process.env.TAGCLOUD_MIN_FONT);
  if (process.env.TAGCLOUD_MAX_FONT) config.maxFont = Number(process.env.TAGCLOUD_MAX_FONT);
  if (process.env.TAGCLOUD_STYLESHEET) config.stylesheetHref = process.env.TAGCLOUD_STYLESHEET;
  if (process.env.TAGCLOUD_ESCAPE_HTML)
    config.escapeHtml = parseFlag(process.env.TAGCLOUD_ESCAPE_HTML);
  if (process.env.TAGCLOUD_COUNT) config.defaultCount = Number(process.env.TAGCLOUD_COUNT);

  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}

export function fontRangeOf(config: TagCloudConfig): FontRange {
  return { min: config.minFont, max: config.maxFont };
}

/** Parses a user-supplied word count such as a CLI argument or prompt answer. */
export function parseCount(input: string): number {
  const result = CountSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidCountError(input);
  }
  return result.data;
}
