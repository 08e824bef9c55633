export const ErrorCode = {
  InvalidCount: "INVALID_COUNT",
  InvalidConfig: "INVALID_CONFIG",
  DocumentNotFound: "DOCUMENT_NOT_FOUND",
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class TagCloudError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TagCloudError";
    this.code = code;
  }
}

export class InvalidCountError extends TagCloudError {
  readonly value: unknown;

  constructor(value: unknown) {
    super(ErrorCode.InvalidCount, `Invalid word count: ${String(value)}. Expected a non-negative integer`);
    this.name = "InvalidCountError";
    this.value = value;
  }
}

export class InvalidConfigError extends TagCloudError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(ErrorCode.InvalidConfig, `Invalid configuration: ${issues.join("; ")}`);
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}

export function isTagCloudError(error: unknown): error is TagCloudError {
  return error instanceof TagCloudError;
}
