/**
 * Error Taxonomy
 *
 * Every failure the link service reports to callers carries one of these
 * codes. Validation failures are caller errors and are never retried.
 */

export const ErrorCode = {
  INVALID_URL: "INVALID_URL",
  INVALID_CODE: "INVALID_CODE",
  INVALID_VALIDITY: "INVALID_VALIDITY",
  CODE_TAKEN: "CODE_TAKEN",
  NOT_FOUND: "NOT_FOUND",
  EXPIRED: "EXPIRED",
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * HTTP status for each error code.
 */
export const ERROR_STATUS: Record<ErrorCode, number> = {
  INVALID_URL: 400,
  INVALID_CODE: 400,
  INVALID_VALIDITY: 400,
  CODE_TAKEN: 400,
  NOT_FOUND: 404,
  EXPIRED: 410,
  INTERNAL: 500,
};

export class ShortLinkError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ShortLinkError";
    this.code = code;
  }

  get statusCode(): number {
    return ERROR_STATUS[this.code];
  }
}

export function isShortLinkError(err: unknown): err is ShortLinkError {
  return err instanceof ShortLinkError;
}
