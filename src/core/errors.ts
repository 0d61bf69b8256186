// src/core/errors.ts

/** Invalid startup configuration. Fatal: the launcher exits with 1. */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/** Error with an HTTP status; the error middleware answers with it. */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

// body-parser markiert kaputtes JSON mit type=entity.parse.failed
function isJsonParseFailure(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;
  if (isJsonParseFailure(err)) return new HttpError(400, "Invalid JSON body");
  return new HttpError(500, "Internal server error");
}
