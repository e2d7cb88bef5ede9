/**
 * Error hierarchy for VirgoCX API interactions.
 *
 * Every failure surfaced by the client extends VirgoCXError, so callers can
 * catch the whole family at once or switch on `kind`.
 */

export type VirgoCXErrorKind = "usage" | "status" | "api" | "cache_miss" | "decode";

export class VirgoCXError extends Error {
  public readonly kind: VirgoCXErrorKind;

  constructor(message: string, kind: VirgoCXErrorKind) {
    super(message);
    this.name = "VirgoCXError";
    this.kind = kind;
    // Restore prototype chain (instanceof on subclasses)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Invalid or missing arguments, detected before any request is sent */
export class VirgoCXUsageError extends VirgoCXError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, "usage");
    this.name = "VirgoCXUsageError";
    this.field = field;
  }
}

/** Non-200 HTTP status */
export class VirgoCXStatusError extends VirgoCXError {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string) {
    super(`Request failed with status code ${status}: ${body}`, "status");
    this.name = "VirgoCXStatusError";
    this.status = status;
    this.body = body;
  }
}

/** Envelope came back with a non-zero `code` */
export class VirgoCXApiError extends VirgoCXError {
  public readonly code: number;
  public readonly msg: string | undefined;
  public readonly body: string;

  constructor(code: number, msg: string | undefined, body: string) {
    super(`Request failed with error code ${code}: ${msg ?? body}`, "api");
    this.name = "VirgoCXApiError";
    this.code = code;
    this.msg = msg;
    this.body = body;
  }
}

export class VirgoCXCacheMissError extends VirgoCXError {
  public readonly symbol: string;

  constructor(symbol: string) {
    super(`No formatting info for symbol ${symbol}`, "cache_miss");
    this.name = "VirgoCXCacheMissError";
    this.symbol = symbol;
  }
}

/** Body was not a JSON envelope, or a mapped field held an unknown enum value */
export class VirgoCXDecodeError extends VirgoCXError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, "decode");
    this.name = "VirgoCXDecodeError";
    this.field = field;
  }
}
