import { type BaseErrorType, ERROR_CATALOG, type ErrorCode, type ErrorDomain } from "./catalog.js";

/**
 * Wire shape produced by {@link RecurrentError.toJSON}.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string>;
  readonly stack?: string;
}

/**
 * Root of the error hierarchy.
 *
 * The catalog entry for `code` fills in the base type, domain and
 * expectedness; `_tag` is the discriminant for exhaustive switches.
 */
export abstract class RecurrentError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C;
  readonly _tag: (typeof ERROR_CATALOG)[C]["baseType"];
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;

  constructor(code: C, message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    const entry = ERROR_CATALOG[code];
    this.name = new.target.name;
    this.code = code;
    this._tag = entry.baseType;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.timestamp = new Date();
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.stack ? { stack: this.stack } : {}),
    };
  }

  override toString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      result += ` ${JSON.stringify(this.metadata)}`;
    }
    return result;
  }
}

/**
 * Check if a value is a RecurrentError
 */
export function isRecurrentError(error: unknown): error is RecurrentError {
  return error instanceof RecurrentError;
}

/**
 * Check if a RecurrentError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: RecurrentError,
  code: C,
): error is RecurrentError & { readonly code: C } {
  return error.code === code;
}
