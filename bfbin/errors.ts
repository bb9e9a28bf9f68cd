export type DecodeErrorKind =
  | "HandlerSetMismatch"
  | "IoError"
  | "TruncatedInput"
  | "MalformedHeader"
  | "AllocationFailure"
  | "InternalInconsistency";

/**
 * Fatal decode failure. Raised anywhere below the session and reported
 * once through the handler set's error callback.
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  /** Stream position when the failure was detected, if known */
  readonly offset?: number;

  constructor(kind: DecodeErrorKind, message: string, options: { offset?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DecodeError";
    this.kind = kind;
    this.offset = options.offset;
  }
}

/** Text of an underlying system error, for inclusion in messages. */
export function systemErrorText(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
