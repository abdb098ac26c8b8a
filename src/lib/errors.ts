export type ReactorErrorKind = "InvalidArgument" | "OutOfRange";

/** Base class for failures raised by the reactor model. */
export class ReactorError extends Error {
  readonly kind: ReactorErrorKind;

  constructor(kind: ReactorErrorKind, message: string) {
    super(message);
    this.name = "ReactorError";
    this.kind = kind;
  }
}

/** A numeric argument fell outside its allowed range. */
export class InvalidArgumentError extends ReactorError {
  constructor(message: string) {
    super("InvalidArgument", message);
    this.name = "InvalidArgumentError";
  }
}

/** No cached output exists at the requested index. */
export class OutOfRangeError extends ReactorError {
  constructor(message: string) {
    super("OutOfRange", message);
    this.name = "OutOfRangeError";
  }
}

export function isReactorError(value: unknown): value is ReactorError {
  return value instanceof ReactorError;
}

/** Human-readable message for anything thrown at a UI boundary. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
