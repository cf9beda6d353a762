export type ProtocolErrorKind =
  | "validation"
  | "storage"
  | "key"
  | "network"
  | "initialization"
  | "security";

export interface ProtocolErrorOptions {
  code?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * The single error type thrown by every layer. `kind` tells callers which
 * failure class they are looking at; `code` is a stable machine-readable
 * identifier within that kind.
 */
export class ProtocolError extends Error {
  readonly kind: ProtocolErrorKind;
  readonly code?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: ProtocolErrorKind,
    message: string,
    options: ProtocolErrorOptions = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ProtocolError";
    this.kind = kind;
    this.code = options.code;
    this.details = options.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

export function isProtocolError(
  error: unknown,
  kind?: ProtocolErrorKind,
): error is ProtocolError {
  return (
    error instanceof ProtocolError && (kind === undefined || error.kind === kind)
  );
}

export function validationError(
  message: string,
  field?: string,
  details?: Record<string, unknown>,
): ProtocolError {
  return new ProtocolError("validation", message, {
    code: field ? `INVALID_${toCode(field)}` : "INVALID_INPUT",
    details: field ? { field, ...details } : details,
  });
}

export function storageError(
  message: string,
  options?: ProtocolErrorOptions,
): ProtocolError {
  return new ProtocolError("storage", message, options);
}

export function keyError(
  message: string,
  options?: ProtocolErrorOptions,
): ProtocolError {
  return new ProtocolError("key", message, options);
}

export function networkError(
  message: string,
  options?: ProtocolErrorOptions,
): ProtocolError {
  return new ProtocolError("network", message, options);
}

export function initializationError(
  message: string,
  options?: ProtocolErrorOptions,
): ProtocolError {
  return new ProtocolError("initialization", message, options);
}

export function securityError(
  message: string,
  options?: ProtocolErrorOptions,
): ProtocolError {
  return new ProtocolError("security", message, options);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an arbitrary storage failure. Protocol errors pass through untouched
 * so a security or validation failure raised below keeps its kind.
 */
export function wrapStorageError(error: unknown, context: string): ProtocolError {
  if (error instanceof ProtocolError) return error;
  return storageError(
    `Storage operation failed in ${context}: ${describeError(error)}`,
    { code: "STORAGE_FAILURE", details: { context }, cause: error },
  );
}

export function wrapNetworkError(error: unknown, context: string): ProtocolError {
  if (error instanceof ProtocolError) return error;
  return networkError(
    `Directory operation failed in ${context}: ${describeError(error)}`,
    { code: "DIRECTORY_UNREACHABLE", details: { context }, cause: error },
  );
}

function toCode(field: string): string {
  return field
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[^A-Za-z0-9]+/g, "_")
    .toUpperCase();
}
