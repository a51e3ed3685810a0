export type CodegenErrorKind =
  | "ConfigurationError"
  | "SchemaConnectionFailure"
  | "TableSelectionEmpty"
  | "OracleUnavailable"
  | "OracleRateLimited"
  | "MalformedResponse"
  | "WriteFailure"
  | "TargetPathConflict"
  | "Cancelled";

const RETRYABLE_KINDS: ReadonlySet<CodegenErrorKind> = new Set([
  "OracleUnavailable",
  "OracleRateLimited",
]);

const RUN_FATAL_KINDS: ReadonlySet<CodegenErrorKind> = new Set([
  "ConfigurationError",
  "SchemaConnectionFailure",
]);

export type CodegenErrorOptions = ErrorOptions & {
  /** Oracle attempts made before the error was raised. */
  attempts?: number;
};

export class CodegenError extends Error {
  readonly kind: CodegenErrorKind;
  readonly attempts: number;

  constructor(kind: CodegenErrorKind, message: string, options: CodegenErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CodegenError";
    this.kind = kind;
    this.attempts = options.attempts ?? 0;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }

  get runFatal(): boolean {
    return RUN_FATAL_KINDS.has(this.kind);
  }
}

export function isCodegenError(error: unknown): error is CodegenError {
  return error instanceof CodegenError;
}

// Errors from Node's fs may come from another realm (Jest runs tests in a vm
// context), so these read fields by shape instead of `instanceof Error`.
function readStringField(error: unknown, field: string): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

export function errorMessage(error: unknown): string {
  return readStringField(error, "message") ?? String(error);
}

export function errorName(error: unknown): string {
  return readStringField(error, "name") ?? "";
}

/** Node.js system error code (`ENOENT`, `EEXIST`, ...), when present. */
export function errorCode(error: unknown): string | undefined {
  return readStringField(error, "code");
}

/** Re-labels any non-codegen error with the given kind, keeping it as the cause. */
export function asCodegenError(
  error: unknown,
  fallbackKind: CodegenErrorKind,
  context?: string,
): CodegenError {
  if (isCodegenError(error)) {
    return error;
  }
  const message = context ? `${context}: ${errorMessage(error)}` : errorMessage(error);
  return new CodegenError(fallbackKind, message, { cause: error });
}
