export type MicrodoseErrorCode =
  | "IO"
  | "SERIALIZATION"
  | "CATALOG_INVALID"
  | "PRESCRIPTION"
  | "LOCK_TIMEOUT"
  | "CONFIG";

export class MicrodoseError extends Error {
  readonly code: MicrodoseErrorCode;
  readonly retryable: boolean;

  constructor(code: MicrodoseErrorCode, message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/** Disk or permission failure on a write path. Prior durable state is untouched. */
export class PersistenceError extends MicrodoseError {
  constructor(message: string, cause?: unknown) {
    super("IO", message, { cause, retryable: true });
  }
}

export class SerializationError extends MicrodoseError {
  constructor(message: string, cause?: unknown) {
    super("SERIALIZATION", message, { cause });
  }
}

export class CatalogValidationError extends MicrodoseError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CATALOG_INVALID", `Catalog is invalid:\n  - ${issues.join("\n  - ")}`);
    this.issues = issues;
  }
}

export class PrescriptionError extends MicrodoseError {
  constructor(message: string) {
    super("PRESCRIPTION", message);
  }
}

export class LockTimeoutError extends MicrodoseError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super("LOCK_TIMEOUT", `Timed out waiting for lock on ${path}`, { cause, retryable: true });
    this.path = path;
  }
}

export class ConfigError extends MicrodoseError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNodeErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/** Passes typed errors through and wraps raw IO failures. */
export function asPersistenceError(error: unknown, message: string): MicrodoseError {
  if (error instanceof MicrodoseError) {
    return error;
  }
  return new PersistenceError(`${message}: ${errorMessage(error)}`, error);
}
