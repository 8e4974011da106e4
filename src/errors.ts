/**
 * Error taxonomy for the SDK configuration store.
 *
 * Every failure surfaced by the store is a {@link ConfigurationError}; callers
 * that only care whether the store worked can catch the base class.
 */

/** Base class for all configuration store failures. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The configuration file exists but a section could not be turned into a
 * robot configuration (missing key, bad address, unreadable certificate).
 */
export class ConfigurationLoadError extends ConfigurationError {
  public readonly filePath: string;
  public readonly serialNumber: string | undefined;

  constructor(
    message: string,
    details: { filePath: string; serialNumber?: string },
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConfigurationLoadError';
    this.filePath = details.filePath;
    this.serialNumber = details.serialNumber;
  }
}

/** One field that failed validation before a write. */
export interface ValidationIssue {
  /** Serial number of the offending entry, when it has one. */
  readonly serialNumber?: string;
  readonly field: string;
  readonly reason: string;
}

/**
 * One or more entries were rejected before anything was written.
 */
export class ConfigurationValidationError extends ConfigurationError {
  public readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    super(ConfigurationValidationError.describe(issues));
    this.name = 'ConfigurationValidationError';
    this.issues = issues;
  }

  /** Names of the offending fields, in issue order, without duplicates. */
  get fields(): string[] {
    return [...new Set(this.issues.map((issue) => issue.field))];
  }

  private static describe(issues: readonly ValidationIssue[]): string {
    const parts = issues.map((issue) =>
      issue.serialNumber
        ? `${issue.serialNumber}: ${issue.field} ${issue.reason}`
        : `${issue.field} ${issue.reason}`,
    );
    return `Invalid robot configuration (${parts.join('; ')})`;
  }
}

/**
 * A filesystem operation failed: directory creation, file read or file write.
 */
export class ConfigurationIOError extends ConfigurationError {
  public readonly path: string;
  public readonly code: string | undefined;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationIOError';
    this.path = path;
    this.code = errorCode(options?.cause);
  }
}

/** Extract the errno-style `code` from an unknown thrown value. */
export function errorCode(err: unknown): string | undefined {
  if (err !== null && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
