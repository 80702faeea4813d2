/**
 * Error taxonomy for bump runs.
 *
 * Only {@link DocumentIOError} is fatal to a run. Everything else is recorded
 * per package on the bump result and never thrown across the driver.
 *
 * @module
 */

export class BumpError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A requirement line or request string that does not match the grammar.
 */
export class ParseError extends BumpError {
  public constructor(public readonly text: string, reason: string) {
    super(`Could not parse requirement "${text}": ${reason}`);
  }
}

/**
 * The version provider has never heard of the package.
 */
export class PackageNotFoundError extends BumpError {
  public constructor(public readonly packageName: string, options?: { cause?: unknown }) {
    super(`Package not found: ${packageName}`, options);
  }
}

/**
 * No version could be resolved for a requested bump.
 */
export class VersionNotFoundError extends BumpError {
  public constructor(
    public readonly packageName: string,
    message?: string,
    options?: { cause?: unknown },
  ) {
    super(message ?? `No published version found for ${packageName}`, options);
  }
}

export class UnsatisfiedRequirementError extends BumpError {
  public constructor(public readonly requirements: string[]) {
    super(`Requirement(s) could not be met: ${requirements.join(', ')}`);
  }
}

/**
 * Reading or writing a requirements document failed.
 */
export class DocumentIOError extends BumpError {
  public constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${message}: ${path}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
