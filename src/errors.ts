/**
 * Package manager error types.
 *
 * Every failure the install flow can raise is a PackageManagerError with a
 * typed code, so callers can branch on `code` instead of parsing messages.
 */

export type PackageManagerErrorCode =
  | "ECONFIG" // Manifest, lock file or environment is missing/unparseable
  | "ERANGE" // Version range string failed to parse
  | "EFETCH" // Network transport failed
  | "EREGISTRY" // Registry response unusable
  | "ENOTFOUND" // No published version satisfies the range
  | "EINTEGRITY" // Digest mismatch or unsupported algorithm
  | "EEXTRACT" // Tarball malformed or filesystem write failed
  | "EPERSIST"; // Lock file could not be written

/**
 * Context attached to an error for diagnostics.
 */
export interface PackageManagerErrorContext {
  package?: string;
  version?: string;
  range?: string;
  url?: string;
  path?: string;
}

export interface PackageManagerErrorOptions {
  context?: PackageManagerErrorContext;
  cause?: unknown;
}

export class PackageManagerError extends Error {
  readonly code: PackageManagerErrorCode;
  readonly context?: PackageManagerErrorContext;

  constructor(
    code: PackageManagerErrorCode,
    message: string,
    options: PackageManagerErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "PackageManagerError";
    this.code = code;
    this.context = options.context;

    // Fix prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends PackageManagerError {
  constructor(message: string, options?: PackageManagerErrorOptions) {
    super("ECONFIG", message, options);
    this.name = "ConfigError";
  }
}

export class InvalidRangeError extends PackageManagerError {
  constructor(range: string, packageName?: string) {
    const subject = packageName ? ` for ${packageName}` : "";
    super("ERANGE", `Invalid version range "${range}"${subject}`, {
      context: { package: packageName, range },
    });
    this.name = "InvalidRangeError";
  }
}

/**
 * Transport-level failure. `status` is set when the server answered with
 * a non-2xx response.
 */
export class NetworkError extends PackageManagerError {
  readonly status?: number;
  readonly statusText?: string;

  constructor(
    message: string,
    options: { url: string; status?: number; statusText?: string; cause?: unknown },
  ) {
    super("EFETCH", message, {
      context: { url: options.url },
      cause: options.cause,
    });
    this.name = "NetworkError";
    this.status = options.status;
    this.statusText = options.statusText;
  }
}

export class RegistryError extends PackageManagerError {
  constructor(message: string, packageName: string, cause?: unknown) {
    super("EREGISTRY", message, { context: { package: packageName }, cause });
    this.name = "RegistryError";
  }
}

export class ResolutionNotFoundError extends PackageManagerError {
  constructor(packageName: string, range: string) {
    super("ENOTFOUND", `No matching version found for ${packageName}@${range}`, {
      context: { package: packageName, range },
    });
    this.name = "ResolutionNotFoundError";
  }
}

export class IntegrityError extends PackageManagerError {
  constructor(message: string, context?: PackageManagerErrorContext) {
    super("EINTEGRITY", message, { context });
    this.name = "IntegrityError";
  }
}

export class UnsupportedAlgorithmError extends IntegrityError {
  readonly digest: string;

  constructor(digest: string) {
    super(`Unsupported hash algorithm in ${digest}`);
    this.name = "UnsupportedAlgorithmError";
    this.digest = digest;
  }
}

export class IntegrityMismatchError extends IntegrityError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Integrity check failed. Expected ${expected}, got ${actual}`);
    this.name = "IntegrityMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class ExtractError extends PackageManagerError {
  constructor(message: string, options?: PackageManagerErrorOptions) {
    super("EEXTRACT", message, options);
    this.name = "ExtractError";
  }
}

export class PersistenceError extends PackageManagerError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super("EPERSIST", message, { context: { path: filePath }, cause });
    this.name = "PersistenceError";
  }
}

/**
 * Finds the NetworkError behind an error, looking through `cause` links.
 */
function findNetworkError(error: unknown): NetworkError | undefined {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof NetworkError) {
      return current;
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Renders an error as the diagnostic shown to the user. Network failures get
 * an extra line with the HTTP status when the server answered.
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return "An unknown error occurred.";
  }

  const lines = [error.message];
  const networkError = findNetworkError(error);
  if (networkError?.status !== undefined) {
    const statusText = networkError.statusText ? ` ${networkError.statusText}` : "";
    lines.push(`HTTP status: ${networkError.status}.${statusText}`);
  }
  return lines.join("\n");
}
