/**
 * Error types for release lookup, download and checksum verification.
 */

/**
 * Error codes carried by every {@link InstallError}.
 */
export type InstallErrorCode =
  | 'INVALID_ARGUMENT_FORMAT'
  | 'RELEASE_NOT_FOUND'
  | 'RATE_LIMITED'
  | 'RELEASE_LOOKUP_FAILED'
  | 'NO_SUITABLE_ASSET'
  | 'MALFORMED_ASSET'
  | 'UNEXPECTED_REDIRECT'
  | 'DOWNLOAD_INCOMPLETE'
  | 'UNSUPPORTED_ALGORITHM'
  | 'IO_ERROR'
  | 'ENTRY_NOT_FOUND'
  | 'VERIFICATION_UNAVAILABLE'
  | 'CHECKSUM_MISMATCH';

/**
 * Base class for all errors raised by the install pipeline.
 */
export class InstallError extends Error {
  constructor(
    message: string,
    readonly code: InstallErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidArgumentFormatError extends InstallError {
  constructor(readonly input: string, detail: string) {
    super(`invalid argument format '${input}': ${detail}`, 'INVALID_ARGUMENT_FORMAT');
  }
}

export class ReleaseNotFoundError extends InstallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RELEASE_NOT_FOUND', options);
  }
}

export class RateLimitedError extends InstallError {
  constructor(
    message: string,
    /** When the rate limit resets, if GitHub reported it */
    readonly resetAt: Date | undefined,
    options?: { cause?: unknown }
  ) {
    super(message, 'RATE_LIMITED', options);
  }
}

export class ReleaseLookupFailedError extends InstallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RELEASE_LOOKUP_FAILED', options);
  }
}

export class NoSuitableAssetError extends InstallError {
  constructor(message = 'no suitable asset found for download') {
    super(message, 'NO_SUITABLE_ASSET');
  }
}

export class MalformedAssetError extends InstallError {
  constructor(detail: string) {
    super(`asset has missing information: ${detail}`, 'MALFORMED_ASSET');
  }
}

export class UnexpectedRedirectError extends InstallError {
  constructor(readonly assetName: string, readonly location: string) {
    super(
      `download of '${assetName}' resulted in redirect URL '${location}' instead of data stream`,
      'UNEXPECTED_REDIRECT'
    );
  }
}

export class DownloadIncompleteError extends InstallError {
  constructor(
    readonly assetName: string,
    readonly targetPath: string,
    cause: unknown
  ) {
    super(
      `error saving data for '${assetName}' to '${targetPath}': ${describeError(cause)}`,
      'DOWNLOAD_INCOMPLETE',
      { cause }
    );
  }
}

export class UnsupportedAlgorithmError extends InstallError {
  constructor(readonly algorithm: string) {
    super(`invalid or unsupported hash algorithm: ${algorithm}`, 'UNSUPPORTED_ALGORITHM');
  }
}

/**
 * A local file could not be opened, read or written.
 */
export class FileAccessError extends InstallError {
  constructor(
    message: string,
    readonly path: string,
    cause: unknown
  ) {
    super(`${message}: ${describeError(cause)}`, 'IO_ERROR', { cause });
  }
}

export class EntryNotFoundError extends InstallError {
  constructor(
    readonly targetFilename: string,
    readonly manifestPath: string
  ) {
    super(
      `checksum for target '${targetFilename}' not found in checksum file '${manifestPath}'`,
      'ENTRY_NOT_FOUND'
    );
  }
}

export class VerificationUnavailableError extends InstallError {
  constructor(
    readonly assetName: string,
    readonly manifestPath: string,
    cause: unknown
  ) {
    super(
      `checksum verification unavailable for '${assetName}': could not find entry in checksum file '${manifestPath}'`,
      'VERIFICATION_UNAVAILABLE',
      { cause }
    );
  }
}

export class ChecksumMismatchError extends InstallError {
  constructor(
    readonly assetName: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(
      `checksum mismatch for '${assetName}': expected '${expected}', got '${actual}'`,
      'CHECKSUM_MISMATCH'
    );
  }
}

/**
 * Render any thrown value as a message string.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
