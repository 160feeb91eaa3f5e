import { rm } from 'node:fs/promises';
import { ChecksumMismatchError, describeError, UnsupportedAlgorithmError, VerificationUnavailableError } from './errors.js';
import { DEFAULT_ALGORITHM, isSupportedAlgorithm, type HashEngine } from './hash.js';
import { silentLogger, type Logger } from './logger.js';
import type { ChecksumEntry } from './types.js';

export interface ChecksumVerifierOptions {
  hashEngine: HashEngine;
  /** Algorithm assumed for manifests like checksums.txt, sha256 by default */
  defaultAlgorithm?: string;
  logger?: Logger;
}

/**
 * Checks a downloaded asset against the digest its checksum manifest lists.
 */
export class ChecksumVerifier {
  private readonly hashEngine: HashEngine;
  private readonly defaultAlgorithm: string;
  private readonly logger: Logger;

  constructor(options: ChecksumVerifierOptions) {
    this.hashEngine = options.hashEngine;
    this.defaultAlgorithm = options.defaultAlgorithm ?? DEFAULT_ALGORITHM;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Pick the algorithm: the override, else the manifest's extension,
   * else the default.
   *
   * @throws UnsupportedAlgorithmError
   */
  resolveAlgorithm(manifestPath: string, algorithmOverride?: string): string {
    let algorithm: string;
    if (algorithmOverride) {
      algorithm = algorithmOverride;
      this.logger.debug(`Using algorithm '${algorithm}' from override`);
    } else {
      const fromName = this.hashEngine.algorithmFromFilename(manifestPath);
      if (fromName !== undefined) {
        algorithm = fromName;
        this.logger.debug(`Using algorithm '${algorithm}' derived from checksum file extension: ${manifestPath}`);
      } else {
        algorithm = this.defaultAlgorithm;
        this.logger.debug(`Checksum file '${manifestPath}' has no algorithm extension. Using default: '${algorithm}'`);
      }
    }

    if (!isSupportedAlgorithm(algorithm)) {
      throw new UnsupportedAlgorithmError(algorithm);
    }
    return algorithm.toLowerCase();
  }

  /**
   * Verify `mainAssetPath` against the entry for `originalName` in the
   * manifest. On success the manifest is removed. The main asset is never
   * removed here; what to do on failure is the caller's decision.
   *
   * @throws UnsupportedAlgorithmError if the resolved algorithm is unknown
   * @throws VerificationUnavailableError if the manifest has no usable entry
   * @throws FileAccessError if the asset cannot be hashed
   * @throws ChecksumMismatchError if the digests differ
   */
  async verify(
    mainAssetPath: string,
    originalName: string,
    manifestPath: string,
    algorithmOverride?: string
  ): Promise<ChecksumEntry> {
    this.logger.info('Verifying checksum...');
    const algorithm = this.resolveAlgorithm(manifestPath, algorithmOverride);

    let expectedDigest: string;
    try {
      expectedDigest = await this.hashEngine.parseChecksumManifest(manifestPath, originalName);
    } catch (error) {
      this.logger.warn(
        `Failed to find/parse checksum for '${originalName}' in '${manifestPath}': ${describeError(error)}`
      );
      throw new VerificationUnavailableError(originalName, manifestPath, error);
    }

    const actualDigest = await this.hashEngine.hashFile(mainAssetPath, algorithm);

    if (expectedDigest.toLowerCase() !== actualDigest.toLowerCase()) {
      this.logger.error(`CHECKSUM MISMATCH for ${originalName} (file: ${mainAssetPath})!`);
      this.logger.error(`  Expected: ${expectedDigest}`);
      this.logger.error(`  Actual:   ${actualDigest}`);
      throw new ChecksumMismatchError(originalName, expectedDigest, actualDigest);
    }

    this.logger.info(`Checksum verified successfully (${algorithm}).`);
    try {
      await rm(manifestPath);
      this.logger.debug(`Removed checksum file: ${manifestPath}`);
    } catch (error) {
      this.logger.warn(`Could not remove checksum file '${manifestPath}' after verification: ${describeError(error)}`);
    }

    return { expectedDigest, algorithm };
  }
}
