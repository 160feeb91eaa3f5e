/**
 * Binary manager: finds the release asset for this platform, downloads it
 * with its checksum manifest, verifies it and places it on disk.
 */

import { chmod, mkdir, rm, stat } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { dir } from 'tmp-promise';
import { PlatformMatcher } from './asset-matcher.js';
import { selectAssets } from './asset-selector.js';
import { AssetDownloader } from './downloader.js';
import {
  ChecksumMismatchError,
  describeError,
  FileAccessError,
  NoSuitableAssetError,
  VerificationUnavailableError,
} from './errors.js';
import type { ReleaseSource } from './github-client.js';
import { DEFAULT_ALGORITHM, HashEngine } from './hash.js';
import { silentLogger, type Logger } from './logger.js';
import { isSystemPackage } from './platform.js';
import { noProgress, type ProgressFactory } from './progress.js';
import { formatRepositoryReference, LATEST_VERSION } from './repository-ref.js';
import type {
  BinaryManagerConfig,
  DownloadedFile,
  HostPlatform,
  InstalledAsset,
  NamedAsset,
  Release,
  RepositoryReference,
  VerificationStatus,
} from './types.js';
import { ChecksumVerifier } from './verifier.js';

const ARCHIVE_EXTENSIONS = ['.tar.gz', '.tgz', '.tar.xz', '.tar.bz2', '.zip'];

/** A `-1.2.3`, `_v1.2.3` style version marker inside an asset name */
const VERSION_MARKER = /[_-]v?\d+\.\d+\.\d+/;

const EXECUTE_BITS = 0o111;

/**
 * Create the default configuration, applying any overrides.
 */
export function createDefaultConfig(
  overrides: Partial<BinaryManagerConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): BinaryManagerConfig {
  return {
    binDir: overrides.binDir ?? defaultBinDir(env),
    binName: overrides.binName,
    checksumDir: overrides.checksumDir ?? process.cwd(),
    defaultAlgorithm: overrides.defaultAlgorithm ?? DEFAULT_ALGORITHM,
    algorithmOverride: overrides.algorithmOverride,
    deleteOnMismatch: overrides.deleteOnMismatch ?? true,
    token: overrides.token ?? (env.GITHUB_TOKEN || undefined),
  };
}

/**
 * XDG bin home: $XDG_BIN_HOME, falling back to ~/.local/bin
 */
export function defaultBinDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.XDG_BIN_HOME || path.join(os.homedir(), '.local', 'bin');
}

/**
 * Derive the name to install a raw binary under from its asset name.
 *
 * Archives keep their full name. Otherwise everything from the first
 * version marker (`_v1.2.3`, `-1.2.3`) is dropped, or, without one,
 * everything from the first `-` or `_`. A `.exe` suffix is kept.
 *
 * @example
 * deriveBinaryName('tool_1.4.0_linux_amd64'); // "tool"
 * deriveBinaryName('my-tool-v2.0.1-darwin-arm64'); // "my-tool"
 */
export function deriveBinaryName(assetName: string): string {
  const lower = assetName.toLowerCase();
  if (ARCHIVE_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
    return assetName;
  }

  let name: string;
  const marker = VERSION_MARKER.exec(assetName);
  if (marker && marker.index > 0) {
    name = assetName.slice(0, marker.index);
  } else {
    name = assetName.split(/[-_]/)[0] || assetName;
  }

  if (lower.endsWith('.exe') && !name.toLowerCase().endsWith('.exe')) {
    name += '.exe';
  }
  return name;
}

export interface BinaryManagerDependencies {
  source: ReleaseSource;
  host: HostPlatform;
  logger?: Logger;
  progress?: ProgressFactory;
  hashEngine?: HashEngine;
}

export class BinaryManager {
  private readonly source: ReleaseSource;
  private readonly host: HostPlatform;
  private readonly logger: Logger;
  private readonly hashEngine: HashEngine;
  private readonly matcher: PlatformMatcher;
  private readonly downloader: AssetDownloader;
  private readonly verifier: ChecksumVerifier;

  constructor(
    private readonly config: BinaryManagerConfig,
    dependencies: BinaryManagerDependencies
  ) {
    this.source = dependencies.source;
    this.host = dependencies.host;
    this.logger = dependencies.logger ?? silentLogger;
    this.hashEngine = dependencies.hashEngine ?? new HashEngine({ logger: this.logger });
    this.matcher = PlatformMatcher.forHost(this.host, this.logger);
    this.downloader = new AssetDownloader(this.source, {
      logger: this.logger,
      progress: dependencies.progress ?? noProgress,
    });
    this.verifier = new ChecksumVerifier({
      hashEngine: this.hashEngine,
      defaultAlgorithm: config.defaultAlgorithm,
      logger: this.logger,
    });
  }

  /**
   * Download, verify and place the asset of a release that matches this
   * platform.
   */
  async install(ref: RepositoryReference, signal?: AbortSignal): Promise<InstalledAsset> {
    await this.reportRateLimit();

    const release = await this.lookupRelease(ref, signal);
    if (release.assets.length === 0) {
      throw new NoSuitableAssetError(`no assets found for release '${release.tagName}'`);
    }

    const selection = selectAssets(release.assets, {
      hashEngine: this.hashEngine,
      matcher: this.matcher,
      packageFamily: this.host.packageFamily,
      logger: this.logger,
    });
    const { mainAsset, checksumAsset } = selection;

    this.logger.info(`Selected main asset for download: ${mainAsset.name}`);
    if (checksumAsset) {
      this.logger.info(`Selected checksum file: ${checksumAsset.name}`);
    } else {
      this.logger.warn('No checksum file found. Proceeding without verification.');
    }

    const targetPath = await this.resolveTargetPath(mainAsset.name);
    this.logger.debug(`Main asset ('${mainAsset.name}') will be saved as: ${targetPath}`);

    const downloaded = await this.downloader.downloadAndSave(ref, mainAsset, targetPath, signal);

    const verification: VerificationStatus = checksumAsset
      ? await this.verifyWithManifest(ref, downloaded, checksumAsset, signal)
      : 'skipped';

    if (!isSystemPackage(mainAsset.name) && this.host.os !== 'windows') {
      await this.makeExecutable(downloaded.localPath);
    }

    return {
      name: mainAsset.name,
      path: downloaded.localPath,
      contentType: mainAsset.contentType ?? 'application/octet-stream',
      verification,
      tagName: release.tagName,
    };
  }

  private async lookupRelease(ref: RepositoryReference, signal?: AbortSignal): Promise<Release> {
    if (ref.version === LATEST_VERSION) {
      this.logger.info(`Fetching assets for latest release of ${ref.owner}/${ref.repo}`);
      const release = await this.source.getLatestRelease(ref.owner, ref.repo, signal);
      this.logger.info(`Latest release tag: ${release.tagName}`);
      return release;
    }
    this.logger.info(`Fetching assets for release tag '${ref.version}' of ${ref.owner}/${ref.repo}`);
    return this.source.getReleaseByTag(ref.owner, ref.repo, ref.version, signal);
  }

  private async reportRateLimit(): Promise<void> {
    if (!this.source.checkRateLimit) {
      return;
    }
    try {
      const rate = await this.source.checkRateLimit();
      this.logger.debug(
        `Rate Limit: ${rate.remaining}/${rate.limit} remaining | Resets @ ${rate.resetAt.toLocaleTimeString()}`
      );
    } catch (error) {
      this.logger.debug(`Could not retrieve rate limits: ${describeError(error)}`);
    }
  }

  /**
   * System packages go to a fresh temporary directory under their own name;
   * everything else goes to the bin directory.
   */
  private async resolveTargetPath(assetName: string): Promise<string> {
    if (isSystemPackage(assetName)) {
      const { path: tmpPath } = await dir({ prefix: 'relget' });
      return path.join(tmpPath, this.config.binName ?? assetName);
    }

    const targetDir = this.config.binDir;
    try {
      await mkdir(targetDir, { recursive: true, mode: 0o750 });
    } catch (error) {
      throw new FileAccessError(`failed to create target directory '${targetDir}'`, targetDir, error);
    }
    return path.join(targetDir, this.config.binName ?? deriveBinaryName(assetName));
  }

  private async verifyWithManifest(
    ref: RepositoryReference,
    downloaded: DownloadedFile,
    checksumAsset: NamedAsset,
    signal?: AbortSignal
  ): Promise<VerificationStatus> {
    const manifestPath = path.join(this.config.checksumDir, path.basename(checksumAsset.name));
    this.logger.debug(`Checksum asset ('${checksumAsset.name}') will be saved as: ${manifestPath}`);

    try {
      await this.downloader.downloadAndSave(ref, checksumAsset, manifestPath, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.error(
        `Failed to download checksum file '${checksumAsset.name}': ${describeError(error)}. Checksum verification will be SKIPPED.`
      );
      this.logger.warn(`Integrity of '${downloaded.originalName}' (at ${downloaded.localPath}) is NOT confirmed.`);
      return 'unverified';
    }

    try {
      await this.verifier.verify(
        downloaded.localPath,
        downloaded.originalName,
        manifestPath,
        this.config.algorithmOverride
      );
      return 'verified';
    } catch (error) {
      if (error instanceof VerificationUnavailableError) {
        this.logger.warn(
          `Integrity of '${downloaded.originalName}' (at ${downloaded.localPath}) is NOT confirmed: ${error.message}`
        );
        return 'unverified';
      }
      if (error instanceof ChecksumMismatchError && this.config.deleteOnMismatch) {
        await this.removeFile(downloaded.localPath);
      }
      throw error;
    } finally {
      await this.removeFile(manifestPath);
    }
  }

  private async makeExecutable(filePath: string): Promise<void> {
    try {
      const { mode } = await stat(filePath);
      await chmod(filePath, (mode & 0o777) | EXECUTE_BITS);
    } catch (error) {
      throw new FileAccessError(`failed to make '${filePath}' executable`, filePath, error);
    }
    this.logger.debug(`Set execute permissions on ${filePath}`);
  }

  private async removeFile(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
    } catch (error) {
      this.logger.warn(`Could not remove '${filePath}': ${describeError(error)}`);
    }
  }

  describe(ref: RepositoryReference): string {
    return `${formatRepositoryReference(ref)} for ${this.host.os}/${this.host.arch}`;
  }
}
