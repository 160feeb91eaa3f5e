import type { Readable } from 'node:stream';

/**
 * Operating system tokens as they appear in release asset names
 */
export type OS = 'darwin' | 'linux' | 'windows' | 'freebsd' | 'openbsd' | 'netbsd' | 'solaris' | 'aix' | '';

/**
 * CPU architecture tokens as they appear in release asset names
 */
export type Arch = 'amd64' | '386' | 'arm64' | 'arm' | 'ppc64le' | 'ppc64' | 's390x' | 'riscv64' | '';

/**
 * Native package format of the host's Linux distribution
 */
export type PackageFamily = 'deb' | 'rpm' | 'apk';

/**
 * Platform information for asset selection
 */
export interface HostPlatform {
  os: OS;
  arch: Arch;
  packageFamily?: PackageFamily;
}

/**
 * Repository and release identified by an `owner/repo[@version]` argument
 */
export interface RepositoryReference {
  readonly owner: string;
  readonly repo: string;
  /** "latest" or an explicit release tag */
  readonly version: string;
}

/**
 * GitHub release asset information.
 * Fields may be missing when the API response is incomplete.
 */
export interface ReleaseAsset {
  name?: string;
  id?: number;
  size?: number;
  contentType?: string;
}

/**
 * A release asset that carries both a name and an identifier
 */
export interface NamedAsset extends ReleaseAsset {
  name: string;
  id: number;
}

/**
 * GitHub release information
 */
export interface Release {
  tagName: string;
  assets: ReleaseAsset[];
}

/**
 * Assets chosen from a release for download
 */
export interface SelectionResult {
  readonly mainAsset: NamedAsset;
  readonly checksumAsset?: NamedAsset;
}

/**
 * Result of a completed download
 */
export interface DownloadedFile {
  /** Name of the asset on GitHub */
  originalName: string;
  /** Where the bytes were written */
  localPath: string;
  /** Bytes written */
  sizeBytes: number;
}

/**
 * Expected digest of an asset and the algorithm that produced it
 */
export interface ChecksumEntry {
  expectedDigest: string;
  algorithm: string;
}

/**
 * Byte source returned by the release source for an asset download.
 * A redirect without a stream cannot be hashed incrementally.
 */
export type AssetDownload =
  | { kind: 'stream'; stream: Readable }
  | { kind: 'redirect'; location: string };

/**
 * How far integrity of an installed asset was confirmed
 */
export type VerificationStatus = 'verified' | 'unverified' | 'skipped';

/**
 * An asset that was downloaded and placed on disk
 */
export interface InstalledAsset {
  /** Original filename of the asset on GitHub */
  name: string;
  /** Local path the asset was saved to */
  path: string;
  /** MIME content type reported by GitHub */
  contentType: string;
  verification: VerificationStatus;
  /** Release tag the asset belongs to */
  tagName: string;
}

/**
 * Configuration for the binary manager
 */
export interface BinaryManagerConfig {
  /** Directory raw binaries are saved to, defaults to $XDG_BIN_HOME or ~/.local/bin */
  binDir: string;
  /** Name to save the main asset as, derived from the asset name when unset */
  binName?: string;
  /** Directory checksum manifests are saved to, defaults to the working directory */
  checksumDir: string;
  /** Algorithm for manifests whose name carries none */
  defaultAlgorithm: string;
  /** Algorithm that replaces any derived from the manifest name */
  algorithmOverride?: string;
  /** Remove the downloaded asset when its checksum does not match */
  deleteOnMismatch: boolean;
  /** GitHub token, from GITHUB_TOKEN */
  token?: string;
}

/**
 * CLI options parsed from command line arguments
 */
export interface CLIOptions {
  /** owner/repo[@version] */
  repository: string;
  /** Name to save the binary as */
  binName?: string;
  /** Directory to save the binary to */
  path?: string;
  /** Checksum algorithm override */
  sha?: string;
  /** Enable verbose/debug logging */
  verbose: boolean;
}
