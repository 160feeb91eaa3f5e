import { silentLogger, type Logger } from './logger.js';
import type { HostPlatform } from './types.js';

/**
 * Alternative spellings of an architecture used in release names.
 * Only these pairs are equivalent; i386 never matches amd64.
 */
const ARCH_SYNONYMS: Readonly<Record<string, readonly string[]>> = {
  amd64: ['x86_64'],
  '386': ['i386'],
  arm64: ['aarch64'],
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the OS/architecture patterns for a host. Each architecture spelling
 * yields `os<sep>arch`, `arch<sep>os` and "both anywhere, either order".
 */
export function buildPlatformPatterns(host: HostPlatform): RegExp[] {
  if (host.os === '' || host.arch === '') {
    return [];
  }

  const os = escapeRegExp(host.os);
  const archTokens = [host.arch, ...(ARCH_SYNONYMS[host.arch] ?? [])].map(escapeRegExp);

  return archTokens.flatMap((arch) => [
    new RegExp(`${os}[-_/]${arch}`, 'i'),
    new RegExp(`${arch}[-_/]${os}`, 'i'),
    new RegExp(`(${os}.*${arch}|${arch}.*${os})`, 'i'),
  ]);
}

/**
 * Decides whether an asset filename was built for the host platform.
 * Construct once at startup with {@link PlatformMatcher.forHost}.
 */
export class PlatformMatcher {
  private constructor(
    private readonly patterns: readonly RegExp[],
    private readonly logger: Logger
  ) {}

  static forHost(host: HostPlatform, logger: Logger = silentLogger): PlatformMatcher {
    const patterns = buildPlatformPatterns(host);
    logger.debug(`Compiled ${patterns.length} OS/Arch patterns for ${host.os}/${host.arch}`);
    return new PlatformMatcher(patterns, logger);
  }

  matches(filename: string): boolean {
    if (this.patterns.length === 0) {
      this.logger.warn('OS/Arch patterns are empty, no asset can match this platform');
      return false;
    }

    const matched = this.patterns.find((pattern) => pattern.test(filename));
    if (matched) {
      this.logger.debug(`File '${filename}' matched pattern ${matched.source}`);
      return true;
    }
    this.logger.debug(`File '${filename}' did not match any OS/arch pattern`);
    return false;
  }
}
