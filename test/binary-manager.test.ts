import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { mkdir, readdir, readFile, rm, stat } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { dir, type DirectoryResult } from 'tmp-promise';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { BinaryManager, createDefaultConfig, defaultBinDir, deriveBinaryName } from '../src/binary-manager.js';
import { ChecksumMismatchError, NoSuitableAssetError, ReleaseNotFoundError } from '../src/errors.js';
import type { RateLimitStatus, ReleaseSource } from '../src/github-client.js';
import type { Logger } from '../src/logger.js';
import type { AssetDownload, BinaryManagerConfig, HostPlatform, Release, ReleaseAsset } from '../src/types.js';

const BINARY = 'binary-contents';
const MAIN = 'tool_1.2.3_linux_amd64';

function sha256(contents: string): string {
  return createHash('sha256').update(contents).digest('hex');
}

function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

/**
 * In-memory release source serving asset bodies by id
 */
class FakeReleaseSource implements ReleaseSource {
  readonly lookups: string[] = [];
  rateLimit?: () => Promise<RateLimitStatus>;

  constructor(
    private readonly release: Release,
    private readonly bodies: Map<number, string>
  ) {}

  async getLatestRelease(owner: string, repo: string): Promise<Release> {
    this.lookups.push(`latest ${owner}/${repo}`);
    return this.release;
  }

  async getReleaseByTag(owner: string, repo: string, tag: string): Promise<Release> {
    this.lookups.push(`tag ${owner}/${repo}@${tag}`);
    return this.release;
  }

  async downloadAsset(_owner: string, _repo: string, assetId: number): Promise<AssetDownload> {
    const body = this.bodies.get(assetId);
    if (body === undefined) {
      throw new ReleaseNotFoundError(`asset ${assetId} not found`);
    }
    return { kind: 'stream', stream: Readable.from([Buffer.from(body)]) };
  }

  async checkRateLimit(): Promise<RateLimitStatus> {
    if (!this.rateLimit) {
      throw new Error('rate limit unavailable');
    }
    return this.rateLimit();
  }
}

function asset(id: number, name: string, body: string): ReleaseAsset {
  return { id, name, size: Buffer.byteLength(body), contentType: 'application/octet-stream' };
}

interface Fixture {
  assets: Array<[string, string]>;
  tagName?: string;
}

function createSource({ assets, tagName = 'v1.2.3' }: Fixture): FakeReleaseSource {
  const bodies = new Map<number, string>();
  const releaseAssets = assets.map(([name, body], index) => {
    bodies.set(index + 1, body);
    return asset(index + 1, name, body);
  });
  return new FakeReleaseSource({ tagName, assets: releaseAssets }, bodies);
}

const linuxHost: HostPlatform = { os: 'linux', arch: 'amd64' };
const ref = { owner: 'acme', repo: 'tool', version: 'latest' };

describe('BinaryManager', () => {
  let tmp: DirectoryResult;
  let binDir: string;
  let workDir: string;
  let logger: ReturnType<typeof createMockLogger>;

  function createManager(
    source: ReleaseSource,
    overrides: Partial<BinaryManagerConfig> = {},
    host: HostPlatform = linuxHost
  ): BinaryManager {
    const config = createDefaultConfig({ binDir, checksumDir: workDir, ...overrides }, {});
    return new BinaryManager(config, { source, host, logger });
  }

  beforeEach(async () => {
    tmp = await dir({ unsafeCleanup: true });
    binDir = path.join(tmp.path, 'bin');
    workDir = path.join(tmp.path, 'work');
    await mkdir(workDir);
    logger = createMockLogger();
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  test('installs and verifies the latest release asset', async () => {
    const source = createSource({
      assets: [
        ['tool_1.2.3_darwin_arm64', 'other'],
        [MAIN, BINARY],
        ['checksums.txt', `${sha256('other')}  tool_1.2.3_darwin_arm64\n${sha256(BINARY)}  ${MAIN}\n`],
      ],
    });

    const installed = await createManager(source).install(ref);

    expect(installed).toEqual({
      name: MAIN,
      path: path.join(binDir, 'tool'),
      contentType: 'application/octet-stream',
      verification: 'verified',
      tagName: 'v1.2.3',
    });
    expect(await readFile(installed.path, 'utf8')).toBe(BINARY);
    expect(await readdir(workDir)).toEqual([]);
    expect(source.lookups).toEqual(['latest acme/tool']);
  });

  test('marks the binary executable', async () => {
    const source = createSource({ assets: [[MAIN, BINARY]] });

    const installed = await createManager(source).install(ref);

    const { mode } = await stat(installed.path);
    expect(mode & 0o111).toBe(0o111);
  });

  test('looks up an explicit tag', async () => {
    const source = createSource({ assets: [[MAIN, BINARY]], tagName: 'v0.9.0' });

    const installed = await createManager(source).install({ ...ref, version: 'v0.9.0' });

    expect(installed.tagName).toBe('v0.9.0');
    expect(source.lookups).toEqual(['tag acme/tool@v0.9.0']);
  });

  test('skips verification without a checksum manifest', async () => {
    const source = createSource({ assets: [[MAIN, BINARY]] });

    const installed = await createManager(source).install(ref);

    expect(installed.verification).toBe('skipped');
    expect(logger.warn).toHaveBeenCalledWith('No checksum file found. Proceeding without verification.');
  });

  test('saves under the requested name', async () => {
    const source = createSource({ assets: [[MAIN, BINARY]] });

    const installed = await createManager(source, { binName: 'tl' }).install(ref);

    expect(installed.path).toBe(path.join(binDir, 'tl'));
  });

  test('deletes the binary on a checksum mismatch', async () => {
    const source = createSource({
      assets: [
        [MAIN, BINARY],
        ['checksums.txt', `${sha256('tampered')}  ${MAIN}\n`],
      ],
    });

    await expect(createManager(source).install(ref)).rejects.toBeInstanceOf(ChecksumMismatchError);
    expect(existsSync(path.join(binDir, 'tool'))).toBe(false);
    expect(await readdir(workDir)).toEqual([]);
  });

  test('keeps the binary on a mismatch when configured to', async () => {
    const source = createSource({
      assets: [
        [MAIN, BINARY],
        ['checksums.txt', `${sha256('tampered')}  ${MAIN}\n`],
      ],
    });

    await expect(createManager(source, { deleteOnMismatch: false }).install(ref)).rejects.toBeInstanceOf(
      ChecksumMismatchError
    );
    expect(existsSync(path.join(binDir, 'tool'))).toBe(true);
  });

  test('keeps the binary unverified when the manifest has no entry for it', async () => {
    const source = createSource({
      assets: [
        [MAIN, BINARY],
        ['checksums.txt', `${sha256(BINARY)}  tool_1.2.3_linux_arm64\n`],
      ],
    });

    const installed = await createManager(source).install(ref);

    expect(installed.verification).toBe('unverified');
    expect(existsSync(installed.path)).toBe(true);
    expect(await readdir(workDir)).toEqual([]);
  });

  test('keeps the binary unverified when the manifest cannot be downloaded', async () => {
    const source = createSource({
      assets: [
        [MAIN, BINARY],
        ['checksums.txt', ''],
      ],
    });
    const failing: ReleaseSource = {
      getLatestRelease: (owner, repo) => source.getLatestRelease(owner, repo),
      getReleaseByTag: (owner, repo, tag) => source.getReleaseByTag(owner, repo, tag),
      downloadAsset: (owner, repo, assetId) =>
        assetId === 2
          ? Promise.reject(new ReleaseNotFoundError('asset 2 not found'))
          : source.downloadAsset(owner, repo, assetId),
    };

    const installed = await createManager(failing).install(ref);

    expect(installed.verification).toBe('unverified');
    expect(existsSync(installed.path)).toBe(true);
    expect(logger.error).toHaveBeenCalledWith(
      "Failed to download checksum file 'checksums.txt': asset 2 not found. Checksum verification will be SKIPPED."
    );
  });

  test('uses the algorithm override', async () => {
    const md5 = createHash('md5').update(BINARY).digest('hex');
    const source = createSource({
      assets: [
        [MAIN, BINARY],
        ['checksums.txt', `${md5}  ${MAIN}\n`],
      ],
    });

    const installed = await createManager(source, { algorithmOverride: 'md5' }).install(ref);

    expect(installed.verification).toBe('verified');
  });

  test('saves system packages to a temporary directory under their own name', async () => {
    const pkg = 'tool_1.2.3_linux_amd64.deb';
    const source = createSource({
      assets: [
        ['tool_1.2.3_linux_amd64.tar.gz', 'archive'],
        [pkg, BINARY],
      ],
    });

    const installed = await createManager(source, {}, { ...linuxHost, packageFamily: 'deb' }).install(ref);
    const packageDir = path.dirname(installed.path);

    try {
      expect(path.basename(installed.path)).toBe(pkg);
      expect(path.dirname(packageDir)).toBe(os.tmpdir());
      expect(path.basename(packageDir).startsWith('relget-')).toBe(true);
      expect(existsSync(binDir)).toBe(false);
    } finally {
      await rm(packageDir, { recursive: true, force: true });
    }
  });

  test('rejects a release without assets', async () => {
    const source = createSource({ assets: [] });

    await expect(createManager(source).install(ref)).rejects.toThrow(
      new NoSuitableAssetError("no assets found for release 'v1.2.3'")
    );
  });

  test('rejects a release without a platform match', async () => {
    const source = createSource({ assets: [['tool_1.2.3_darwin_arm64', BINARY]] });

    await expect(createManager(source).install(ref)).rejects.toBeInstanceOf(NoSuitableAssetError);
  });

  test('reports the rate limit at debug level', async () => {
    const source = createSource({ assets: [[MAIN, BINARY]] });
    source.rateLimit = async () => ({ limit: 60, remaining: 42, resetAt: new Date(1_700_000_000_000) });

    await createManager(source).install(ref);

    expect(logger.debug).toHaveBeenCalledWith(expect.stringMatching(/^Rate Limit: 42\/60 remaining \| Resets @ /));
  });

  test('carries on when the rate limit cannot be read', async () => {
    const source = createSource({ assets: [[MAIN, BINARY]] });

    await expect(createManager(source).install(ref)).resolves.toMatchObject({ verification: 'skipped' });
    expect(logger.debug).toHaveBeenCalledWith('Could not retrieve rate limits: rate limit unavailable');
  });
});

describe('deriveBinaryName', () => {
  test.each([
    ['tool_1.4.0_linux_amd64', 'tool'],
    ['my-tool-v2.0.1-darwin-arm64', 'my-tool'],
    ['tool_linux_amd64', 'tool'],
    ['tool-linux-x86_64', 'tool'],
    ['tool_1.0.0_windows_amd64.exe', 'tool.exe'],
    ['tool_linux_amd64.tar.gz', 'tool_linux_amd64.tar.gz'],
    ['tool_windows_amd64.zip', 'tool_windows_amd64.zip'],
    ['tool', 'tool'],
  ])('%s -> %s', (assetName, expected) => {
    expect(deriveBinaryName(assetName)).toBe(expected);
  });
});

describe('createDefaultConfig', () => {
  test('reads the environment', () => {
    expect(createDefaultConfig({}, { XDG_BIN_HOME: '/xdg/bin', GITHUB_TOKEN: 'test-token' })).toEqual({
      binDir: '/xdg/bin',
      binName: undefined,
      checksumDir: process.cwd(),
      defaultAlgorithm: 'sha256',
      algorithmOverride: undefined,
      deleteOnMismatch: true,
      token: 'test-token',
    });
  });

  test('falls back to ~/.local/bin', () => {
    expect(defaultBinDir({})).toBe(path.join(os.homedir(), '.local', 'bin'));
    expect(createDefaultConfig({}, {}).token).toBeUndefined();
  });

  test('applies overrides over the environment', () => {
    const config = createDefaultConfig(
      { binDir: '/opt/bin', token: 'other-token', deleteOnMismatch: false },
      { XDG_BIN_HOME: '/xdg/bin', GITHUB_TOKEN: 'test-token' }
    );

    expect(config.binDir).toBe('/opt/bin');
    expect(config.token).toBe('other-token');
    expect(config.deleteOnMismatch).toBe(false);
  });
});
