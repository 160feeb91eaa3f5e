/**
 * Digest computation and checksum manifest parsing.
 *
 * The algorithm set covers what release tooling and the common `*sum` tools
 * publish alongside release assets.
 */

import { createHash, type Hash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import { crc32 } from 'node:zlib';
import { EntryNotFoundError, FileAccessError, UnsupportedAlgorithmError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * Streaming digest context
 */
export interface Hasher {
  update(chunk: Uint8Array): void;
  /** Lowercase hex digest */
  digest(): string;
}

/**
 * Supported algorithm names mapped to their node:crypto digest names.
 * crc32 is computed with node:zlib instead.
 */
const CRYPTO_DIGESTS: ReadonlyMap<string, string> = new Map([
  ['blake2b', 'blake2b512'],
  ['blake2s', 'blake2s256'],
  ['md5', 'md5'],
  ['sha1', 'sha1'],
  ['sha224', 'sha224'],
  ['sha256', 'sha256'],
  ['sha384', 'sha384'],
  ['sha512', 'sha512'],
  ['sha3-224', 'sha3-224'],
  ['sha3-256', 'sha3-256'],
  ['sha3-384', 'sha3-384'],
  ['sha3-512', 'sha3-512'],
]);

const CRC32 = 'crc32';

/**
 * File extensions that name the algorithm of a per-asset checksum file,
 * e.g. `tool_linux_amd64.tar.gz.sha256`.
 */
export const ALGORITHM_EXTENSIONS: ReadonlySet<string> = new Set([
  '.sha256',
  '.sha512',
  '.sha1',
  '.crc32',
  '.md5',
  '.sha224',
  '.sha384',
  '.sha3-256',
  '.sha3-512',
  '.sha3-224',
  '.sha3-384',
  '.blake2s',
  '.blake2b',
]);

/** Generic manifest names such as `checksums.txt` or `SHA256SUMS` */
const MANIFEST_NAME_PATTERN =
  /(^(sha\d*sums?(\.txt)?|md5sums?(\.txt)?|checksums\.txt)$|checksums?(\.txt)?)/i;

export const DEFAULT_ALGORITHM = 'sha256';

class CryptoHasher implements Hasher {
  private readonly hash: Hash;

  constructor(digestName: string) {
    this.hash = createHash(digestName);
  }

  update(chunk: Uint8Array): void {
    this.hash.update(chunk);
  }

  digest(): string {
    return this.hash.digest('hex');
  }
}

class Crc32Hasher implements Hasher {
  private value = 0;

  update(chunk: Uint8Array): void {
    this.value = crc32(chunk, this.value);
  }

  digest(): string {
    return this.value.toString(16).padStart(8, '0');
  }
}

export function supportedAlgorithms(): string[] {
  return [...CRYPTO_DIGESTS.keys(), CRC32].sort();
}

export function isSupportedAlgorithm(algorithm: string): boolean {
  const name = algorithm.toLowerCase();
  return name === CRC32 || CRYPTO_DIGESTS.has(name);
}

/**
 * Create a digest context for an algorithm name (case-insensitive).
 *
 * @throws UnsupportedAlgorithmError
 */
export function createHasher(algorithm: string): Hasher {
  const name = algorithm.toLowerCase();
  if (name === CRC32) {
    return new Crc32Hasher();
  }
  const digestName = CRYPTO_DIGESTS.get(name);
  if (digestName === undefined) {
    throw new UnsupportedAlgorithmError(algorithm);
  }
  return new CryptoHasher(digestName);
}

export interface HashEngineOptions {
  /** Recognised checksum file extensions, including the leading dot */
  algorithmExtensions?: ReadonlySet<string>;
  logger?: Logger;
}

export class HashEngine {
  private readonly algorithmExtensions: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(options: HashEngineOptions = {}) {
    this.algorithmExtensions = options.algorithmExtensions ?? ALGORITHM_EXTENSIONS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Compute the lowercase hex digest of a file's full contents.
   *
   * @throws UnsupportedAlgorithmError if the algorithm is unknown
   * @throws FileAccessError if the file cannot be opened or read
   */
  async hashFile(filePath: string, algorithm: string): Promise<string> {
    const hasher = createHasher(algorithm);
    const safePath = path.normalize(filePath);

    try {
      for await (const chunk of createReadStream(safePath)) {
        hasher.update(toBytes(chunk));
      }
    } catch (error) {
      throw new FileAccessError(
        `failed to read file '${safePath}' for hashing with ${algorithm}`,
        safePath,
        error
      );
    }

    const digest = hasher.digest();
    this.logger.debug(`${algorithm.toUpperCase()} checksum for '${safePath}': ${digest}`);
    return digest;
  }

  /**
   * Whether a filename denotes a checksum manifest, either by a generic name
   * like `checksums.txt` or by an algorithm extension like `.sha256`.
   */
  isChecksumManifestName(filename: string): boolean {
    if (MANIFEST_NAME_PATTERN.test(path.basename(filename))) {
      return true;
    }
    return this.algorithmExtensions.has(path.extname(filename.toLowerCase()));
  }

  /**
   * Derive the algorithm from an extension such as `.sha256`.
   *
   * @returns The algorithm name, or undefined if the extension names none
   */
  algorithmFromFilename(filename: string): string | undefined {
    const ext = path.extname(filename.toLowerCase());
    return this.algorithmExtensions.has(ext) ? ext.slice(1) : undefined;
  }

  /**
   * Find the expected digest for `targetFilename` in a manifest of
   * `<digest> <filename>` lines. A leading `*` (binary mode) or `./` on the
   * filename is ignored; blank and `#` lines are skipped.
   *
   * @throws EntryNotFoundError if no line names the target
   * @throws FileAccessError if the manifest cannot be read
   */
  async parseChecksumManifest(manifestPath: string, targetFilename: string): Promise<string> {
    const safePath = path.normalize(manifestPath);
    let handle: FileHandle;
    try {
      handle = await open(safePath, 'r');
    } catch (error) {
      throw new FileAccessError(`failed to open checksum file '${safePath}'`, safePath, error);
    }

    try {
      for await (const rawLine of handle.readLines({ autoClose: false })) {
        const line = rawLine.trim();
        if (line === '' || line.startsWith('#')) {
          continue;
        }

        const fields = line.split(/\s+/);
        const checksum = fields[0];
        const lastField = fields[fields.length - 1];
        if (fields.length < 2 || checksum === undefined || lastField === undefined) {
          this.logger.debug(`skipping malformed line in checksum file: ${line}`);
          continue;
        }

        let filename = lastField;
        if (filename.startsWith('*')) {
          filename = filename.slice(1);
        }
        if (filename.startsWith('./')) {
          filename = filename.slice(2);
        }

        if (filename === targetFilename) {
          this.logger.debug(
            `found expected checksum '${checksum}' for '${targetFilename}' in '${manifestPath}'`
          );
          return checksum;
        }
      }
    } catch (error) {
      throw new FileAccessError(`error reading checksum file '${manifestPath}'`, safePath, error);
    } finally {
      await handle.close();
    }

    throw new EntryNotFoundError(targetFilename, manifestPath);
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  return Buffer.from(String(chunk));
}
