import { open, rm, type FileHandle } from 'node:fs/promises';
import {
  describeError,
  DownloadIncompleteError,
  FileAccessError,
  MalformedAssetError,
  UnexpectedRedirectError,
} from './errors.js';
import type { ReleaseSource } from './github-client.js';
import { silentLogger, type Logger } from './logger.js';
import { noProgress, type ProgressFactory } from './progress.js';
import type { DownloadedFile, ReleaseAsset } from './types.js';

export interface AssetDownloaderOptions {
  logger?: Logger;
  progress?: ProgressFactory;
}

/**
 * Streams release assets to local files.
 */
export class AssetDownloader {
  private readonly logger: Logger;
  private readonly progress: ProgressFactory;

  constructor(
    private readonly source: ReleaseSource,
    options: AssetDownloaderOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.progress = options.progress ?? noProgress;
  }

  /**
   * Download an asset to exactly `targetPath`.
   *
   * A copy that fails partway (including on abort) or delivers other than
   * the declared size removes the partial file. A close failure after a
   * complete copy is only logged.
   *
   * @throws MalformedAssetError if the asset lacks a name, id or size
   * @throws UnexpectedRedirectError if no byte stream was returned
   * @throws DownloadIncompleteError if the copy fails
   */
  async downloadAndSave(
    repository: { owner: string; repo: string },
    asset: ReleaseAsset,
    targetPath: string,
    signal?: AbortSignal
  ): Promise<DownloadedFile> {
    const { name, id, size } = asset;
    if (name === undefined || name === '' || id === undefined || size === undefined) {
      throw new MalformedAssetError('name, id, or size');
    }

    this.logger.debug(`Initiating download for asset: ${name} (ID: ${id}, Size: ${size}) to ${targetPath}`);

    const download = await this.source.downloadAsset(repository.owner, repository.repo, id, signal);
    if (download.kind === 'redirect') {
      this.logger.warn(`Download for '${name}' resulted in a redirect URL (${download.location}) but no reader.`);
      throw new UnexpectedRedirectError(name, download.location);
    }

    let file: FileHandle;
    try {
      file = await open(targetPath, 'w');
    } catch (error) {
      download.stream.destroy();
      throw new FileAccessError(`error creating file '${targetPath}'`, targetPath, error);
    }

    const progress = this.progress(name, size);
    let written = 0;
    let copyError: unknown;
    try {
      for await (const chunk of download.stream) {
        signal?.throwIfAborted();
        const bytes = toBuffer(chunk);
        await writeFully(file, bytes);
        written += bytes.length;
        progress.advance(bytes.length);
      }
      signal?.throwIfAborted();
      if (written !== size) {
        throw new Error(`expected ${size} bytes, received ${written}`);
      }
    } catch (error) {
      copyError = error;
    }
    progress.finish(copyError === undefined);

    try {
      await file.close();
    } catch (closeError) {
      this.logger.warn(`Could not close '${targetPath}' after download: ${describeError(closeError)}`);
    }

    if (copyError !== undefined) {
      this.logger.error(`Error during download/copy for '${name}' to '${targetPath}': ${describeError(copyError)}`);
      try {
        await rm(targetPath, { force: true });
      } catch (removeError) {
        this.logger.warn(`Could not remove partial download '${targetPath}': ${describeError(removeError)}`);
      }
      throw new DownloadIncompleteError(name, targetPath, copyError);
    }

    this.logger.info(`Successfully downloaded ${name} to ${targetPath}`);
    return { originalName: name, localPath: targetPath, sizeBytes: written };
  }
}

/**
 * Destination of {@link writeFully}; a FileHandle satisfies it
 */
export interface ChunkSink {
  write(buffer: Buffer, offset: number, length: number): Promise<{ bytesWritten: number }>;
}

/**
 * Write all of `bytes`, repeating the call after a short write.
 */
export async function writeFully(sink: ChunkSink, bytes: Buffer): Promise<void> {
  let offset = 0;
  while (offset < bytes.length) {
    const { bytesWritten } = await sink.write(bytes, offset, bytes.length - offset);
    if (bytesWritten <= 0) {
      throw new Error(`write made no progress after ${offset} of ${bytes.length} bytes`);
    }
    offset += bytesWritten;
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  return Buffer.from(String(chunk));
}
