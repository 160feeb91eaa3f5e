/**
 * GitHub release lookup and asset download, built on Octokit.
 */

import { Readable } from 'node:stream';
import { ReadableStream } from 'node:stream/web';
import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { InstallError, RateLimitedError, ReleaseLookupFailedError, ReleaseNotFoundError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { AssetDownload, Release, ReleaseAsset } from './types.js';

export interface RateLimitStatus {
  limit: number;
  remaining: number;
  resetAt: Date;
}

/**
 * Source of release metadata and asset bytes.
 */
export interface ReleaseSource {
  getLatestRelease(owner: string, repo: string, signal?: AbortSignal): Promise<Release>;
  getReleaseByTag(owner: string, repo: string, tag: string, signal?: AbortSignal): Promise<Release>;
  downloadAsset(owner: string, repo: string, assetId: number, signal?: AbortSignal): Promise<AssetDownload>;
  checkRateLimit?(): Promise<RateLimitStatus>;
}

interface ApiAsset {
  name?: string;
  id?: number;
  size?: number;
  content_type?: string;
}

interface ApiRelease {
  tag_name: string;
  assets?: ApiAsset[];
}

function toRelease(data: ApiRelease): Release {
  return {
    tagName: data.tag_name,
    assets: (data.assets ?? []).map(
      (asset): ReleaseAsset => ({
        name: asset.name,
        id: asset.id,
        size: asset.size,
        contentType: asset.content_type,
      })
    ),
  };
}

/**
 * Translate an Octokit failure into the install error taxonomy.
 *
 * @param what - Human description of the missing thing for 404s
 */
export function toReleaseLookupError(error: unknown, what: string): InstallError {
  if (error instanceof InstallError) {
    return error;
  }
  if (error instanceof RequestError) {
    if (error.status === 404) {
      return new ReleaseNotFoundError(`${what} not found`, { cause: error });
    }
    const headers = error.response?.headers ?? {};
    if ((error.status === 403 || error.status === 429) && headers['x-ratelimit-remaining'] === '0') {
      const reset = Number(headers['x-ratelimit-reset']);
      const resetAt = Number.isFinite(reset) && reset > 0 ? new Date(reset * 1000) : undefined;
      const when = resetAt ? ` (resets at ${resetAt.toISOString()})` : '';
      return new RateLimitedError(`GitHub API rate limit exceeded${when}`, resetAt, { cause: error });
    }
    return new ReleaseLookupFailedError(`GitHub API error ${error.status}: ${error.message}`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ReleaseLookupFailedError(`failed to look up ${what}: ${message}`, { cause: error });
}

export interface GitHubReleaseSourceOptions {
  /** Personal access token; unauthenticated requests get a lower rate limit */
  token?: string;
  userAgent?: string;
  logger?: Logger;
}

export class GitHubReleaseSource implements ReleaseSource {
  private readonly octokit: Octokit;
  private readonly logger: Logger;

  constructor(options: GitHubReleaseSourceOptions = {}, octokit?: Octokit) {
    this.logger = options.logger ?? silentLogger;
    if (options.token) {
      this.logger.debug('Using GITHUB_TOKEN for authentication.');
    } else {
      this.logger.debug('No GITHUB_TOKEN found, using unauthenticated requests (lower rate limit).');
    }
    this.octokit =
      octokit ??
      new Octokit({
        auth: options.token,
        userAgent: options.userAgent,
      });
  }

  async getLatestRelease(owner: string, repo: string, signal?: AbortSignal): Promise<Release> {
    try {
      const { data } = await this.octokit.rest.repos.getLatestRelease({
        owner,
        repo,
        request: { signal },
      });
      return toRelease(data);
    } catch (error) {
      throw toReleaseLookupError(error, `repository ${owner}/${repo} or its latest release`);
    }
  }

  async getReleaseByTag(owner: string, repo: string, tag: string, signal?: AbortSignal): Promise<Release> {
    try {
      const { data } = await this.octokit.rest.repos.getReleaseByTag({
        owner,
        repo,
        tag,
        request: { signal },
      });
      return toRelease(data);
    } catch (error) {
      throw toReleaseLookupError(error, `release with tag '${tag}' in ${owner}/${repo}`);
    }
  }

  async downloadAsset(owner: string, repo: string, assetId: number, signal?: AbortSignal): Promise<AssetDownload> {
    try {
      const response = await this.octokit.request('GET /repos/{owner}/{repo}/releases/assets/{asset_id}', {
        owner,
        repo,
        asset_id: assetId,
        headers: { accept: 'application/octet-stream' },
        request: { signal, parseSuccessResponseBody: false },
      });

      // With parseSuccessResponseBody disabled, data is the raw fetch body
      const body: unknown = response.data;
      if (body instanceof ReadableStream) {
        return { kind: 'stream', stream: Readable.fromWeb(body) };
      }

      const location = response.headers.location;
      if (location) {
        return { kind: 'redirect', location };
      }
      throw new ReleaseLookupFailedError(`download request for asset ${assetId} returned no data stream`);
    } catch (error) {
      throw toReleaseLookupError(error, `asset ${assetId} in ${owner}/${repo}`);
    }
  }

  async checkRateLimit(): Promise<RateLimitStatus> {
    const { data } = await this.octokit.rest.rateLimit.get();
    const core = data.resources.core;
    return {
      limit: core.limit,
      remaining: core.remaining,
      resetAt: new Date(core.reset * 1000),
    };
  }
}
