import { text } from 'node:stream/consumers';
import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { describe, expect, test } from 'vitest';
import {
  InstallError,
  NoSuitableAssetError,
  RateLimitedError,
  ReleaseLookupFailedError,
  ReleaseNotFoundError,
} from '../src/errors.js';
import { GitHubReleaseSource, toReleaseLookupError } from '../src/github-client.js';

const request = {
  method: 'GET',
  url: 'https://api.github.com/repos/acme/tool/releases/latest',
  headers: {},
} as const;

const quietLog = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8', ...headers },
  });
}

/**
 * Octokit whose HTTP layer is answered in process
 */
function octokitWith(handler: (url: string) => Response): Octokit {
  return new Octokit({
    log: quietLog,
    request: { fetch: async (url: string) => handler(url) },
  });
}

describe('toReleaseLookupError', () => {
  test('maps 404 to a missing release', () => {
    const error = toReleaseLookupError(new RequestError('Not Found', 404, { request: { ...request } }), 'release v1');

    expect(error).toBeInstanceOf(ReleaseNotFoundError);
    expect(error.message).toBe('release v1 not found');
    expect(error.cause).toBeInstanceOf(RequestError);
  });

  test('maps an exhausted rate limit', () => {
    const cause = new RequestError('API rate limit exceeded', 403, {
      request: { ...request },
      response: {
        status: 403,
        url: request.url,
        headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000000' },
        data: {},
      },
    });

    const error = toReleaseLookupError(cause, 'release v1');

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error.message).toBe('GitHub API rate limit exceeded (resets at 2023-11-14T22:13:20.000Z)');
    expect(error).toMatchObject({ code: 'RATE_LIMITED', resetAt: new Date(1_700_000_000_000) });
  });

  test('maps a 403 with quota left to a lookup failure', () => {
    const cause = new RequestError('Forbidden', 403, {
      request: { ...request },
      response: { status: 403, url: request.url, headers: { 'x-ratelimit-remaining': '12' }, data: {} },
    });

    expect(toReleaseLookupError(cause, 'release v1')).toBeInstanceOf(ReleaseLookupFailedError);
  });

  test('maps other statuses to a lookup failure', () => {
    const error = toReleaseLookupError(new RequestError('Server Error', 500, { request: { ...request } }), 'release v1');

    expect(error).toBeInstanceOf(ReleaseLookupFailedError);
    expect(error.message).toBe('GitHub API error 500: Server Error');
  });

  test('wraps non-HTTP failures', () => {
    const error = toReleaseLookupError(new Error('socket hang up'), 'asset 7 in acme/tool');

    expect(error.code).toBe('RELEASE_LOOKUP_FAILED');
    expect(error.message).toBe('failed to look up asset 7 in acme/tool: socket hang up');
  });

  test('passes install errors through', () => {
    const original = new NoSuitableAssetError();

    expect(toReleaseLookupError(original, 'anything')).toBe(original);
    expect(original).toBeInstanceOf(InstallError);
  });
});

describe('GitHubReleaseSource', () => {
  test('fetches the latest release', async () => {
    const urls: string[] = [];
    const source = new GitHubReleaseSource(
      {},
      octokitWith((url) => {
        urls.push(url);
        return json({
          tag_name: 'v1.0.0',
          assets: [
            { id: 11, name: 'tool_linux_amd64.tar.gz', size: 2048, content_type: 'application/gzip' },
            { id: 12, name: 'checksums.txt', size: 90, content_type: 'text/plain' },
          ],
        });
      })
    );

    await expect(source.getLatestRelease('acme', 'tool')).resolves.toEqual({
      tagName: 'v1.0.0',
      assets: [
        { id: 11, name: 'tool_linux_amd64.tar.gz', size: 2048, contentType: 'application/gzip' },
        { id: 12, name: 'checksums.txt', size: 90, contentType: 'text/plain' },
      ],
    });
    expect(urls).toEqual(['https://api.github.com/repos/acme/tool/releases/latest']);
  });

  test('reports a missing tag', async () => {
    const source = new GitHubReleaseSource({}, octokitWith(() => json({ message: 'Not Found' }, 404)));

    const attempt = source.getReleaseByTag('acme', 'tool', 'v9.9.9');

    await expect(attempt).rejects.toBeInstanceOf(ReleaseNotFoundError);
    await expect(attempt).rejects.toThrow("release with tag 'v9.9.9' in acme/tool not found");
  });

  test('streams asset bytes', async () => {
    const urls: string[] = [];
    const source = new GitHubReleaseSource(
      {},
      octokitWith((url) => {
        urls.push(url);
        return new Response('asset-bytes', { status: 200, headers: { 'content-type': 'application/octet-stream' } });
      })
    );

    const download = await source.downloadAsset('acme', 'tool', 11);

    expect(urls).toEqual(['https://api.github.com/repos/acme/tool/releases/assets/11']);
    expect(download.kind).toBe('stream');
    if (download.kind === 'stream') {
      expect(await text(download.stream)).toBe('asset-bytes');
    }
  });

  test('reads the core rate limit', async () => {
    const source = new GitHubReleaseSource(
      {},
      octokitWith(() =>
        json({
          resources: { core: { limit: 60, remaining: 59, reset: 1700000000, used: 1 } },
          rate: { limit: 60, remaining: 59, reset: 1700000000, used: 1 },
        })
      )
    );

    await expect(source.checkRateLimit()).resolves.toEqual({
      limit: 60,
      remaining: 59,
      resetAt: new Date(1_700_000_000_000),
    });
  });
});
