/**
 * GitHub Releases archive
 *
 * Each release of the configured repository is one catalog entry; its zip
 * assets hold the day's CSV tables.
 */

import { z } from 'zod';
import { CatalogFetchError, errorMessage } from '../errors';
import { NonRetryableError, TransientError, isRetryableStatus, withRetry } from '../infra/retry';
import type { CatalogAsset, CatalogEntry } from '../types';
import { createLogger } from '../utils/logger';
import type { GitHubArchiveOptions, SnapshotArchive } from './types';

const logger = createLogger('github-archive');

const DEFAULT_API_URL = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_PER_PAGE = 100;
const DEFAULT_MAX_PAGES = 20;

const releaseAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string().url(),
});

const releaseSchema = z.object({
  tag_name: z.string(),
  name: z.string().nullable().optional(),
  draft: z.boolean().optional(),
  assets: z.array(releaseAssetSchema).default([]),
});

const releasePageSchema = z.array(releaseSchema);

export type GitHubRelease = z.infer<typeof releaseSchema>;

export function releaseToEntry(release: GitHubRelease): CatalogEntry {
  return {
    tag: release.tag_name,
    label: release.name ?? undefined,
    assets: release.assets.map((a) => ({ name: a.name, url: a.browser_download_url })),
  };
}

export class GitHubReleaseArchive implements SnapshotArchive {
  readonly kind = 'github';

  private readonly repository: string;
  private readonly token?: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly perPage: number;
  private readonly maxPages: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: GitHubArchiveOptions) {
    if (!/^[\w.-]+\/[\w.-]+$/.test(options.repository)) {
      throw new CatalogFetchError(`Invalid repository "${options.repository}", expected owner/name`);
    }
    this.repository = options.repository;
    this.token = options.token || undefined;
    this.apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async listEntries(): Promise<CatalogEntry[]> {
    const entries: CatalogEntry[] = [];

    for (let page = 1; page <= this.maxPages; page++) {
      const url = `${this.apiUrl}/repos/${this.repository}/releases?per_page=${this.perPage}&page=${page}`;
      const response = await this.request(url, 'application/vnd.github+json');

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        throw new CatalogFetchError(`Release listing page ${page} is not JSON`, { cause: err });
      }

      const parsed = releasePageSchema.safeParse(body);
      if (!parsed.success) {
        throw new CatalogFetchError(
          `Unexpected release listing payload on page ${page}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
          { cause: parsed.error },
        );
      }

      for (const release of parsed.data) {
        if (release.draft) continue;
        entries.push(releaseToEntry(release));
      }

      if (parsed.data.length < this.perPage) break;
      if (page === this.maxPages) {
        logger.warn({ maxPages: this.maxPages }, 'Release listing truncated at page limit');
      }
    }

    logger.info({ repository: this.repository, releases: entries.length }, 'Release catalog listed');
    return entries;
  }

  async download(asset: CatalogAsset): Promise<Buffer> {
    const response = await this.request(asset.url, 'application/octet-stream');
    try {
      const data = Buffer.from(await response.arrayBuffer());
      logger.debug({ asset: asset.name, bytes: data.length }, 'Asset downloaded');
      return data;
    } catch (err) {
      throw new CatalogFetchError(`Failed reading asset ${asset.name}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private headers(accept: string): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: accept,
      'User-Agent': 'pricedrift',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;
    return headers;
  }

  private async request(url: string, accept: string): Promise<Response> {
    try {
      return await withRetry(
        async () => {
          let response: Response;
          try {
            response = await fetch(url, {
              headers: this.headers(accept),
              signal: AbortSignal.timeout(this.timeoutMs),
            });
          } catch (err) {
            throw new TransientError(`Request to ${url} failed: ${errorMessage(err)}`);
          }

          if (!response.ok) {
            const message = `GET ${url} returned ${response.status} ${response.statusText}`.trim();
            if (isRetryableStatus(response.status)) {
              throw new TransientError(message, response.status);
            }
            throw new NonRetryableError(message, response.status);
          }
          return response;
        },
        {
          maxAttempts: this.maxAttempts,
          minDelay: this.retryDelayMs,
          onRetry: (info) => {
            if (info.willRetry) {
              logger.warn({ url, attempt: info.attempt, delay: info.delay }, 'Archive request failed; retrying');
            }
          },
        },
      );
    } catch (err) {
      const status =
        err instanceof TransientError || err instanceof NonRetryableError ? err.statusCode : undefined;
      throw new CatalogFetchError(errorMessage(err), { cause: err, status });
    }
  }
}
