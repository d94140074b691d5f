/**
 * Snapshot archive boundary
 */

import type { CatalogAsset, CatalogEntry } from '../types';

/**
 * Where dated snapshot archives live. The pipeline only lists entries and
 * downloads assets; everything else stays behind this interface.
 */
export interface SnapshotArchive {
  readonly kind: string;
  listEntries(): Promise<CatalogEntry[]>;
  download(asset: CatalogAsset): Promise<Buffer>;
}

export interface GitHubArchiveOptions {
  /** `owner/name` of the repository whose releases hold the snapshots */
  repository: string;
  token?: string;
  /** Default: https://api.github.com */
  apiUrl?: string;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Releases per page (default: 100, GitHub's maximum) */
  perPage?: number;
  /** Hard stop on pagination (default: 20) */
  maxPages?: number;
  /** Attempts per request, first one included (default: 3) */
  maxAttempts?: number;
  /** Base backoff delay in ms (default: 1000) */
  retryDelayMs?: number;
}
