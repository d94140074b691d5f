/**
 * Pipeline error kinds.
 *
 * Fatal kinds abort the run before any text is produced. RowParseError is the
 * only recoverable kind: the loader catches it per row and counts the drop.
 */

export type PipelineErrorCode =
  | 'CATALOG_FETCH'
  | 'SNAPSHOT_NOT_FOUND'
  | 'ARCHIVE_EXTRACTION'
  | 'ROW_PARSE'
  | 'NO_DATA';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

/** Network, auth or payload failure while talking to the snapshot archive. */
export class CatalogFetchError extends PipelineError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('CATALOG_FETCH', message, options);
    this.name = 'CatalogFetchError';
    this.status = options?.status;
  }
}

export type SnapshotRole = 'baseline' | 'latest' | 'week-ago';

export class SnapshotNotFoundError extends PipelineError {
  readonly role: SnapshotRole;

  constructor(role: SnapshotRole, message: string) {
    super('SNAPSHOT_NOT_FOUND', message);
    this.name = 'SnapshotNotFoundError';
    this.role = role;
  }
}

export class ArchiveExtractionError extends PipelineError {
  readonly tag: string;

  constructor(tag: string, message: string, options?: { cause?: unknown }) {
    super('ARCHIVE_EXTRACTION', message, options);
    this.name = 'ArchiveExtractionError';
    this.tag = tag;
  }
}

export type RowDropReason = 'malformed' | 'missing_id' | 'invalid_price';

export class RowParseError extends PipelineError {
  readonly row: number;
  readonly reason: RowDropReason;

  constructor(row: number, reason: RowDropReason, message: string) {
    super('ROW_PARSE', message);
    this.name = 'RowParseError';
    this.row = row;
    this.reason = reason;
  }
}

export class NoDataError extends PipelineError {
  constructor(message: string) {
    super('NO_DATA', message);
    this.name = 'NoDataError';
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
