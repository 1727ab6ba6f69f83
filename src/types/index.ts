export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * One catalog entry describing a single downloadable textbook.
 */
export interface CatalogRecord {
  readonly id: string;
  readonly title: string;
  readonly publisher: string;
  readonly catalogIndex: number;
  readonly position: number;
  readonly globalSequence: number;
}

/** Coordinate of a descriptor slot inside the catalog set. */
export interface WalkCursor {
  catalogIndex: number;
  position: number;
}

export interface CatalogPage {
  descriptors: unknown[];
  nextPageToken: string | null;
}

/**
 * Anything the walker can read catalogs from. The HTTP fetcher is the
 * production implementation; tests supply in-memory ones.
 */
export interface CatalogSource {
  listCatalogs(): Promise<string[]>;
  fetchPage(catalogIndex: number, pageToken: string): Promise<CatalogPage>;
}

export interface ResolvedSource {
  recordId: string;
  fragment: string;
  title?: string;
}

export interface SourceLookup {
  resolve(recordId: string): Promise<ResolvedSource>;
}

export enum TransferStatus {
  SUCCESS = 'success',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

export interface MirrorEndpoint {
  name: string;
  baseUrl: string;
}

export interface MirrorAttempt {
  mirror: string;
  url: string;
  ok: boolean;
  bytesWritten: number;
  errorDetail?: string;
}

export interface TransferResult {
  status: TransferStatus;
  bytesWritten: number;
  mirrorUsed?: string;
  errorDetail?: string;
  attempts: MirrorAttempt[];
}

export interface TransferOutcome extends TransferResult {
  record: CatalogRecord;
  destination: string;
}

export interface FileTransfer {
  transfer(fragment: string, destination: string): Promise<TransferResult>;
}

export interface TransferProgress {
  mirror: string;
  bytesReceived: number;
  totalBytes: number;
}

export interface FailedRecord {
  globalSequence: number;
  id: string;
  title: string;
  reason: string;
}

export interface RunSummary {
  selected: number;
  succeeded: number;
  skipped: number;
  failed: FailedRecord[];
  bytesWritten: number;
  lastCursor?: WalkCursor;
}

export type SelectionMode =
  | { kind: 'single'; ordinal: number; table: number; item: number }
  | { kind: 'range'; from: number; to: number }
  | { kind: 'byId'; id: string }
  | { kind: 'bySequence'; sequence: number }
  | { kind: 'legacy'; table: number; item: number; limit?: number };

/** Raw user-facing selection flags, before precedence is applied. */
export interface SelectionOptions {
  bookId?: string;
  sequence?: number;
  range?: string;
  single?: number;
  limit?: number;
  table?: number;
  item?: number;
}

export interface DownloaderConfig {
  outputDir: string;
  exportPath: string;
  logLevel: LogLevelName;
  headers: Record<string, string>;
  catalog: {
    versionUrl: string;
    catalogUrls: string[];
    requestTimeout: number;
    expectedTotal?: number;
  };
  resolver: {
    detailsBaseUrl: string;
    requestTimeout: number;
  };
  transfer: {
    mirrors: MirrorEndpoint[];
    requestTimeout: number;
    minDocumentBytes: number;
    skipExisting: boolean;
    delayBetweenRecords: number;
  };
}

export type PartialDownloaderConfig = Partial<
  Omit<DownloaderConfig, 'catalog' | 'resolver' | 'transfer'>
> & {
  catalog?: Partial<DownloaderConfig['catalog']>;
  resolver?: Partial<DownloaderConfig['resolver']>;
  transfer?: Partial<DownloaderConfig['transfer']>;
};
