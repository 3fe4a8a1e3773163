/**
 * Dataset Module Types
 * Canonical dataset record and deduplication outcomes
 */

// ============================================================================
// Enums
// ============================================================================

export enum StoreOutcome {
  CREATED = 'created',
  UPDATED = 'updated',
  UNCHANGED = 'unchanged',
  DUPLICATE_SKIPPED = 'duplicate_skipped',
  ERROR = 'error',
}

export enum DatasetStatus {
  ACTIVE = 'active',
  ARCHIVED = 'archived',
  DELETED = 'deleted',
}

// ============================================================================
// Core Interfaces
// ============================================================================

/**
 * Normalized record produced by the normalizer, ready for the gateway.
 * `hash` is the identity (URL based), `contentHash` only detects changes.
 */
export interface DatasetRecord {
  hash: string;
  contentHash: string;
  title: string;
  description?: string;
  url: string;
  fileReferences: string[];
  source: string;
  tags: string[];
  extension?: string;
  crawlJobId: string;
}

/**
 * Record as held by storage
 */
export interface StoredDataset extends DatasetRecord {
  id: string;
  status: DatasetStatus;
  lastCrawlJobId: string;
  createdAt: Date;
  updatedAt: Date;
  lastCrawledAt: Date;
}

/**
 * Content fields overwritten when a record changes
 */
export type DatasetContent = Pick<
  DatasetRecord,
  'contentHash' | 'title' | 'description' | 'url' | 'fileReferences' | 'source' | 'tags' | 'extension'
>;

export interface StoreResult {
  outcome: StoreOutcome;
  hash: string;
  error?: string;
}

// ============================================================================
// API Interfaces
// ============================================================================

export interface IDatasetListQuery {
  page?: number;
  limit?: number;
  source?: string;
  crawlJobId?: string;
}

export interface IDatasetListResponse {
  success: boolean;
  datasets: StoredDataset[];
  total: number;
  page: number;
  limit: number;
}
