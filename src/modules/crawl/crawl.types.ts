/**
 * Crawl Module Types
 * Crawl jobs, their statistics and the API payloads around them
 */

// ============================================================================
// Enums
// ============================================================================

export enum CrawlStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export const TERMINAL_STATUSES: readonly CrawlStatus[] = [
  CrawlStatus.COMPLETED,
  CrawlStatus.FAILED,
  CrawlStatus.CANCELLED,
];

export function isTerminalStatus(status: CrawlStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export enum CrawlerType {
  STATIC = 'static',
  DYNAMIC = 'dynamic',
}

// ============================================================================
// Core Interfaces
// ============================================================================

/**
 * Job options. Keys this service does not know are kept as submitted.
 */
export interface CrawlOptions {
  /**
   * Maximum number of extraction pages to fetch
   */
  pageBudget?: number;

  /**
   * Write records to a side file instead of storage
   */
  testMode?: boolean;

  [key: string]: unknown;
}

export interface CrawlStatistics {
  pagesCrawled: number;
  datasetsFound: number;
  datasetsCreated: number;
  datasetsUpdated: number;
  datasetsUnchanged: number;
  duplicatesSkipped: number;
  errorsCount: number;
}

export interface CrawlErrorDetails {
  exceptionType: string;
  message: string;
  taskId: string;
}

export interface CrawlJob {
  jobId: string;
  siteId: string;
  sourceName: string;
  startUrl: string;
  crawlerType: CrawlerType;
  options: CrawlOptions;
  status: CrawlStatus;
  progressPercentage: number;
  currentPage?: string;
  statistics: CrawlStatistics;
  errorMessage?: string;
  errorDetails?: CrawlErrorDetails;
  createdBy?: string;
  createdAt: Date;
  updatedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export type NewCrawlJob = Pick<
  CrawlJob,
  'jobId' | 'siteId' | 'sourceName' | 'startUrl' | 'crawlerType' | 'options' | 'createdBy'
>;

/**
 * Fields written together with a status transition
 */
export type CrawlJobPatch = Partial<
  Pick<
    CrawlJob,
    | 'progressPercentage'
    | 'currentPage'
    | 'statistics'
    | 'errorMessage'
    | 'errorDetails'
    | 'startedAt'
    | 'completedAt'
  >
>;

export interface CrawlProgressPatch {
  progressPercentage: number;
  currentPage?: string;
  statistics: CrawlStatistics;
}

/**
 * Outbound view of a job
 */
export interface CrawlJobSnapshot {
  jobId: string;
  siteId: string;
  sourceName: string;
  status: CrawlStatus;
  progressPercentage: number;
  currentPage: string | null;
  statistics: CrawlStatistics;
  options: CrawlOptions;
  errorMessage?: string;
  errorDetails?: CrawlErrorDetails;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  updatedAt: Date;
  durationSeconds: number | null;
}

/**
 * Receives job updates for realtime delivery
 */
export interface CrawlJobNotifier {
  progress(job: CrawlJobSnapshot): void;
  complete(job: CrawlJobSnapshot): void;
}

// ============================================================================
// API Interfaces
// ============================================================================

export interface IStartCrawlRequest {
  siteId?: unknown;
  options?: unknown;
}

export interface ICrawlJobResponse {
  success: boolean;
  job?: CrawlJobSnapshot;
  error?: string;
}

export interface ICrawlJobListQuery {
  page?: number;
  limit?: number;
  status?: CrawlStatus;
}

export interface ICrawlJobListResponse {
  success: boolean;
  jobs: CrawlJobSnapshot[];
  total: number;
  page: number;
  limit: number;
}
