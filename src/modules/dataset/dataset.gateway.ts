/**
 * Dataset Gateway
 * Dedups and classifies normalized records, buffers them per run, and writes
 * them to storage with an NDJSON fallback when storage is unavailable
 */

import { CrawlError, CrawlErrorCode, getErrorMessage, isCrawlError } from '../../lib/errors/crawl.errors';
import { NdjsonWriter } from '../../lib/storage/ndjson.writer';
import { DatasetBatch } from './dataset.batch';
import { DatasetStore, datasetRepository } from './dataset.repository';
import {
  DatasetContent,
  DatasetRecord,
  IDatasetListQuery,
  StoreOutcome,
  StoreResult,
  StoredDataset,
} from './dataset.types';

// Lost insert/update races are re-classified this many times
const MAX_CLASSIFY_ATTEMPTS = 5;

/**
 * The per-run state the gateway needs
 */
export interface GatewayRun {
  readonly jobId: string;
  readonly testMode: boolean;
  readonly batch: DatasetBatch;
}

export interface DatasetGatewayOptions {
  now?: () => Date;
}

function contentOf(record: DatasetRecord): DatasetContent {
  return {
    contentHash: record.contentHash,
    title: record.title,
    description: record.description,
    url: record.url,
    fileReferences: record.fileReferences,
    source: record.source,
    tags: record.tags,
    extension: record.extension,
  };
}

export class DatasetGateway {
  private readonly now: () => Date;

  constructor(
    private readonly store: DatasetStore = datasetRepository,
    private readonly sideFiles: NdjsonWriter = new NdjsonWriter(),
    options: DatasetGatewayOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Hand a record to the run's batch. Returns the outcomes decided by this call:
   * a DuplicateSkipped for a hash already seen in the run, or the outcomes of
   * the flush this record triggered. In test mode the record goes straight to
   * the side file and nothing is classified.
   */
  async submit(record: DatasetRecord, run: GatewayRun): Promise<StoreResult[]> {
    if (run.testMode) {
      await this.writeTestRecord(run.jobId, record);
      return [];
    }

    if (run.batch.add(record) === 'duplicate') {
      return [{ outcome: StoreOutcome.DUPLICATE_SKIPPED, hash: record.hash }];
    }

    return run.batch.isFull() ? this.flush(run) : [];
  }

  /**
   * Store every buffered record. A storage failure sends the failing record and
   * the rest of the batch to the fallback file with an Error outcome.
   */
  async flush(run: GatewayRun): Promise<StoreResult[]> {
    const records = run.batch.drain();
    if (run.testMode || records.length === 0) {
      return [];
    }

    const results: StoreResult[] = [];
    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      try {
        const outcome = await this.classifyAndStore(record, run.jobId);
        results.push({ outcome, hash: record.hash });
      } catch (error) {
        const remaining = records.slice(i);
        const message = getErrorMessage(error);
        await this.writeFallback(run.jobId, remaining, message);
        for (const failed of remaining) {
          results.push({ outcome: StoreOutcome.ERROR, hash: failed.hash, error: message });
        }
        break;
      }
    }

    console.log(`Job ${run.jobId}: Flushed ${records.length} records`);
    return results;
  }

  /**
   * Look the record up by identity hash and create, update or touch it.
   * Throws StorageUnavailable when storage fails.
   */
  async classifyAndStore(record: DatasetRecord, jobId: string): Promise<StoreOutcome> {
    try {
      return await this.classify(record, jobId);
    } catch (error) {
      if (isCrawlError(error)) {
        throw error;
      }
      throw new CrawlError(CrawlErrorCode.STORAGE_UNAVAILABLE, `Storage unavailable: ${getErrorMessage(error)}`, {
        details: { hash: record.hash },
        cause: error,
      });
    }
  }

  async getDataset(hash: string): Promise<StoredDataset | null> {
    return this.store.findByHash(hash);
  }

  async listDatasets(query: IDatasetListQuery): Promise<{ datasets: StoredDataset[]; total: number }> {
    return this.store.list(query);
  }

  private async classify(record: DatasetRecord, jobId: string): Promise<StoreOutcome> {
    for (let attempt = 0; attempt < MAX_CLASSIFY_ATTEMPTS; attempt++) {
      const seenAt = this.now();
      const existing = await this.store.findByHash(record.hash);

      if (!existing) {
        if (await this.store.insert(record, seenAt)) {
          return StoreOutcome.CREATED;
        }
        continue;
      }

      if (existing.contentHash === record.contentHash) {
        await this.store.touch(record.hash, jobId, seenAt);
        return StoreOutcome.UNCHANGED;
      }

      if (await this.store.replaceContent(record.hash, existing.contentHash, contentOf(record), jobId, seenAt)) {
        return StoreOutcome.UPDATED;
      }
    }

    throw new CrawlError(
      CrawlErrorCode.STORAGE_UNAVAILABLE,
      `Record ${record.hash} changed concurrently ${MAX_CLASSIFY_ATTEMPTS} times`,
      { details: { hash: record.hash } }
    );
  }

  private async writeTestRecord(jobId: string, record: DatasetRecord): Promise<void> {
    const filePath = this.sideFiles.testModePath(jobId);
    try {
      await this.sideFiles.append(filePath, [{ ...record, crawledAt: this.now().toISOString() }]);
    } catch (error) {
      throw new CrawlError(CrawlErrorCode.JOB_FATAL, `Failed to write test output ${filePath}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async writeFallback(jobId: string, records: DatasetRecord[], reason: string): Promise<void> {
    const filePath = this.sideFiles.fallbackPath(jobId);
    const failedAt = this.now().toISOString();

    console.warn(`Job ${jobId}: Storage unavailable, writing ${records.length} records to ${filePath}`);
    try {
      await this.sideFiles.append(
        filePath,
        records.map((record) => ({ ...record, failedAt, error: reason }))
      );
    } catch (error) {
      throw new CrawlError(CrawlErrorCode.JOB_FATAL, `Fallback write failed for ${filePath}: ${getErrorMessage(error)}`, {
        details: { storageError: reason },
        cause: error,
      });
    }
  }
}

export const datasetGateway = new DatasetGateway();
