/**
 * Dataset Batch
 * Bounded per-run buffer with run-wide hash dedup
 */

import { env } from '../../config/env';
import { DatasetRecord } from './dataset.types';

export type BatchAddResult = 'buffered' | 'duplicate';

export class DatasetBatch {
  private records: DatasetRecord[] = [];
  private readonly submitted = new Set<string>();

  constructor(readonly capacity: number = env.CRAWL_BATCH_SIZE) {}

  /**
   * Buffer a record unless its hash was already submitted in this run
   */
  add(record: DatasetRecord): BatchAddResult {
    if (this.submitted.has(record.hash)) {
      return 'duplicate';
    }
    this.submitted.add(record.hash);
    this.records.push(record);
    return 'buffered';
  }

  isFull(): boolean {
    return this.records.length >= Math.max(1, this.capacity);
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Take every buffered record; the buffer is empty afterwards
   */
  drain(): DatasetRecord[] {
    return this.records.splice(0, this.records.length);
  }

  /**
   * Drop unflushed records (cancellation); returns how many were dropped
   */
  discard(): number {
    return this.drain().length;
  }
}
