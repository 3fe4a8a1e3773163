/**
 * Dataset Repository
 * Data access layer for dataset records
 */

import { Types, UpdateQuery } from 'mongoose';
import { DatasetDocument, DatasetModel } from './dataset.model';
import {
  DatasetContent,
  DatasetRecord,
  DatasetStatus,
  IDatasetListQuery,
  StoredDataset,
} from './dataset.types';

/**
 * Storage operations the gateway relies on.
 * `insert` and `replaceContent` report lost races instead of throwing.
 */
export interface DatasetStore {
  findByHash(hash: string): Promise<StoredDataset | null>;

  /**
   * Insert a new record; false when the hash already exists
   */
  insert(record: DatasetRecord, seenAt: Date): Promise<boolean>;

  /**
   * Overwrite content only while the stored contentHash still equals `expectedContentHash`
   */
  replaceContent(
    hash: string,
    expectedContentHash: string,
    content: DatasetContent,
    jobId: string,
    seenAt: Date
  ): Promise<boolean>;

  /**
   * Record that a job saw the record again without changes
   */
  touch(hash: string, jobId: string, seenAt: Date): Promise<void>;

  list(query: IDatasetListQuery): Promise<{ datasets: StoredDataset[]; total: number }>;
}

type LeanDataset = DatasetDocument & { _id: Types.ObjectId };

const DUPLICATE_KEY_CODE = 11000;

export function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY_CODE;
}

function toStoredDataset(doc: LeanDataset): StoredDataset {
  return {
    id: doc._id.toString(),
    hash: doc.hash,
    contentHash: doc.contentHash,
    title: doc.title,
    description: doc.description ?? undefined,
    url: doc.url,
    fileReferences: doc.fileReferences,
    source: doc.source,
    tags: doc.tags,
    extension: doc.extension ?? undefined,
    status: doc.status,
    crawlJobId: doc.crawlJobId,
    lastCrawlJobId: doc.lastCrawlJobId,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
    lastCrawledAt: doc.lastCrawledAt,
  };
}

export class DatasetRepository implements DatasetStore {
  /**
   * Find dataset by identity hash
   */
  async findByHash(hash: string): Promise<StoredDataset | null> {
    const doc = await DatasetModel.findOne({ hash }).lean<LeanDataset | null>();
    return doc ? toStoredDataset(doc) : null;
  }

  async insert(record: DatasetRecord, seenAt: Date): Promise<boolean> {
    try {
      await DatasetModel.create({
        ...record,
        status: DatasetStatus.ACTIVE,
        lastCrawlJobId: record.crawlJobId,
        lastCrawledAt: seenAt,
      });
      return true;
    } catch (error) {
      // Unique index on hash: someone else created it first
      if (isDuplicateKeyError(error)) {
        return false;
      }
      throw error;
    }
  }

  async replaceContent(
    hash: string,
    expectedContentHash: string,
    content: DatasetContent,
    jobId: string,
    seenAt: Date
  ): Promise<boolean> {
    const { description, extension, ...required } = content;

    const $set: Partial<DatasetDocument> = {
      ...required,
      lastCrawlJobId: jobId,
      lastCrawledAt: seenAt,
    };
    const $unset: { description?: 1; extension?: 1 } = {};

    // Optional fields the new content lacks are removed, not kept stale
    if (description !== undefined) {
      $set.description = description;
    } else {
      $unset.description = 1;
    }
    if (extension !== undefined) {
      $set.extension = extension;
    } else {
      $unset.extension = 1;
    }

    const update: UpdateQuery<DatasetDocument> =
      Object.keys($unset).length > 0 ? { $set, $unset } : { $set };

    const result = await DatasetModel.updateOne({ hash, contentHash: expectedContentHash }, update);
    return result.matchedCount === 1;
  }

  async touch(hash: string, jobId: string, seenAt: Date): Promise<void> {
    // updatedAt tracks content changes only
    await DatasetModel.updateOne(
      { hash },
      { $set: { lastCrawlJobId: jobId, lastCrawledAt: seenAt } },
      { timestamps: false }
    );
  }

  async list(query: IDatasetListQuery): Promise<{ datasets: StoredDataset[]; total: number }> {
    const { page = 1, limit = 20, source, crawlJobId } = query;
    const skip = (page - 1) * limit;

    const filter: { status: DatasetStatus; source?: string; crawlJobId?: string } = {
      status: DatasetStatus.ACTIVE,
    };
    if (source) {
      filter.source = source;
    }
    if (crawlJobId) {
      filter.crawlJobId = crawlJobId;
    }

    const [docs, total] = await Promise.all([
      DatasetModel.find(filter)
        .sort({ createdAt: -1 })
        .skip(skip)
        .limit(limit)
        .lean<LeanDataset[]>(),
      DatasetModel.countDocuments(filter),
    ]);

    return { datasets: docs.map(toStoredDataset), total };
  }
}

export const datasetRepository = new DatasetRepository();
