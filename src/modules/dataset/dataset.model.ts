/**
 * Dataset MongoDB Model
 * Mongoose schema for deduplicated dataset records
 */

import mongoose, { Schema } from 'mongoose';
import { DatasetStatus, StoredDataset } from './dataset.types';

export type DatasetDocument = Omit<StoredDataset, 'id'>;

const DatasetSchema = new Schema<DatasetDocument>(
  {
    hash: {
      type: String,
      required: true,
      unique: true,
    },
    contentHash: {
      type: String,
      required: true,
    },
    title: {
      type: String,
      required: true,
      trim: true,
    },
    description: String,
    url: {
      type: String,
      required: true,
    },
    fileReferences: {
      type: [String],
      default: [],
    },
    source: {
      type: String,
      required: true,
      index: true,
    },
    tags: {
      type: [String],
      default: [],
    },
    extension: String,
    status: {
      type: String,
      enum: Object.values(DatasetStatus),
      default: DatasetStatus.ACTIVE,
      index: true,
    },
    crawlJobId: {
      type: String,
      required: true,
      index: true,
    },
    lastCrawlJobId: {
      type: String,
      required: true,
    },
    lastCrawledAt: {
      type: Date,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

DatasetSchema.index({ createdAt: -1 });
DatasetSchema.index({ source: 1, createdAt: -1 });

export const DatasetModel = mongoose.model<DatasetDocument>('Dataset', DatasetSchema);
