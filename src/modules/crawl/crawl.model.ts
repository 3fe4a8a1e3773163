/**
 * Crawl Job MongoDB Model
 * Mongoose schema for crawl jobs
 */

import mongoose, { Schema } from 'mongoose';
import { CrawlJob, CrawlStatus, CrawlerType } from './crawl.types';

const CrawlStatisticsSchema = new Schema({
  pagesCrawled: { type: Number, default: 0, min: 0 },
  datasetsFound: { type: Number, default: 0, min: 0 },
  datasetsCreated: { type: Number, default: 0, min: 0 },
  datasetsUpdated: { type: Number, default: 0, min: 0 },
  datasetsUnchanged: { type: Number, default: 0, min: 0 },
  duplicatesSkipped: { type: Number, default: 0, min: 0 },
  errorsCount: { type: Number, default: 0, min: 0 },
}, { _id: false });

const CrawlErrorDetailsSchema = new Schema({
  exceptionType: String,
  message: String,
  taskId: String,
}, { _id: false });

const CrawlJobSchema = new Schema<CrawlJob>(
  {
    jobId: {
      type: String,
      required: true,
      unique: true,
    },
    siteId: {
      type: String,
      required: true,
      index: true,
    },
    sourceName: {
      type: String,
      required: true,
    },
    startUrl: {
      type: String,
      required: true,
    },
    crawlerType: {
      type: String,
      enum: Object.values(CrawlerType),
      default: CrawlerType.STATIC,
    },
    options: {
      type: Schema.Types.Mixed,
      default: () => ({}),
    },
    status: {
      type: String,
      enum: Object.values(CrawlStatus),
      default: CrawlStatus.PENDING,
      index: true,
    },
    progressPercentage: {
      type: Number,
      default: 0,
      min: 0,
      max: 100,
    },
    currentPage: String,
    statistics: {
      type: CrawlStatisticsSchema,
      default: () => ({}),
    },
    errorMessage: String,
    errorDetails: CrawlErrorDetailsSchema,
    createdBy: String,
    startedAt: Date,
    completedAt: Date,
  },
  {
    timestamps: true,
    minimize: false,
  }
);

CrawlJobSchema.index({ createdAt: -1 });
CrawlJobSchema.index({ status: 1, createdAt: -1 });

export const CrawlJobModel = mongoose.model<CrawlJob>('CrawlJob', CrawlJobSchema);
