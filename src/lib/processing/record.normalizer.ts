/**
 * Record Normalizer
 * Turns a candidate record into a canonical dataset record with its two hashes:
 * `hash` (URL identity) and `contentHash` (change detection)
 */

import { createHash } from 'crypto';
import { CandidateRecord } from '../extraction/extraction.types';
import { CrawlErrorCode, RejectionReason } from '../errors/crawl.errors';
import { DatasetRecord } from '../../modules/dataset/dataset.types';
import { cleanText, toHashInput } from './text.processor';

export const DATA_EXTENSIONS: readonly string[] = [
  'csv', 'json', 'xml', 'xlsx', 'xls', 'pdf',
  'zip', 'txt', 'geojson', 'shp', 'kml', 'tsv',
];

export const MIN_TITLE_LENGTH = 3;
export const MAX_TAG_LENGTH = 50;

export type NormalizeResult =
  | { ok: true; record: DatasetRecord }
  | { ok: false; reason: RejectionReason; message: string };

function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Identity hash: SHA-256 of the lower-cased, trimmed URL
 */
export function generateHash(url: string): string {
  return sha256(url.toLowerCase().trim());
}

/**
 * Content hash: SHA-256 of "title|description|sorted,tags", all lower-cased
 */
export function generateContentHash(title: string, description?: string, tags: string[] = []): string {
  const tagsInput = [...tags].sort().join(',').toLowerCase();
  return sha256(`${toHashInput(title)}|${toHashInput(description)}|${tagsInput}`);
}

/**
 * Requires both a scheme and an authority
 */
export function isValidRecordUrl(url: string | undefined): url is string {
  if (!url) {
    return false;
  }
  try {
    const parsed = new URL(url);
    return parsed.protocol.length > 1 && parsed.host.length > 0;
  } catch {
    return false;
  }
}

/**
 * File extension from the URL path, falling back to a `format=` query token
 *
 * "http://example.com/data.csv" → "csv"
 * "http://example.com/download?format=geojson" → "geojson"
 */
export function extractExtension(url: string): string | undefined {
  let pathname = '';
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = '';
  }

  if (pathname.includes('.')) {
    const candidate = pathname.split('.').pop()?.toLowerCase();
    if (candidate && DATA_EXTENSIONS.includes(candidate)) {
      return candidate;
    }
  }

  const formatMatch = url.toLowerCase().match(/format=(\w+)/);
  return formatMatch ? formatMatch[1] : undefined;
}

/**
 * Clean, drop empty or overlong values, lower-case, de-duplicate keeping first-seen order
 */
export function processTags(tags: string[] | undefined): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const tag of tags ?? []) {
    const cleaned = cleanText(tag);
    if (!cleaned || cleaned.length > MAX_TAG_LENGTH) {
      continue;
    }
    const lowered = cleaned.toLowerCase();
    if (!seen.has(lowered)) {
      seen.add(lowered);
      result.push(lowered);
    }
  }

  return result;
}

function reject(reason: RejectionReason, message: string): NormalizeResult {
  return { ok: false, reason, message };
}

/**
 * Build the canonical record. Never throws: every failure is a rejection.
 * A missing description stays missing (it is not defaulted from the title).
 */
export function normalizeRecord(
  candidate: CandidateRecord,
  sourceName: string,
  jobId: string
): NormalizeResult {
  const title = cleanText(candidate.title);
  const description = cleanText(candidate.description);
  const url = candidate.url.trim();

  if (!title || title.length < MIN_TITLE_LENGTH) {
    return reject(CrawlErrorCode.INVALID_TITLE, `Invalid title: ${title ?? '<empty>'}`);
  }

  if (!isValidRecordUrl(url)) {
    return reject(CrawlErrorCode.INVALID_URL, `Invalid URL: ${url || '<empty>'}`);
  }

  const tags = processTags(candidate.tags);
  const source = sourceName.trim();

  const record: DatasetRecord = {
    hash: generateHash(url),
    contentHash: generateContentHash(title, description, tags),
    title,
    description,
    url,
    fileReferences: [url],
    source,
    tags,
    extension: extractExtension(url),
    crawlJobId: jobId,
  };

  const missing = (['title', 'fileReferences', 'hash', 'source'] as const).filter((field) => {
    const value = record[field];
    return Array.isArray(value) ? value.length === 0 : !value;
  });

  if (missing.length > 0) {
    return reject(CrawlErrorCode.INCOMPLETE_RECORD, `Missing required field(s): ${missing.join(', ')}`);
  }

  return { ok: true, record };
}
