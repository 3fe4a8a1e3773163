/**
 * Test Fixtures
 * Reusable test data
 */

import { WalkPolicy, WalkTarget } from '../../lib/crawling/crawling.types';
import { DatasetRecord } from '../../modules/dataset/dataset.types';
import { generateContentHash, generateHash } from '../../lib/processing/record.normalizer';
import { CrawlJob, CrawlStatus, CrawlerType } from '../../modules/crawl/crawl.types';
import { emptyStatistics } from '../../modules/crawl/crawl-statistics';

export const BASE_URL = 'https://data.example.org';

/**
 * Listing page linking to every href given
 */
export function listingPage(hrefs: string[]): string {
  const links = hrefs.map((href) => `<li><a href="${href}">${href}</a></li>`).join('\n');
  return `<!DOCTYPE html>
<html>
<head><title>Datasets</title></head>
<body>
  <ul class="results">
${links}
  </ul>
</body>
</html>`;
}

export function datasetPage(fields: {
  title?: string;
  description?: string;
  tags?: string[];
  links?: string[];
}): string {
  const title = fields.title !== undefined ? `<h1 class="dataset-title">${fields.title}</h1>` : '';
  const description = fields.description !== undefined
    ? `<div class="dataset-description">${fields.description}</div>`
    : '';
  const tags = (fields.tags ?? []).map((tag) => `<li><a>${tag}</a></li>`).join('');
  const links = (fields.links ?? []).map((href) => `<a href="${href}">related</a>`).join('');

  return `<!DOCTYPE html>
<html>
<body>
  ${title}
  ${description}
  <ul class="tag-list">${tags}</ul>
  ${links}
</body>
</html>`;
}

/**
 * Start page → /datasets?page=N listings → /dataset/<slug> extraction pages
 */
export function testTarget(overrides: Partial<WalkTarget> = {}): WalkTarget {
  return {
    startUrl: `${BASE_URL}/datasets`,
    domain: 'data.example.org',
    sourceName: 'Example Open Data',
    rules: [
      { allow: '/datasets\\?page=\\d+', role: 'traversal' },
      { allow: '/dataset/[\\w-]+$', role: 'extraction' },
    ],
    selectors: {
      title: 'h1.dataset-title::text',
      description: 'div.dataset-description',
      tags: 'ul.tag-list li a::text',
    },
    ...overrides,
  };
}

export function testPolicy(overrides: Partial<WalkPolicy> = {}): WalkPolicy {
  return {
    maxConcurrency: 4,
    downloadDelayMs: 0,
    obeyRobotsTxt: false,
    userAgent: 'TestCrawler/1.0',
    ...overrides,
  };
}

export function testRecord(overrides: Partial<DatasetRecord> = {}): DatasetRecord {
  const url = overrides.url ?? `${BASE_URL}/dataset/air-quality.csv`;
  const title = overrides.title ?? 'Air Quality Measurements';
  const description = 'description' in overrides ? overrides.description : 'Hourly readings';
  const tags = overrides.tags ?? ['air', 'environment'];

  return {
    hash: generateHash(url),
    contentHash: generateContentHash(title, description, tags),
    title,
    description,
    url,
    fileReferences: [url],
    source: 'Example Open Data',
    tags,
    extension: 'csv',
    crawlJobId: 'job-1',
    ...overrides,
  };
}

export function testJob(overrides: Partial<CrawlJob> = {}): CrawlJob {
  const now = new Date('2026-01-01T00:00:00.000Z');
  return {
    jobId: 'job-1',
    siteId: '1',
    sourceName: 'Example Open Data',
    startUrl: `${BASE_URL}/datasets`,
    crawlerType: CrawlerType.STATIC,
    options: {},
    status: CrawlStatus.PENDING,
    progressPercentage: 0,
    statistics: emptyStatistics(),
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

/**
 * Site entries in the sites file format
 */
export const testSiteEntries: unknown[] = [
  {
    id: 1,
    source_name: 'Example Open Data',
    domain: 'data.example.org',
    start_url: `${BASE_URL}/datasets`,
    crawler_type: 'static',
    rules: [
      { allow: '/datasets\\?page=\\d+', role: 'traversal' },
      { allow: '/dataset/[\\w-]+$', role: 'extraction' },
    ],
    title_selector: 'h1.dataset-title::text',
    description_selector: 'div.dataset-description',
    tags_selector: 'ul.tag-list li a::text',
  },
  {
    id: 2,
    source_name: 'Dynamic Portal',
    domain: 'dynamic.example.org',
    start_url: 'https://dynamic.example.org/',
    crawler_type: 'dynamic',
    rules: [{ allow: '' }],
    title_selector: 'h1',
  },
  {
    id: 3,
    source_name: 'Broken Portal',
    domain: 'broken.example.org',
    rules: [{ allow: '' }],
    title_selector: 'h1',
  },
];
