/**
 * Dataset Gateway Tests
 */

import { BASE_URL, testRecord } from '../../../__tests__/helpers/fixtures';
import { InMemoryDatasetStore, MemoryNdjsonWriter } from '../../../__tests__/helpers/mocks';
import { CrawlErrorCode } from '../../../lib/errors/crawl.errors';
import { DatasetBatch } from '../dataset.batch';
import { DatasetGateway, GatewayRun } from '../dataset.gateway';
import { StoreOutcome } from '../dataset.types';

const NOW = new Date('2026-02-01T00:00:00.000Z');

describe('DatasetGateway', () => {
  let store: InMemoryDatasetStore;
  let sideFiles: MemoryNdjsonWriter;
  let gateway: DatasetGateway;

  const run = (overrides: Partial<GatewayRun> = {}): GatewayRun => ({
    jobId: 'job-1',
    testMode: false,
    batch: new DatasetBatch(10),
    ...overrides,
  });

  beforeEach(() => {
    store = new InMemoryDatasetStore();
    sideFiles = new MemoryNdjsonWriter();
    gateway = new DatasetGateway(store, sideFiles, { now: () => NOW });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('classifyAndStore', () => {
    it('should create a new record, then report it unchanged', async () => {
      const record = testRecord();

      expect(await gateway.classifyAndStore(record, 'job-1')).toBe(StoreOutcome.CREATED);
      expect(await gateway.classifyAndStore(record, 'job-2')).toBe(StoreOutcome.UNCHANGED);

      expect(store.calls).toEqual(['findByHash', 'insert', 'findByHash', 'touch']);
      expect(store.records.size).toBe(1);
      expect(store.records.get(record.hash)).toMatchObject({ crawlJobId: 'job-1', lastCrawlJobId: 'job-2' });
    });

    it('should store one record for any number of repeats', async () => {
      const record = testRecord();
      const outcomes: StoreOutcome[] = [];
      for (let i = 0; i < 4; i++) {
        outcomes.push(await gateway.classifyAndStore(record, 'job-1'));
      }

      expect(outcomes).toEqual([
        StoreOutcome.CREATED,
        StoreOutcome.UNCHANGED,
        StoreOutcome.UNCHANGED,
        StoreOutcome.UNCHANGED,
      ]);
      expect(store.records.size).toBe(1);
    });

    it('should update changed content in place, keeping the hash and the creating job', async () => {
      const original = testRecord();
      await gateway.classifyAndStore(original, 'job-1');

      const revised = testRecord({ description: 'Revised readings', crawlJobId: 'job-2' });
      expect(revised.hash).toBe(original.hash);

      expect(await gateway.classifyAndStore(revised, 'job-2')).toBe(StoreOutcome.UPDATED);
      expect(store.records.size).toBe(1);
      expect(store.records.get(original.hash)).toMatchObject({
        hash: original.hash,
        contentHash: revised.contentHash,
        description: 'Revised readings',
        crawlJobId: 'job-1',
        lastCrawlJobId: 'job-2',
      });
    });

    it('should re-classify when content changed between lookup and update', async () => {
      const original = testRecord();
      await gateway.classifyAndStore(original, 'job-1');
      store.calls.length = 0;

      let raced = false;
      store.afterFind = (hash) => {
        const current = store.records.get(hash);
        if (!raced && current) {
          raced = true;
          store.records.set(hash, { ...current, contentHash: 'edited-elsewhere' });
        }
      };

      const revised = testRecord({ title: 'Air Quality Measurements 2026' });

      expect(await gateway.classifyAndStore(revised, 'job-2')).toBe(StoreOutcome.UPDATED);
      expect(store.calls).toEqual(['findByHash', 'replaceContent', 'findByHash', 'replaceContent']);
      expect(store.records.get(original.hash)?.contentHash).toBe(revised.contentHash);
    });

    it('should report Unchanged after losing an insert race to identical content', async () => {
      const record = testRecord();
      store.afterFind = () => {
        if (store.records.size === 0) {
          void store.insert(record, NOW);
        }
      };

      expect(await gateway.classifyAndStore(record, 'job-1')).toBe(StoreOutcome.UNCHANGED);
      expect(store.records.size).toBe(1);
    });

    it('should wrap storage failures as StorageUnavailable', async () => {
      store.failOn = () => true;

      await expect(gateway.classifyAndStore(testRecord(), 'job-1')).rejects.toMatchObject({
        code: CrawlErrorCode.STORAGE_UNAVAILABLE,
        message: 'Storage unavailable: connection refused during findByHash',
      });
    });
  });

  describe('submit', () => {
    it('should skip a hash already submitted in the same run', async () => {
      const current = run();
      const record = testRecord();

      expect(await gateway.submit(record, current)).toEqual([]);
      expect(await gateway.submit(record, current)).toEqual([
        { outcome: StoreOutcome.DUPLICATE_SKIPPED, hash: record.hash },
      ]);
      expect(current.batch.size).toBe(1);
    });

    it('should flush when the batch fills up', async () => {
      const current = run({ batch: new DatasetBatch(2) });
      const first = testRecord({ url: `${BASE_URL}/dataset/first.csv` });
      const second = testRecord({ url: `${BASE_URL}/dataset/second.csv` });

      expect(await gateway.submit(first, current)).toEqual([]);
      expect(store.calls).toEqual([]);

      expect(await gateway.submit(second, current)).toEqual([
        { outcome: StoreOutcome.CREATED, hash: first.hash },
        { outcome: StoreOutcome.CREATED, hash: second.hash },
      ]);
      expect(current.batch.size).toBe(0);
    });

    it('should write test mode records to the side file without touching storage', async () => {
      const record = testRecord();

      expect(await gateway.submit(record, run({ testMode: true }))).toEqual([]);

      expect(store.calls).toEqual([]);
      expect(sideFiles.rows('/virtual-data/job-1.ndjson')).toEqual([
        { ...record, crawledAt: '2026-02-01T00:00:00.000Z' },
      ]);
    });

    it('should fail the job when the test mode file cannot be written', async () => {
      sideFiles.fail = true;

      await expect(gateway.submit(testRecord(), run({ testMode: true }))).rejects.toMatchObject({
        code: CrawlErrorCode.JOB_FATAL,
      });
    });
  });

  describe('flush', () => {
    it('should do nothing for an empty batch', async () => {
      expect(await gateway.flush(run())).toEqual([]);
      expect(store.calls).toEqual([]);
    });

    it('should send the failing record and the rest of the batch to the fallback file', async () => {
      const current = run();
      const first = testRecord({ url: `${BASE_URL}/dataset/first.csv` });
      const second = testRecord({ url: `${BASE_URL}/dataset/second.csv` });
      const third = testRecord({ url: `${BASE_URL}/dataset/third.csv` });
      for (const record of [first, second, third]) {
        await gateway.submit(record, current);
      }
      store.failOn = (operation, hash) => operation === 'insert' && hash === second.hash;

      const results = await gateway.flush(current);

      const error = 'Storage unavailable: connection refused during insert';
      expect(results).toEqual([
        { outcome: StoreOutcome.CREATED, hash: first.hash },
        { outcome: StoreOutcome.ERROR, hash: second.hash, error },
        { outcome: StoreOutcome.ERROR, hash: third.hash, error },
      ]);
      expect(sideFiles.rows('/virtual-data/fallback/job-1.ndjson')).toEqual([
        { ...second, failedAt: '2026-02-01T00:00:00.000Z', error },
        { ...third, failedAt: '2026-02-01T00:00:00.000Z', error },
      ]);
      expect(store.records.size).toBe(1);
    });

    it('should fail the job when the fallback file cannot be written either', async () => {
      const current = run();
      await gateway.submit(testRecord(), current);
      store.failOn = () => true;
      sideFiles.fail = true;

      await expect(gateway.flush(current)).rejects.toMatchObject({
        code: CrawlErrorCode.JOB_FATAL,
        message: 'Fallback write failed for /virtual-data/fallback/job-1.ndjson: disk full',
      });
    });
  });

  describe('queries', () => {
    it('should list active datasets and look them up by hash', async () => {
      const record = testRecord();
      await gateway.classifyAndStore(record, 'job-1');

      expect(await gateway.getDataset(record.hash)).toMatchObject({ title: 'Air Quality Measurements' });
      expect(await gateway.getDataset('missing')).toBeNull();
      expect(await gateway.listDatasets({ source: 'Example Open Data' })).toMatchObject({ total: 1 });
      expect(await gateway.listDatasets({ source: 'Elsewhere' })).toMatchObject({ total: 0 });
    });
  });
});
