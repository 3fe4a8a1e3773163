/**
 * NDJSON Writer Tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { NdjsonWriter } from '../ndjson.writer';

describe('NdjsonWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ndjson-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should place test output and fallback files under the data directory', () => {
    const writer = new NdjsonWriter(dir);

    expect(writer.testModePath('job-1')).toBe(path.join(dir, 'job-1.ndjson'));
    expect(writer.fallbackPath('job-1')).toBe(path.join(dir, 'fallback', 'job-1.ndjson'));
  });

  it('should keep job ids filesystem-safe', () => {
    const writer = new NdjsonWriter(dir);

    expect(writer.testModePath('../etc/passwd')).toBe(path.join(dir, '.._etc_passwd.ndjson'));
  });

  it('should append one JSON line per row, creating directories', async () => {
    const writer = new NdjsonWriter(dir);
    const file = writer.fallbackPath('job-1');

    await writer.append(file, [{ hash: 'a' }, { hash: 'b' }]);
    await writer.append(file, [{ hash: 'c' }]);
    await writer.append(file, []);

    expect(await fs.readFile(file, 'utf8')).toBe('{"hash":"a"}\n{"hash":"b"}\n{"hash":"c"}\n');
  });
});
