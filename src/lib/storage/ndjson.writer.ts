/**
 * NDJSON Side Files
 * Append-only JSON-lines files for test-mode output and storage fallback
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { env } from '../../config/env';

export class NdjsonWriter {
  private readonly baseDir: string;

  constructor(baseDir: string = env.DATA_DIR) {
    this.baseDir = path.resolve(baseDir);
  }

  /**
   * data/<jobId>.ndjson
   */
  testModePath(jobId: string): string {
    return path.join(this.baseDir, `${safeName(jobId)}.ndjson`);
  }

  /**
   * data/fallback/<jobId>.ndjson
   */
  fallbackPath(jobId: string): string {
    return path.join(this.baseDir, 'fallback', `${safeName(jobId)}.ndjson`);
  }

  /**
   * Append one line per row, creating the directory on first use
   */
  async append(filePath: string, rows: object[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const lines = rows.map((row) => JSON.stringify(row)).join('\n');
    await fs.appendFile(filePath, `${lines}\n`, 'utf8');
  }
}

// Job ids are UUIDs, but keep anything else filesystem-safe
function safeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]/g, '_');
}
