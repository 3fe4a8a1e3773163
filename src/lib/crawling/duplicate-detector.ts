/**
 * Duplicate Detector
 * Visited-set for one walk, keyed by normalized URL
 */

import { normalizeUrl } from './url-normalizer';

export class DuplicateDetector {
  private seenUrls: Set<string> = new Set();
  private duplicatesCount: number = 0;

  /**
   * Mark a URL as seen; returns true if it was already seen
   */
  addUrl(url: string): boolean {
    const normalized = normalizeUrl(url);

    if (this.seenUrls.has(normalized)) {
      this.duplicatesCount++;
      return true;
    }

    this.seenUrls.add(normalized);
    return false;
  }

  getStats(): { total: number; duplicates: number } {
    return {
      total: this.seenUrls.size,
      duplicates: this.duplicatesCount,
    };
  }
}
