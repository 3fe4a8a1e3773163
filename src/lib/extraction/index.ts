/**
 * Extraction System
 * Main export file for page field extraction
 */

export * from './extraction.types';
export * from './cheerio.locator';
export * from './record.extractor';
