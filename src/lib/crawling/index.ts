/**
 * Crawling System
 * Main export file for rule-based site walking
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './duplicate-detector';
export * from './crawl-rules';
export * from './link-discoverer';
export * from './robots-txt';
export * from './retry';
export * from './domain-throttle';
export * from './http-page.fetcher';
export * from './site-walker';
