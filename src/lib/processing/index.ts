/**
 * Record Processing
 * Main export file for text cleanup and record normalization
 */

export * from './text.processor';
export * from './record.normalizer';
