import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Database
  MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017/opendata-crawler',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Site configuration & local side files
  SITE_CONFIG_PATH: process.env.SITE_CONFIG_PATH || 'configs/sites.json',
  DATA_DIR: process.env.DATA_DIR || 'data',

  // Job dispatch
  MAX_CONCURRENT_CRAWLS: parseInt(process.env.MAX_CONCURRENT_CRAWLS || '5', 10),
  CRAWL_CANCEL_GRACE_MS: parseInt(process.env.CRAWL_CANCEL_GRACE_MS || '30000', 10), // 30 seconds

  // Politeness (process-wide, never per job)
  CRAWL_CONCURRENCY_PER_DOMAIN: parseInt(process.env.CRAWL_CONCURRENCY_PER_DOMAIN || '4', 10),
  CRAWL_DOWNLOAD_DELAY_MS: parseInt(process.env.CRAWL_DOWNLOAD_DELAY_MS || '2000', 10), // jittered 0.5x - 1.5x
  CRAWL_OBEY_ROBOTS: process.env.CRAWL_OBEY_ROBOTS !== 'false', // Default true
  CRAWL_FETCH_TIMEOUT_MS: parseInt(process.env.CRAWL_FETCH_TIMEOUT_MS || '30000', 10),
  CRAWL_USER_AGENT: process.env.CRAWL_USER_AGENT || 'Mozilla/5.0 (compatible; DatasetCrawler/1.0)',
  CRAWL_FETCH_RETRIES: parseInt(process.env.CRAWL_FETCH_RETRIES || '3', 10),
  CRAWL_RETRY_BACKOFF_MS: parseInt(process.env.CRAWL_RETRY_BACKOFF_MS || '1000', 10),

  // Extraction & persistence
  CRAWL_MAX_TAGS: parseInt(process.env.CRAWL_MAX_TAGS || '5', 10),
  CRAWL_BATCH_SIZE: parseInt(process.env.CRAWL_BATCH_SIZE || '10', 10),
} as const;

export default env;
