import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from project root
dotenv.config({ path: resolve(__dirname, '../../.env') });

interface Config {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  hospitalApiUrl: string;
  requestTimeoutMs: number;
  maxRows: number;
  maxFileSizeBytes: number;
  concurrencyLimit: number;
  rateLimitPerMinute: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryBackoffMultiplier: number;
  retryMaxDelayMs: number;
  retryJitterPercent: number;
  shutdownTimeoutMs: number;
  forceShutdownTimeoutMs: number;
}

const nodeEnv = process.env.NODE_ENV || 'development';

function defaultLogLevel(env: string): string {
  if (env === 'production') return 'info';
  if (env === 'test') return 'silent';
  return 'debug';
}

export const config: Config = {
  port: parseInt(process.env.PORT || '3000', 10),
  host: process.env.HOST || '0.0.0.0',
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || defaultLogLevel(nodeEnv),
  hospitalApiUrl: process.env.HOSPITAL_API_BASE || 'https://hospital-directory.onrender.com',
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || '10000', 10),
  maxRows: parseInt(process.env.MAX_ROWS || '20', 10),
  maxFileSizeBytes: parseInt(process.env.MAX_FILE_SIZE_BYTES || '1048576', 10), // 1MB
  concurrencyLimit: parseInt(process.env.CONCURRENCY_LIMIT || '5', 10),
  rateLimitPerMinute: parseInt(process.env.RATE_LIMIT_PER_MINUTE || '0', 10), // 0 = no rate limit
  maxAttempts: parseInt(process.env.MAX_ATTEMPTS || '3', 10),
  retryBaseDelayMs: parseInt(process.env.RETRY_BASE_DELAY_MS || '1000', 10),
  retryBackoffMultiplier: parseFloat(process.env.RETRY_BACKOFF_MULTIPLIER || '2'),
  retryMaxDelayMs: parseInt(process.env.RETRY_MAX_DELAY_MS || '300000', 10), // 5 minutes
  retryJitterPercent: parseInt(process.env.RETRY_JITTER_PERCENT || '0', 10),
  shutdownTimeoutMs: parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '30000', 10), // 30 seconds
  forceShutdownTimeoutMs: parseInt(process.env.FORCE_SHUTDOWN_TIMEOUT_MS || '60000', 10), // 60 seconds
};
