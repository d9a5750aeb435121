import dotenv from 'dotenv';
import { Validator } from './utils/validator';
import { LogLevel, Logger } from './utils/logger';
import { RateLimiterConfig } from './services/rate-limiter';
import { CrawlerConfig } from './services/discography-crawler';
import { RetryConfig } from './utils/retry';
import { TrackMatchingStrategy } from './types';

export interface AppConfig {
  lastfmApiKey?: string;
  geniusAccessToken?: string;
  musicbrainzUserAgent?: string;
  rateLimit: RateLimiterConfig;
  retry: RetryConfig;
  requestTimeoutMs: number;
  trackMatching: TrackMatchingStrategy;
  logLevel: LogLevel;
  logDir: string;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Read settings from the environment (after loading .env). Invalid numbers raise a ValidationError naming the variable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const trackMatching = optional(env, 'TRACK_MATCHING');

  return {
    lastfmApiKey: optional(env, 'LASTFM_API_KEY'),
    geniusAccessToken: optional(env, 'GENIUS_ACCESS_TOKEN'),
    musicbrainzUserAgent: optional(env, 'MUSICBRAINZ_USER_AGENT'),
    rateLimit: {
      maxRequests: Validator.validateIntegerSetting(env.RATE_LIMIT_REQUESTS, 'RATE_LIMIT_REQUESTS', 5, 1),
      timeWindowSeconds: Validator.validateIntegerSetting(env.RATE_LIMIT_WINDOW_SECONDS, 'RATE_LIMIT_WINDOW_SECONDS', 60, 1),
    },
    retry: {
      maxRetries: Validator.validateIntegerSetting(env.MAX_RETRIES, 'MAX_RETRIES', 3),
      baseDelayMs: Validator.validateIntegerSetting(env.RETRY_BASE_DELAY_MS, 'RETRY_BASE_DELAY_MS', 1000),
      maxDelayMs: Validator.validateIntegerSetting(env.RETRY_MAX_DELAY_MS, 'RETRY_MAX_DELAY_MS', 60000),
    },
    requestTimeoutMs: Validator.validateIntegerSetting(env.REQUEST_TIMEOUT_MS, 'REQUEST_TIMEOUT_MS', 30000, 1),
    trackMatching: trackMatching ? Validator.validateTrackMatching(trackMatching) : 'positional',
    logLevel: Logger.parseLogLevel(env.LOG_LEVEL || 'info'),
    logDir: optional(env, 'LOG_DIR') ?? './logs',
  };
}

/**
 * Load .env into process.env, then read the config
 */
export function loadEnvConfig(): AppConfig {
  dotenv.config();
  const config = loadConfig(process.env);
  Logger.setLogLevel(config.logLevel);
  Logger.setLogDirectory(config.logDir);
  return config;
}

/**
 * Crawler settings from the config; CLI flags passed as overrides win
 */
export function toCrawlerConfig(config: AppConfig, overrides: Partial<CrawlerConfig> = {}): Partial<CrawlerConfig> {
  return {
    lastfmApiKey: overrides.lastfmApiKey ?? config.lastfmApiKey,
    geniusAccessToken: overrides.geniusAccessToken ?? config.geniusAccessToken,
    musicbrainzUserAgent: overrides.musicbrainzUserAgent ?? config.musicbrainzUserAgent,
    enrich: overrides.enrich,
    includeLyricsRefs: overrides.includeLyricsRefs,
    trackMatching: overrides.trackMatching ?? config.trackMatching,
    rateLimit: overrides.rateLimit ?? config.rateLimit,
    retry: overrides.retry ?? config.retry,
    requestTimeoutMs: overrides.requestTimeoutMs ?? config.requestTimeoutMs,
    providerFactory: overrides.providerFactory,
    sessionFactory: overrides.sessionFactory,
  };
}
