/**
 * Input validation for CLI arguments, environment settings and provider responses
 * Provides type guards, response readers and detailed error messages
 */

import { ParseError, ValidationError } from './error-handler';
import { InputSanitizer } from './sanitizer';
import { TrackMatchingStrategy } from '../types';

export { ValidationError };

export type UnknownRecord = Record<string, unknown>;

export const TRACK_MATCHING_STRATEGIES: readonly TrackMatchingStrategy[] = ['positional', 'title'];

export interface CrawlCommandOptions {
  artist: string;
  output?: string;
  lastfmKey?: string;
  geniusToken?: string;
  enrich: boolean;
  includeLyricsRefs: boolean;
  trackMatching?: TrackMatchingStrategy;
  pretty: boolean;
  quiet: boolean;
  verbose: boolean;
}

export interface SearchCommandOptions {
  query: string;
  limit: number;
}

export interface SongsCommandOptions {
  artist: string;
  limit: number;
  geniusToken?: string;
}

/**
 * Validator utility with schema validation and type guards
 */
export class Validator {
  static readonly MAX_ARTIST_NAME_LENGTH = 200;

  /**
   * Validate `crawl <artist>` arguments
   */
  static validateCrawlOptions(artist: unknown, options: UnknownRecord): CrawlCommandOptions {
    const name = this.validateArtistName(artist, 'artist');

    const trackMatching =
      options.trackMatching === undefined ? undefined : this.validateTrackMatching(options.trackMatching);

    const output = this.optionalString(options.output, 'output');

    return {
      artist: name,
      output: output ? InputSanitizer.sanitizePath(output) : undefined,
      lastfmKey: this.optionalString(options.lastfmKey, 'lastfm-key'),
      geniusToken: this.optionalString(options.geniusToken, 'genius-token'),
      // commander sets enrich=false for --no-enrich
      enrich: options.enrich !== false,
      includeLyricsRefs: Boolean(options.includeLyricsRefs),
      trackMatching,
      pretty: Boolean(options.pretty),
      quiet: Boolean(options.quiet),
      verbose: Boolean(options.verbose),
    };
  }

  /**
   * Validate `search <query>` arguments
   */
  static validateSearchOptions(query: unknown, options: UnknownRecord): SearchCommandOptions {
    return {
      query: this.validateArtistName(query, 'query'),
      limit: this.validateLimit(options.limit, 10),
    };
  }

  /**
   * Validate `songs <artist>` arguments
   */
  static validateSongsOptions(artist: unknown, options: UnknownRecord): SongsCommandOptions {
    return {
      artist: this.validateArtistName(artist, 'artist'),
      limit: this.validateLimit(options.limit, 20),
      geniusToken: this.optionalString(options.geniusToken, 'genius-token'),
    };
  }

  static validateArtistName(value: unknown, field: string): string {
    if (typeof value !== 'string') {
      throw new ValidationError(field, 'An artist name is required');
    }
    if (value.trim().length > this.MAX_ARTIST_NAME_LENGTH) {
      throw new ValidationError(field, `Must be ${this.MAX_ARTIST_NAME_LENGTH} characters or less`);
    }
    const sanitized = InputSanitizer.sanitizeSearchQuery(value, this.MAX_ARTIST_NAME_LENGTH);
    if (!sanitized) {
      throw new ValidationError(field, 'Cannot be empty');
    }
    return sanitized;
  }

  /**
   * Validate a result limit (1-100). Accepts numbers or numeric strings from the CLI.
   */
  static validateLimit(value: unknown, defaultValue: number): number {
    if (value === undefined) {
      return defaultValue;
    }
    const limit = typeof value === 'number' ? value : Number(value);
    if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
      throw new ValidationError('limit', 'Limit must be an integer between 1 and 100');
    }
    return limit;
  }

  static validateTrackMatching(value: unknown): TrackMatchingStrategy {
    const match = TRACK_MATCHING_STRATEGIES.find((strategy) => strategy === value);
    if (!match) {
      throw new ValidationError('track-matching', `Must be one of: ${TRACK_MATCHING_STRATEGIES.join(', ')}`);
    }
    return match;
  }

  /**
   * Parse an integer setting such as RATE_LIMIT_REQUESTS
   */
  static validateIntegerSetting(
    value: string | undefined,
    field: string,
    defaultValue: number,
    min: number = 0
  ): number {
    if (value === undefined || value.trim() === '') {
      return defaultValue;
    }
    const parsed = Number(value.trim());
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new ValidationError(field, `Must be an integer >= ${min} (got "${value}")`);
    }
    return parsed;
  }

  private static optionalString(value: unknown, field: string): string | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new ValidationError(field, 'Must be a string');
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
}

// --- Provider response readers ---------------------------------------------
// Bodies arrive as `unknown`; these narrow them field by field.

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a value to an object or fail with a ParseError naming the field
 */
export function expectRecord(value: unknown, field: string): UnknownRecord {
  if (!isRecord(value)) {
    throw new ParseError(`Expected "${field}" to be an object`);
  }
  return value;
}

export function expectString(record: UnknownRecord, key: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ParseError(`Expected "${key}" to be a non-empty string`);
  }
  return value;
}

/**
 * Optional string; empty strings read as null
 */
export function readString(record: UnknownRecord, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * Optional number; numeric strings ("238") are accepted since Last.fm sends them
 */
export function readNumber(record: UnknownRecord, key: string): number | null {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readRecord(record: UnknownRecord, key: string): UnknownRecord | null {
  const value = record[key];
  return isRecord(value) ? value : null;
}

/**
 * Read a list. A lone object is wrapped, because Last.fm collapses one-element lists.
 */
export function readList(record: UnknownRecord, key: string): unknown[] {
  const value = record[key];
  if (Array.isArray(value)) {
    return value;
  }
  if (isRecord(value)) {
    return [value];
  }
  return [];
}

export function readBoolean(record: UnknownRecord, key: string): boolean {
  return record[key] === true;
}
