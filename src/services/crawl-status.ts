import { AppError, ErrorType } from '../utils/error-handler';
import { CrawlStatus } from '../types';

/**
 * Crawl status transitions. Each returns a new value; completed and failed are terminal.
 */

export function isTerminal(status: CrawlStatus): boolean {
  return status.status !== 'in_progress';
}

function assertInProgress(status: CrawlStatus, transition: string): void {
  if (isTerminal(status)) {
    throw new AppError(
      ErrorType.InvalidState,
      `Cannot ${transition}: crawl for "${status.artistName}" is already ${status.status}`,
      undefined,
      undefined,
      { operation: 'crawl-status', resource: status.artistName }
    );
  }
}

export function startCrawl(artistName: string, now: Date = new Date()): CrawlStatus {
  return {
    artistName,
    startedAt: now.toISOString(),
    completedAt: null,
    status: 'in_progress',
    albumsFound: 0,
    tracksFound: 0,
    errors: [],
    sourcesUsed: [],
  };
}

export function recordAlbums(status: CrawlStatus, albumsFound: number): CrawlStatus {
  assertInProgress(status, 'record albums');
  return { ...status, albumsFound };
}

export function recordTracks(status: CrawlStatus, tracksFound: number): CrawlStatus {
  assertInProgress(status, 'record tracks');
  return { ...status, tracksFound };
}

export function addSource(status: CrawlStatus, source: string): CrawlStatus {
  assertInProgress(status, 'add source');
  if (status.sourcesUsed.includes(source)) {
    return status;
  }
  return { ...status, sourcesUsed: [...status.sourcesUsed, source] };
}

export function addError(status: CrawlStatus, message: string): CrawlStatus {
  assertInProgress(status, 'add error');
  return { ...status, errors: [...status.errors, message] };
}

export function completeCrawl(status: CrawlStatus, now: Date = new Date()): CrawlStatus {
  assertInProgress(status, 'complete');
  return { ...status, status: 'completed', completedAt: now.toISOString() };
}

export function failCrawl(status: CrawlStatus, message: string, now: Date = new Date()): CrawlStatus {
  assertInProgress(status, 'fail');
  return {
    ...status,
    status: 'failed',
    completedAt: now.toISOString(),
    errors: [...status.errors, message],
  };
}
