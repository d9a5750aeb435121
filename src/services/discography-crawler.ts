import { Logger } from '../utils/logger';
import {
  AggregationFailure,
  AppError,
  ErrorType,
  NotFoundError,
  ParseError,
  isCancellation,
} from '../utils/error-handler';
import { DEFAULT_RETRY_CONFIG, RetryConfig, RetryManager, RetryPredicate } from '../utils/retry';
import { OutputSanitizer } from '../utils/sanitizer';
import { ProgressCallback, noopProgress } from '../utils/progress';
import { totalTracks } from '../utils/discography';
import { RateLimiter, RateLimiterConfig, DEFAULT_RATE_LIMIT } from './rate-limiter';
import { mergeAlbumEnrichment } from './album-merger';
import {
  addError,
  addSource,
  completeCrawl,
  failCrawl,
  isTerminal,
  recordAlbums,
  recordTracks,
  startCrawl,
} from './crawl-status';
import {
  CatalogProvider,
  DEFAULT_REQUEST_TIMEOUT_MS,
  ProviderFactory,
  RequestOptions,
  SessionFactory,
  defaultProviderFactory,
  withSession,
} from '../api';
import {
  Album,
  Artist,
  ArtistEnrichment,
  CrawlStats,
  CrawlStatus,
  Discography,
  JsonObject,
  SongReference,
  Track,
  TrackMatchingStrategy,
} from '../types';

export const SOURCE_MUSICBRAINZ = 'MusicBrainz';
export const SOURCE_LASTFM = 'Last.fm';
export const SOURCE_GENIUS = 'Genius';

export interface CrawlerConfig {
  lastfmApiKey?: string;
  geniusAccessToken?: string;
  musicbrainzUserAgent?: string;
  /** Look albums up on Last.fm when a key is present */
  enrich: boolean;
  /** Attach Genius page links to tracks when a token is present */
  includeLyricsRefs: boolean;
  trackMatching: TrackMatchingStrategy;
  rateLimit: RateLimiterConfig;
  retry: RetryConfig;
  /** Override which failures are retried; defaults to transient errors only */
  shouldRetry?: RetryPredicate;
  requestTimeoutMs: number;
  providerFactory: ProviderFactory;
  sessionFactory?: SessionFactory;
}

export interface CrawlOptions {
  signal?: AbortSignal;
  onStatus?: (status: CrawlStatus) => void;
  onProgress?: ProgressCallback;
}

/**
 * State of one crawl. Each crawl owns its own; only snapshots leave it.
 */
interface CrawlRun {
  status: CrawlStatus;
  signal?: AbortSignal;
  onStatus?: (status: CrawlStatus) => void;
  onProgress: ProgressCallback;
  metadata: Record<string, JsonObject>;
}

function errorMessage(error: unknown): string {
  return OutputSanitizer.sanitizeErrorMessage(error);
}

function artistMetadata(info: ArtistEnrichment): JsonObject {
  return {
    name: info.name,
    url: info.url,
    listeners: info.listeners,
    playcount: info.playcount,
    tags: info.tags,
    similar: info.similar,
  };
}

/**
 * Aggregates one artist's discography: MusicBrainz is the backbone,
 * Last.fm fills gaps, Genius adds lyrics page links.
 */
export class DiscographyCrawler {
  private readonly config: CrawlerConfig;
  private readonly rateLimiter: RateLimiter;
  private readonly retryManager: RetryManager;
  private latestStatus: CrawlStatus | null = null;
  private readonly stats: CrawlStats = { requestsMade: 0, requestsSucceeded: 0, requestsFailed: 0, retries: 0 };

  constructor(config: Partial<CrawlerConfig> = {}) {
    this.config = {
      ...config,
      enrich: config.enrich ?? true,
      includeLyricsRefs: config.includeLyricsRefs ?? false,
      trackMatching: config.trackMatching ?? 'positional',
      rateLimit: config.rateLimit ?? DEFAULT_RATE_LIMIT,
      retry: config.retry ?? DEFAULT_RETRY_CONFIG,
      requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      providerFactory: config.providerFactory ?? defaultProviderFactory,
    };
    this.rateLimiter = new RateLimiter(this.config.rateLimit);
    this.retryManager = new RetryManager(this.config.retry);
  }

  /**
   * Artist candidates from the catalog, best match first. Empty when nothing matches.
   */
  async searchArtists(query: string, limit: number = 10, options: Pick<CrawlOptions, 'signal'> = {}): Promise<Artist[]> {
    const catalog = this.createCatalog();
    return withSession(catalog, (client) =>
      this.execute(`searchArtists(${query})`, (request) => client.searchArtists(query, limit, request), options.signal)
    );
  }

  /**
   * Latest status of the most recent crawl on this instance
   */
  getCrawlStatus(): CrawlStatus | null {
    return this.latestStatus;
  }

  getStats(): CrawlStats {
    return { ...this.stats };
  }

  /**
   * Popular songs from Genius: page links and metadata only
   */
  async popularSongs(artistName: string, limit: number = 10, options: Pick<CrawlOptions, 'signal'> = {}): Promise<SongReference[]> {
    const token = this.config.geniusAccessToken;
    if (!token) {
      throw new AppError(ErrorType.ConfigurationError, 'A Genius access token is required for song references', undefined, undefined, {
        operation: 'popularSongs',
      });
    }

    const genius = this.config.providerFactory.lyrics({
      kind: 'genius',
      accessToken: token,
      timeoutMs: this.config.requestTimeoutMs,
      sessionFactory: this.config.sessionFactory,
    });

    return withSession(genius, async (client) => {
      const artists = await this.execute(
        `searchArtists(${artistName})`,
        (request) => client.searchArtists(artistName, 1, request),
        options.signal
      );
      const artistId = artists[0]?.externalIds.genius;
      if (!artistId) {
        throw new NotFoundError(artistName, { operation: 'popularSongs', resource: SOURCE_GENIUS });
      }
      return this.execute(
        `fetchArtistSongs(${artistName})`,
        (request) => client.fetchArtistSongs(artistId, 1, limit, request),
        options.signal
      );
    });
  }

  /**
   * Crawl one artist. Unrecovered errors surface as AggregationFailure;
   * cancellation is rethrown as-is. The status is failed in both cases.
   */
  async crawl(artistName: string, options: CrawlOptions = {}): Promise<Discography> {
    const traceId = Logger.startOperation(`crawl ${artistName}`);
    const run: CrawlRun = {
      status: startCrawl(artistName),
      signal: options.signal,
      onStatus: options.onStatus,
      onProgress: options.onProgress ?? noopProgress,
      metadata: {},
    };
    this.publish(run, run.status);

    const sources: string[] = [SOURCE_MUSICBRAINZ];

    try {
      const catalog = await this.crawlCatalog(run, artistName);
      const { artist } = catalog;
      let { albums } = catalog;

      if (this.config.enrich && this.config.lastfmApiKey) {
        sources.push(SOURCE_LASTFM);
        this.publish(run, addSource(run.status, SOURCE_LASTFM));
        albums = await this.enrichAlbums(run, artist, albums, this.config.lastfmApiKey);
      }

      if (this.config.includeLyricsRefs && this.config.geniusAccessToken) {
        sources.push(SOURCE_GENIUS);
        this.publish(run, addSource(run.status, SOURCE_GENIUS));
        albums = await this.attachLyricsReferences(run, artist, albums, this.config.geniusAccessToken);
      }

      const discography: Discography = {
        artist,
        albums,
        crawledAt: new Date().toISOString(),
        sources,
        metadata: run.metadata,
      };

      const tracks = totalTracks(discography);
      this.publish(run, completeCrawl(recordTracks(recordAlbums(run.status, albums.length), tracks)));
      Logger.endOperation(traceId, true, { artist: artist.name, albums: albums.length, tracks, sources });

      return discography;
    } catch (error) {
      const message = errorMessage(error);
      Logger.endOperation(traceId, false, { artist: artistName, error: message });
      // A status listener may throw after the crawl already completed
      if (!isTerminal(run.status)) {
        this.publish(run, failCrawl(run.status, message));
      }

      if (isCancellation(error)) {
        throw error;
      }
      throw new AggregationFailure(artistName, error);
    }
  }

  /**
   * Steps 1-3: search, pick the first candidate, fetch release groups and their details
   */
  private async crawlCatalog(run: CrawlRun, artistName: string): Promise<{ artist: Artist; albums: Album[] }> {
    return withSession(this.createCatalog(), async (catalog) => {
      run.onProgress({ stage: 'Searching artist', current: 0, total: 0, message: artistName });

      const candidates = await this.execute(
        `searchArtists(${artistName})`,
        (request) => catalog.searchArtists(artistName, 10, request),
        run.signal
      );
      if (candidates.length === 0) {
        throw new NotFoundError(artistName, { operation: 'crawl', resource: SOURCE_MUSICBRAINZ });
      }

      const artist = candidates[0];
      this.publish(run, addSource(run.status, SOURCE_MUSICBRAINZ));
      Logger.info(`Selected artist: ${artist.name}`, { musicbrainzId: artist.externalIds.musicbrainz });

      const groups = await this.execute(
        `fetchAlbums(${artist.name})`,
        (request) => catalog.fetchAlbums(artist, request),
        run.signal
      );
      this.publish(run, recordAlbums(run.status, groups.length));

      const albums: Album[] = [];
      let tracks = 0;

      for (const [index, group] of groups.entries()) {
        run.onProgress({ stage: 'Fetching albums', current: index + 1, total: groups.length, message: group.title });

        try {
          const album = await this.execute(
            `fetchAlbumDetail(${group.title})`,
            (request) => catalog.fetchAlbumDetail(group, request),
            run.signal
          );
          albums.push(album);
          tracks += album.tracks.length;
          this.publish(run, recordTracks(run.status, tracks));
        } catch (error) {
          if (!(error instanceof ParseError)) {
            throw error;
          }
          Logger.warn(`Skipping album "${group.title}": ${error.message}`);
          this.publish(run, addError(run.status, `Skipped album "${group.title}": ${errorMessage(error)}`));
        }
      }

      this.publish(run, recordAlbums(run.status, albums.length));
      run.metadata[SOURCE_MUSICBRAINZ] = {
        artist_id: artist.externalIds.musicbrainz ?? null,
        release_groups: groups.length,
        albums_fetched: albums.length,
      };

      return { artist, albums };
    });
  }

  /**
   * Step 4: per-album Last.fm lookups. Any failure but cancellation keeps the album as it was.
   */
  private async enrichAlbums(run: CrawlRun, artist: Artist, albums: Album[], apiKey: string): Promise<Album[]> {
    const lastfm = this.config.providerFactory.enrichment({
      kind: 'lastfm',
      apiKey,
      timeoutMs: this.config.requestTimeoutMs,
      sessionFactory: this.config.sessionFactory,
    });

    return withSession(lastfm, async (client) => {
      try {
        const info = await this.execute(
          `lookupArtist(${artist.name})`,
          (request) => client.lookupArtist(artist.name, request),
          run.signal
        );
        if (info) {
          run.metadata[SOURCE_LASTFM] = artistMetadata(info);
        }
      } catch (error) {
        this.recordNonFatal(run, error, `Last.fm artist info for "${artist.name}"`);
      }

      const enriched: Album[] = [];
      let matched = 0;

      for (const [index, album] of albums.entries()) {
        run.onProgress({ stage: 'Enriching albums', current: index + 1, total: albums.length, message: album.title });

        try {
          const info = await this.execute(
            `lookupAlbum(${album.title})`,
            (request) => client.lookupAlbum(artist.name, album.title, request),
            run.signal
          );
          if (info) {
            matched++;
            enriched.push(mergeAlbumEnrichment(album, info, { trackMatching: this.config.trackMatching }));
          } else {
            enriched.push(album);
          }
        } catch (error) {
          this.recordNonFatal(run, error, `Last.fm enrichment for "${album.title}"`);
          enriched.push(album);
        }
      }

      Logger.info(`Enriched ${matched}/${albums.length} albums from Last.fm`);
      return enriched;
    });
  }

  /**
   * Step 5: per-track Genius page links. Tracks that already carry one are left alone.
   */
  private async attachLyricsReferences(run: CrawlRun, artist: Artist, albums: Album[], token: string): Promise<Album[]> {
    const genius = this.config.providerFactory.lyrics({
      kind: 'genius',
      accessToken: token,
      timeoutMs: this.config.requestTimeoutMs,
      sessionFactory: this.config.sessionFactory,
    });
    const total = albums.reduce((sum, album) => sum + album.tracks.length, 0);

    return withSession(genius, async (client) => {
      const result: Album[] = [];
      let processed = 0;
      let linked = 0;

      for (const album of albums) {
        const tracks: Track[] = [];
        for (const track of album.tracks) {
          processed++;
          run.onProgress({ stage: 'Linking lyrics pages', current: processed, total, message: track.title });

          if (track.lyricsReference) {
            tracks.push(track);
            continue;
          }

          try {
            const reference = await this.execute(
              `lookupTrack(${track.title})`,
              (request) => client.lookupTrack(artist.name, track.title, request),
              run.signal
            );
            if (reference) linked++;
            tracks.push(reference ? { ...track, lyricsReference: reference } : track);
          } catch (error) {
            this.recordNonFatal(run, error, `Genius lookup for "${track.title}"`);
            tracks.push(track);
          }
        }
        result.push({ ...album, tracks });
      }

      run.metadata[SOURCE_GENIUS] = { tracks_linked: linked, tracks_total: total };
      return result;
    });
  }

  /**
   * Run one provider operation through the retry manager, acquiring the shared
   * rate limiter before every HTTP request of every attempt
   */
  private async execute<T>(label: string, operation: (request: RequestOptions) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const request: RequestOptions = {
      signal,
      throttle: (throttleSignal) => this.rateLimiter.acquire(throttleSignal),
    };

    return this.retryManager.executeWithRetry(
      async () => {
        this.stats.requestsMade++;
        try {
          const result = await operation(request);
          this.stats.requestsSucceeded++;
          return result;
        } catch (error) {
          this.stats.requestsFailed++;
          throw error;
        }
      },
      {
        signal,
        shouldRetry: this.config.shouldRetry,
        onRetry: (attempt, delayMs, error) => {
          this.stats.retries++;
          Logger.warn(`Retrying ${label} (attempt ${attempt}/${this.retryManager.getConfig().maxRetries}) in ${delayMs}ms`, {
            error: errorMessage(error),
          });
        },
      }
    );
  }

  private recordNonFatal(run: CrawlRun, error: unknown, what: string): void {
    if (isCancellation(error)) {
      throw error;
    }
    const message = `${what} failed: ${errorMessage(error)}`;
    Logger.warn(message);
    this.publish(run, addError(run.status, message));
  }

  private publish(run: CrawlRun, status: CrawlStatus): void {
    run.status = status;
    this.latestStatus = status;
    if (run.onStatus) {
      run.onStatus(status);
    }
  }

  private createCatalog(): CatalogProvider {
    return this.config.providerFactory.catalog({
      kind: 'musicbrainz',
      userAgent: this.config.musicbrainzUserAgent,
      timeoutMs: this.config.requestTimeoutMs,
      sessionFactory: this.config.sessionFactory,
    });
  }
}
