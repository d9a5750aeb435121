import axios, { AxiosRequestConfig } from 'axios';
import { Logger } from '../utils/logger';
import { AppError, ErrorContext, ErrorHandler, SessionStateError, isCancellation } from '../utils/error-handler';
import { RequestPacer, RequestPacerConfig } from '../services/request-pacer';
import {
  Album,
  AlbumEnrichment,
  Artist,
  ArtistEnrichment,
  LyricsReference,
  SongReference,
} from '../types';

export type ProviderKind = 'musicbrainz' | 'lastfm' | 'genius';
export type SessionState = 'uninitialized' | 'open' | 'closed';

// --- HTTP session -------------------------------------------------------------

export interface HttpResponse {
  data: unknown;
  status?: number;
}

/**
 * The slice of an axios instance the clients use
 */
export interface HttpSession {
  get(url: string, config?: AxiosRequestConfig): Promise<HttpResponse>;
}

export interface SessionOptions {
  baseURL: string;
  timeout: number;
  headers: Record<string, string>;
}

export type SessionFactory = (options: SessionOptions) => HttpSession;

export const axiosSessionFactory: SessionFactory = (options) =>
  axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout,
    headers: options.headers,
  });

// --- Provider configuration ---------------------------------------------------

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

interface BaseProviderConfig {
  baseUrl?: string;
  timeoutMs?: number;
  pacing?: Partial<RequestPacerConfig>;
  sessionFactory?: SessionFactory;
}

export interface MusicBrainzConfig extends BaseProviderConfig {
  kind: 'musicbrainz';
  /** MusicBrainz rejects anonymous clients; "app/version ( contact )" */
  userAgent?: string;
}

export interface LastFmConfig extends BaseProviderConfig {
  kind: 'lastfm';
  apiKey: string;
}

export interface GeniusConfig extends BaseProviderConfig {
  kind: 'genius';
  accessToken: string;
  /** Fetch song descriptions to build a short disambiguation snippet */
  snippets?: boolean;
}

export type ProviderConfig = MusicBrainzConfig | LastFmConfig | GeniusConfig;

// --- Provider roles -------------------------------------------------------------

export interface RequestOptions {
  signal?: AbortSignal;
  /** Awaited before every HTTP request (the crawler's shared rate limiter) */
  throttle?: (signal?: AbortSignal) => Promise<void>;
}

export interface MetadataProvider {
  readonly kind: ProviderKind;
  readonly displayName: string;
  readonly state: SessionState;
  open(): Promise<void>;
  close(): Promise<void>;
  searchArtists(query: string, limit: number, options?: RequestOptions): Promise<Artist[]>;
}

/**
 * Catalog of record: artists, release groups and their track lists
 */
export interface CatalogProvider extends MetadataProvider {
  readonly kind: 'musicbrainz';
  fetchAlbums(artist: Artist, options?: RequestOptions): Promise<Album[]>;
  fetchAlbumDetail(album: Album, options?: RequestOptions): Promise<Album>;
}

/**
 * Secondary metadata looked up by name. A miss is null, never an error.
 */
export interface EnrichmentProvider extends MetadataProvider {
  readonly kind: 'lastfm';
  lookupArtist(name: string, options?: RequestOptions): Promise<ArtistEnrichment | null>;
  lookupAlbum(artistName: string, albumTitle: string, options?: RequestOptions): Promise<AlbumEnrichment | null>;
}

/**
 * Links to lyrics pages plus popularity metadata. Never returns lyric text.
 */
export interface LyricsReferenceProvider extends MetadataProvider {
  readonly kind: 'genius';
  fetchArtistSongs(artistId: string, page: number, perPage: number, options?: RequestOptions): Promise<SongReference[]>;
  lookupTrack(artistName: string, title: string, options?: RequestOptions): Promise<LyricsReference | null>;
}

export interface ProviderFactory {
  catalog(config: MusicBrainzConfig): CatalogProvider;
  enrichment(config: LastFmConfig): EnrichmentProvider;
  lyrics(config: GeniusConfig): LyricsReferenceProvider;
}

// --- Session lifecycle ----------------------------------------------------------

export interface ClientSettings {
  baseUrl: string;
  timeoutMs: number;
  headers: Record<string, string>;
  pacing: RequestPacerConfig;
  sessionFactory: SessionFactory;
}

export interface GetOptions extends RequestOptions {
  /** Resolve with the body for every HTTP status; the caller interprets errors */
  acceptAnyStatus?: boolean;
}

/**
 * Owns one HTTP session: uninitialized -> open -> closed.
 * Requests outside the open state throw SessionStateError.
 */
export abstract class BaseProviderClient<K extends ProviderKind> {
  private session: HttpSession | null = null;
  private sessionState: SessionState = 'uninitialized';
  protected readonly pacer: RequestPacer;

  protected constructor(
    readonly kind: K,
    readonly displayName: string,
    protected readonly settings: ClientSettings
  ) {
    this.pacer = new RequestPacer(displayName, settings.pacing);
  }

  get state(): SessionState {
    return this.sessionState;
  }

  async open(): Promise<void> {
    if (this.sessionState === 'open') {
      return;
    }
    if (this.sessionState === 'closed') {
      throw new SessionStateError(this.displayName, this.sessionState);
    }

    this.session = this.settings.sessionFactory({
      baseURL: this.settings.baseUrl,
      timeout: this.settings.timeoutMs,
      headers: this.settings.headers,
    });
    this.sessionState = 'open';
    Logger.debug(`[${this.displayName}] Session opened`);
  }

  async close(): Promise<void> {
    if (this.sessionState === 'open') {
      Logger.debug(`[${this.displayName}] Session closed`);
    }
    this.session = null;
    this.sessionState = 'closed';
  }

  /**
   * Paced, throttled, timeout-bounded GET. Failures are mapped through handleError.
   */
  protected async get(
    path: string,
    params: Record<string, string | number>,
    operation: string,
    options: GetOptions = {}
  ): Promise<HttpResponse> {
    const session = this.requireSession();
    const { signal } = options;

    await this.pacer.wait(signal);
    if (options.throttle) {
      await options.throttle(signal);
    }

    try {
      const config: AxiosRequestConfig = { params, signal };
      if (options.acceptAnyStatus) {
        config.validateStatus = () => true;
      }
      Logger.debug(`[${this.displayName}] GET ${path}`, { operation });
      return await session.get(path, config);
    } catch (error) {
      this.handleError(error, operation);
    }
  }

  protected handleError(error: unknown, operation: string, details?: Record<string, unknown>): never {
    const context: ErrorContext = { operation, resource: this.displayName, details };
    const appError: AppError = ErrorHandler.parse(error, context);

    let severity: 'error' | 'warn' | 'info' = 'error';
    if (isCancellation(appError)) {
      severity = 'info';
    } else if (appError.isRetryable()) {
      severity = 'warn';
    }
    ErrorHandler.log(appError, severity);

    throw appError;
  }

  private requireSession(): HttpSession {
    if (this.sessionState !== 'open' || !this.session) {
      throw new SessionStateError(this.displayName, this.sessionState);
    }
    return this.session;
  }
}

/**
 * Open the provider, run `fn`, and close it whether `fn` settles or throws
 */
export async function withSession<P extends MetadataProvider, T>(provider: P, fn: (provider: P) => Promise<T>): Promise<T> {
  await provider.open();
  try {
    return await fn(provider);
  } finally {
    await provider.close();
  }
}

export function resolveSettings(
  config: BaseProviderConfig,
  defaults: { baseUrl: string; pacing: RequestPacerConfig },
  headers: Record<string, string>
): ClientSettings {
  return {
    baseUrl: config.baseUrl ?? defaults.baseUrl,
    timeoutMs: config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    headers,
    pacing: { ...defaults.pacing, ...config.pacing },
    sessionFactory: config.sessionFactory ?? axiosSessionFactory,
  };
}
