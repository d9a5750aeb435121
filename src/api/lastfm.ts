import { Logger } from '../utils/logger';
import { AppError, ErrorHandler, ErrorType, ParseError, TransientProviderError } from '../utils/error-handler';
import { parseLastFmDate } from '../utils/date-parser';
import { createArtist } from '../utils/discography';
import { UnknownRecord, expectRecord, isRecord, readList, readNumber, readRecord, readString } from '../utils/validator';
import { AlbumEnrichment, Artist, ArtistEnrichment, TrackEnrichment } from '../types';
import { BaseProviderClient, EnrichmentProvider, LastFmConfig, RequestOptions, resolveSettings } from './provider';

export const LASTFM_BASE_URL = 'https://ws.audioscrobbler.com/2.0/';

/** Number of top tags kept as genres */
const MAX_GENRES = 5;

// https://www.last.fm/api/errorcodes
const LASTFM_NOT_FOUND = 6;
const LASTFM_TRANSIENT_CODES = new Set([8, 11, 16, 29]);
const LASTFM_AUTH_CODES = new Set([4, 9, 10, 26]);

function tagNames(record: UnknownRecord): string[] {
  const tags = readRecord(record, 'tags') ?? readRecord(record, 'toptags');
  if (!tags) return [];
  return readList(tags, 'tag')
    .filter(isRecord)
    .map((tag) => readString(tag, 'name'))
    .filter((name): name is string => name !== null);
}

/**
 * Last.fm reports durations in seconds; 0 means unknown
 */
function secondsToMs(value: number | null): number | null {
  return value && value > 0 ? Math.round(value * 1000) : null;
}

/**
 * Enrichment client for the Last.fm web service (JSON format)
 */
export class LastFmClient extends BaseProviderClient<'lastfm'> implements EnrichmentProvider {
  private readonly apiKey: string;

  constructor(config: Omit<LastFmConfig, 'kind'>) {
    if (!config.apiKey) {
      throw new AppError(ErrorType.ConfigurationError, 'Last.fm requires an API key', undefined, undefined, {
        operation: 'LastFmClient',
      });
    }

    super(
      'lastfm',
      'Last.fm',
      resolveSettings(
        config,
        { baseUrl: LASTFM_BASE_URL, pacing: { minIntervalMs: 200, maxPerMinute: 300 } },
        { Accept: 'application/json' }
      )
    );
    this.apiKey = config.apiKey;
  }

  async searchArtists(query: string, limit: number = 10, options: RequestOptions = {}): Promise<Artist[]> {
    const body = await this.call('artist.search', { artist: query, limit }, `searchArtists(${query})`, options);
    if (!body) return [];

    const results = readRecord(body, 'results');
    const matches = results ? readRecord(results, 'artistmatches') : null;
    if (!matches) return [];

    const artists: Artist[] = [];
    for (const entry of readList(matches, 'artist')) {
      if (!isRecord(entry)) continue;
      const name = readString(entry, 'name');
      if (!name) continue;
      artists.push(
        createArtist({
          name,
          externalIds: {
            musicbrainz: readString(entry, 'mbid') ?? undefined,
            lastfm: readString(entry, 'url') ?? undefined,
          },
        })
      );
    }

    return artists.slice(0, limit);
  }

  async lookupArtist(name: string, options: RequestOptions = {}): Promise<ArtistEnrichment | null> {
    const body = await this.call('artist.getinfo', { artist: name, autocorrect: 1 }, `lookupArtist(${name})`, options);
    if (!body) return null;

    const artist = expectRecord(body.artist, 'artist');
    const stats = readRecord(artist, 'stats');
    const similar = readRecord(artist, 'similar');

    return {
      name: readString(artist, 'name') ?? name,
      url: readString(artist, 'url'),
      listeners: stats ? readNumber(stats, 'listeners') : null,
      playcount: stats ? readNumber(stats, 'playcount') : null,
      tags: tagNames(artist),
      similar: similar
        ? readList(similar, 'artist')
            .filter(isRecord)
            .map((entry) => readString(entry, 'name'))
            .filter((entry): entry is string => entry !== null)
        : [],
    };
  }

  async lookupAlbum(artistName: string, albumTitle: string, options: RequestOptions = {}): Promise<AlbumEnrichment | null> {
    const body = await this.call(
      'album.getinfo',
      { artist: artistName, album: albumTitle, autocorrect: 1 },
      `lookupAlbum(${artistName}, ${albumTitle})`,
      options
    );
    if (!body) {
      Logger.debug(`[Last.fm] No album match for "${albumTitle}"`);
      return null;
    }

    const album = expectRecord(body.album, 'album');
    const trackContainer = readRecord(album, 'tracks');
    const tags = tagNames(album);

    const tracks: TrackEnrichment[] = (trackContainer ? readList(trackContainer, 'track') : [])
      .filter(isRecord)
      .map((track) => ({
        title: readString(track, 'name') ?? '',
        durationMs: secondsToMs(readNumber(track, 'duration')),
        url: readString(track, 'url'),
      }));

    return {
      title: readString(album, 'name') ?? albumTitle,
      label: readString(album, 'label'),
      releaseDate: parseLastFmDate(readString(album, 'releasedate')),
      genres: tags.slice(0, MAX_GENRES),
      tags,
      tracks,
      url: readString(album, 'url'),
      listeners: readNumber(album, 'listeners'),
      playcount: readNumber(album, 'playcount'),
    };
  }

  /**
   * Call one API method. Returns null on "not found" (error 6 or HTTP 404).
   */
  private async call(
    method: string,
    params: Record<string, string | number>,
    operation: string,
    options: RequestOptions
  ): Promise<UnknownRecord | null> {
    const response = await this.get(
      '',
      { ...params, method, api_key: this.apiKey, format: 'json' },
      operation,
      { ...options, acceptAnyStatus: true }
    );

    const status = response.status ?? 200;
    const body = isRecord(response.data) ? response.data : null;
    const code = body ? readNumber(body, 'error') : null;

    if (code === LASTFM_NOT_FOUND || status === 404) {
      return null;
    }

    if (code !== null || status >= 400) {
      const message = (body && readString(body, 'message')) || `HTTP ${status}`;
      const error = this.mapApiError(code, status, message, operation);
      ErrorHandler.log(error, error.isRetryable() ? 'warn' : 'error');
      throw error;
    }

    if (!body) {
      throw new ParseError('Last.fm returned a non-JSON body', undefined, { operation, resource: this.displayName });
    }

    return body;
  }

  private mapApiError(code: number | null, status: number, message: string, operation: string): AppError {
    const context = { operation, resource: this.displayName, details: { code, status } };

    if (code === 29 || status === 429) {
      return new TransientProviderError(this.displayName, ErrorType.RateLimit, message, status, undefined, context);
    }
    if ((code !== null && LASTFM_TRANSIENT_CODES.has(code)) || status >= 500) {
      return new TransientProviderError(this.displayName, ErrorType.ServiceUnavailable, message, status, undefined, context);
    }
    if ((code !== null && LASTFM_AUTH_CODES.has(code)) || status === 401 || status === 403) {
      return new AppError(ErrorType.Unauthorized, message, status, undefined, context);
    }
    return new AppError(ErrorType.BadRequest, message, status, undefined, context);
  }
}
