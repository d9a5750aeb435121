import { Logger } from '../utils/logger';
import { AppError, ErrorType, ParseError } from '../utils/error-handler';
import { parsePartialDate } from '../utils/date-parser';
import { createArtist } from '../utils/discography';
import { QueryNormalizer } from '../utils/query-normalizer';
import { UnknownRecord, expectRecord, isRecord, readList, readNumber, readRecord, readString } from '../utils/validator';
import { TrackMatcher } from '../services/track-matcher';
import { Artist, LyricsReference, SongReference } from '../types';
import { BaseProviderClient, GeniusConfig, LyricsReferenceProvider, RequestOptions, resolveSettings } from './provider';

export const GENIUS_BASE_URL = 'https://api.genius.com';
export const GENIUS_SOURCE = 'Genius';

export const LYRICS_DISCLAIMER =
  'Lyrics are protected by copyright. This is a link to the lyrics page only; no lyric text is stored or reproduced.';

export const MAX_SNIPPET_WORDS = 3;
const MAX_PER_PAGE = 50;

/**
 * First words of a song description, capped at MAX_SNIPPET_WORDS. Genius uses "?" for "no description".
 */
export function buildSnippet(description: string | null): string | null {
  if (!description) return null;
  const words = description.trim().split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0 || description.trim() === '?') return null;
  return words.slice(0, MAX_SNIPPET_WORDS).join(' ');
}

interface SongHit {
  id: string;
  title: string;
  artist: string | null;
  url: string;
}

/**
 * Lyrics-reference client for the Genius API.
 * Only titles, ids, popularity figures and page URLs are read from responses.
 */
export class GeniusClient extends BaseProviderClient<'genius'> implements LyricsReferenceProvider {
  private readonly snippets: boolean;

  constructor(config: Omit<GeniusConfig, 'kind'>) {
    if (!config.accessToken) {
      throw new AppError(ErrorType.ConfigurationError, 'Genius requires an access token', undefined, undefined, {
        operation: 'GeniusClient',
      });
    }

    super(
      'genius',
      GENIUS_SOURCE,
      resolveSettings(
        config,
        { baseUrl: GENIUS_BASE_URL, pacing: { minIntervalMs: 500, maxPerMinute: 60 } },
        { Authorization: `Bearer ${config.accessToken}`, Accept: 'application/json' }
      )
    );
    this.snippets = config.snippets ?? false;
  }

  /**
   * Primary artists of the search hits, de-duplicated by Genius id
   */
  async searchArtists(query: string, limit: number = 10, options: RequestOptions = {}): Promise<Artist[]> {
    const hits = await this.search(query, `searchArtists(${query})`, options);
    const seen = new Set<string>();
    const artists: Artist[] = [];

    for (const result of hits) {
      const primary = readRecord(result, 'primary_artist');
      if (!primary) continue;
      const id = readString(primary, 'id');
      const name = readString(primary, 'name');
      if (!id || !name || seen.has(id)) continue;
      seen.add(id);
      artists.push(createArtist({ name, externalIds: { genius: id } }));
    }

    return artists.slice(0, limit);
  }

  /**
   * Songs by popularity. Link and metadata only.
   */
  async fetchArtistSongs(
    artistId: string,
    page: number = 1,
    perPage: number = 20,
    options: RequestOptions = {}
  ): Promise<SongReference[]> {
    const response = await this.get(
      `/artists/${encodeURIComponent(artistId)}/songs`,
      { sort: 'popularity', per_page: Math.min(Math.max(perPage, 1), MAX_PER_PAGE), page: Math.max(page, 1) },
      `fetchArtistSongs(${artistId}, page ${page})`,
      options
    );

    const songs = readList(this.unwrap(response.data), 'songs');
    const references: SongReference[] = [];

    for (const entry of songs) {
      if (!isRecord(entry)) continue;
      const reference = this.toSongReference(entry);
      if (reference) references.push(reference);
    }

    return references;
  }

  /**
   * Best-matching song page for a track, or null
   */
  async lookupTrack(artistName: string, title: string, options: RequestOptions = {}): Promise<LyricsReference | null> {
    const query = QueryNormalizer.buildSearchQuery(title, artistName);
    const hits = (await this.search(query, `lookupTrack(${artistName}, ${title})`, options))
      .map((result) => this.toSongHit(result))
      .filter((hit): hit is SongHit => hit !== null);

    const match = TrackMatcher.findBestMatch({ title, artist: artistName }, hits);
    if (!match) {
      Logger.debug(`[Genius] No song match for "${title}"`);
      return null;
    }

    const snippet = this.snippets ? await this.fetchSnippet(match.candidate.id, options) : null;

    return {
      url: match.candidate.url,
      disclaimer: LYRICS_DISCLAIMER,
      snippet,
      source: GENIUS_SOURCE,
    };
  }

  private async search(query: string, operation: string, options: RequestOptions): Promise<UnknownRecord[]> {
    const response = await this.get('/search', { q: query }, operation, options);
    return readList(this.unwrap(response.data), 'hits')
      .filter(isRecord)
      .map((hit) => readRecord(hit, 'result'))
      .filter((result): result is UnknownRecord => result !== null);
  }

  private async fetchSnippet(songId: string, options: RequestOptions): Promise<string | null> {
    const response = await this.get(
      `/songs/${encodeURIComponent(songId)}`,
      { text_format: 'plain' },
      `fetchSnippet(${songId})`,
      options
    );
    const song = readRecord(this.unwrap(response.data), 'song');
    const description = song ? readRecord(song, 'description') : null;
    return buildSnippet(description ? readString(description, 'plain') : null);
  }

  /**
   * Genius wraps every payload as { meta, response }
   */
  private unwrap(data: unknown): UnknownRecord {
    const body = expectRecord(data, 'Genius response');
    const response = readRecord(body, 'response');
    if (!response) {
      throw new ParseError('Genius response is missing "response"', undefined, {
        operation: 'unwrap',
        resource: this.displayName,
      });
    }
    return response;
  }

  private toSongHit(result: UnknownRecord): SongHit | null {
    const id = readString(result, 'id');
    const title = readString(result, 'title');
    const url = readString(result, 'url');
    if (!id || !title || !url) return null;
    const primary = readRecord(result, 'primary_artist');
    return { id, title, url, artist: primary ? readString(primary, 'name') : null };
  }

  private toSongReference(song: UnknownRecord): SongReference | null {
    const hit = this.toSongHit(song);
    if (!hit) return null;

    const stats = readRecord(song, 'stats');
    const components = readRecord(song, 'release_date_components');
    let releaseDate = parsePartialDate(readString(song, 'release_date'));
    if (!releaseDate && components) {
      const year = readNumber(components, 'year');
      const month = readNumber(components, 'month');
      releaseDate = year ? parsePartialDate(month ? `${year}-${month}` : String(year)) : null;
    }

    return {
      id: hit.id,
      title: hit.title,
      fullTitle: readString(song, 'full_title'),
      artistName: hit.artist,
      url: hit.url,
      releaseDate,
      pageviews: stats ? readNumber(stats, 'pageviews') : null,
      annotationCount: readNumber(song, 'annotation_count'),
      lyricsState: readString(song, 'lyrics_state'),
      disclaimer: LYRICS_DISCLAIMER,
    };
  }
}
