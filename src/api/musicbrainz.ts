import { Logger } from '../utils/logger';
import { ParseError } from '../utils/error-handler';
import { parsePartialDate } from '../utils/date-parser';
import { createAlbum, createArtist, createTrack } from '../utils/discography';
import {
  UnknownRecord,
  expectRecord,
  expectString,
  isRecord,
  readList,
  readNumber,
  readRecord,
  readString,
} from '../utils/validator';
import { Album, AlbumType, Artist, Track } from '../types';
import { BaseProviderClient, CatalogProvider, MusicBrainzConfig, RequestOptions, resolveSettings } from './provider';

export const MUSICBRAINZ_BASE_URL = 'https://musicbrainz.org/ws/2';
export const DEFAULT_MUSICBRAINZ_USER_AGENT = 'discography-crawler/1.0.0';

const BROWSE_PAGE_SIZE = 100;
const MAX_RELEASE_GROUP_PAGES = 10;

const PRIMARY_TYPES: Record<string, AlbumType> = {
  album: 'album',
  single: 'single',
  ep: 'ep',
};

export function mapPrimaryType(value: string | null): AlbumType {
  return (value && PRIMARY_TYPES[value.toLowerCase()]) || 'unknown';
}

/**
 * Escape Lucene special characters for a quoted MusicBrainz search term
 */
function quoteTerm(value: string): string {
  return `"${value.replace(/(["\\])/g, '\\$1')}"`;
}

/**
 * Catalog-of-record client for the MusicBrainz web service (JSON, v2)
 */
export class MusicBrainzClient extends BaseProviderClient<'musicbrainz'> implements CatalogProvider {
  constructor(config: Omit<MusicBrainzConfig, 'kind'> = {}) {
    super(
      'musicbrainz',
      'MusicBrainz',
      resolveSettings(
        config,
        // MusicBrainz allows one request per second per client
        { baseUrl: MUSICBRAINZ_BASE_URL, pacing: { minIntervalMs: 1000, maxPerMinute: 60 } },
        {
          'User-Agent': config.userAgent || DEFAULT_MUSICBRAINZ_USER_AGENT,
          Accept: 'application/json',
        }
      )
    );
  }

  async searchArtists(query: string, limit: number = 10, options: RequestOptions = {}): Promise<Artist[]> {
    const response = await this.get(
      '/artist',
      { query: `artist:${quoteTerm(query)}`, limit, fmt: 'json' },
      `searchArtists(${query})`,
      options
    );

    const body = expectRecord(response.data, 'artist search');
    const artists: Artist[] = [];

    for (const entry of readList(body, 'artists')) {
      try {
        artists.push(this.parseArtist(expectRecord(entry, 'artist')));
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        Logger.warn(`[MusicBrainz] Skipping malformed artist: ${error.message}`);
      }
    }

    Logger.info(`Found ${artists.length} artists for "${query}"`);
    return artists.slice(0, limit);
  }

  /**
   * Browse the artist's release groups. Albums come back without tracks,
   * ordered by release year (unknown years first).
   */
  async fetchAlbums(artist: Artist, options: RequestOptions = {}): Promise<Album[]> {
    const artistId = artist.externalIds.musicbrainz;
    if (!artistId) {
      throw new ParseError(`Artist "${artist.name}" has no MusicBrainz id`);
    }

    const albums: Album[] = [];
    let offset = 0;

    for (let page = 0; page < MAX_RELEASE_GROUP_PAGES; page++) {
      const response = await this.get(
        '/release-group',
        { artist: artistId, limit: BROWSE_PAGE_SIZE, offset, inc: 'genres', fmt: 'json' },
        `fetchAlbums(${artist.name}, offset ${offset})`,
        options
      );

      const body = expectRecord(response.data, 'release-group browse');
      const groups = readList(body, 'release-groups');

      for (const entry of groups) {
        try {
          albums.push(this.parseReleaseGroup(expectRecord(entry, 'release-group')));
        } catch (error) {
          if (!(error instanceof ParseError)) throw error;
          Logger.warn(`[MusicBrainz] Skipping malformed release group: ${error.message}`);
        }
      }

      offset += groups.length;
      const total = readNumber(body, 'release-group-count') ?? offset;
      if (groups.length === 0 || offset >= total) {
        break;
      }
    }

    albums.sort((a, b) => (a.releaseYear ?? 0) - (b.releaseYear ?? 0));
    Logger.info(`Found ${albums.length} release groups for ${artist.name}`);
    return albums;
  }

  /**
   * Fill an album from the earliest release of its release group:
   * tracks, label, catalog number and country
   */
  async fetchAlbumDetail(album: Album, options: RequestOptions = {}): Promise<Album> {
    const groupId = album.externalIds.musicbrainz;
    if (!groupId) {
      throw new ParseError(`Album "${album.title}" has no MusicBrainz release-group id`);
    }

    const response = await this.get(
      '/release',
      { 'release-group': groupId, inc: 'recordings+labels+media+isrcs', limit: BROWSE_PAGE_SIZE, fmt: 'json' },
      `fetchAlbumDetail(${album.title})`,
      options
    );

    const body = expectRecord(response.data, 'release browse');
    const release = this.pickEarliestRelease(readList(body, 'releases'));
    if (!release) {
      Logger.debug(`[MusicBrainz] No releases for "${album.title}"`);
      return album;
    }

    const labelInfo = readList(release, 'label-info').find(isRecord);
    const label = labelInfo ? readRecord(labelInfo, 'label') : null;
    const releaseDate = album.releaseDate ?? parsePartialDate(readString(release, 'date'));

    return createAlbum({
      ...album,
      releaseDate,
      releaseYear: album.releaseYear,
      label: album.label ?? (label ? readString(label, 'name') : null),
      catalogNumber: album.catalogNumber ?? (labelInfo ? readString(labelInfo, 'catalog-number') : null),
      country: album.country ?? readString(release, 'country'),
      externalIds: { ...album.externalIds, musicbrainzRelease: expectString(release, 'id') },
      tracks: this.parseMedia(readList(release, 'media'), album.title),
    });
  }

  private parseArtist(data: UnknownRecord): Artist {
    const lifeSpan = readRecord(data, 'life-span');

    return createArtist({
      name: expectString(data, 'name'),
      sortName: readString(data, 'sort-name'),
      disambiguation: readString(data, 'disambiguation'),
      externalIds: { musicbrainz: expectString(data, 'id') },
      country: readString(data, 'country'),
      beginDate: lifeSpan ? parsePartialDate(readString(lifeSpan, 'begin')) : null,
      endDate: lifeSpan ? parsePartialDate(readString(lifeSpan, 'end')) : null,
      artistType: readString(data, 'type'),
      gender: readString(data, 'gender'),
    });
  }

  private parseReleaseGroup(data: UnknownRecord): Album {
    const genres = readList(data, 'genres')
      .filter(isRecord)
      .map((genre) => readString(genre, 'name'))
      .filter((name): name is string => name !== null);

    return createAlbum({
      title: expectString(data, 'title'),
      releaseDate: parsePartialDate(readString(data, 'first-release-date')),
      albumType: mapPrimaryType(readString(data, 'primary-type')),
      genres,
      externalIds: { musicbrainz: expectString(data, 'id') },
    });
  }

  private pickEarliestRelease(releases: unknown[]): UnknownRecord | null {
    let earliest: UnknownRecord | null = null;
    let earliestDate = '';

    for (const entry of releases) {
      if (!isRecord(entry)) continue;
      const date = parsePartialDate(readString(entry, 'date')) ?? '9999-12-31';
      if (!earliest || date < earliestDate) {
        earliest = entry;
        earliestDate = date;
      }
    }

    return earliest;
  }

  /**
   * Track numbers run on across media, so disc 2 track 1 follows the last track of disc 1
   */
  private parseMedia(media: unknown[], albumTitle: string): Track[] {
    const tracks: Track[] = [];
    let offset = 0;

    const sorted = media.filter(isRecord).sort((a, b) => (readNumber(a, 'position') ?? 0) - (readNumber(b, 'position') ?? 0));

    for (const medium of sorted) {
      const entries = readList(medium, 'tracks').filter(isRecord);

      entries.forEach((entry, index) => {
        const recording = readRecord(entry, 'recording');
        const title = readString(entry, 'title') ?? (recording ? readString(recording, 'title') : null);
        const position = readNumber(entry, 'position') ?? index + 1;

        // Hidden pregap tracks sit at position 0
        if (position < 1) {
          Logger.debug(`[MusicBrainz] Skipping pregap track ${title ?? '(untitled)'} of "${albumTitle}"`);
          return;
        }
        if (!title) {
          throw new ParseError(`Track ${index + 1} of "${albumTitle}" has no title`);
        }

        const length = readNumber(entry, 'length') ?? (recording ? readNumber(recording, 'length') : null);
        const isrcs = recording ? readList(recording, 'isrcs') : [];
        const isrc = isrcs.find((value): value is string => typeof value === 'string') ?? null;

        tracks.push(
          createTrack({
            title,
            trackNumber: offset + position,
            durationMs: length,
            isrc,
            externalIds: recording ? { musicbrainz: readString(recording, 'id') ?? undefined } : {},
          })
        );
      });

      offset += readNumber(medium, 'track-count') ?? entries.length;
    }

    return tracks;
  }
}
