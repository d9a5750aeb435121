import { ParseError } from './error-handler';
import { yearOf } from './date-parser';
import {
  Album,
  AlbumType,
  Artist,
  CrawlStatus,
  Discography,
  DiscographySpan,
  ExternalIds,
  LyricsReference,
  Track,
} from '../types';

export interface TrackInput {
  title: string;
  trackNumber: number;
  durationMs?: number | null;
  isrc?: string | null;
  explicit?: boolean;
  lyricsReference?: LyricsReference | null;
  externalIds?: ExternalIds;
}

export interface AlbumInput {
  title: string;
  releaseDate?: string | null;
  releaseYear?: number | null;
  albumType?: AlbumType;
  label?: string | null;
  catalogNumber?: string | null;
  genres?: readonly string[];
  tags?: readonly string[];
  country?: string | null;
  externalIds?: ExternalIds;
  tracks?: readonly Track[];
}

export interface ArtistInput {
  name: string;
  sortName?: string | null;
  disambiguation?: string | null;
  externalIds?: ExternalIds;
  country?: string | null;
  beginDate?: string | null;
  endDate?: string | null;
  artistType?: string | null;
  gender?: string | null;
}

function requireTitle(value: string, entity: string): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (trimmed.length === 0) {
    throw new ParseError(`${entity} is missing a title`);
  }
  return trimmed;
}

/**
 * Trimmed, lower-cased, whitespace-collapsed name
 */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Identity key: MusicBrainz id when known, else the normalized name
 */
export function artistKey(artist: Artist): string {
  return artist.externalIds.musicbrainz ?? normalizeName(artist.name);
}

export function createTrack(input: TrackInput): Track {
  const title = requireTitle(input.title, 'Track');

  if (!Number.isInteger(input.trackNumber) || input.trackNumber < 1) {
    throw new ParseError(`Track "${title}" has invalid track number ${input.trackNumber}`);
  }

  let durationMs: number | null = null;
  if (input.durationMs !== undefined && input.durationMs !== null) {
    if (!Number.isFinite(input.durationMs) || input.durationMs < 0) {
      throw new ParseError(`Track "${title}" has invalid duration ${input.durationMs}`);
    }
    durationMs = Math.round(input.durationMs);
  }

  return {
    title,
    trackNumber: input.trackNumber,
    durationMs,
    isrc: input.isrc ?? null,
    explicit: input.explicit ?? false,
    lyricsReference: input.lyricsReference ?? null,
    externalIds: { ...input.externalIds },
  };
}

export function createAlbum(input: AlbumInput): Album {
  const title = requireTitle(input.title, 'Album');
  const releaseDate = input.releaseDate ?? null;
  const releaseYear = input.releaseYear ?? yearOf(releaseDate);

  if (releaseYear !== null && !Number.isInteger(releaseYear)) {
    throw new ParseError(`Album "${title}" has invalid release year ${releaseYear}`);
  }

  return {
    title,
    releaseDate,
    releaseYear,
    albumType: input.albumType ?? 'unknown',
    label: input.label ?? null,
    catalogNumber: input.catalogNumber ?? null,
    genres: [...(input.genres ?? [])],
    tags: [...(input.tags ?? [])],
    country: input.country ?? null,
    externalIds: { ...input.externalIds },
    tracks: [...(input.tracks ?? [])],
  };
}

export function createArtist(input: ArtistInput): Artist {
  const name = typeof input.name === 'string' ? input.name.trim() : '';
  if (name.length === 0) {
    throw new ParseError('Artist is missing a name');
  }

  return {
    name,
    sortName: input.sortName ?? null,
    disambiguation: input.disambiguation ?? null,
    externalIds: { ...input.externalIds },
    country: input.country ?? null,
    beginDate: input.beginDate ?? null,
    endDate: input.endDate ?? null,
    artistType: input.artistType ?? null,
    gender: input.gender ?? null,
  };
}

export function trackCount(album: Album): number {
  return album.tracks.length;
}

/**
 * Sum of the known track durations
 */
export function totalDurationMs(album: Album): number {
  return album.tracks.reduce((sum, track) => sum + (track.durationMs ?? 0), 0);
}

export function totalAlbums(discography: Discography): number {
  return discography.albums.length;
}

export function totalTracks(discography: Discography): number {
  return discography.albums.reduce((sum, album) => sum + trackCount(album), 0);
}

export function discographySpan(discography: Discography): DiscographySpan {
  const years = discography.albums
    .map((album) => album.releaseYear)
    .filter((year): year is number => year !== null);

  if (years.length === 0) {
    return { start: null, end: null };
  }

  return { start: Math.min(...years), end: Math.max(...years) };
}

/**
 * Albums grouped by release year, ascending. Albums without a year are left out.
 */
export function albumsByYear(discography: Discography): Map<number, Album[]> {
  const grouped = new Map<number, Album[]>();
  const sorted = [...discography.albums].sort((a, b) => (a.releaseYear ?? 0) - (b.releaseYear ?? 0));

  for (const album of sorted) {
    if (album.releaseYear === null) continue;
    const bucket = grouped.get(album.releaseYear) ?? [];
    bucket.push(album);
    grouped.set(album.releaseYear, bucket);
  }

  return grouped;
}

export function albumsByType(discography: Discography): Record<AlbumType, Album[]> {
  const grouped: Record<AlbumType, Album[]> = { album: [], single: [], ep: [], unknown: [] };
  for (const album of discography.albums) {
    grouped[album.albumType].push(album);
  }
  return grouped;
}

/**
 * Seconds between start and completion, or null while the crawl is running
 */
export function crawlDurationSeconds(status: CrawlStatus): number | null {
  if (!status.completedAt) {
    return null;
  }
  return (Date.parse(status.completedAt) - Date.parse(status.startedAt)) / 1000;
}
