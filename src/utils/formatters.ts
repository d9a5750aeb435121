import { ParseError } from './error-handler';
import { createAlbum, createArtist, createTrack } from './discography';
import { InputSanitizer } from './sanitizer';
import {
  UnknownRecord,
  expectRecord,
  expectString,
  isRecord,
  readBoolean,
  readList,
  readNumber,
  readRecord,
  readString,
} from './validator';
import {
  Album,
  AlbumType,
  Artist,
  Discography,
  DiscographySpan,
  JsonObject,
  JsonValue,
  LyricsReference,
  Track,
} from '../types';

// --- Output document shape ---------------------------------------------------

export interface LyricsReferenceDocument {
  url: string;
  disclaimer: string;
  snippet: string | null;
  source: string;
}

export interface TrackDocument {
  title: string;
  track_number: number;
  duration_ms: number | null;
  isrc: string | null;
  explicit: boolean;
  lyrics_reference?: LyricsReferenceDocument;
}

export interface AlbumDocument {
  title: string;
  release_date: string | null;
  release_year: number | null;
  album_type: AlbumType;
  label: string | null;
  catalog_number: string | null;
  musicbrainz_id: string | null;
  tracks: TrackDocument[];
  genre: string[];
  tags: string[];
  country: string | null;
}

export interface ArtistDocument {
  name: string;
  sort_name: string | null;
  disambiguation: string | null;
  musicbrainz_id: string | null;
  country: string | null;
  begin_date: string | null;
  end_date: string | null;
  artist_type: string | null;
  gender: string | null;
}

export interface DiscographyDocument {
  artist: ArtistDocument;
  albums: AlbumDocument[];
  crawled_at: string;
  sources: string[];
  metadata: Record<string, JsonObject>;
}

const ALBUM_TYPES: readonly AlbumType[] = ['album', 'single', 'ep', 'unknown'];

// --- Serialization -------------------------------------------------------------

function trackToDocument(track: Track): TrackDocument {
  const document: TrackDocument = {
    title: track.title,
    track_number: track.trackNumber,
    duration_ms: track.durationMs,
    isrc: track.isrc,
    explicit: track.explicit,
  };
  if (track.lyricsReference) {
    document.lyrics_reference = {
      url: track.lyricsReference.url,
      disclaimer: track.lyricsReference.disclaimer,
      snippet: track.lyricsReference.snippet,
      source: track.lyricsReference.source,
    };
  }
  return document;
}

function albumToDocument(album: Album): AlbumDocument {
  return {
    title: album.title,
    release_date: album.releaseDate,
    release_year: album.releaseYear,
    album_type: album.albumType,
    label: album.label,
    catalog_number: album.catalogNumber,
    musicbrainz_id: album.externalIds.musicbrainz ?? null,
    tracks: album.tracks.map(trackToDocument),
    genre: [...album.genres],
    tags: [...album.tags],
    country: album.country,
  };
}

function artistToDocument(artist: Artist): ArtistDocument {
  return {
    name: artist.name,
    sort_name: artist.sortName,
    disambiguation: artist.disambiguation,
    musicbrainz_id: artist.externalIds.musicbrainz ?? null,
    country: artist.country,
    begin_date: artist.beginDate,
    end_date: artist.endDate,
    artist_type: artist.artistType,
    gender: artist.gender,
  };
}

export function toDocument(discography: Discography): DiscographyDocument {
  return {
    artist: artistToDocument(discography.artist),
    albums: discography.albums.map(albumToDocument),
    crawled_at: discography.crawledAt,
    sources: [...discography.sources],
    metadata: { ...discography.metadata },
  };
}

export function toJson(discography: Discography, pretty: boolean = false): string {
  return JSON.stringify(toDocument(discography), null, pretty ? 2 : undefined);
}

// --- Parsing -------------------------------------------------------------------

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isRecord(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value) && isJsonValue(value);
}

function readStringList(record: UnknownRecord, key: string): string[] {
  return readList(record, key).filter((entry): entry is string => typeof entry === 'string');
}

function parseLyricsReference(record: UnknownRecord | null): LyricsReference | null {
  if (!record) return null;
  return {
    url: expectString(record, 'url'),
    disclaimer: expectString(record, 'disclaimer'),
    snippet: readString(record, 'snippet'),
    source: readString(record, 'source') ?? 'unknown',
  };
}

function parseTrack(value: unknown): Track {
  const record = expectRecord(value, 'track');
  const trackNumber = readNumber(record, 'track_number');
  if (trackNumber === null) {
    throw new ParseError('Track is missing "track_number"');
  }

  return createTrack({
    title: expectString(record, 'title'),
    trackNumber,
    durationMs: readNumber(record, 'duration_ms'),
    isrc: readString(record, 'isrc'),
    explicit: readBoolean(record, 'explicit'),
    lyricsReference: parseLyricsReference(readRecord(record, 'lyrics_reference')),
  });
}

function parseAlbumType(value: string | null): AlbumType {
  const match = ALBUM_TYPES.find((type) => type === value);
  if (!match) {
    throw new ParseError(`Unknown album_type "${value}"`);
  }
  return match;
}

function parseAlbum(value: unknown): Album {
  const record = expectRecord(value, 'album');
  const musicbrainzId = readString(record, 'musicbrainz_id');

  return createAlbum({
    title: expectString(record, 'title'),
    releaseDate: readString(record, 'release_date'),
    releaseYear: readNumber(record, 'release_year'),
    albumType: parseAlbumType(readString(record, 'album_type') ?? 'unknown'),
    label: readString(record, 'label'),
    catalogNumber: readString(record, 'catalog_number'),
    genres: readStringList(record, 'genre'),
    tags: readStringList(record, 'tags'),
    country: readString(record, 'country'),
    externalIds: musicbrainzId ? { musicbrainz: musicbrainzId } : {},
    tracks: readList(record, 'tracks').map(parseTrack),
  });
}

function parseArtist(value: unknown): Artist {
  const record = expectRecord(value, 'artist');
  const musicbrainzId = readString(record, 'musicbrainz_id');

  return createArtist({
    name: expectString(record, 'name'),
    sortName: readString(record, 'sort_name'),
    disambiguation: readString(record, 'disambiguation'),
    externalIds: musicbrainzId ? { musicbrainz: musicbrainzId } : {},
    country: readString(record, 'country'),
    beginDate: readString(record, 'begin_date'),
    endDate: readString(record, 'end_date'),
    artistType: readString(record, 'artist_type'),
    gender: readString(record, 'gender'),
  });
}

/**
 * Validate a document and rebuild the canonical model
 */
export function parseDocument(value: unknown): Discography {
  const record = expectRecord(value, 'discography');
  const metadata: Record<string, JsonObject> = {};

  for (const [source, entry] of Object.entries(readRecord(record, 'metadata') ?? {})) {
    if (!isJsonObject(entry)) {
      throw new ParseError(`Metadata for "${source}" must be a JSON object`);
    }
    metadata[source] = entry;
  }

  if (!Array.isArray(record.albums)) {
    throw new ParseError('Expected "albums" to be a list');
  }

  return {
    artist: parseArtist(record.artist),
    albums: record.albums.map(parseAlbum),
    crawledAt: expectString(record, 'crawled_at'),
    sources: readStringList(record, 'sources'),
    metadata,
  };
}

export function fromJson(text: string): Discography {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ParseError('Discography document is not valid JSON', error);
  }
  return parseDocument(parsed);
}

// --- CLI formatting ------------------------------------------------------------

export function formatGenreList(genres: readonly string[]): string {
  return genres.join(', ');
}

/**
 * 245000 -> "4:05"
 */
export function formatDuration(durationMs: number | null): string {
  if (durationMs === null) return '--:--';
  const totalSeconds = Math.round(durationMs / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

export function formatSpan(span: DiscographySpan): string {
  if (span.start === null || span.end === null) return 'unknown';
  return span.start === span.end ? String(span.start) : `${span.start} - ${span.end}`;
}

/**
 * "Pink Floyd" -> "pink_floyd_discography.json"
 */
export function defaultOutputFile(artistName: string): string {
  return `${InputSanitizer.toFileName(artistName)}_discography.json`;
}
