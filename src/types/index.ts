export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type AlbumType = 'album' | 'single' | 'ep' | 'unknown';
export type TrackMatchingStrategy = 'positional' | 'title';
export type CrawlState = 'in_progress' | 'completed' | 'failed';

export interface ExternalIds {
  readonly musicbrainz?: string;
  readonly musicbrainzRelease?: string;
  readonly lastfm?: string;
  readonly genius?: string;
}

export interface Artist {
  readonly name: string;
  readonly sortName: string | null;
  readonly disambiguation: string | null;
  readonly externalIds: ExternalIds;
  readonly country: string | null;
  readonly beginDate: string | null;
  readonly endDate: string | null;
  readonly artistType: string | null;
  readonly gender: string | null;
}

/**
 * Link to a lyrics page. Never carries lyric text.
 */
export interface LyricsReference {
  readonly url: string;
  readonly disclaimer: string;
  /** At most three words, for disambiguation only */
  readonly snippet: string | null;
  readonly source: string;
}

export interface Track {
  readonly title: string;
  readonly trackNumber: number;
  readonly durationMs: number | null;
  readonly isrc: string | null;
  readonly explicit: boolean;
  readonly lyricsReference: LyricsReference | null;
  readonly externalIds: ExternalIds;
}

export interface Album {
  readonly title: string;
  readonly releaseDate: string | null;
  readonly releaseYear: number | null;
  readonly albumType: AlbumType;
  readonly label: string | null;
  readonly catalogNumber: string | null;
  readonly genres: readonly string[];
  readonly tags: readonly string[];
  readonly country: string | null;
  readonly externalIds: ExternalIds;
  readonly tracks: readonly Track[];
}

export interface Discography {
  readonly artist: Artist;
  readonly albums: readonly Album[];
  readonly crawledAt: string;
  readonly sources: readonly string[];
  readonly metadata: Readonly<Record<string, JsonObject>>;
}

export interface CrawlStatus {
  readonly artistName: string;
  readonly startedAt: string;
  readonly completedAt: string | null;
  readonly status: CrawlState;
  readonly albumsFound: number;
  readonly tracksFound: number;
  readonly errors: readonly string[];
  readonly sourcesUsed: readonly string[];
}

export interface DiscographySpan {
  start: number | null;
  end: number | null;
}

// --- Enrichment payloads ----------------------------------------------------

export interface TrackEnrichment {
  title: string;
  durationMs: number | null;
  url: string | null;
}

export interface AlbumEnrichment {
  title: string;
  label: string | null;
  releaseDate: string | null;
  genres: string[];
  tags: string[];
  tracks: TrackEnrichment[];
  url: string | null;
  listeners: number | null;
  playcount: number | null;
}

export interface ArtistEnrichment {
  name: string;
  url: string | null;
  listeners: number | null;
  playcount: number | null;
  tags: string[];
  similar: string[];
}

/**
 * Popular-song entry from the lyrics reference provider: link and metadata only
 */
export interface SongReference {
  id: string;
  title: string;
  fullTitle: string | null;
  artistName: string | null;
  url: string;
  releaseDate: string | null;
  pageviews: number | null;
  annotationCount: number | null;
  lyricsState: string | null;
  disclaimer: string;
}

export interface ProgressInfo {
  stage: string;
  current: number;
  total: number;
  message?: string;
}

export interface CrawlStats {
  requestsMade: number;
  requestsSucceeded: number;
  requestsFailed: number;
  retries: number;
}
