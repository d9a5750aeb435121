import { createAlbum, createArtist, createTrack } from '../src/utils/discography';
import {
  CatalogProvider,
  EnrichmentProvider,
  HttpResponse,
  HttpSession,
  LyricsReferenceProvider,
  RequestOptions,
  SessionFactory,
  SessionOptions,
  SessionState,
} from '../src/api/provider';
import {
  Album,
  AlbumEnrichment,
  Artist,
  ArtistEnrichment,
  Discography,
  LyricsReference,
  SongReference,
} from '../src/types';

export const nirvana = createArtist({
  name: 'Nirvana',
  sortName: 'Nirvana',
  disambiguation: 'US grunge band',
  externalIds: { musicbrainz: 'mb-nirvana' },
  country: 'US',
  beginDate: '1987',
  endDate: '1994-04-05',
  artistType: 'Group',
});

export function sampleAlbum(overrides: Partial<Album> = {}): Album {
  return {
    ...createAlbum({
      title: 'Nevermind',
      releaseDate: '1991-09-24',
      albumType: 'album',
      label: 'DGC',
      catalogNumber: 'DGC-24425',
      genres: ['grunge'],
      country: 'US',
      externalIds: { musicbrainz: 'rg-nevermind' },
      tracks: [
        createTrack({ title: 'Smells Like Teen Spirit', trackNumber: 1, durationMs: 301000, isrc: 'USGF19942501' }),
        createTrack({ title: 'In Bloom', trackNumber: 2, durationMs: 255000 }),
        createTrack({ title: 'Come as You Are', trackNumber: 3, durationMs: null }),
      ],
    }),
    ...overrides,
  };
}

export function sampleDiscography(albums: Album[] = [sampleAlbum()]): Discography {
  return {
    artist: nirvana,
    albums,
    crawledAt: '2024-03-01T10:00:00.000Z',
    sources: ['MusicBrainz'],
    metadata: { MusicBrainz: { artist_id: 'mb-nirvana', release_groups: albums.length } },
  };
}

export interface RecordedRequest {
  url: string;
  params: Record<string, unknown>;
  headers: Record<string, unknown>;
}

type Responder = (url: string, params: Record<string, unknown>) => HttpResponse | Promise<HttpResponse>;

/**
 * In-process HTTP session: answers from a responder and records every request
 */
export class FakeSession implements HttpSession {
  readonly requests: RecordedRequest[] = [];
  options: SessionOptions | null = null;

  constructor(private readonly responder: Responder) {}

  readonly factory: SessionFactory = (options) => {
    this.options = options;
    return this;
  };

  async get(url: string, config: { params?: unknown; headers?: unknown } = {}): Promise<HttpResponse> {
    const params = isPlainRecord(config.params) ? config.params : {};
    this.requests.push({
      url,
      params,
      headers: isPlainRecord(config.headers) ? config.headers : {},
    });
    return this.responder(url, params);
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// --- In-process providers ----------------------------------------------------

async function throttled(options?: RequestOptions): Promise<void> {
  if (options?.throttle) {
    await options.throttle(options.signal);
  }
}

export abstract class FakeProvider {
  state: SessionState = 'uninitialized';

  async open(): Promise<void> {
    this.state = 'open';
  }

  async close(): Promise<void> {
    this.state = 'closed';
  }
}

export type Step<T> = T | Error;

function settle<T>(step: Step<T>): T {
  if (step instanceof Error) {
    throw step;
  }
  return step;
}

export class FakeCatalog extends FakeProvider implements CatalogProvider {
  readonly kind = 'musicbrainz' as const;
  readonly displayName = 'MusicBrainz';
  searchResults: Array<Step<Artist[]>> = [[nirvana]];
  albumResults: Array<Step<Album[]>> = [];
  details = new Map<string, Step<Album>>();
  throttleSeen = false;

  async searchArtists(_query: string, _limit: number, options?: RequestOptions): Promise<Artist[]> {
    await throttled(options);
    this.throttleSeen = options?.throttle !== undefined;
    const next = this.searchResults.length > 1 ? this.searchResults.shift() : this.searchResults[0];
    return settle(next ?? []);
  }

  async fetchAlbums(_artist: Artist, options?: RequestOptions): Promise<Album[]> {
    await throttled(options);
    const next = this.albumResults.length > 1 ? this.albumResults.shift() : this.albumResults[0];
    return settle(next ?? []);
  }

  async fetchAlbumDetail(album: Album, options?: RequestOptions): Promise<Album> {
    await throttled(options);
    return settle(this.details.get(album.externalIds.musicbrainz ?? '') ?? album);
  }
}

export class FakeLastFm extends FakeProvider implements EnrichmentProvider {
  readonly kind = 'lastfm' as const;
  readonly displayName = 'Last.fm';
  artistInfo: Step<ArtistEnrichment | null> = null;
  albums = new Map<string, Step<AlbumEnrichment | null>>();

  async searchArtists(): Promise<Artist[]> {
    return [];
  }

  async lookupArtist(_name: string, options?: RequestOptions): Promise<ArtistEnrichment | null> {
    await throttled(options);
    return settle(this.artistInfo);
  }

  async lookupAlbum(_artist: string, title: string, options?: RequestOptions): Promise<AlbumEnrichment | null> {
    await throttled(options);
    return settle(this.albums.get(title) ?? null);
  }
}

export class FakeGenius extends FakeProvider implements LyricsReferenceProvider {
  readonly kind = 'genius' as const;
  readonly displayName = 'Genius';
  artists: Artist[] = [createArtist({ name: 'Nirvana', externalIds: { genius: '55' } })];
  songs: SongReference[] = [];
  unmatched = new Set<string>();
  requestedSongs: Array<{ artistId: string; perPage: number }> = [];

  async searchArtists(): Promise<Artist[]> {
    return this.artists;
  }

  async fetchArtistSongs(artistId: string, _page: number, perPage: number): Promise<SongReference[]> {
    this.requestedSongs.push({ artistId, perPage });
    return this.songs.slice(0, perPage);
  }

  async lookupTrack(_artist: string, title: string, options?: RequestOptions): Promise<LyricsReference | null> {
    await throttled(options);
    if (this.unmatched.has(title)) return null;
    return {
      url: `https://genius.com/${title.replace(/\s+/g, '-')}-lyrics`,
      disclaimer: 'Link only.',
      snippet: null,
      source: 'Genius',
    };
  }
}
