import { TrackMatcher } from './track-matcher';
import { yearOf } from '../utils/date-parser';
import { Album, AlbumEnrichment, Track, TrackMatchingStrategy } from '../types';

export interface MergeOptions {
  trackMatching?: TrackMatchingStrategy;
  /** Genres taken from enrichment tags when the album has none */
  maxGenres?: number;
}

const DEFAULT_MAX_GENRES = 5;

function mergeTags(existing: readonly string[], incoming: readonly string[]): string[] {
  const seen = new Set(existing.map((tag) => tag.toLowerCase()));
  const merged = [...existing];
  for (const tag of incoming) {
    const key = tag.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      merged.push(tag);
    }
  }
  return merged;
}

/**
 * Overlay enrichment onto a canonical album without overwriting anything it already has.
 * Label, release date and genres fill gaps; tags are appended; a track's duration
 * is filled only when absent. Returns a new album; the input is untouched.
 */
export function mergeAlbumEnrichment(album: Album, enrichment: AlbumEnrichment, options: MergeOptions = {}): Album {
  const maxGenres = options.maxGenres ?? DEFAULT_MAX_GENRES;
  const partners = TrackMatcher.pairTracks(album.tracks, enrichment.tracks, options.trackMatching ?? 'positional');

  const tracks: Track[] = album.tracks.map((track, index) => {
    const partner = partners[index];
    if (!partner || track.durationMs !== null || partner.durationMs === null) {
      return track;
    }
    return { ...track, durationMs: partner.durationMs };
  });

  const releaseDate = album.releaseDate ?? enrichment.releaseDate;
  const genreSource = enrichment.genres.length > 0 ? enrichment.genres : enrichment.tags;

  return {
    ...album,
    label: album.label ?? enrichment.label,
    releaseDate,
    releaseYear: album.releaseYear ?? yearOf(releaseDate),
    genres: album.genres.length > 0 ? [...album.genres] : genreSource.slice(0, maxGenres),
    tags: mergeTags(album.tags, enrichment.tags),
    externalIds:
      album.externalIds.lastfm || !enrichment.url
        ? album.externalIds
        : { ...album.externalIds, lastfm: enrichment.url },
    tracks,
  };
}
