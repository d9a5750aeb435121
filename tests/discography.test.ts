import {
  albumsByType,
  albumsByYear,
  artistKey,
  createAlbum,
  createArtist,
  createTrack,
  discographySpan,
  normalizeName,
  totalAlbums,
  totalDurationMs,
  totalTracks,
  trackCount,
} from '../src/utils/discography';
import { ParseError } from '../src/utils/error-handler';
import { nirvana, sampleAlbum, sampleDiscography } from './fixtures';

describe('Discography model', () => {
  describe('createTrack', () => {
    it('should apply defaults', () => {
      expect(createTrack({ title: '  Polly ', trackNumber: 6 })).toEqual({
        title: 'Polly',
        trackNumber: 6,
        durationMs: null,
        isrc: null,
        explicit: false,
        lyricsReference: null,
        externalIds: {},
      });
    });

    it('should round durations to whole milliseconds', () => {
      expect(createTrack({ title: 'Polly', trackNumber: 6, durationMs: 177000.6 }).durationMs).toBe(177001);
    });

    it('should reject invalid tracks', () => {
      expect(() => createTrack({ title: ' ', trackNumber: 1 })).toThrow('Track is missing a title');
      expect(() => createTrack({ title: 'Polly', trackNumber: 0 })).toThrow('Track "Polly" has invalid track number 0');
      expect(() => createTrack({ title: 'Polly', trackNumber: 1, durationMs: -5 })).toThrow(ParseError);
    });
  });

  describe('createAlbum', () => {
    it('should derive the year from the release date', () => {
      const album = createAlbum({ title: 'Bleach', releaseDate: '1989-06-15' });

      expect(album.releaseYear).toBe(1989);
      expect(album.albumType).toBe('unknown');
      expect(album.tracks).toEqual([]);
    });

    it('should prefer an explicit year', () => {
      expect(createAlbum({ title: 'Bleach', releaseDate: '1989-06-15', releaseYear: 1990 }).releaseYear).toBe(1990);
    });

    it('should reject a missing title', () => {
      expect(() => createAlbum({ title: '' })).toThrow('Album is missing a title');
    });
  });

  describe('createArtist', () => {
    it('should reject a missing name', () => {
      expect(() => createArtist({ name: '   ' })).toThrow('Artist is missing a name');
    });

    it('should key artists by MusicBrainz id, else by normalized name', () => {
      expect(artistKey(nirvana)).toBe('mb-nirvana');
      expect(artistKey(createArtist({ name: '  Sonic   Youth ' }))).toBe('sonic youth');
      expect(normalizeName(' The  Melvins')).toBe('the melvins');
    });
  });

  describe('derived values', () => {
    const bleach = sampleAlbum({ title: 'Bleach', releaseYear: 1989, releaseDate: '1989-06-15', tracks: [] });
    const hormoaning = sampleAlbum({ title: 'Hormoaning', releaseYear: 1992, albumType: 'ep' });
    const bootleg = sampleAlbum({ title: 'Bootleg', releaseYear: null, releaseDate: null, albumType: 'unknown' });
    const discography = sampleDiscography([hormoaning, sampleAlbum(), bleach, bootleg]);

    it('should count albums, tracks and durations', () => {
      expect(totalAlbums(discography)).toBe(4);
      expect(totalTracks(discography)).toBe(9);
      expect(trackCount(bleach)).toBe(0);
      expect(totalDurationMs(sampleAlbum())).toBe(556000);
    });

    it('should report the span of release years', () => {
      expect(discographySpan(discography)).toEqual({ start: 1989, end: 1992 });
      expect(discographySpan(sampleDiscography([bootleg]))).toEqual({ start: null, end: null });
    });

    it('should group albums by year in ascending order', () => {
      const grouped = albumsByYear(discography);

      expect([...grouped.keys()]).toEqual([1989, 1991, 1992]);
      expect(grouped.get(1991)?.map((album) => album.title)).toEqual(['Nevermind']);
    });

    it('should group albums by type', () => {
      const grouped = albumsByType(discography);

      expect(grouped.album.map((album) => album.title)).toEqual(['Nevermind', 'Bleach']);
      expect(grouped.ep.map((album) => album.title)).toEqual(['Hormoaning']);
      expect(grouped.single).toEqual([]);
      expect(grouped.unknown.map((album) => album.title)).toEqual(['Bootleg']);
    });
  });
});
