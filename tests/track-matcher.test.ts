import { TrackMatcher } from '../src/services/track-matcher';
import { QueryNormalizer } from '../src/utils/query-normalizer';
import { createTrack } from '../src/utils/discography';

describe('QueryNormalizer', () => {
  it('should strip remaster and live markers from titles', () => {
    expect(QueryNormalizer.normalizeTrackTitle('Smells Like Teen Spirit (Remastered 2021)')).toBe('Smells Like Teen Spirit');
    expect(QueryNormalizer.normalizeTrackTitle('About a Girl (Live)')).toBe('About a Girl');
  });

  it('should strip featuring credits', () => {
    expect(QueryNormalizer.normalizeTrackTitle('Song Title (feat. Someone Else)')).toBe('Song Title');
    expect(QueryNormalizer.normalizeTrackTitle('Song Title ft. Guest')).toBe('Song Title');
  });

  it('should leave words that merely contain "ft" alone', () => {
    expect(QueryNormalizer.normalizeTrackTitle('Left Behind')).toBe('Left Behind');
    expect(QueryNormalizer.normalizeArtistName('Daft Punk')).toBe('Daft Punk');
  });

  it('should keep letters from any script', () => {
    expect(QueryNormalizer.normalizeTrackTitle('Café del Mar!')).toBe('Café del Mar');
    expect(QueryNormalizer.normalizeTrackTitle('夜に駆ける')).toBe('夜に駆ける');
  });

  it('should drop a leading "the" and joiners from artist names', () => {
    expect(QueryNormalizer.normalizeArtistName('The Beatles & Friends')).toBe('Beatles Friends');
    expect(QueryNormalizer.normalizeArtistName('Simon and Garfunkel')).toBe('Simon Garfunkel');
  });

  it('should extract the primary artist', () => {
    expect(QueryNormalizer.extractPrimaryArtist('Main Artist feat. Featured Artist')).toBe('Main Artist');
  });

  it('should build a search query from title and artist', () => {
    expect(QueryNormalizer.buildSearchQuery('Come as You Are (Remastered)', 'Nirvana')).toBe('Come as You Are Nirvana');
    expect(QueryNormalizer.buildSearchQuery('Lithium', '')).toBe('Lithium');
  });
});

describe('TrackMatcher', () => {
  describe('calculateStringSimilarity', () => {
    it('should score identical strings as 1 regardless of case', () => {
      expect(TrackMatcher.calculateStringSimilarity('Lithium', 'lithium')).toBe(1);
    });

    it('should score empty input as 0', () => {
      expect(TrackMatcher.calculateStringSimilarity('', 'Lithium')).toBe(0);
    });

    it('should rank close strings above distant ones', () => {
      const close = TrackMatcher.calculateStringSimilarity('Come as You Are', 'Come As You Are!');
      const distant = TrackMatcher.calculateStringSimilarity('Come as You Are', 'Territorial Pissings');
      expect(close).toBeGreaterThan(distant);
    });
  });

  it('should count edits', () => {
    expect(TrackMatcher.levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(TrackMatcher.levenshteinDistance('', 'abc')).toBe(3);
  });

  describe('scoreMatch', () => {
    it('should give full confidence to an exact match', () => {
      const { confidence, breakdown } = TrackMatcher.scoreMatch(
        { title: 'Lithium', artist: 'Nirvana', durationMs: 257000 },
        { id: '1', title: 'Lithium', artist: 'Nirvana', durationMs: 257000 }
      );

      expect(confidence).toBe(1);
      expect(breakdown.weightsUsed).toBeCloseTo(1);
    });

    it('should ignore dimensions missing on either side', () => {
      const { confidence, breakdown } = TrackMatcher.scoreMatch(
        { title: 'Lithium' },
        { id: '1', title: 'Lithium', artist: 'Nirvana', durationMs: 257000 }
      );

      expect(confidence).toBe(1);
      expect(breakdown.weightsUsed).toBeCloseTo(0.6);
    });

    it('should score durations 20% apart as zero', () => {
      const { breakdown } = TrackMatcher.scoreMatch(
        { title: 'Lithium', durationMs: 100000 },
        { id: '1', title: 'Lithium', durationMs: 120000 }
      );

      expect(breakdown.durationScore).toBeCloseTo(0);
    });
  });

  describe('findBestMatch', () => {
    const candidates = [
      { id: 'a', title: 'Polly', artist: 'Nirvana' },
      { id: 'b', title: 'Lithium', artist: 'Nirvana' },
    ];

    it('should return the highest scoring candidate', () => {
      expect(TrackMatcher.findBestMatch({ title: 'Lithium', artist: 'Nirvana' }, candidates)?.candidate.id).toBe('b');
    });

    it('should return null below the threshold', () => {
      expect(TrackMatcher.findBestMatch({ title: 'Breed', artist: 'Hole' }, candidates)).toBeNull();
      expect(TrackMatcher.findBestMatch({ title: 'Lithium' }, [])).toBeNull();
    });

    it('should allow the threshold to be tuned within 0-1', () => {
      const original = TrackMatcher.getConfidenceThreshold();
      TrackMatcher.setConfidenceThreshold(2);
      expect(TrackMatcher.getConfidenceThreshold()).toBe(original);
      TrackMatcher.setConfidenceThreshold(0.9);
      expect(TrackMatcher.getConfidenceThreshold()).toBe(0.9);
      TrackMatcher.setConfidenceThreshold(original);
    });
  });

  describe('pairTracks', () => {
    const tracks = [
      createTrack({ title: 'Drain You', trackNumber: 1 }),
      createTrack({ title: 'Breed', trackNumber: 2 }),
      createTrack({ title: 'Polly', trackNumber: 3 }),
    ];
    const enrichment = [
      { title: 'Breed', durationMs: 184000, url: null },
      { title: 'Drain You', durationMs: 224000, url: null },
    ];

    it('should pair by position', () => {
      expect(TrackMatcher.pairTracks(tracks, enrichment, 'positional')).toEqual([enrichment[0], enrichment[1], null]);
    });

    it('should pair by title and use each entry once', () => {
      expect(TrackMatcher.pairTracks(tracks, enrichment, 'title')).toEqual([enrichment[1], enrichment[0], null]);
    });
  });
});
