import {
  Validator,
  ValidationError,
  expectRecord,
  expectString,
  readBoolean,
  readList,
  readNumber,
  readString,
} from '../src/utils/validator';
import { ParseError } from '../src/utils/error-handler';

describe('Validator', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('validateCrawlOptions', () => {
    it('should read commander options', () => {
      const options = Validator.validateCrawlOptions(' Nirvana ', {
        enrich: false,
        output: '../out.json',
        trackMatching: 'title',
        pretty: true,
      });

      expect(options).toEqual({
        artist: 'Nirvana',
        output: 'out.json',
        enrich: false,
        includeLyricsRefs: false,
        trackMatching: 'title',
        pretty: true,
        quiet: false,
        verbose: false,
      });
    });

    it('should enable enrichment unless --no-enrich was given', () => {
      expect(Validator.validateCrawlOptions('Nirvana', {}).enrich).toBe(true);
    });

    it('should treat blank keys as absent', () => {
      expect(Validator.validateCrawlOptions('Nirvana', { lastfmKey: '  ' }).lastfmKey).toBeUndefined();
      expect(Validator.validateCrawlOptions('Nirvana', { geniusToken: 'test-token' }).geniusToken).toBe('test-token');
    });

    it('should reject a missing, blank or overlong artist', () => {
      expect(() => Validator.validateCrawlOptions(undefined, {})).toThrow(
        'Validation error: artist - An artist name is required'
      );
      expect(() => Validator.validateCrawlOptions('   ', {})).toThrow('Validation error: artist - Cannot be empty');
      expect(() => Validator.validateCrawlOptions('x'.repeat(201), {})).toThrow(
        'Validation error: artist - Must be 200 characters or less'
      );
    });

    it('should reject unknown track matching strategies', () => {
      expect(() => Validator.validateCrawlOptions('Nirvana', { trackMatching: 'fuzzy' })).toThrow(
        'Validation error: track-matching - Must be one of: positional, title'
      );
    });

    it('should reject non-string keys', () => {
      expect(() => Validator.validateCrawlOptions('Nirvana', { lastfmKey: 42 })).toThrow(ValidationError);
    });
  });

  describe('limits', () => {
    it('should default and parse limits', () => {
      expect(Validator.validateSearchOptions('Nirvana', {})).toEqual({ query: 'Nirvana', limit: 10 });
      expect(Validator.validateSearchOptions('Nirvana', { limit: '5' }).limit).toBe(5);
      expect(Validator.validateSongsOptions('Nirvana', {}).limit).toBe(20);
    });

    it('should reject limits outside 1-100', () => {
      expect(() => Validator.validateLimit('0', 10)).toThrow('Limit must be an integer between 1 and 100');
      expect(() => Validator.validateLimit(101, 10)).toThrow(ValidationError);
      expect(() => Validator.validateLimit('2.5', 10)).toThrow(ValidationError);
    });
  });

  describe('validateIntegerSetting', () => {
    it('should use the default when unset', () => {
      expect(Validator.validateIntegerSetting(undefined, 'MAX_RETRIES', 3)).toBe(3);
      expect(Validator.validateIntegerSetting('', 'MAX_RETRIES', 3)).toBe(3);
    });

    it('should parse integers', () => {
      expect(Validator.validateIntegerSetting(' 7 ', 'MAX_RETRIES', 3)).toBe(7);
    });

    it('should name the variable when invalid', () => {
      expect(() => Validator.validateIntegerSetting('abc', 'MAX_RETRIES', 3)).toThrow(
        'Validation error: MAX_RETRIES - Must be an integer >= 0 (got "abc")'
      );
      expect(() => Validator.validateIntegerSetting('0', 'RATE_LIMIT_REQUESTS', 5, 1)).toThrow(
        'Validation error: RATE_LIMIT_REQUESTS - Must be an integer >= 1 (got "0")'
      );
    });
  });
});

describe('Response readers', () => {
  const record = { name: ' Nirvana ', count: '12', year: 1991, empty: '', flag: true, one: { id: 1 }, list: [1, 2] };

  it('should read strings', () => {
    expect(readString(record, 'name')).toBe('Nirvana');
    expect(readString(record, 'year')).toBe('1991');
    expect(readString(record, 'empty')).toBeNull();
    expect(readString(record, 'missing')).toBeNull();
  });

  it('should read numbers from numbers and numeric strings', () => {
    expect(readNumber(record, 'count')).toBe(12);
    expect(readNumber(record, 'year')).toBe(1991);
    expect(readNumber(record, 'name')).toBeNull();
  });

  it('should wrap a lone object into a list', () => {
    expect(readList(record, 'one')).toEqual([{ id: 1 }]);
    expect(readList(record, 'list')).toEqual([1, 2]);
    expect(readList(record, 'name')).toEqual([]);
  });

  it('should read booleans strictly', () => {
    expect(readBoolean(record, 'flag')).toBe(true);
    expect(readBoolean(record, 'count')).toBe(false);
  });

  it('should raise ParseErrors for required fields', () => {
    expect(() => expectRecord(null, 'artist')).toThrow('Expected "artist" to be an object');
    expect(() => expectString(record, 'empty')).toThrow(ParseError);
    expect(expectString(record, 'name')).toBe(' Nirvana ');
  });
});
