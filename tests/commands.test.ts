import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createCrawlCommand, printCrawlSummary, runCrawl } from '../src/commands/crawl';
import { createSearchCommand, formatArtistLine, runSearch } from '../src/commands/search';
import { createSongsCommand, formatSongLine, runSongs } from '../src/commands/songs';
import { loadConfig } from '../src/config';
import { CommandBuilder, CrawlerFactory, EXIT_CANCELLED, EXIT_FAILURE } from '../src/utils/command-builder';
import { CancellationError, ValidationError } from '../src/utils/error-handler';
import { CrawlerConfig, DiscographyCrawler } from '../src/services/discography-crawler';
import { CatalogProvider, EnrichmentProvider, LyricsReferenceProvider, ProviderFactory } from '../src/api/provider';
import { fromJson } from '../src/utils/formatters';
import { SongReference } from '../src/types';
import { FakeCatalog, FakeGenius, FakeLastFm, nirvana, sampleAlbum, sampleDiscography } from './fixtures';

// Mock chalk to avoid ESM issues and keep output plain
jest.mock('chalk', () => {
  const plain = (s: string) => s;
  return {
    __esModule: true,
    default: { green: plain, red: plain, yellow: plain, gray: plain, blue: plain, cyan: plain, bold: plain },
  };
});

// Mock ora
jest.mock('ora', () => ({
  __esModule: true,
  default: jest.fn(() => ({
    start: jest.fn().mockReturnThis(),
    succeed: jest.fn().mockReturnThis(),
    fail: jest.fn().mockReturnThis(),
    warn: jest.fn().mockReturnThis(),
    text: '',
  })),
}));

describe('Commands', () => {
  const config = loadConfig({});
  let catalog: FakeCatalog;
  let genius: FakeGenius;
  let factory: ProviderFactory;
  let received: Array<Partial<CrawlerConfig>>;
  let createCrawler: CrawlerFactory;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();

    catalog = new FakeCatalog();
    catalog.albumResults = [[sampleAlbum()]];
    genius = new FakeGenius();
    const lastfm = new FakeLastFm();
    factory = {
      catalog: (): CatalogProvider => catalog,
      enrichment: (): EnrichmentProvider => lastfm,
      lyrics: (): LyricsReferenceProvider => genius,
    };

    received = [];
    createCrawler = (crawlerConfig) => {
      received.push(crawlerConfig);
      return new DiscographyCrawler({ ...crawlerConfig, providerFactory: factory });
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('crawl', () => {
    it('should declare its arguments and options', () => {
      const cmd = createCrawlCommand(config);

      expect(cmd.name()).toBe('crawl');
      expect(cmd.description()).toBe('Crawl an artist discography and save it as JSON');
      expect(cmd.options.map((option) => option.long)).toEqual([
        '--output',
        '--lastfm-key',
        '--no-enrich',
        '--genius-token',
        '--include-lyrics-refs',
        '--track-matching',
        '--pretty',
        '--quiet',
        '--verbose',
      ]);
    });

    it('should write the discography and pass flags to the crawler', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'discography-crawler-'));
      const output = path.join(dir, 'out', 'nirvana.json');

      try {
        const result = await runCrawl(
          {
            artist: 'Nirvana',
            output,
            lastfmKey: 'test-key',
            enrich: false,
            includeLyricsRefs: false,
            trackMatching: 'title',
            pretty: true,
            quiet: true,
            verbose: false,
          },
          config,
          createCrawler
        );

        expect(result.outputFile).toBe(output);
        expect(result.discography.albums.map((album) => album.title)).toEqual(['Nevermind']);
        expect(received[0]).toMatchObject({ lastfmApiKey: 'test-key', enrich: false, trackMatching: 'title' });

        const text = fs.readFileSync(output, 'utf8');
        expect(text.endsWith('}\n')).toBe(true);
        expect(text.split('\n')[1]).toBe('  "artist": {');

        const restored = fromJson(text);
        expect(restored.artist.name).toBe('Nirvana');
        expect(restored.sources).toEqual(['MusicBrainz']);
        expect(restored.albums[0].tracks).toHaveLength(3);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should print a summary of the crawled albums', () => {
      printCrawlSummary(sampleDiscography());

      const lines = jest.mocked(console.log).mock.calls.map((call) => call[0]);
      expect(lines).toContain('Albums: 1');
      expect(lines).toContain('Tracks: 3');
      expect(lines).toContain('Years: 1991');
      expect(lines).toContain('  1991  Nevermind (album, 3 tracks, 9:16) [grunge]');
    });

    it('should cap the album list in the summary', () => {
      const albums = Array.from({ length: 12 }, (_, index) => sampleAlbum({ title: `Album ${index + 1}` }));

      printCrawlSummary(sampleDiscography(albums));

      const lines = jest.mocked(console.log).mock.calls.map((call) => call[0]);
      expect(lines).toContain('  ... and 2 more');
      expect(lines.filter((line) => typeof line === 'string' && line.startsWith('  1991  Album'))).toHaveLength(10);
    });
  });

  describe('search', () => {
    it('should declare a limit option defaulting to 10', () => {
      const cmd = createSearchCommand(config);

      expect(cmd.name()).toBe('search');
      expect(cmd.options.find((option) => option.long === '--limit')?.defaultValue).toBe('10');
    });

    it('should return catalog candidates', async () => {
      await expect(runSearch({ query: 'Nirvana', limit: 5 }, config, createCrawler)).resolves.toEqual([nirvana]);
    });

    it('should format an artist line', () => {
      expect(formatArtistLine(nirvana)).toBe('Nirvana (US grunge band) [US, 1987 - 1994-04-05]');
      expect(formatArtistLine({ ...nirvana, disambiguation: null, country: null, endDate: null })).toBe('Nirvana [1987 -]');
      expect(formatArtistLine({ ...nirvana, disambiguation: null, country: null, beginDate: null })).toBe('Nirvana');
    });
  });

  describe('songs', () => {
    const song: SongReference = {
      id: '101',
      title: 'Lithium',
      fullTitle: 'Lithium by Nirvana',
      artistName: 'Nirvana',
      url: 'https://genius.com/Nirvana-lithium-lyrics',
      releaseDate: null,
      pageviews: 1234,
      annotationCount: null,
      lyricsState: 'complete',
      disclaimer: 'Link only.',
    };

    it('should declare a limit option defaulting to 20', () => {
      const cmd = createSongsCommand(config);

      expect(cmd.name()).toBe('songs');
      expect(cmd.options.map((option) => option.long)).toEqual(['--genius-token', '--limit']);
      expect(cmd.options.find((option) => option.long === '--limit')?.defaultValue).toBe('20');
    });

    it('should use the token passed on the command line', async () => {
      genius.songs = [song];

      const songs = await runSongs({ artist: 'Nirvana', limit: 5, geniusToken: 'test-token' }, config, createCrawler);

      expect(songs).toEqual([song]);
      expect(received[0].geniusAccessToken).toBe('test-token');
    });

    it('should format a song line', () => {
      expect(formatSongLine(song)).toBe('Lithium by Nirvana (1,234 views)');
      expect(formatSongLine({ ...song, fullTitle: null, pageviews: null })).toBe('Lithium');
    });
  });

  describe('CommandBuilder', () => {
    it('should describe application errors with their user message', () => {
      const error = new ValidationError('limit', 'Limit must be an integer between 1 and 100');

      expect(CommandBuilder.describeError(error)).toBe(
        'Invalid input. Validation error: limit - Limit must be an integer between 1 and 100 (validate)'
      );
    });

    it('should redact secrets from other errors', () => {
      expect(CommandBuilder.describeError(new Error('request failed api_key=test-secret'))).toBe(
        'request failed api_key=[REDACTED]'
      );
    });

    it('should exit with 130 on cancellation', () => {
      const spinner = CommandBuilder.createSpinner('Crawling');

      expect(CommandBuilder.fail(spinner, new CancellationError())).toBe(EXIT_CANCELLED);
      expect(jest.mocked(spinner.warn)).toHaveBeenCalledWith('⚠ Cancelled');
    });

    it('should exit with 1 on other failures', () => {
      const spinner = CommandBuilder.createSpinner('Crawling');

      expect(CommandBuilder.fail(spinner, new Error('boom'))).toBe(EXIT_FAILURE);
      expect(jest.mocked(spinner.fail)).toHaveBeenCalledWith('✗ boom');
    });

    it('should drive the spinner text from progress', () => {
      const spinner = CommandBuilder.createSpinner('Crawling');
      const onProgress = CommandBuilder.createProgressCallback(spinner);

      onProgress({ stage: 'Fetching albums', current: 1, total: 4, message: 'Bleach' });

      expect(spinner.text).toBe('Fetching albums: 1/4 (25%) - Bleach');
    });
  });
});
