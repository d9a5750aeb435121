import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { AppConfig, toCrawlerConfig } from '../config';
import {
  CommandBuilder,
  CrawlerFactory,
  EXIT_SUCCESS,
  defaultCrawlerFactory,
} from '../utils/command-builder';
import { CrawlCommandOptions, Validator } from '../utils/validator';
import { LogLevel, Logger } from '../utils/logger';
import { ProgressCallback } from '../utils/progress';
import { discographySpan, totalDurationMs, totalTracks, trackCount } from '../utils/discography';
import { defaultOutputFile, formatDuration, formatGenreList, formatSpan, toJson } from '../utils/formatters';
import { Discography } from '../types';

const SUMMARY_ALBUM_LIMIT = 10;

export interface CrawlResult {
  discography: Discography;
  outputFile: string;
}

/**
 * Crawl one artist and write the JSON document
 */
export async function runCrawl(
  options: CrawlCommandOptions,
  config: AppConfig,
  createCrawler: CrawlerFactory = defaultCrawlerFactory,
  hooks: { signal?: AbortSignal; onProgress?: ProgressCallback } = {}
): Promise<CrawlResult> {
  const crawler = createCrawler(
    toCrawlerConfig(config, {
      lastfmApiKey: options.lastfmKey,
      geniusAccessToken: options.geniusToken,
      enrich: options.enrich,
      includeLyricsRefs: options.includeLyricsRefs,
      trackMatching: options.trackMatching,
    })
  );

  const discography = await crawler.crawl(options.artist, hooks);

  const outputFile = options.output ?? defaultOutputFile(options.artist);
  await fs.promises.mkdir(path.dirname(path.resolve(outputFile)), { recursive: true });
  await fs.promises.writeFile(outputFile, `${toJson(discography, options.pretty)}\n`, 'utf8');
  Logger.info('Discography written', { file: outputFile, albums: discography.albums.length });

  return { discography, outputFile };
}

export function printCrawlSummary(discography: Discography): void {
  const { artist, albums } = discography;

  console.log(chalk.bold(`\n🎵 ${artist.name}${artist.disambiguation ? chalk.gray(` (${artist.disambiguation})`) : ''}\n`));
  console.log(chalk.cyan(`Albums: ${albums.length}`));
  console.log(chalk.cyan(`Tracks: ${totalTracks(discography)}`));
  console.log(chalk.cyan(`Years: ${formatSpan(discographySpan(discography))}`));
  console.log(chalk.cyan(`Sources: ${discography.sources.join(', ')}`));

  if (albums.length > 0) {
    console.log(chalk.bold('\nAlbums:'));
  }
  for (const album of albums.slice(0, SUMMARY_ALBUM_LIMIT)) {
    const year = album.releaseYear ?? '????';
    const genres = album.genres.length > 0 ? chalk.gray(` [${formatGenreList(album.genres)}]`) : '';
    console.log(
      `  ${year}  ${album.title} ${chalk.gray(`(${album.albumType}, ${trackCount(album)} tracks, ${formatDuration(totalDurationMs(album))})`)}${genres}`
    );
  }
  if (albums.length > SUMMARY_ALBUM_LIMIT) {
    console.log(chalk.gray(`  ... and ${albums.length - SUMMARY_ALBUM_LIMIT} more`));
  }
  console.log();
}

export function createCrawlCommand(config: AppConfig, createCrawler: CrawlerFactory = defaultCrawlerFactory) {
  return new Command('crawl')
    .description('Crawl an artist discography and save it as JSON')
    .argument('<artist>', 'Artist name to search for')
    .option('-o, --output <file>', 'Output file (default: <artist>_discography.json)')
    .option('--lastfm-key <key>', 'Last.fm API key (overrides LASTFM_API_KEY)')
    .option('--no-enrich', 'Skip Last.fm enrichment')
    .option('--genius-token <token>', 'Genius access token (overrides GENIUS_ACCESS_TOKEN)')
    .option('--include-lyrics-refs', 'Attach Genius lyrics page links to tracks')
    .option('--track-matching <strategy>', 'How enrichment tracks are paired: positional or title')
    .option('--pretty', 'Indent the JSON output')
    .option('-q, --quiet', 'Only print errors')
    .option('-v, --verbose', 'Show debug logging')
    .action(async (artist: string, rawOptions: Record<string, unknown>) => {
      let options: CrawlCommandOptions;
      try {
        options = Validator.validateCrawlOptions(artist, rawOptions);
      } catch (error) {
        console.error(CommandBuilder.formatError(CommandBuilder.describeError(error)));
        process.exit(1);
      }

      if (options.verbose) {
        Logger.setLogLevel(LogLevel.DEBUG);
      } else if (options.quiet) {
        Logger.setLogLevel(LogLevel.ERROR);
      }

      const spinner = CommandBuilder.createSpinner(`Crawling ${options.artist}...`, options.quiet);
      const controller = new AbortController();
      const onSigint = () => {
        spinner.text = 'Cancelling...';
        controller.abort();
      };
      process.once('SIGINT', onSigint);

      try {
        const { discography, outputFile } = await runCrawl(options, config, createCrawler, {
          signal: controller.signal,
          onProgress: CommandBuilder.createProgressCallback(spinner),
        });
        spinner.succeed(CommandBuilder.formatSuccess(`Saved ${discography.albums.length} albums to ${outputFile}`));

        if (!options.quiet) {
          printCrawlSummary(discography);
        }
        process.exit(EXIT_SUCCESS);
      } catch (error) {
        process.exit(CommandBuilder.fail(spinner, error));
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });
}
