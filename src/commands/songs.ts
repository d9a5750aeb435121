import { Command } from 'commander';
import chalk from 'chalk';
import { AppConfig, toCrawlerConfig } from '../config';
import { CommandBuilder, CrawlerFactory, EXIT_SUCCESS, defaultCrawlerFactory } from '../utils/command-builder';
import { SongsCommandOptions, Validator } from '../utils/validator';
import { LYRICS_DISCLAIMER } from '../api/genius';
import { SongReference } from '../types';

export async function runSongs(
  options: SongsCommandOptions,
  config: AppConfig,
  createCrawler: CrawlerFactory = defaultCrawlerFactory
): Promise<SongReference[]> {
  const crawler = createCrawler(toCrawlerConfig(config, { geniusAccessToken: options.geniusToken }));
  return crawler.popularSongs(options.artist, options.limit);
}

export function formatSongLine(song: SongReference): string {
  const views = song.pageviews !== null ? chalk.gray(` (${song.pageviews.toLocaleString('en-US')} views)`) : '';
  return `${song.fullTitle ?? song.title}${views}`;
}

export function createSongsCommand(config: AppConfig, createCrawler: CrawlerFactory = defaultCrawlerFactory) {
  return new Command('songs')
    .description('List popular songs for an artist with Genius lyrics page links')
    .argument('<artist>', 'Artist name')
    .option('--genius-token <token>', 'Genius access token (overrides GENIUS_ACCESS_TOKEN)')
    .option('-l, --limit <number>', 'Maximum songs (1-100)', '20')
    .action(async (artist: string, rawOptions: Record<string, unknown>) => {
      const spinner = CommandBuilder.createSpinner('Loading songs from Genius...');

      try {
        const options = Validator.validateSongsOptions(artist, rawOptions);
        const songs = await runSongs(options, config, createCrawler);

        spinner.succeed(CommandBuilder.formatSuccess(`Found ${songs.length} song${songs.length !== 1 ? 's' : ''}`));
        songs.forEach((song, index) => {
          console.log(`${chalk.gray(`${index + 1}.`)} ${formatSongLine(song)}`);
          console.log(chalk.blue(`   ${song.url}`));
        });
        console.log(chalk.yellow(`\n${LYRICS_DISCLAIMER}\n`));
        process.exit(EXIT_SUCCESS);
      } catch (error) {
        process.exit(CommandBuilder.fail(spinner, error));
      }
    });
}
