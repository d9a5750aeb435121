import { Command } from 'commander';
import chalk from 'chalk';
import { AppConfig, toCrawlerConfig } from '../config';
import { CommandBuilder, CrawlerFactory, EXIT_SUCCESS, defaultCrawlerFactory } from '../utils/command-builder';
import { SearchCommandOptions, Validator } from '../utils/validator';
import { Artist } from '../types';

export async function runSearch(
  options: SearchCommandOptions,
  config: AppConfig,
  createCrawler: CrawlerFactory = defaultCrawlerFactory
): Promise<Artist[]> {
  const crawler = createCrawler(toCrawlerConfig(config));
  return crawler.searchArtists(options.query, options.limit);
}

/**
 * "Nirvana (US grunge band) [US, 1987 - 1994]"
 */
export function formatArtistLine(artist: Artist): string {
  const details: string[] = [];
  if (artist.country) details.push(artist.country);
  if (artist.beginDate) {
    details.push(artist.endDate ? `${artist.beginDate} - ${artist.endDate}` : `${artist.beginDate} -`);
  }
  const disambiguation = artist.disambiguation ? ` (${artist.disambiguation})` : '';
  const suffix = details.length > 0 ? ` [${details.join(', ')}]` : '';
  return `${artist.name}${disambiguation}${suffix}`;
}

export function createSearchCommand(config: AppConfig, createCrawler: CrawlerFactory = defaultCrawlerFactory) {
  return new Command('search')
    .description('Search MusicBrainz for artists')
    .argument('<query>', 'Artist name to search for')
    .option('-l, --limit <number>', 'Maximum results (1-100)', '10')
    .action(async (query: string, rawOptions: Record<string, unknown>) => {
      const spinner = CommandBuilder.createSpinner('Searching artists...');

      try {
        const options = Validator.validateSearchOptions(query, rawOptions);
        const artists = await runSearch(options, config, createCrawler);

        if (artists.length === 0) {
          spinner.warn(CommandBuilder.formatWarning(`No artists found for "${options.query}"`));
          process.exit(EXIT_SUCCESS);
        }

        spinner.succeed(CommandBuilder.formatSuccess(`Found ${artists.length} artist${artists.length !== 1 ? 's' : ''}`));
        artists.forEach((artist, index) => {
          console.log(`${chalk.gray(`${index + 1}.`)} ${formatArtistLine(artist)}`);
          if (artist.externalIds.musicbrainz) {
            console.log(chalk.gray(`   ${artist.externalIds.musicbrainz}`));
          }
        });
        console.log();
        process.exit(EXIT_SUCCESS);
      } catch (error) {
        process.exit(CommandBuilder.fail(spinner, error));
      }
    });
}
