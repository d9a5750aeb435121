#!/usr/bin/env node

import { program } from 'commander';
import { AppConfig, loadEnvConfig } from './config';
import { CommandBuilder } from './utils/command-builder';
import { createCrawlCommand } from './commands/crawl';
import { createSearchCommand } from './commands/search';
import { createSongsCommand } from './commands/songs';

program
  .name('discography-crawler')
  .description('Aggregate artist discographies from MusicBrainz, Last.fm and Genius')
  .version('1.0.0');

let config: AppConfig;
try {
  config = loadEnvConfig();
} catch (error) {
  console.error(CommandBuilder.formatError(CommandBuilder.describeError(error)));
  console.log(CommandBuilder.formatWarning('Check your .env file. See .env.example for reference.'));
  process.exit(1);
}

program.addCommand(createCrawlCommand(config));
program.addCommand(createSearchCommand(config));
program.addCommand(createSongsCommand(config));

program.parse(process.argv);
