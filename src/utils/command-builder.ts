import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { AppError, isCancellation } from './error-handler';
import { OutputSanitizer } from './sanitizer';
import { ProgressCallback, formatProgress } from './progress';
import { CrawlerConfig, DiscographyCrawler } from '../services/discography-crawler';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
/** Conventional exit status after SIGINT */
export const EXIT_CANCELLED = 130;

/**
 * Shared helpers for the CLI commands:
 * - Spinner initialization and management
 * - Unified error messages and exit codes
 * - Consistent success/failure formatting
 */
export class CommandBuilder {
  /**
   * Create and start a new spinner. Quiet mode keeps it silent.
   */
  static createSpinner(text: string = '', quiet: boolean = false): Ora {
    return ora({ text, isSilent: quiet }).start();
  }

  /**
   * Progress callback that drives the spinner text
   */
  static createProgressCallback(spinner: Ora): ProgressCallback {
    return (progress) => {
      spinner.text = formatProgress(progress);
    };
  }

  /**
   * User-facing message for any thrown value, with secrets redacted
   */
  static describeError(error: unknown): string {
    if (error instanceof AppError) {
      return OutputSanitizer.redactSensitive(error.getUserMessage());
    }
    return OutputSanitizer.sanitizeErrorMessage(error);
  }

  /**
   * Report a failure on the spinner and return the exit code to use
   */
  static fail(spinner: Ora, error: unknown): number {
    if (isCancellation(error)) {
      spinner.warn(this.formatWarning('Cancelled'));
      return EXIT_CANCELLED;
    }
    spinner.fail(this.formatError(this.describeError(error)));
    return EXIT_FAILURE;
  }

  static formatSuccess(message: string): string {
    return chalk.green(`✓ ${message}`);
  }

  static formatError(message: string): string {
    return chalk.red(`✗ ${message}`);
  }

  static formatWarning(message: string): string {
    return chalk.yellow(`⚠ ${message}`);
  }
}

export type CrawlerFactory = (config: Partial<CrawlerConfig>) => DiscographyCrawler;

export const defaultCrawlerFactory: CrawlerFactory = (config) => new DiscographyCrawler(config);
