import { ProgressInfo } from '../types';

export type { ProgressInfo };

/**
 * Progress callback function type
 */
export type ProgressCallback = (progress: ProgressInfo) => void;

/**
 * No-op progress callback (does nothing)
 */
export const noopProgress: ProgressCallback = () => {
  // No operation
};

/**
 * Calculate percentage completion
 */
export function getPercentage(progress: ProgressInfo): number {
  if (progress.total === 0) return 0;
  return Math.round((progress.current / progress.total) * 100);
}

/**
 * Format progress as "stage: current/total (pct%) - message"
 */
export function formatProgress(progress: ProgressInfo): string {
  let message = progress.stage;

  if (progress.total > 0) {
    message += `: ${progress.current}/${progress.total} (${getPercentage(progress)}%)`;
  }

  if (progress.message) {
    message += ` - ${progress.message}`;
  }

  return message;
}
