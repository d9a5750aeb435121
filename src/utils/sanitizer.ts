import { Logger } from './logger';

/**
 * Input cleanup for artist names, search queries and output paths
 */
export class InputSanitizer {
  /**
   * Trim and normalize string input
   */
  static normalizeString(input: string, maxLength?: number): string {
    if (!input) return '';

    let normalized = input.trim();

    // Remove null bytes
    normalized = normalized.replace(/\0/g, '');

    // Collapse whitespace
    normalized = normalized.replace(/\s+/g, ' ');

    if (maxLength && normalized.length > maxLength) {
      normalized = normalized.substring(0, maxLength);
      Logger.warn('Input truncated to max length', { maxLength });
    }

    return normalized;
  }

  /**
   * Normalize an artist name or search query. Returns null when nothing is left.
   * Punctuation is kept: names such as "AC/DC" or "Sunn O)))" depend on it.
   */
  static sanitizeSearchQuery(input: string, maxLength: number = 200): string | null {
    const sanitized = this.normalizeString(input, maxLength).replace(/[\u0000-\u001F\u007F]/g, '');

    if (sanitized.length === 0) {
      Logger.warn('Empty search query');
      return null;
    }

    return sanitized;
  }

  /**
   * Build a file name from an artist name: "Pink Floyd" -> "pink_floyd"
   */
  static toFileName(input: string, maxLength: number = 100): string {
    const base = this.normalizeString(input)
      .toLowerCase()
      .replace(/[\s/\\]+/g, '_')
      .replace(/[^\p{L}\p{N}_\-.]/gu, '')
      .replace(/\.{2,}/g, '.')
      .replace(/^[._]+|[._]+$/g, '');

    return (base || 'artist').substring(0, maxLength);
  }

  /**
   * Sanitize file paths to prevent directory traversal
   */
  static sanitizePath(input: string): string {
    if (!input) return '';

    let sanitized = input.replace(/\0/g, '');
    sanitized = sanitized.replace(/\.\.[/\\]/g, '');
    sanitized = sanitized.replace(/\/\//g, '/');

    return sanitized.trim();
  }
}

/**
 * Output cleanup for log lines and error messages
 */
export class OutputSanitizer {
  /**
   * Escape control characters so one log entry stays on one line
   */
  static escapeLog(input: string): string {
    if (!input) return '';

    return input
      .replace(/\r/g, '\\r')
      .replace(/\n/g, '\\n')
      .replace(/\t/g, '\\t')
      .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '');
  }

  /**
   * Redact API keys and tokens, including the api_key query parameter Last.fm URLs carry
   */
  static redactSensitive(input: string): string {
    if (!input) return '';

    return input
      .replace(/\b(access_token|token|password|secret|api[_-]?key|apikey)("?\s*[:=]\s*)"?[^\s,;&}\]"]*"?/gi, '$1$2[REDACTED]')
      .replace(/\b(Bearer|Basic)\s+[^\s,;"]+/gi, '$1 [REDACTED]');
  }

  /**
   * Sanitize error messages for display
   */
  static sanitizeErrorMessage(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    return this.escapeLog(this.redactSensitive(message));
  }

  /**
   * Truncate long strings safely
   */
  static truncate(input: string, maxLength: number = 200): string {
    if (!input || input.length <= maxLength) return input;

    return input.substring(0, maxLength) + '...';
  }
}
