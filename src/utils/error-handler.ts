import axios, { AxiosError } from 'axios';
import axiosRetry from 'axios-retry';
import { Logger } from './logger';
import { OutputSanitizer } from './sanitizer';

/**
 * Centralized error handling and categorization
 * Provides consistent error types and logging across provider clients and the crawler
 */

export enum ErrorType {
  // HTTP Client Errors (4xx)
  BadRequest = 'BadRequest',
  Unauthorized = 'Unauthorized',
  Forbidden = 'Forbidden',
  NotFound = 'NotFound',
  Conflict = 'Conflict',
  UnprocessableEntity = 'UnprocessableEntity',

  // Rate Limiting (429)
  RateLimit = 'RateLimit',

  // HTTP Server Errors (5xx)
  InternalServerError = 'InternalServerError',
  ServiceUnavailable = 'ServiceUnavailable',
  BadGateway = 'BadGateway',
  GatewayTimeout = 'GatewayTimeout',

  // Network Errors
  NetworkError = 'NetworkError',
  Timeout = 'Timeout',

  // Application Errors
  ValidationError = 'ValidationError',
  ConfigurationError = 'ConfigurationError',
  ParseError = 'ParseError',
  InvalidState = 'InvalidState',
  Cancelled = 'Cancelled',
  AggregationFailure = 'AggregationFailure',

  // Unknown
  Unknown = 'Unknown',
}

const RETRYABLE_TYPES: ReadonlySet<ErrorType> = new Set([
  ErrorType.RateLimit,
  ErrorType.InternalServerError,
  ErrorType.ServiceUnavailable,
  ErrorType.BadGateway,
  ErrorType.GatewayTimeout,
  ErrorType.Timeout,
  ErrorType.NetworkError,
]);

export interface ErrorContext {
  operation: string;
  resource?: string;
  details?: Record<string, unknown>;
}

/**
 * Base application error with type and context information
 */
export class AppError extends Error {
  constructor(
    public type: ErrorType,
    message: string,
    public statusCode?: number,
    public originalError?: unknown,
    public context?: ErrorContext
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static isRetryableType(type: ErrorType): boolean {
    return RETRYABLE_TYPES.has(type);
  }

  /**
   * Check if error is retryable
   * (temporary failures that may succeed on retry)
   */
  isRetryable(): boolean {
    return AppError.isRetryableType(this.type);
  }

  /**
   * Get user-friendly error message
   */
  getUserMessage(): string {
    const contextStr = this.context ? ` (${this.context.operation})` : '';

    switch (this.type) {
      case ErrorType.RateLimit:
        return `Rate limit exceeded. Please try again later.${contextStr}`;
      case ErrorType.Unauthorized:
      case ErrorType.Forbidden:
        return `Authentication failed. Please check your API key or token.${contextStr}`;
      case ErrorType.NotFound:
        return `${this.message}${contextStr}`;
      case ErrorType.ValidationError:
        return `Invalid input. ${this.message}${contextStr}`;
      case ErrorType.NetworkError:
        return `Network error. Please check your connection.${contextStr}`;
      case ErrorType.Timeout:
        return `Request timed out. Please try again.${contextStr}`;
      case ErrorType.ServiceUnavailable:
      case ErrorType.BadGateway:
      case ErrorType.GatewayTimeout:
      case ErrorType.InternalServerError:
        return `Service temporarily unavailable. Please try again later.${contextStr}`;
      case ErrorType.ParseError:
        return `Provider returned an unexpected response. ${this.message}${contextStr}`;
      case ErrorType.Cancelled:
        return 'Operation cancelled.';
      default:
        return `Error: ${this.message}${contextStr}`;
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON() {
    return {
      type: this.type,
      message: this.message,
      statusCode: this.statusCode,
      context: this.context,
      isRetryable: this.isRetryable(),
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * An artist search came back empty. Terminal: empty results are never retried.
 */
export class NotFoundError extends AppError {
  constructor(public query: string, context?: ErrorContext) {
    super(ErrorType.NotFound, `Artist "${query}" not found`, undefined, undefined, context);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Network failure, timeout, 429 or 5xx from a provider
 */
export class TransientProviderError extends AppError {
  constructor(
    public provider: string,
    type: ErrorType,
    message: string,
    statusCode?: number,
    originalError?: unknown,
    context?: ErrorContext
  ) {
    super(type, message, statusCode, originalError, context);
    this.name = 'TransientProviderError';
    Object.setPrototypeOf(this, TransientProviderError.prototype);
  }

  isRetryable(): boolean {
    return true;
  }
}

/**
 * Malformed provider response for a single item
 */
export class ParseError extends AppError {
  constructor(message: string, originalError?: unknown, context?: ErrorContext) {
    super(ErrorType.ParseError, message, undefined, originalError, context);
    this.name = 'ParseError';
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * A request was issued outside an open provider session
 */
export class SessionStateError extends AppError {
  constructor(public provider: string, public state: string) {
    super(
      ErrorType.InvalidState,
      `${provider} session is ${state}; requests are only allowed while it is open`,
      undefined,
      undefined,
      { operation: 'session', resource: provider }
    );
    this.name = 'SessionStateError';
    Object.setPrototypeOf(this, SessionStateError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(public field: string, public reason: string) {
    super(ErrorType.ValidationError, `Validation error: ${field} - ${reason}`, undefined, undefined, {
      operation: 'validate',
      resource: field,
    });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class CancellationError extends AppError {
  constructor(message: string = 'Operation cancelled', originalError?: unknown, context?: ErrorContext) {
    super(ErrorType.Cancelled, message, undefined, originalError, context);
    this.name = 'CancellationError';
    Object.setPrototypeOf(this, CancellationError.prototype);
  }
}

/**
 * Unrecovered failure of a whole crawl, carrying the artist name and root cause
 */
export class AggregationFailure extends AppError {
  constructor(public artistName: string, public rootCause: unknown) {
    const causeMessage = rootCause instanceof Error ? rootCause.message : String(rootCause);
    super(
      ErrorType.AggregationFailure,
      `Crawl failed for "${artistName}": ${causeMessage}`,
      rootCause instanceof AppError ? rootCause.statusCode : undefined,
      rootCause,
      { operation: 'crawl', resource: artistName }
    );
    this.name = 'AggregationFailure';
    Object.setPrototypeOf(this, AggregationFailure.prototype);
  }

  getUserMessage(): string {
    if (this.rootCause instanceof AppError) {
      return `Crawl failed for "${this.artistName}": ${this.rootCause.getUserMessage()}`;
    }
    return this.message;
  }
}

export function isCancellation(error: unknown): boolean {
  if (error instanceof CancellationError || axios.isCancel(error)) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Pull a human-readable message out of a provider error body
 * (MusicBrainz: { error }, Last.fm: { error, message }, Genius: { meta: { message } })
 */
function extractBodyMessage(data: unknown): string | undefined {
  if (!isObject(data)) {
    return undefined;
  }
  if (typeof data.message === 'string') return data.message;
  if (typeof data.error_description === 'string') return data.error_description;
  if (typeof data.error === 'string') return data.error;
  if (isObject(data.meta) && typeof data.meta.message === 'string') {
    return data.meta.message;
  }
  return undefined;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Error handler utility for consistent error processing
 */
export class ErrorHandler {
  /**
   * Parse and categorize an error into AppError
   * Handles Axios errors, cancellations, generic Error objects and unknown types
   */
  static parse(error: unknown, context: ErrorContext): AppError {
    // Already categorized: keep identity so callers can rethrow it unchanged
    if (error instanceof AppError) {
      if (!error.context) {
        error.context = context;
      }
      return error;
    }

    if (isCancellation(error)) {
      return new CancellationError('Operation cancelled', error, context);
    }

    if (axios.isAxiosError(error)) {
      return this.parseAxiosError(error, context);
    }

    if (error instanceof Error) {
      return this.parseStandardError(error, context);
    }

    return new AppError(ErrorType.Unknown, String(error), undefined, error, context);
  }

  /**
   * Parse Axios error into AppError with HTTP status categorization
   */
  static parseAxiosError(error: AxiosError, context: ErrorContext): AppError {
    const status = error.response?.status;
    const errorMsg = extractBodyMessage(error.response?.data) || error.message;

    let type: ErrorType;
    switch (status) {
      case 400:
        type = ErrorType.BadRequest;
        break;
      case 401:
        type = ErrorType.Unauthorized;
        break;
      case 403:
        type = ErrorType.Forbidden;
        break;
      case 404:
        type = ErrorType.NotFound;
        break;
      case 409:
        type = ErrorType.Conflict;
        break;
      case 422:
        type = ErrorType.UnprocessableEntity;
        break;
      case 429:
        type = ErrorType.RateLimit;
        break;
      case 500:
        type = ErrorType.InternalServerError;
        break;
      case 502:
        type = ErrorType.BadGateway;
        break;
      case 503:
        type = ErrorType.ServiceUnavailable;
        break;
      case 504:
        type = ErrorType.GatewayTimeout;
        break;
      case undefined:
        // No response: timeout, connection failure, or a request that never left
        if (
          error.code === 'ECONNABORTED' ||
          error.code === 'ETIMEDOUT' ||
          error.message.toLowerCase().includes('timeout')
        ) {
          type = ErrorType.Timeout;
        } else if (axiosRetry.isNetworkError(error)) {
          type = ErrorType.NetworkError;
        } else {
          type = ErrorType.Unknown;
        }
        break;
      default:
        type = status >= 500 ? ErrorType.InternalServerError : ErrorType.Unknown;
    }

    const message = errorMsg || `HTTP ${status}: ${error.message}`;
    if (AppError.isRetryableType(type)) {
      const provider = context.resource || context.operation;
      return new TransientProviderError(provider, type, message, status, error, context);
    }
    return new AppError(type, message, status, error, context);
  }

  /**
   * Parse standard Error object
   * Look for common patterns in error messages
   */
  static parseStandardError(error: Error, context: ErrorContext): AppError {
    const msg = error.message.toLowerCase();
    const provider = context.resource || context.operation;

    if (msg.includes('timeout') || msg.includes('timed out')) {
      return new TransientProviderError(provider, ErrorType.Timeout, error.message, undefined, error, context);
    }
    if (msg.includes('network') || msg.includes('econnrefused') || msg.includes('econnreset')) {
      return new TransientProviderError(provider, ErrorType.NetworkError, error.message, undefined, error, context);
    }

    let type: ErrorType = ErrorType.Unknown;
    if (msg.includes('validation') || msg.includes('invalid')) {
      type = ErrorType.ValidationError;
    } else if (msg.includes('configuration') || msg.includes('not set')) {
      type = ErrorType.ConfigurationError;
    }

    return new AppError(type, error.message, undefined, error, context);
  }

  /**
   * Log an error with context information
   * Respects error severity (retryable vs permanent)
   */
  static log(error: AppError, severity: 'error' | 'warn' | 'info' = 'error'): void {
    const baseMsg = `[${error.context?.operation || 'unknown'}] ${error.message}`;

    if (severity === 'error') {
      Logger.error(baseMsg, error);
    } else if (severity === 'warn') {
      Logger.warn(baseMsg);
    } else {
      Logger.info(baseMsg);
    }

    if (error.context?.details) {
      Logger.debug(`Details: ${OutputSanitizer.redactSensitive(JSON.stringify(error.context.details))}`);
    }

    if (error.isRetryable()) {
      Logger.debug('Error is retryable');
    }
  }
}
