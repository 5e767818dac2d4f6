/**
 * Testimony Engine - Error Hierarchy
 *
 * Configuration errors reject a single call and leave state untouched.
 * Lookup misses never throw, and claim/world mismatches are ordinary
 * ValidationResults, so neither has an error class here.
 */

import { TIME_PERIODS } from '../config/constants.js';

/**
 * Error options for EngineError
 */
export interface EngineErrorOptions {
  code?: string;
  recoverable?: boolean;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  recoverable: boolean;
  context: Record<string, unknown>;
  timestamp: string;
  stack?: string;
}

/**
 * Base error class for all engine errors
 */
export class EngineError extends Error {
  code: string;
  recoverable: boolean;
  context: Record<string, unknown>;
  timestamp: Date;

  constructor(message: string, options: EngineErrorOptions = {}) {
    super(message);
    this.name = 'EngineError';
    this.code = options.code ?? 'ENGINE_ERROR';
    this.recoverable = options.recoverable ?? false;
    this.context = options.context ?? {};
    this.timestamp = new Date();

    if (options.cause) {
      this.cause = options.cause;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  withContext(context: Record<string, unknown>): this {
    this.context = { ...this.context, ...context };
    return this;
  }
}

/**
 * Configuration errors (bad config values, bad authoring input)
 */
export class ConfigurationError extends EngineError {
  constructor(message: string, options: EngineErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'CONFIG_ERROR',
      recoverable: options.recoverable ?? false,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * A schedule period outside the canonical period set
 */
export class InvalidPeriodError extends ConfigurationError {
  period: string;

  constructor(period: string, options: EngineErrorOptions = {}) {
    super(`Invalid period '${period}'. Must be one of: ${TIME_PERIODS.join(', ')}`, {
      ...options,
      code: options.code ?? 'INVALID_PERIOD',
    });
    this.name = 'InvalidPeriodError';
    this.period = period;
    this.context.period = period;
  }
}

/**
 * Field validation errors on records entering the world model
 */
export class ValidationError extends EngineError {
  field?: string;

  constructor(message: string, field?: string, options: EngineErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'VALIDATION_ERROR',
      recoverable: options.recoverable ?? false,
    });
    this.name = 'ValidationError';
    this.field = field;
    if (field) {
      this.context.field = field;
    }
  }
}

/**
 * Text generation provider errors
 */
export class ProviderError extends EngineError {
  provider: string;

  constructor(message: string, provider: string, options: EngineErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'PROVIDER_ERROR',
      recoverable: options.recoverable ?? true,
    });
    this.name = 'ProviderError';
    this.provider = provider;
    this.context.provider = provider;
  }
}

/**
 * Gemini-specific errors
 */
export class GeminiError extends ProviderError {
  constructor(message: string, options: EngineErrorOptions = {}) {
    super(message, 'gemini', {
      ...options,
      code: options.code ?? 'GEMINI_ERROR',
    });
    this.name = 'GeminiError';
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Normalize any thrown value to EngineError
 */
export function normalizeError(source: unknown, defaultCode = 'UNKNOWN_ERROR'): EngineError {
  if (source instanceof EngineError) {
    return source;
  }

  if (source instanceof Error) {
    return new EngineError(source.message, {
      code: defaultCode,
      cause: source,
    });
  }

  if (typeof source === 'string') {
    return new EngineError(source, { code: defaultCode });
  }

  return new EngineError('Unknown error', {
    code: defaultCode,
    context: { originalError: source },
  });
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function getErrorCode(error: unknown): string {
  if (error instanceof EngineError) {
    return error.code;
  }
  if (error instanceof Error) {
    return error.name;
  }
  return 'UNKNOWN_ERROR';
}
