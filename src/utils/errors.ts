/**
 * Error types and codes for layerviz.
 * Every failure raised by the core and the CLI extends LayervizError.
 */

/**
 * Base error class for all layerviz errors.
 */
export class LayervizError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LayervizError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Input acquisition errors (unreadable stdin or snapshot file).
 */
export class InputError extends LayervizError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InputError';
  }
}

/**
 * The container engine could not be reached or refused the image listing.
 */
export class EngineUnavailableError extends LayervizError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'EngineUnavailableError';
  }
}

/**
 * A snapshot that is not valid JSON or does not describe image records.
 */
export class MalformedInputError extends LayervizError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'MalformedInputError';
  }
}

/**
 * A tree root selector that matches no image.
 */
export class RootNotFoundError extends LayervizError {
  constructor(public readonly selector: string) {
    super(ErrorCodes.ROOT_NOT_FOUND, `Unable to find image ${selector}.`, { selector });
    this.name = 'RootNotFoundError';
  }
}

/**
 * Invalid combination of command-line flags.
 */
export class UsageError extends LayervizError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'UsageError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends LayervizError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

export const ErrorCodes = {
  // Input acquisition
  INPUT_READ_FAILED: 'IN001',
  ENGINE_UNAVAILABLE: 'IN002',

  // Malformed input
  INVALID_JSON: 'MI001',
  INVALID_IMAGE_RECORD: 'MI002',

  // Resolution
  ROOT_NOT_FOUND: 'RT001',

  // Usage
  NO_RENDER_MODE: 'US001',
  CONFLICTING_RENDER_MODES: 'US002',
  INVALID_OPTION: 'US003',

  // Configuration
  CONFIG_LOAD_ERROR: 'CF001',
} as const;
