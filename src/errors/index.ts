// Base error class for all spanchunk errors
export class SpanchunkError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'SpanchunkError';
  }
}

// Validation error for malformed chunks, CLI options and environment values
export class ValidationError extends SpanchunkError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for out-of-range chunker options and config file issues
export class ConfigurationError extends SpanchunkError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

// Processing error for collaborators that break their contract
export class ProcessingError extends SpanchunkError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
