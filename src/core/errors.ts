/**
 * Base error class for all application errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Error thrown when a video's duration cannot be determined
 * (probe tool missing, non-zero exit, non-numeric output, unreadable container).
 */
export class ProbeError extends AppError {
  constructor(videoPath: string, detail: string) {
    super(`Cannot probe duration of ${videoPath}: ${detail}`, 'PROBE_ERROR');
    this.name = 'ProbeError';
  }
}

/**
 * Error thrown when an external tool process cannot be started.
 */
export class ToolError extends AppError {
  constructor(tool: string, detail: string) {
    super(`[${tool}] ${detail}`, 'TOOL_ERROR');
    this.name = 'ToolError';
  }
}

/**
 * Error thrown when the persisted record store cannot be read or written.
 */
export class StoreError extends AppError {
  constructor(detail: string) {
    super(detail, 'STORE_ERROR');
    this.name = 'StoreError';
  }
}

/**
 * Error thrown when invalid arguments or values are passed in
 * (e.g., bad command-line flags, non-positive fps, malformed frame spec).
 */
export class ValidationError extends AppError {
  constructor(detail: string) {
    super(detail, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}
