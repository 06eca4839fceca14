/**
 * Structured error types for the generator
 *
 * Every failure carries a machine-readable code so the CLI and callers can tell
 * fatal extraction problems apart from the recoverable ones the fallback chain
 * absorbs.
 */

export class GeneratorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GeneratorError';
  }
}

/**
 * The schema anchor or its closing bracket is missing. Nothing can be recovered.
 */
export class StructuralError extends GeneratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STRUCTURAL_ERROR', details);
    this.name = 'StructuralError';
  }
}

/**
 * A parsing tier could not turn the literal into a tree. The next tier is tried.
 */
export class NormalizationError extends GeneratorError {
  constructor(tier: string, reason: string, details?: Record<string, unknown>) {
    super(`${tier} tier failed: ${reason}`, 'NORMALIZATION_FAILED', { tier, reason, ...details });
    this.name = 'NormalizationError';
  }
}

export class ExternalToolUnavailableError extends GeneratorError {
  constructor(command: string, reason?: string) {
    super(
      `External interpreter '${command}' is not available${reason ? `: ${reason}` : ''}`,
      'EXTERNAL_TOOL_UNAVAILABLE',
      { command, reason }
    );
    this.name = 'ExternalToolUnavailableError';
  }
}

export class ValidationError extends GeneratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends GeneratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export function isGeneratorError(error: unknown): error is GeneratorError {
  return error instanceof GeneratorError;
}

/**
 * Error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isGeneratorError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}

/**
 * Coerce a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
