export class PresslineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PresslineError';
  }
}

export class ConfigError extends PresslineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class RulesError extends PresslineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RULES_ERROR', details);
    this.name = 'RulesError';
  }
}

export class DbError extends PresslineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class ValidationError extends PresslineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * A collaborator call failed. `transient` marks failures worth retrying
 * (network errors, timeouts, 5xx, 408, 429).
 */
export class WorkerError extends PresslineError {
  constructor(
    message: string,
    public readonly transient: boolean,
    details?: Record<string, unknown>,
  ) {
    super(message, 'WORKER_ERROR', details);
    this.name = 'WorkerError';
  }
}

export class SourceError extends PresslineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class LlmError extends PresslineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export class ArchiveError extends PresslineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ARCHIVE_ERROR', details);
    this.name = 'ArchiveError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
