export type EngineErrorKind =
  | 'ResumeNotFoundError'
  | 'ConfigurationMismatchError'
  | 'ConfigurationError'
  | 'ScoreError';

export class EngineError extends Error {
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

/** No resume text could be found. Nothing can be scored without it. */
export class ResumeNotFoundError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ResumeNotFoundError', message, options);
  }
}

export interface IndexSignature {
  modelName: string;
  dimension: number;
}

/**
 * A persisted index was built with a different embedding model or
 * dimension than the one configured now. Requires an explicit rebuild.
 */
export class ConfigurationMismatchError extends EngineError {
  readonly cached: IndexSignature;
  readonly current: IndexSignature;

  constructor(cached: IndexSignature, current: IndexSignature) {
    super(
      'ConfigurationMismatchError',
      `Cached index was built with ${cached.modelName} (dimension ${cached.dimension}) ` +
        `but the configured model is ${current.modelName} (dimension ${current.dimension}). ` +
        'Rebuild the index.'
    );
    this.cached = cached;
    this.current = current;
  }
}

export class ConfigurationError extends EngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('ConfigurationError', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ScoreError extends EngineError {
  readonly jobId: string;

  constructor(jobId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('ScoreError', `Failed to score job ${jobId}: ${detail}`, { cause });
    this.jobId = jobId;
  }
}
