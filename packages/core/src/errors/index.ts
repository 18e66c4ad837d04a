/**
 * Error types raised by the photometry pipeline.
 *
 * Row and file level problems never surface here: parsers and the sanitizer
 * degrade them to "not applicable" or missing values. These errors describe
 * configuration gaps and per-object failures.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * A vocabulary, zero-point table, registry or environment failed validation.
 * Fatal at startup.
 */
export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION_ERROR';
}

export class ZeroPointNotFoundError extends PipelineError {
  readonly code = 'ZERO_POINT_NOT_FOUND';

  constructor(
    public readonly magSystem: string,
    public readonly band: string
  ) {
    super(`No zero point for passband '${band}' in magnitude system '${magSystem}'`, { band, magSystem });
  }
}

/**
 * Raised for an object when the unrecognized-label policy is `skip-object`.
 */
export class UnrecognizedPassbandError extends PipelineError {
  readonly code = 'UNRECOGNIZED_PASSBAND';

  constructor(public readonly labels: readonly string[]) {
    super(`Unrecognized passband labels: ${labels.join(', ')}`, { labels: [...labels] });
  }
}
