/**
 * Estimation Errors
 * Only configuration problems are thrown; row-level data problems become warnings.
 */

export class EstimationError extends Error {
  readonly suggestion?: string;
  readonly context: Record<string, unknown>;
  readonly statusCode: number;

  constructor(
    message: string,
    options: { suggestion?: string; context?: Record<string, unknown>; statusCode?: number } = {}
  ) {
    super(message);
    this.name = 'EstimationError';
    this.suggestion = options.suggestion;
    this.context = options.context ?? {};
    this.statusCode = options.statusCode ?? 500;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      error_type: this.name,
      suggestion: this.suggestion,
      context: this.context
    };
  }
}

export class ConfigurationError extends EstimationError {
  readonly setting: string;

  constructor(setting: string, reason: string, statusCode: number = 400) {
    super(`Configuration error for '${setting}': ${reason}`, {
      suggestion: 'Check the price book source and pricing settings',
      context: { setting },
      statusCode
    });
    this.name = 'ConfigurationError';
    this.setting = setting;
  }
}

export function isEstimationError(err: unknown): err is EstimationError {
  return err instanceof EstimationError;
}
