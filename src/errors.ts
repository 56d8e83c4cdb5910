export class ValidationError extends Error {
  public readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UnsupportedConversionError extends Error {
  public readonly statusCode = 500;

  constructor(public readonly inputType: string, public readonly outputType: string) {
    super(`Unsupported conversion ${inputType}->${outputType}`);
    this.name = 'UnsupportedConversionError';
  }
}

export class ConfigurationError extends Error {
  public readonly statusCode = 500;

  constructor(message: string = 'HF_TOKEN not configured on server') {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class TimeoutError extends Error {
  public readonly statusCode = 500;

  constructor(timeoutMs: number) {
    super(`Inference call timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

// Anything without a known status is an upstream failure
export const statusCodeFor = (error: unknown): number => {
  if (
    error instanceof ValidationError ||
    error instanceof UnsupportedConversionError ||
    error instanceof ConfigurationError ||
    error instanceof TimeoutError
  ) {
    return error.statusCode;
  }
  return 500;
};

export const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
