/**
 * Error types raised by the recap pipeline
 */

export class TransportError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'TransportError';
  }
}

export type StructuralErrorKind = 'extraction' | 'parse';

/**
 * The model answered, but not with a usable envelope.
 */
export class StructuralError extends Error {
  constructor(
    public readonly kind: StructuralErrorKind,
    message: string,
    public readonly rawContent: string
  ) {
    super(message);
    this.name = 'StructuralError';
  }
}

export class SalvageImpossibleError extends Error {
  constructor(strategy: string, public readonly rawContent: string) {
    super(`${strategy} could not repair the completion`);
    this.name = 'SalvageImpossibleError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isRetryableError(error: unknown): boolean {
  return !(error instanceof ConfigurationError);
}
