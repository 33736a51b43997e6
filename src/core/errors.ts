export type ProviderErrorKind = 'timeout' | 'auth' | 'transport' | 'rate_limited' | 'cancelled';

// Failure talking to the LLM backend. Never reaches callers of the generation operations.
export class ProviderError extends Error {
  constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

// No parseable JSON object in a model response.
export class ExtractionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

// A batch came back with fewer records than were asked for. Reported, not fatal.
export class MalformedBatchError extends Error {
  constructor(
    public readonly requested: number,
    public readonly recovered: number,
    what = 'records'
  ) {
    super(`Recovered ${recovered} of ${requested} requested ${what}`);
    this.name = 'MalformedBatchError';
  }
}

export interface RequestIssue {
  path: string;
  message: string;
}

// The caller broke an operation's input contract.
export class InvalidRequestError extends Error {
  constructor(
    public readonly issues: RequestIssue[],
    operation: string
  ) {
    super(`Invalid ${operation} request: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`);
    this.name = 'InvalidRequestError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
