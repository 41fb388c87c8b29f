export type ErrorKind = 'network' | 'parse' | 'unexpected';

/** Transport-level failure: connection refused, DNS, timeout, aborted body. */
export class FetchError extends Error {
  readonly kind = 'network' as const;

  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
  }
}

/** Listing HTML that the extractor could not make sense of. */
export class ExtractError extends Error {
  readonly kind = 'parse' as const;

  constructor(readonly pageUrl: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractError';
  }
}

export function classifyError(err: unknown): ErrorKind {
  if (err instanceof FetchError) return err.kind;
  if (err instanceof ExtractError) return err.kind;
  return 'unexpected';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
