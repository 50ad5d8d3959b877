/**
 * Shared types for external data providers.
 *
 * Adapters throw ProviderError internally; the public accessors that the
 * analysis consumes catch it and resolve to null.
 */

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public operation: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
