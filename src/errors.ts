/**
 * Error types shared by the clients and the sync pipeline
 */

export class ZoteroApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`Zotero API error (${status}): ${body}`);
    this.name = 'ZoteroApiError';
  }
}

export class RateLimitError extends Error {
  constructor(readonly retryAfter: number) {
    super(`Rate limited. Please wait ${retryAfter} seconds.`);
    this.name = 'RateLimitError';
  }
}

export class TranslationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranslationError';
  }
}

/**
 * The target library's item listing could not be obtained.
 * Sync planning never proceeds without it.
 */
export class RemoteUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Remote library unavailable: ${message}`, options);
    this.name = 'RemoteUnavailableError';
  }
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
