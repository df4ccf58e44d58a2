/**
 * Transport for metadata and artifacts.
 *
 * The updater never decides trust on anything a fetcher says: the fetcher
 * only returns bytes (capped at a length the caller chooses) or a
 * {@link FetchError}.
 *
 * @packageDocumentation
 */

import { FetchError, Logger, MooringErrorCode, defaultLogger, validateNonEmpty, withRetry } from '@mooring/types';
import type { RetryOptions } from '@mooring/types';

// ─── Fetcher interface ──────────────────────────────────────────────────────────

export interface Fetcher {
  /**
   * Fetch `<version>.<role>.json`, or `<role>.json` when `version` is omitted.
   *
   * @throws {FetchError} FETCH_NOT_FOUND, FETCH_FAILED or FETCH_LENGTH_EXCEEDED.
   */
  fetchMetadata(roleName: string, maxLength: number, version?: number): Promise<Uint8Array>;

  /**
   * Fetch an artifact by its (possibly hash-prefixed) target path.
   *
   * @throws {FetchError}
   */
  fetchTarget(targetPath: string, maxLength: number): Promise<Uint8Array>;
}

/** File name of a metadata document in the repository. */
export function metadataFileName(roleName: string, version?: number): string {
  const name = `${encodeURIComponent(roleName)}.json`;
  return version === undefined ? name : `${version}.${name}`;
}

export function lengthExceeded(what: string, maxLength: number): FetchError {
  return new FetchError(
    MooringErrorCode.FETCH_LENGTH_EXCEEDED,
    `${what} exceeds the maximum length of ${maxLength} bytes`,
    { context: { maxLength } },
  );
}

// ─── HttpFetcher ────────────────────────────────────────────────────────────────

export interface HttpFetcherOptions {
  /** Base URL metadata file names are resolved against. */
  metadataBaseUrl: string;
  /** Base URL target paths are resolved against. */
  targetsBaseUrl: string;
  /** Per-request timeout in milliseconds. Defaults to 30000. */
  timeoutMs?: number;
  /** Retry policy for transient failures. Not-found and oversize responses are never retried. */
  retry?: RetryOptions;
  /** Replaces the global `fetch`, e.g. for a proxy-aware client. */
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

function isRetryable(error: Error): boolean {
  return error instanceof FetchError && error.code === MooringErrorCode.FETCH_FAILED;
}

/**
 * {@link Fetcher} over HTTP(S) using `fetch`.
 *
 * @example
 * ```typescript
 * const fetcher = new HttpFetcher({
 *   metadataBaseUrl: 'https://updates.example.com/metadata/',
 *   targetsBaseUrl: 'https://updates.example.com/targets/',
 * });
 * ```
 */
export class HttpFetcher implements Fetcher {
  private readonly metadataBaseUrl: string;
  private readonly targetsBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpFetcherOptions) {
    validateNonEmpty(options.metadataBaseUrl, 'metadataBaseUrl');
    validateNonEmpty(options.targetsBaseUrl, 'targetsBaseUrl');
    this.metadataBaseUrl = withTrailingSlash(options.metadataBaseUrl);
    this.targetsBaseUrl = withTrailingSlash(options.targetsBaseUrl);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retry = options.retry ?? {};
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? defaultLogger.child('fetcher');
  }

  async fetchMetadata(roleName: string, maxLength: number, version?: number): Promise<Uint8Array> {
    return this.download(`${this.metadataBaseUrl}${metadataFileName(roleName, version)}`, maxLength);
  }

  async fetchTarget(targetPath: string, maxLength: number): Promise<Uint8Array> {
    const encoded = targetPath.split('/').map(encodeURIComponent).join('/');
    return this.download(`${this.targetsBaseUrl}${encoded}`, maxLength);
  }

  private async download(url: string, maxLength: number): Promise<Uint8Array> {
    return withRetry(() => this.downloadOnce(url, maxLength), {
      ...this.retry,
      retryOn: (error) => isRetryable(error) && (this.retry.retryOn?.(error) ?? true),
      onRetry: (attempt, error) => {
        this.logger.warn('Retrying download', { url, attempt, error: error.message });
        this.retry.onRetry?.(attempt, error);
      },
    });
  }

  private async downloadOnce(url: string, maxLength: number): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err: unknown) {
      throw new FetchError(
        MooringErrorCode.FETCH_FAILED,
        `Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
        { context: { url }, cause: err instanceof Error ? err : undefined },
      );
    }

    if (response.status === 403 || response.status === 404) {
      throw new FetchError(MooringErrorCode.FETCH_NOT_FOUND, `${url} not found (HTTP ${response.status})`, {
        context: { url, status: response.status },
      });
    }
    if (!response.ok) {
      throw new FetchError(MooringErrorCode.FETCH_FAILED, `${url} returned HTTP ${response.status}`, {
        context: { url, status: response.status },
      });
    }

    const declared = Number(response.headers.get('content-length') ?? Number.NaN);
    if (Number.isFinite(declared) && declared > maxLength) {
      await response.body?.cancel();
      throw lengthExceeded(url, maxLength);
    }
    return readCapped(response, url, maxLength);
  }
}

async function readCapped(response: Response, url: string, maxLength: number): Promise<Uint8Array> {
  if (response.body === null) {
    return new Uint8Array(0);
  }
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      total += value.length;
      if (total > maxLength) {
        await reader.cancel();
        throw lengthExceeded(url, maxLength);
      }
      chunks.push(value);
    }
  } catch (err: unknown) {
    if (err instanceof FetchError) throw err;
    throw new FetchError(
      MooringErrorCode.FETCH_FAILED,
      `Reading ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
      { context: { url }, cause: err instanceof Error ? err : undefined },
    );
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}
