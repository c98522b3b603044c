/**
 * HTTP transport: streams a rendition URL to disk with the platform's
 * request headers, progress callbacks, cancellation, and byte-range resume.
 */
import { createWriteStream } from 'fs';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { logger } from '../utils/logger.js';
import { TransportError, describeError } from '../utils/errors.js';
import type { DownloadOptions, DownloadRequest, DownloadResult, Transport } from './types.js';

export type FetchLike = typeof fetch;

/** Statuses worth retrying: timeouts, throttling, and server-side faults. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/** Default for how long a request or body may go without data before it counts as stalled. */
export const DEFAULT_IDLE_TIMEOUT_MS = 30_000;

export class HttpTransport implements Transport {
  constructor(
    private readonly fetchImpl: FetchLike = fetch,
    private readonly idleTimeoutMs: number = DEFAULT_IDLE_TIMEOUT_MS,
  ) {}

  async download(
    request: DownloadRequest,
    destPath: string,
    options: DownloadOptions = {},
  ): Promise<DownloadResult> {
    const { signal, resumeFrom = 0, onProgress } = options;
    if (!request.source) {
      throw new TransportError(`No source URL for stream ${request.streamRef}`, { transient: false });
    }

    const headers: Record<string, string> = { ...request.source.headers };
    if (resumeFrom > 0) headers['Range'] = `bytes=${resumeFrom}-`;

    // Re-armed on every chunk; firing aborts the request or the body transfer.
    const idle = new AbortController();
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdle = (): void => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => idle.abort(), this.idleTimeoutMs);
    };
    const combined = signal ? AbortSignal.any([signal, idle.signal]) : idle.signal;

    armIdle();
    try {
      let response: Response;
      try {
        response = await this.fetchImpl(request.source.url, { headers, signal: combined });
      } catch (err) {
        if (signal?.aborted) throw err;
        const reason = idle.signal.aborted ? `timed out after ${this.idleTimeoutMs}ms` : describeError(err);
        throw new TransportError(`Request for ${request.streamRef} failed: ${reason}`, {
          transient: true,
          cause: err,
        });
      }

      if (!response.ok) {
        throw new TransportError(`HTTP ${response.status} for ${request.streamRef}`, {
          transient: isTransientStatus(response.status),
          status: response.status,
        });
      }
      if (!response.body) {
        throw new TransportError(`Empty response body for ${request.streamRef}`, { transient: true });
      }

      // A 200 to a range request means the server ignored it: start over.
      const appending = resumeFrom > 0 && response.status === 206;
      const resumable = response.status === 206 || response.headers.get('accept-ranges') === 'bytes';
      const start = appending ? resumeFrom : 0;
      const length = Number(response.headers.get('content-length') ?? NaN);
      const bytesTotal = Number.isFinite(length) ? start + length : null;

      logger.debug('HTTP: downloading', { streamRef: request.streamRef, start, bytesTotal, resumable });

      let written = start;
      const counter = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          armIdle();
          written += chunk.length;
          onProgress?.(written, bytesTotal);
          callback(null, chunk);
        },
      });

      armIdle();
      try {
        await pipeline(
          Readable.fromWeb(response.body),
          counter,
          createWriteStream(destPath, { flags: appending ? 'a' : 'w' }),
          { signal: combined },
        );
      } catch (err) {
        if (signal?.aborted) throw err;
        const reason = idle.signal.aborted ? `stalled for ${this.idleTimeoutMs}ms` : describeError(err);
        throw new TransportError(`Transfer of ${request.streamRef} interrupted: ${reason}`, {
          transient: true,
          resumable,
          bytesWritten: written,
          cause: err,
        });
      }

      if (bytesTotal !== null && written < bytesTotal) {
        throw new TransportError(`Partial read of ${request.streamRef}: ${written}/${bytesTotal} bytes`, {
          transient: true,
          resumable,
          bytesWritten: written,
        });
      }

      return { bytesWritten: written, resumable };
    } finally {
      clearTimeout(idleTimer);
    }
  }
}
