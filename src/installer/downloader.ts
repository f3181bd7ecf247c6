/**
 * Release Artifact Downloader
 * Streams the archive to disk with coalesced progress and all-or-nothing output
 */

import { createWriteStream } from 'fs';
import { mkdir, rename, rm } from 'fs/promises';
import { dirname } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { getLogger } from '../infra/logger';
import { DownloadError } from '../core/errors';
import { err, ok, type ProgressListener, type Result } from '../core/types';
import { trackTemporaryPath } from './temp-paths';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_TIMEOUT_MS = 60_000;
export const PARTIAL_SUFFIX = '.part';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  /** Abort once no headers or body bytes arrive for this long */
  timeoutMs?: number;
  /** Used when the server sends no Content-Length */
  expectedSize?: number;
  fetchFn?: typeof fetch;
}

export type Downloader = (
  url: string,
  destinationFile: string,
  onProgress: ProgressListener,
  options?: DownloadOptions
) => Promise<Result<void, DownloadError>>;

// ---------------------------------------------------------------------------
// Progress Coalescing
// ---------------------------------------------------------------------------

/**
 * Emits at most once per whole percent when the total is known, once per
 * chunk otherwise. `finish` emits the final count unless it was just sent.
 */
export class DownloadProgress {
  private received = 0;
  private lastPercent = -1;
  private lastEmitted = -1;

  constructor(private readonly total: number, private readonly listener: ProgressListener) {}

  add(bytes: number): void {
    this.received += bytes;

    if (this.total > 0) {
      const percent = Math.min(100, Math.floor((this.received / this.total) * 100));
      if (percent === this.lastPercent) return;
      this.lastPercent = percent;
    }
    this.emit();
  }

  finish(): void {
    if (this.lastEmitted !== this.received) this.emit();
  }

  get bytesReceived(): number {
    return this.received;
  }

  private emit(): void {
    this.lastEmitted = this.received;
    this.listener({
      phase: 'downloading',
      bytesDone: this.received,
      bytesTotal: this.total,
    });
  }
}

// ---------------------------------------------------------------------------
// Idle Timeout
// ---------------------------------------------------------------------------

/** Aborts the request when a single wait for the server outlasts `ms`. */
class IdleTimeout {
  private readonly controller = new AbortController();
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly ms: number) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  arm(): void {
    this.clear();
    this.timer = setTimeout(() => {
      const reason = new Error(`No data received for ${this.ms} ms`);
      reason.name = 'TimeoutError';
      this.controller.abort(reason);
    }, this.ms);
  }

  clear(): void {
    if (this.timer === null) return;
    clearTimeout(this.timer);
    this.timer = null;
  }
}

// ---------------------------------------------------------------------------
// Download
// ---------------------------------------------------------------------------

export const download: Downloader = async (url, destinationFile, onProgress, options = {}) => {
  const releasePart = trackTemporaryPath(destinationFile + PARTIAL_SUFFIX);
  const idle = new IdleTimeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  try {
    return await transfer(url, destinationFile, onProgress, options, idle);
  } finally {
    idle.clear();
    releasePart();
  }
};

async function transfer(
  url: string,
  destinationFile: string,
  onProgress: ProgressListener,
  options: DownloadOptions,
  idle: IdleTimeout
): Promise<Result<void, DownloadError>> {
  const log = getLogger().child('downloader');
  const partPath = destinationFile + PARTIAL_SUFFIX;
  const fetchFn = options.fetchFn ?? fetch;

  const fail = async (error: DownloadError): Promise<Result<void, DownloadError>> => {
    await removeQuietly(partPath);
    await removeQuietly(destinationFile);
    log.error('Download failed', { url, reason: error.reason, message: error.message });
    return err(error);
  };

  try {
    await mkdir(dirname(destinationFile), { recursive: true });
  } catch (cause) {
    return fail(DownloadError.write(cause));
  }

  log.info('Starting download', { url, destinationFile });

  let response: Response;
  idle.arm();
  try {
    response = await fetchFn(url, { redirect: 'follow', signal: idle.signal });
  } catch (cause) {
    return fail(DownloadError.networkUnavailable(cause));
  } finally {
    idle.clear();
  }

  if (!response.ok) {
    await cancelQuietly(() => response.body?.cancel());
    return fail(DownloadError.httpStatus(response.status, response.statusText));
  }
  if (!response.body) {
    return fail(DownloadError.networkUnavailable(new Error('Response body is empty')));
  }

  const contentLength = parseInt(response.headers.get('content-length') ?? '', 10);
  const total = contentLength > 0 ? contentLength : (options.expectedSize ?? 0);
  const progress = new DownloadProgress(total, onProgress);

  const reader = response.body.getReader();
  const source = new Readable({
    async read() {
      try {
        idle.arm();
        const { done, value } = await reader.read();
        idle.clear();
        if (done) {
          this.push(null);
          return;
        }
        progress.add(value.byteLength);
        this.push(Buffer.from(value));
      } catch (cause) {
        this.destroy(cause instanceof Error ? cause : new Error(String(cause)));
      }
    },
  });

  let writeFailed = false;
  const sink = createWriteStream(partPath);
  sink.once('error', () => {
    writeFailed = true;
  });

  try {
    await pipeline(source, sink);
  } catch (cause) {
    await cancelQuietly(() => reader.cancel());
    return fail(writeFailed ? DownloadError.write(cause) : DownloadError.networkUnavailable(cause));
  }

  if (total > 0 && contentLength > 0 && progress.bytesReceived !== total) {
    return fail(DownloadError.networkUnavailable(
      new Error(`Connection closed after ${progress.bytesReceived} of ${total} bytes`)
    ));
  }

  try {
    await rename(partPath, destinationFile);
  } catch (cause) {
    return fail(DownloadError.write(cause));
  }

  progress.finish();
  log.info('Download complete', { destinationFile, bytesReceived: progress.bytesReceived });
  return ok(undefined);
}

async function cancelQuietly(cancel: () => Promise<void> | undefined): Promise<void> {
  try {
    await cancel();
  } catch (cause) {
    getLogger().child('downloader').debug('Response body cancel failed', {
      error: cause instanceof Error ? cause.message : String(cause),
    });
  }
}

async function removeQuietly(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (cause) {
    getLogger().child('downloader').warn('Could not remove partial download', {
      path,
      error: cause instanceof Error ? cause.message : String(cause),
    });
  }
}
