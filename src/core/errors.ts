/**
 * Installer Error Taxonomy
 * Typed errors for download, extraction and filesystem failures,
 * plus user-facing message classification.
 */

// ---------------------------------------------------------------------------
// Base Error
// ---------------------------------------------------------------------------

export type ErrorCategory = 'network' | 'http' | 'archive' | 'filesystem' | 'config';

export class InstallerError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InstallerError';
    this.category = category;
  }
}

// ---------------------------------------------------------------------------
// Download Errors
// ---------------------------------------------------------------------------

export type DownloadErrorReason = 'network-unavailable' | 'http-status' | 'write';

export class DownloadError extends InstallerError {
  readonly reason: DownloadErrorReason;
  readonly status?: number;

  private constructor(
    reason: DownloadErrorReason,
    message: string,
    options: { cause?: unknown; status?: number } = {}
  ) {
    super(categoryForDownload(reason), message, { cause: options.cause });
    this.name = 'DownloadError';
    this.reason = reason;
    this.status = options.status;
  }

  static networkUnavailable(cause: unknown): DownloadError {
    return new DownloadError('network-unavailable', `Network unavailable: ${describeError(cause)}`, { cause });
  }

  static httpStatus(status: number, statusText = ''): DownloadError {
    const suffix = statusText ? ` ${statusText}` : '';
    return new DownloadError('http-status', `Download failed: HTTP ${status}${suffix}`, { status });
  }

  static write(cause: unknown): DownloadError {
    return new DownloadError('write', `Could not write download: ${describeError(cause)}`, { cause });
  }
}

function categoryForDownload(reason: DownloadErrorReason): ErrorCategory {
  switch (reason) {
    case 'network-unavailable': return 'network';
    case 'http-status': return 'http';
    case 'write': return 'filesystem';
  }
}

// ---------------------------------------------------------------------------
// Extract Errors
// ---------------------------------------------------------------------------

export type ExtractErrorReason = 'corrupt-archive' | 'disk-full' | 'permission-denied';

export class ExtractError extends InstallerError {
  readonly reason: ExtractErrorReason;

  constructor(reason: ExtractErrorReason, message: string, options?: { cause?: unknown }) {
    super(reason === 'corrupt-archive' ? 'archive' : 'filesystem', message, options);
    this.name = 'ExtractError';
    this.reason = reason;
  }

  /** Maps a raw extraction failure onto one of the three reasons. */
  static from(cause: unknown): ExtractError {
    const code = errorCode(cause);
    if (code === 'ENOSPC' || code === 'EDQUOT') {
      return new ExtractError('disk-full', 'Not enough disk space to extract the archive', { cause });
    }
    if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') {
      return new ExtractError('permission-denied', `Permission denied while extracting: ${describeError(cause)}`, { cause });
    }
    return new ExtractError('corrupt-archive', `Archive is corrupt or incomplete: ${describeError(cause)}`, { cause });
  }
}

// ---------------------------------------------------------------------------
// Error Inspection
// ---------------------------------------------------------------------------

export function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) return undefined;
  const code = value.code;
  return typeof code === 'string' ? code : undefined;
}

const FRIENDLY_CODES: Record<string, string> = {
  ENOENT: 'File or directory not found',
  EACCES: 'Permission denied',
  EPERM: 'Operation not permitted',
  EBUSY: 'File is in use by another program',
  ENOSPC: 'Disk is full',
  ENOTDIR: 'Path is not a directory',
  ENAMETOOLONG: 'Path is too long',
  ECONNREFUSED: 'Connection refused',
  ECONNRESET: 'Connection reset',
  ENOTFOUND: 'Host not found (check your internet connection)',
  EAI_AGAIN: 'DNS lookup failed (check your internet connection)',
  ETIMEDOUT: 'Connection timed out',
};

/**
 * Render any thrown value as a single user-facing line.
 * Known errno codes get a friendly label, including on the error's cause.
 */
export function describeError(value: unknown): string {
  if (value instanceof InstallerError) return value.message;

  const code = errorCode(value) ?? (value instanceof Error ? errorCode(value.cause) : undefined);
  const friendly = code ? FRIENDLY_CODES[code] : undefined;
  if (friendly) return friendly;

  if (value instanceof Error) {
    if (value.name === 'TimeoutError' || value.name === 'AbortError') return 'Request timed out';
    const name = value.name !== 'Error' ? `${value.name}: ` : '';
    return `${name}${value.message}`;
  }
  return String(value);
}
