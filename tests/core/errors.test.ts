/**
 * Error Taxonomy Unit Tests
 * Tests download and extract error reasons and user-facing messages
 */

import { describe, it, expect } from 'vitest';
import {
  DownloadError,
  ExtractError,
  InstallerError,
  describeError,
  errorCode,
} from '../../src/core/errors';

const withCode = (message: string, code: string) => Object.assign(new Error(message), { code });

describe('DownloadError', () => {
  it('should describe HTTP failures with the status', () => {
    const error = DownloadError.httpStatus(404, 'Not Found');

    expect(error).toBeInstanceOf(InstallerError);
    expect(error.reason).toBe('http-status');
    expect(error.category).toBe('http');
    expect(error.status).toBe(404);
    expect(error.message).toBe('Download failed: HTTP 404 Not Found');
  });

  it('should omit an empty status text', () => {
    expect(DownloadError.httpStatus(500).message).toBe('Download failed: HTTP 500');
  });

  it('should label network failures', () => {
    const error = DownloadError.networkUnavailable(withCode('connect ECONNREFUSED', 'ECONNREFUSED'));

    expect(error.reason).toBe('network-unavailable');
    expect(error.category).toBe('network');
    expect(error.message).toBe('Network unavailable: Connection refused');
  });

  it('should label write failures', () => {
    const error = DownloadError.write(withCode('no space', 'ENOSPC'));

    expect(error.reason).toBe('write');
    expect(error.category).toBe('filesystem');
    expect(error.message).toBe('Could not write download: Disk is full');
  });
});

describe('ExtractError.from', () => {
  it('should map a full disk', () => {
    expect(ExtractError.from(withCode('write failed', 'ENOSPC')).reason).toBe('disk-full');
  });

  it('should map permission errors', () => {
    const error = ExtractError.from(withCode('open failed', 'EACCES'));
    expect(error.reason).toBe('permission-denied');
    expect(error.message).toBe('Permission denied while extracting: Permission denied');
  });

  it('should treat anything else as a corrupt archive', () => {
    const error = ExtractError.from(new Error('Invalid END header'));
    expect(error.reason).toBe('corrupt-archive');
    expect(error.category).toBe('archive');
    expect(error.message).toBe('Archive is corrupt or incomplete: Invalid END header');
  });
});

describe('errorCode', () => {
  it('should read string codes only', () => {
    expect(errorCode(withCode('x', 'ENOENT'))).toBe('ENOENT');
    expect(errorCode({ code: 42 })).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});

describe('describeError', () => {
  it('should pass installer messages through', () => {
    expect(describeError(new InstallerError('config', 'Bad config'))).toBe('Bad config');
  });

  it('should use friendly labels for known codes', () => {
    expect(describeError(withCode('EBUSY: resource busy', 'EBUSY'))).toBe('File is in use by another program');
  });

  it('should look at the cause of wrapped errors', () => {
    const error = new Error('fetch failed', { cause: { code: 'ENOTFOUND' } });
    expect(describeError(error)).toBe('Host not found (check your internet connection)');
  });

  it('should report timeouts', () => {
    const error = new Error('The operation was aborted due to timeout');
    error.name = 'TimeoutError';
    expect(describeError(error)).toBe('Request timed out');
  });

  it('should prefix the name of non-generic errors', () => {
    expect(describeError(new TypeError('bad input'))).toBe('TypeError: bad input');
    expect(describeError(new Error('plain'))).toBe('plain');
  });

  it('should stringify non-errors', () => {
    expect(describeError('oops')).toBe('oops');
    expect(describeError(42)).toBe('42');
  });
});
