import fs from 'fs';
import path from 'path';

import lockfile from 'proper-lockfile';

import { EmitIoError, LockError, errnoOf, messageOf } from './errors.js';
import { type Logger, silentLogger } from './logger.js';

export interface EmitOptions {
  /** Hold `<target>.lock` while writing. */
  lock?: boolean;
  logger?: Logger;
}

export interface EmitResult {
  /** Absolute path of the written file */
  path: string;
  /** UTF-8 byte length of the content */
  bytes: number;
}

function toIoError(targetPath: string, error: unknown): EmitIoError {
  const errno = errnoOf(error);
  return new EmitIoError(`Could not write ${targetPath}: ${messageOf(error)}`, targetPath, errno);
}

function writeContent(targetPath: string, content: string): number {
  // The parent directory is never created; a missing one fails with ENOENT.
  let fd: number | undefined;
  try {
    fd = fs.openSync(targetPath, 'w');
    const buffer = Buffer.from(content, 'utf-8');
    let offset = 0;
    while (offset < buffer.length) {
      offset += fs.writeSync(fd, buffer, offset, buffer.length - offset);
    }
    return buffer.length;
  } finally {
    if (fd !== undefined) {
      fs.closeSync(fd);
    }
  }
}

function withLockSync<T>(filePath: string, fn: () => T): T {
  let release: (() => void) | undefined;
  try {
    try {
      // realpath: false, the target may not exist yet.
      release = lockfile.lockSync(filePath, { realpath: false, stale: 20000 });
    } catch (error: unknown) {
      if (errnoOf(error) === 'ELOCKED') {
        throw new LockError(
          `Could not acquire lock for ${path.basename(filePath)}: ${messageOf(error)}`,
          filePath,
        );
      }
      throw error;
    }
    return fn();
  } finally {
    if (release) {
      release();
    }
  }
}

/**
 * Writes `content` to `targetPath` verbatim as UTF-8, replacing any existing file.
 *
 * Throws EmitIoError when the path is not writable and LockError when `lock`
 * is set and another writer holds the target.
 */
export function emitTemplate(content: string, targetPath: string, options: EmitOptions = {}): EmitResult {
  const logger = options.logger ?? silentLogger;
  const absolutePath = path.resolve(targetPath);

  try {
    const write = () => writeContent(absolutePath, content);
    const bytes = options.lock ? withLockSync(absolutePath, write) : write();
    logger.debug({ bytes, path: absolutePath }, 'Template written');
    return { bytes, path: absolutePath };
  } catch (error: unknown) {
    const failure = error instanceof LockError ? error : toIoError(absolutePath, error);
    logger.error({ code: failure.code, path: absolutePath }, failure.message);
    throw failure;
  }
}
