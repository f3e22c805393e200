import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Creates a fresh directory under the OS temp dir. Pair with removeTempDir.
 */
export function makeTempDir(prefix = 'template-emitter-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { force: true, recursive: true });
}

/** Collects CLI output line by line. */
export function captureIo(cwd: string) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const written: string[] = [];
  return {
    io: {
      cwd,
      stderr: (text: string) => {
        stderr.push(text);
      },
      stdout: (text: string) => {
        stdout.push(text);
      },
      write: (text: string) => {
        written.push(text);
      },
    },
    stderr,
    stdout,
    written,
  };
}
