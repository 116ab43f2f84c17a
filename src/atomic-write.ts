/**
 * Atomic file replacement: write a temporary file beside the target,
 * flush it, then rename it over the target. The target is either the old
 * content or the new content, never a partial write.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';

export function atomicWriteFile(target: string, content: string): void {
  const tempPath = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.${crypto.randomBytes(6).toString('hex')}.tmp`
  );

  let fd: number | undefined;
  let renamed = false;

  try {
    fd = fs.openSync(tempPath, 'wx', 0o644);
    fs.writeFileSync(fd, content, 'utf-8');
    fs.fsyncSync(fd);
    fs.closeSync(fd);
    fd = undefined;

    fs.renameSync(tempPath, target);
    renamed = true;
  } finally {
    if (fd !== undefined) {
      fs.closeSync(fd);
    }
    if (!renamed) {
      fs.rmSync(tempPath, { force: true });
    }
  }
}
