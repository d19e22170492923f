/**
 * Scoped writes of downloaded content
 *
 * Content is streamed into a temp file beside the destination and renamed into
 * place only after the transfer completed. A failed transfer never leaves a
 * partial file at the destination.
 */

import { randomUUID } from 'crypto';
import { createWriteStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';

export interface WriteDownloadResult {
  path: string;
  sizeBytes: number;
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Move the temp file onto the destination
 * @returns false if the destination appeared meanwhile and `overwrite` is off
 */
async function commitFile(tempPath: string, targetPath: string, overwrite: boolean): Promise<boolean> {
  if (overwrite) {
    await fs.rename(tempPath, targetPath);
    return true;
  }
  try {
    // link() fails with EEXIST instead of replacing the target
    await fs.link(tempPath, targetPath);
    return true;
  } catch (err: unknown) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'EEXIST') {
      return false;
    }
    throw err;
  }
}

async function removeFile(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}

/**
 * Stream `source` to `destination`.
 *
 * An existing destination is replaced only when `force` is set; otherwise
 * the write is skipped and `undefined` is returned.
 */
export async function writeDownload(
  source: Readable | AsyncIterable<Uint8Array>,
  destination: string,
  options: { force?: boolean } = {}
): Promise<WriteDownloadResult | undefined> {
  const force = options.force ?? false;
  try {
    await fs.mkdir(path.dirname(destination), { recursive: true });
  } catch (err: unknown) {
    // Nothing will read the body; release the connection behind it
    if (source instanceof Readable) source.destroy();
    throw err;
  }

  const tempPath = path.join(path.dirname(destination), `.${path.basename(destination)}.${randomUUID()}.part`);
  try {
    // pipeline() closes the file and destroys the source on any failure
    await pipeline(source, createWriteStream(tempPath, { flags: 'wx' }));
    const { size } = await fs.stat(tempPath);
    const committed = await commitFile(tempPath, destination, force);
    return committed ? { path: destination, sizeBytes: size } : undefined;
  } finally {
    // After link() the temp name is still present; after rename() it is gone
    await removeFile(tempPath);
  }
}
