/**
 * Zip extraction into a directory under the download root
 *
 * Every entry name is checked before anything is written, so an archive with
 * one escaping entry leaves the target directory untouched.
 */

import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { Readable } from 'stream';
import * as yauzl from 'yauzl';
import type { Entry, ZipFile } from 'yauzl';
import { sanitizeDownloadPath } from '@kaggle-tools/core';
import { writeDownload } from './download.js';
import { ArchiveError } from './errors.js';

export interface ExtractArchiveResult {
  /** Written files, relative to the target directory, in archive order */
  files: string[];
  /** Entries kept because the file already existed */
  skipped: string[];
  sizeBytes: number;
}

interface PlannedEntry {
  entry: Entry;
  name: string;
  destination: string;
  directory: boolean;
}

const UTF8_FLAG = 0x800;

function openZip(archivePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    // Names stay raw so that every one goes through sanitizeDownloadPath
    yauzl.open(archivePath, { lazyEntries: true, autoClose: false, decodeStrings: false }, (err, zipfile) => {
      if (err) return reject(err);
      if (!zipfile) return reject(new Error(`Could not open archive ${archivePath}`));
      resolve(zipfile);
    });
  });
}

function readEntries(zipfile: ZipFile): Promise<Entry[]> {
  return new Promise((resolve, reject) => {
    const entries: Entry[] = [];
    zipfile.on('entry', (entry: Entry) => {
      entries.push(entry);
      zipfile.readEntry();
    });
    zipfile.once('end', () => resolve(entries));
    zipfile.once('error', reject);
    zipfile.readEntry();
  });
}

function openEntry(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err) return reject(err);
      if (!stream) return reject(new Error('Could not read archive entry'));
      resolve(stream);
    });
  });
}

function entryName(entry: Entry): string {
  const raw: unknown = entry.fileName;
  if (!Buffer.isBuffer(raw)) return String(raw);
  // Without the UTF-8 flag names are CP437; Latin-1 agrees with it on ASCII
  return raw.toString((entry.generalPurposeBitFlag & UTF8_FLAG) !== 0 ? 'utf8' : 'latin1');
}

async function planEntries(entries: Entry[], targetDir: string): Promise<PlannedEntry[]> {
  const planned: PlannedEntry[] = [];
  for (const entry of entries) {
    const raw = entryName(entry);
    const directory = /[\\/]$/.test(raw);
    const destination = await sanitizeDownloadPath(targetDir, raw);
    if (!destination.ok) {
      throw new ArchiveError(raw, destination.error.message);
    }
    const name = path.relative(targetDir, destination.value).split(path.sep).join('/');
    planned.push({ entry, name, destination: destination.value, directory });
  }
  return planned;
}

/**
 * Extract the zip at `archivePath` into `targetDir`.
 *
 * Existing files are kept unless `force` is set.
 */
export async function extractArchive(
  archivePath: string,
  targetDir: string,
  options: { force?: boolean } = {}
): Promise<ExtractArchiveResult> {
  const zipfile = await openZip(archivePath);
  try {
    const planned = await planEntries(await readEntries(zipfile), path.resolve(targetDir));
    const result: ExtractArchiveResult = { files: [], skipped: [], sizeBytes: 0 };

    for (const item of planned) {
      if (item.directory) {
        await fs.mkdir(item.destination, { recursive: true });
        continue;
      }
      const written = await writeDownload(await openEntry(zipfile, item.entry), item.destination, {
        force: options.force,
      });
      if (written) {
        result.files.push(item.name);
        result.sizeBytes += written.sizeBytes;
      } else {
        result.skipped.push(item.name);
      }
    }
    return result;
  } finally {
    zipfile.close();
  }
}

/**
 * Stream a zip into `targetDir`, extract it there and remove the archive
 */
export async function writeArchive(
  source: Readable | AsyncIterable<Uint8Array>,
  targetDir: string,
  options: { force?: boolean } = {}
): Promise<ExtractArchiveResult> {
  const archivePath = path.join(targetDir, `.archive.${randomUUID()}.zip`);
  try {
    await writeDownload(source, archivePath, { force: true });
    return await extractArchive(archivePath, targetDir, options);
  } finally {
    await fs.rm(archivePath, { force: true });
  }
}
