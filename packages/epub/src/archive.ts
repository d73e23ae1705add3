/**
 * Archive Packager
 *
 * Serializes the staging tree into the .epub file. `mimetype` is always
 * the first entry and is stored without compression.
 */

import { join } from 'node:path';
import JSZip from 'jszip';
import { logger, safeWriteFile, type Logger } from '@docbinder/utils';
import { PackagingError } from '@docbinder/core';
import { MIMETYPE_FILE, shouldCompress } from './format.js';
import { collectArchiveEntries, type ArchiveEntry } from './manifest.js';
import type { StagingTree } from './staging.js';

export function archiveFileName(project: string, version: string): string {
  return `${project}-v${version}.epub`;
}

/**
 * Build the zip payload for a list of entries
 */
export async function createArchive(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  const zip = new JSZip();
  const ordered = [
    ...entries.filter((entry) => entry.path === MIMETYPE_FILE),
    ...entries.filter((entry) => entry.path !== MIMETYPE_FILE),
  ];

  for (const entry of ordered) {
    zip.file(entry.path, entry.content, {
      binary: true,
      createFolders: false,
      compression: shouldCompress(entry.path) ? 'DEFLATE' : 'STORE',
    });
  }

  return zip.generateAsync({
    type: 'nodebuffer',
    compression: 'STORE',
    compressionOptions: { level: 9 },
  });
}

export interface PackageArchiveOptions {
  project: string;
  version: string;
  log?: Logger;
}

/**
 * Write `<project>-v<version>.epub` into the staging root.
 * Returns the absolute archive path.
 */
export async function packageArchive(
  tree: StagingTree,
  options: PackageArchiveOptions
): Promise<string> {
  const log = options.log ?? logger;
  const target = join(tree.root, archiveFileName(options.project, options.version));

  const entries = await collectArchiveEntries(tree, log);
  log.debug({ entries: entries.length, target }, 'Packaging archive');

  try {
    await safeWriteFile(target, await createArchive(entries));
  } catch (error) {
    throw new PackagingError(target, error);
  }

  return target;
}
