/**
 * Manifest Builder
 *
 * Collects the files of a populated staging tree as archive entries.
 *
 * Enumeration is best effort: a file that disappears or cannot be read
 * between listing and reading is left out of the archive and logged at
 * debug level. Listing failures still propagate.
 */

import { readFile } from 'node:fs/promises';
import { listFiles, logger, toPosixRelative, type Logger } from '@docbinder/utils';
import type { StagingTree } from './staging.js';

export interface ArchiveEntry {
  /** Relative to the staging root, forward slashes */
  path: string;
  content: Buffer;
}

export async function collectArchiveEntries(
  tree: StagingTree,
  log: Logger = logger
): Promise<ArchiveEntry[]> {
  const files = [
    tree.mimetypePath,
    ...await listFiles(tree.metaInfDir),
    ...await listFiles(tree.contentDir),
  ];

  const entries: ArchiveEntry[] = [];
  for (const file of files) {
    const path = toPosixRelative(tree.root, file);
    try {
      entries.push({ path, content: await readFile(file) });
    } catch (error) {
      log.debug({ path, err: error }, 'Skipping unreadable staging file');
    }
  }

  return entries;
}
