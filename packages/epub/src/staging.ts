/**
 * Staging Tree
 *
 * Working directory that mirrors the archive layout. It is created fresh
 * at the start of a run and removed when the run ends.
 */

import { join, relative, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  copyFile,
  ensureDir,
  getExtension,
  listFiles,
  removePath,
  safeWriteFile,
  toPosixRelative,
} from '@docbinder/utils';
import { UnsupportedFormatError } from '@docbinder/core';
import {
  CONTENT_DIR,
  DIST_DIR,
  EPUB_MIMETYPE,
  LOGO_DIR,
  LOGO_EXTENSIONS,
  META_INF_DIR,
  MIMETYPE_FILE,
} from './format.js';

export const DEFAULT_ASSETS_DIR = fileURLToPath(new URL('../assets', import.meta.url));

export interface StagingTree {
  readonly root: string;
  readonly mimetypePath: string;
  readonly metaInfDir: string;
  readonly contentDir: string;
}

export function stagingTreeFor(outputDir: string): StagingTree {
  const root = resolve(outputDir);
  return {
    root,
    mimetypePath: join(root, MIMETYPE_FILE),
    metaInfDir: join(root, META_INF_DIR),
    contentDir: join(root, CONTENT_DIR),
  };
}

/**
 * Remove whatever is at the output path and create the content directory.
 * Destructive: the output path must not hold unrelated files.
 */
export async function createStagingTree(tree: StagingTree): Promise<void> {
  await removePath(tree.root);
  await ensureDir(tree.contentDir);
}

/**
 * Copy stylesheets/scripts into OEBPS/dist and container files into META-INF.
 * Returns the staged asset paths relative to the content directory.
 */
export async function copyStaticAssets(
  tree: StagingTree,
  assetsDir: string = DEFAULT_ASSETS_DIR
): Promise<string[]> {
  const distSource = join(assetsDir, DIST_DIR);
  const distFiles = (await listFiles(distSource))
    .filter((file) => ['css', 'js'].includes(getExtension(file)));

  const staged: string[] = [];
  for (const file of distFiles) {
    const destination = join(tree.contentDir, DIST_DIR, relative(distSource, file));
    await copyFile(file, destination);
    staged.push(toPosixRelative(tree.contentDir, destination));
  }

  const metaSource = join(assetsDir, META_INF_DIR);
  const metaFiles = (await listFiles(metaSource))
    .filter((file) => getExtension(file) === 'xml');

  for (const file of metaFiles) {
    await copyFile(file, join(tree.metaInfDir, relative(metaSource, file)));
  }

  return staged;
}

export async function writeMimetype(tree: StagingTree): Promise<void> {
  await safeWriteFile(tree.mimetypePath, EPUB_MIMETYPE);
}

/**
 * Copy the configured logo into OEBPS/assets.
 * Returns its path relative to the content directory.
 */
export async function stageLogo(tree: StagingTree, logoPath: string): Promise<string> {
  const extension = getExtension(logoPath);
  if (!LOGO_EXTENSIONS.some((allowed) => allowed === `.${extension}`)) {
    throw new UnsupportedFormatError(logoPath, 'image', LOGO_EXTENSIONS);
  }

  const staged = `${LOGO_DIR}/logo.${extension}`;
  await copyFile(resolve(logoPath), join(tree.contentDir, staged));
  return staged;
}

/**
 * Delete the staging entries, leaving the archive in place.
 * Every entry is attempted; the first failure is rethrown afterwards.
 */
export async function teardownStagingTree(tree: StagingTree): Promise<void> {
  const results = await Promise.allSettled(
    [tree.metaInfDir, tree.mimetypePath, tree.contentDir].map((target) => removePath(target))
  );
  const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (failure) {
    throw failure.reason;
  }
}
