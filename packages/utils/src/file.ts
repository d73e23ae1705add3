/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  writeFile,
  readFile,
  readdir,
  rm,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { dirname, join } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  if (typeof content === 'string') {
    await writeFile(filePath, content, 'utf8');
  } else {
    await writeFile(filePath, content);
  }
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Copy a file to a new location
 */
export async function copyFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);
}

/**
 * Remove a file or directory tree. Missing paths are not an error.
 */
export async function removePath(target: string): Promise<void> {
  await rm(target, { recursive: true, force: true });
}

/**
 * Recursively list regular files below a directory.
 * Returns absolute paths; a missing directory yields an empty list.
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...await listFiles(fullPath));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
