/**
 * Entities File Loader
 *
 * Accepts either a bare JSON array of entities or an object of the form
 * `{ project?, version?, entities }`.
 */

import { z } from 'zod';
import { safeReadFile } from '@docbinder/utils';
import { parseEntities, ValidationError, type DocumentedEntity } from '@docbinder/core';

const entitiesFileSchema = z.union([
  z.array(z.unknown()),
  z.object({
    project: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
    entities: z.array(z.unknown()),
  }),
]);

export interface EntitiesFile {
  project?: string;
  version?: string;
  entities: DocumentedEntity[];
}

export function parseEntitiesFile(content: string, path: string): EntitiesFile {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(path, error instanceof Error ? error.message : 'invalid JSON');
  }

  const parsed = entitiesFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(path, 'expected an array of entities or an object with an "entities" array');
  }

  if (Array.isArray(parsed.data)) {
    return { entities: parseEntities(parsed.data) };
  }

  const { project, version, entities } = parsed.data;
  return { project, version, entities: parseEntities(entities) };
}

export async function loadEntitiesFile(path: string): Promise<EntitiesFile> {
  const content = await safeReadFile(path);
  if (content === null) {
    throw new ValidationError(path, 'file not found');
  }
  return parseEntitiesFile(content, path);
}
