/**
 * Input Validation
 *
 * Turns zod failures into ValidationError so callers only deal with the
 * docbinder error hierarchy.
 */

import type { z } from 'zod';
import { ValidationError } from './errors/index.js';
import { documentedEntityListSchema, type DocumentedEntity } from './types/entity.js';
import { packageConfigSchema, type PackageConfig } from './types/package.js';

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, field: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${field}.${issue.path.join('.')}` : field;
    throw new ValidationError(path, issue?.message ?? 'invalid value');
  }
  return result.data;
}

export function parsePackageConfig(value: unknown): PackageConfig {
  return parseWith(packageConfigSchema, value, 'config');
}

export function parseEntities(value: unknown): DocumentedEntity[] {
  return parseWith(documentedEntityListSchema, value, 'entities');
}
