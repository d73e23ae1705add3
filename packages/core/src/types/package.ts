/**
 * Package Configuration Types
 */

import { z } from 'zod';

export const DEFAULT_CONCURRENCY = 16;

export const packageConfigSchema = z.object({
  output: z.string().min(1),
  project: z.string().min(1),
  version: z.string().min(1),
  logo: z.string().min(1).optional(),
  extras: z.array(z.string().min(1)).default([]),
  // dependency name -> documentation base URL
  deps: z.record(z.string()).default({}),
  language: z.string().min(1).default('en'),
  concurrency: z.number().int().min(1).default(DEFAULT_CONCURRENCY),
});

/** Configuration as supplied by the caller */
export type PackageConfigInput = z.input<typeof packageConfigSchema>;

/** Configuration after defaults have been applied */
export type PackageConfig = z.infer<typeof packageConfigSchema>;

/**
 * Configuration derived once per run, before any rendering.
 * `logoFile` is relative to the content directory.
 */
export interface ResolvedPackageConfig extends Readonly<Omit<PackageConfig, 'extras' | 'deps'>> {
  readonly extras: readonly string[];
  readonly deps: Readonly<Record<string, string>>;
  readonly outputDir: string;
  readonly logoFile?: string;
}

export interface PackageIdentity {
  /** `urn:uuid:` followed by a version 4 UUID */
  readonly uuid: string;
  /** UTC, `YYYY-MM-DDTHH:MM:SSZ` */
  readonly timestamp: string;
}
