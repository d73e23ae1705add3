/**
 * Build Command
 *
 * Package extracted documentation entities into an EPUB file.
 */

import ora from 'ora';
import { buildEpub } from '@docbinder/epub';
import { DocBinderError, ValidationError, type PackageConfigInput } from '@docbinder/core';
import { config } from '../config/index.js';
import { loadEntitiesFile, type EntitiesFile } from '../lib/entities.js';
import { printError, printJson, printKeyValue, printSuccess } from '../lib/output.js';

export interface BuildOptions {
  output?: string;
  project?: string;
  version?: string;
  logo?: string;
  extra?: string[];
  language?: string;
  concurrency?: string;
  json?: boolean;
}

/**
 * Merge command-line flags, the entities file and environment defaults.
 * Flags win over the file, the file wins over the environment.
 */
export function resolveBuildConfig(
  options: BuildOptions,
  file: Pick<EntitiesFile, 'project' | 'version'>,
  defaults: { output: string; concurrency: number } = config
): PackageConfigInput {
  const project = options.project ?? file.project;
  const version = options.version ?? file.version;
  if (!project) {
    throw new ValidationError('project', 'pass --project or set "project" in the entities file');
  }
  if (!version) {
    throw new ValidationError('version', 'pass --version or set "version" in the entities file');
  }

  let concurrency = defaults.concurrency;
  if (options.concurrency !== undefined) {
    concurrency = Number(options.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError('concurrency', `expected a positive integer, got "${options.concurrency}"`);
    }
  }

  return {
    output: options.output ?? defaults.output,
    project,
    version,
    logo: options.logo,
    extras: options.extra ?? [],
    language: options.language,
    concurrency,
  };
}

export async function buildCommand(
  entitiesPath: string,
  options: BuildOptions
): Promise<void> {
  const spinner = options.json ? null : ora('Building EPUB...').start();

  try {
    const file = await loadEntitiesFile(entitiesPath);
    const packageConfig = resolveBuildConfig(options, file);
    const archive = await buildEpub(file.entities, packageConfig);

    spinner?.stop();
    if (options.json) {
      printJson({ archive, entities: file.entities.length });
      return;
    }

    printSuccess(`EPUB written to ${archive}`);
    printKeyValue('Entities', file.entities.length);
    printKeyValue('Extras', packageConfig.extras?.length ?? 0);
  } catch (error) {
    spinner?.stop();
    if (error instanceof DocBinderError) {
      printError(`${error.code}: ${error.message}`);
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    if (config.debug && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  }
}
