/**
 * EPUB Builder
 *
 * Runs the container assembly pipeline: staging tree, static assets,
 * supplementary documents, structural documents, entity pages, archive,
 * cleanup. Phases run strictly in sequence; renders inside a phase run on
 * a bounded worker pool.
 */

import {
  createRunLogger,
  formatDuration,
  mapConcurrent,
  type Logger,
} from '@docbinder/utils';
import {
  parseEntities,
  parsePackageConfig,
  type DocumentedEntity,
  type EntityKind,
  type PackageConfig,
  type PackageConfigInput,
  type PackageIdentity,
  type ResolvedPackageConfig,
} from '@docbinder/core';
import { packageArchive } from './archive.js';
import { createPackageIdentity } from './identity.js';
import { MarkedConverter, type MarkupConverter } from './markdown.js';
import { PageRenderer } from './renderer.js';
import {
  copyStaticAssets,
  createStagingTree,
  DEFAULT_ASSETS_DIR,
  stageLogo,
  stagingTreeFor,
  teardownStagingTree,
  writeMimetype,
  type StagingTree,
} from './staging.js';
import { writeStructuralDocuments } from './structural.js';

export interface EpubBuilderOptions {
  converter?: MarkupConverter;
  assetsDir?: string;
  identity?: () => PackageIdentity;
  logger?: Logger;
}

export interface PartitionedEntities {
  modules: DocumentedEntity[];
  exceptions: DocumentedEntity[];
  protocols: DocumentedEntity[];
}

/**
 * Split entities by kind, keeping input order inside each kind
 */
export function partitionEntities(entities: readonly DocumentedEntity[]): PartitionedEntities {
  const byKind = (kind: EntityKind) => entities.filter((entity) => entity.kind === kind);
  return {
    modules: byKind('module'),
    exceptions: byKind('exception'),
    protocols: byKind('protocol'),
  };
}

export class EpubBuilder {
  private readonly converter: MarkupConverter;
  private readonly assetsDir: string;
  private readonly identity: () => PackageIdentity;
  private readonly baseLogger?: Logger;

  constructor(options: EpubBuilderOptions = {}) {
    this.converter = options.converter ?? new MarkedConverter();
    this.assetsDir = options.assetsDir ?? DEFAULT_ASSETS_DIR;
    this.identity = options.identity ?? (() => createPackageIdentity());
    this.baseLogger = options.logger;
  }

  /**
   * Build the EPUB and return the absolute path of the archive
   */
  async build(
    entities: readonly DocumentedEntity[],
    input: PackageConfigInput
  ): Promise<string> {
    const config = parsePackageConfig(input);
    // Ids become file names below OEBPS/
    const validated = parseEntities(entities);
    const tree = stagingTreeFor(config.output);
    const log = createRunLogger(config, this.baseLogger);
    const startedAt = Date.now();

    try {
      const archivePath = await this.assemble(tree, validated, config, log);
      log.info(
        { archive: archivePath, entities: validated.length, duration: formatDuration(Date.now() - startedAt) },
        'EPUB generated'
      );
      return archivePath;
    } finally {
      await this.cleanup(tree, log);
    }
  }

  private async assemble(
    tree: StagingTree,
    entities: readonly DocumentedEntity[],
    config: PackageConfig,
    log: Logger
  ): Promise<string> {
    log.debug({ output: tree.root }, 'Creating staging tree');
    await createStagingTree(tree);
    const assets = await copyStaticAssets(tree, this.assetsDir);

    const { modules, exceptions, protocols } = partitionEntities(entities);
    const resolved = await this.resolveConfig(tree, config);

    await writeMimetype(tree);

    const renderer = new PageRenderer(tree, resolved, entities, this.converter);

    log.debug({ count: config.extras.length }, 'Rendering supplementary documents');
    const extras = await mapConcurrent(
      config.extras,
      config.concurrency,
      (path) => renderer.writeSupplementaryDocument(path)
    );

    const identity = this.identity();
    const nodes = [...modules, ...exceptions, ...protocols];

    log.debug({ uuid: identity.uuid }, 'Writing structural documents');
    await writeStructuralDocuments(tree, { config: resolved, nodes, extras, assets }, identity);

    log.debug({ count: nodes.length }, 'Rendering entity pages');
    await mapConcurrent(nodes, config.concurrency, (entity) => renderer.writeEntityPage(entity));

    return packageArchive(tree, { project: config.project, version: config.version, log });
  }

  /**
   * Derive the immutable per-run configuration, staging the logo if set
   */
  private async resolveConfig(tree: StagingTree, config: PackageConfig): Promise<ResolvedPackageConfig> {
    const base: ResolvedPackageConfig = { ...config, outputDir: tree.root };
    if (!config.logo) {
      return Object.freeze(base);
    }
    const logoFile = await stageLogo(tree, config.logo);
    return Object.freeze({ ...base, logoFile });
  }

  private async cleanup(tree: StagingTree, log: Logger): Promise<void> {
    try {
      await teardownStagingTree(tree);
    } catch (error) {
      log.warn({ err: error, output: tree.root }, 'Failed to remove staging tree');
    }
  }
}

/**
 * Build an EPUB with the default converter and assets
 */
export function buildEpub(
  entities: readonly DocumentedEntity[],
  config: PackageConfigInput,
  options?: EpubBuilderOptions
): Promise<string> {
  return new EpubBuilder(options).build(entities, config);
}
