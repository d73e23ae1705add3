/**
 * @docbinder/epub
 *
 * EPUB container assembly.
 *
 * Responsibilities:
 * - Build and tear down the staging tree
 * - Render entity pages and supplementary documents
 * - Generate the package document, NCX, navigation and title page
 * - Package everything into a conformant .epub archive
 */

export {
  EpubBuilder,
  buildEpub,
  partitionEntities,
  type EpubBuilderOptions,
  type PartitionedEntities,
} from './builder.js';

export { createPackageIdentity, generateUuid4, type RandomSource } from './identity.js';

export { PageRenderer, extraTitle, isSupportedExtra } from './renderer.js';

export { writeStructuralDocuments } from './structural.js';

export { collectArchiveEntries, type ArchiveEntry } from './manifest.js';

export { archiveFileName, createArchive, packageArchive, type PackageArchiveOptions } from './archive.js';

export { MarkedConverter, closeVoidElements, type MarkupConverter } from './markdown.js';

export { ReferenceLinker } from './crossref.js';

export {
  DEFAULT_ASSETS_DIR,
  stagingTreeFor,
  createStagingTree,
  copyStaticAssets,
  writeMimetype,
  stageLogo,
  teardownStagingTree,
  type StagingTree,
} from './staging.js';

export {
  EPUB_MIMETYPE,
  MIMETYPE_FILE,
  META_INF_DIR,
  CONTENT_DIR,
  COMPRESSED_EXTENSIONS,
  mediaTypeFor,
  shouldCompress,
} from './format.js';
