/**
 * Structural Document Generator
 *
 * Writes the package document, the NCX, the navigation document and the
 * title page. Each is a single write at a fixed path.
 */

import { join } from 'node:path';
import { safeWriteFile } from '@docbinder/utils';
import type { PackageIdentity } from '@docbinder/core';
import type { StagingTree } from './staging.js';
import { titlePageTemplate } from './templates/page.js';
import {
  contentTemplate,
  navTemplate,
  tocTemplate,
  NAV_DOCUMENT,
  NCX_DOCUMENT,
  PACKAGE_DOCUMENT,
  TITLE_PAGE,
  type StructuralInput,
} from './templates/structural.js';

export async function writeStructuralDocuments(
  tree: StagingTree,
  input: StructuralInput,
  identity: PackageIdentity
): Promise<string[]> {
  const documents: Array<[string, string]> = [
    [PACKAGE_DOCUMENT, contentTemplate(input, identity)],
    [NCX_DOCUMENT, tocTemplate(input, identity)],
    [NAV_DOCUMENT, navTemplate(input)],
    [TITLE_PAGE, titlePageTemplate(input.config)],
  ];

  for (const [fileName, content] of documents) {
    await safeWriteFile(join(tree.contentDir, fileName), content);
  }

  return documents.map(([fileName]) => fileName);
}
