/**
 * Page Renderer
 *
 * Renders entity pages and supplementary documents into the content
 * directory of the staging tree. Each call performs exactly one write.
 */

import { readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { getBasename, safeWriteFile } from '@docbinder/utils';
import {
  UnsupportedFormatError,
  type DocumentedEntity,
  type ResolvedPackageConfig,
  type SupplementaryDocument,
} from '@docbinder/core';
import { ReferenceLinker } from './crossref.js';
import { EXTRA_EXTENSIONS, PAGE_EXTENSION } from './format.js';
import type { MarkupConverter } from './markdown.js';
import type { StagingTree } from './staging.js';
import { entityPageTemplate, extraPageTemplate } from './templates/page.js';

/**
 * Upper-cased file stem, e.g. `docs/readme.md` -> `README`
 */
export function extraTitle(path: string): string {
  return getBasename(path).toUpperCase();
}

export function isSupportedExtra(path: string): boolean {
  const extension = extname(path).toLowerCase();
  return EXTRA_EXTENSIONS.some((allowed) => allowed === extension);
}

export class PageRenderer {
  private readonly linker: ReferenceLinker;

  constructor(
    private readonly tree: StagingTree,
    private readonly config: ResolvedPackageConfig,
    entities: readonly DocumentedEntity[],
    private readonly converter: MarkupConverter
  ) {
    this.linker = new ReferenceLinker(entities, config.deps);
  }

  /**
   * Render an entity page and write it to OEBPS/<id>.xhtml
   */
  async writeEntityPage(entity: DocumentedEntity): Promise<string> {
    const fileName = `${entity.id}${PAGE_EXTENSION}`;
    const linked: DocumentedEntity = {
      ...entity,
      body: this.linker.linkHtml(entity.body, entity.id),
      members: (entity.members ?? []).map((member) => ({
        ...member,
        body: this.linker.linkHtml(member.body, entity.id),
      })),
    };

    await this.writePage(fileName, entityPageTemplate(this.config, linked));
    return fileName;
  }

  /**
   * Convert a Markdown file and write it to OEBPS/<STEM>.xhtml
   */
  async writeSupplementaryDocument(sourcePath: string): Promise<SupplementaryDocument> {
    if (!isSupportedExtra(sourcePath)) {
      throw new UnsupportedFormatError(sourcePath, 'file', EXTRA_EXTENSIONS);
    }

    const source = await readFile(sourcePath, 'utf8');
    const body = await this.converter.toXhtml(this.linker.linkMarkdown(source), sourcePath);

    const title = extraTitle(sourcePath);
    const fileName = `${title}${PAGE_EXTENSION}`;
    await this.writePage(fileName, extraPageTemplate(this.config, title, body));

    return { sourcePath, title, fileName, body };
  }

  private async writePage(fileName: string, content: string): Promise<void> {
    await safeWriteFile(join(this.tree.contentDir, fileName), content);
  }
}
