/**
 * Structural Document Templates
 *
 * Package document (content.opf), legacy NCX table of contents and the
 * EPUB 3 navigation document.
 */

import { ENTITY_KINDS } from '@docbinder/core';
import type {
  DocumentedEntity,
  EntityKind,
  PackageIdentity,
  ResolvedPackageConfig,
  SupplementaryDocument,
} from '@docbinder/core';
import { mediaTypeFor, PAGE_EXTENSION, STYLESHEET } from '../format.js';
import { escapeXml, toXmlId, XML_DECLARATION } from './xml.js';

export const TITLE_PAGE = 'title.xhtml';
export const NAV_DOCUMENT = 'nav.xhtml';
export const NCX_DOCUMENT = 'toc.ncx';
export const PACKAGE_DOCUMENT = 'content.opf';

export interface StructuralInput {
  config: ResolvedPackageConfig;
  /** modules, then exceptions, then protocols */
  nodes: readonly DocumentedEntity[];
  extras: readonly SupplementaryDocument[];
  /** Static assets relative to the content directory */
  assets: readonly string[];
}

interface NavLink {
  id: string;
  title: string;
  href: string;
}

interface NavSection {
  title: string;
  links: NavLink[];
}

const SECTION_TITLES: Record<EntityKind, string> = {
  module: 'Modules',
  exception: 'Exceptions',
  protocol: 'Protocols',
};

function entityLink(entity: DocumentedEntity): NavLink {
  return {
    id: toXmlId('page', entity.id),
    title: entity.title,
    href: `${entity.id}${PAGE_EXTENSION}`,
  };
}

function extraLink(extra: SupplementaryDocument): NavLink {
  return {
    id: toXmlId('extra', extra.title),
    title: extra.title,
    href: extra.fileName,
  };
}

/**
 * Reading order after the title page
 */
function readingOrder(input: StructuralInput): NavLink[] {
  return [...input.extras.map(extraLink), ...input.nodes.map(entityLink)];
}

function navSections(input: StructuralInput): NavSection[] {
  const sections: NavSection[] = [
    { title: 'Pages', links: input.extras.map(extraLink) },
  ];
  for (const kind of ENTITY_KINDS) {
    sections.push({
      title: SECTION_TITLES[kind],
      links: input.nodes.filter((node) => node.kind === kind).map(entityLink),
    });
  }
  return sections.filter((section) => section.links.length > 0);
}

function bookTitle(config: ResolvedPackageConfig): string {
  return `${config.project} v${config.version}`;
}

export function contentTemplate(input: StructuralInput, identity: PackageIdentity): string {
  const { config } = input;
  const pages = readingOrder(input);

  let opf = XML_DECLARATION;
  opf += `<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="project-id" xml:lang="${escapeXml(config.language)}">\n`;
  opf += '  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">\n';
  opf += `    <dc:identifier id="project-id">${escapeXml(identity.uuid)}</dc:identifier>\n`;
  opf += `    <dc:title>${escapeXml(bookTitle(config))}</dc:title>\n`;
  opf += `    <dc:language>${escapeXml(config.language)}</dc:language>\n`;
  opf += `    <meta property="dcterms:modified">${identity.timestamp}</meta>\n`;
  if (config.logoFile) {
    opf += '    <meta name="cover" content="cover-image" />\n';
  }
  opf += '  </metadata>\n';

  opf += '  <manifest>\n';
  opf += `    <item id="nav" href="${NAV_DOCUMENT}" media-type="application/xhtml+xml" properties="nav" />\n`;
  opf += `    <item id="ncx" href="${NCX_DOCUMENT}" media-type="application/x-dtbncx+xml" />\n`;
  opf += `    <item id="title" href="${TITLE_PAGE}" media-type="application/xhtml+xml" />\n`;
  for (const page of pages) {
    opf += `    <item id="${page.id}" href="${escapeXml(page.href)}" media-type="application/xhtml+xml" />\n`;
  }
  input.assets.forEach((asset, index) => {
    opf += `    <item id="asset-${index + 1}" href="${escapeXml(asset)}" media-type="${mediaTypeFor(asset)}" />\n`;
  });
  if (config.logoFile) {
    opf += `    <item id="cover-image" href="${escapeXml(config.logoFile)}" media-type="${mediaTypeFor(config.logoFile)}" properties="cover-image" />\n`;
  }
  opf += '  </manifest>\n';

  opf += '  <spine toc="ncx">\n';
  opf += '    <itemref idref="title" />\n';
  for (const page of pages) {
    opf += `    <itemref idref="${page.id}" />\n`;
  }
  opf += '  </spine>\n';
  opf += '</package>\n';
  return opf;
}

export function tocTemplate(input: StructuralInput, identity: PackageIdentity): string {
  const { config } = input;
  let playOrder = 1;

  let ncx = XML_DECLARATION;
  ncx += `<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1" xml:lang="${escapeXml(config.language)}">\n`;
  ncx += '  <head>\n';
  ncx += `    <meta name="dtb:uid" content="${escapeXml(identity.uuid)}" />\n`;
  ncx += '    <meta name="dtb:depth" content="2" />\n';
  ncx += '    <meta name="dtb:totalPageCount" content="0" />\n';
  ncx += '    <meta name="dtb:maxPageNumber" content="0" />\n';
  ncx += '  </head>\n';
  ncx += `  <docTitle><text>${escapeXml(bookTitle(config))}</text></docTitle>\n`;
  ncx += '  <navMap>\n';
  ncx += navPoint('navpoint-title', playOrder++, config.project, TITLE_PAGE, '    ', '');

  for (const section of navSections(input)) {
    const first = section.links[0];
    if (!first) {
      continue;
    }
    // The section points at its first page and shares its play order
    const sectionOrder = playOrder;
    let children = '';
    for (const link of section.links) {
      children += navPoint(`navpoint-${link.id}`, playOrder++, link.title, link.href, '      ', '');
    }
    const sectionId = toXmlId('navpoint-section', section.title.toLowerCase());
    ncx += navPoint(sectionId, sectionOrder, section.title, first.href, '    ', children);
  }

  ncx += '  </navMap>\n';
  ncx += '</ncx>\n';
  return ncx;
}

function navPoint(
  id: string,
  playOrder: number,
  label: string,
  src: string,
  indent: string,
  children: string
): string {
  let xml = `${indent}<navPoint id="${id}" playOrder="${playOrder}">\n`;
  xml += `${indent}  <navLabel><text>${escapeXml(label)}</text></navLabel>\n`;
  xml += `${indent}  <content src="${escapeXml(src)}" />\n`;
  xml += children;
  xml += `${indent}</navPoint>\n`;
  return xml;
}

export function navTemplate(input: StructuralInput): string {
  const { config } = input;
  const lang = escapeXml(config.language);

  let xhtml = XML_DECLARATION;
  xhtml += '<!DOCTYPE html>\n';
  xhtml += `<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" xml:lang="${lang}" lang="${lang}">\n`;
  xhtml += '  <head>\n';
  xhtml += '    <meta charset="utf-8" />\n';
  xhtml += `    <title>Table of contents - ${escapeXml(bookTitle(config))}</title>\n`;
  xhtml += `    <link type="text/css" rel="stylesheet" href="${STYLESHEET}" />\n`;
  xhtml += '  </head>\n';
  xhtml += '  <body class="content-inner">\n';
  xhtml += '    <nav epub:type="toc" id="toc">\n';
  xhtml += '      <h1>Table of contents</h1>\n';
  xhtml += '      <ol>\n';
  xhtml += `        <li><a href="${TITLE_PAGE}">${escapeXml(config.project)}</a></li>\n`;

  for (const section of navSections(input)) {
    xhtml += '        <li>\n';
    xhtml += `          <span>${section.title}</span>\n`;
    xhtml += '          <ol>\n';
    for (const link of section.links) {
      xhtml += `            <li><a href="${escapeXml(link.href)}">${escapeXml(link.title)}</a></li>\n`;
    }
    xhtml += '          </ol>\n';
    xhtml += '        </li>\n';
  }

  xhtml += '      </ol>\n';
  xhtml += '    </nav>\n';
  xhtml += '  </body>\n';
  xhtml += '</html>\n';
  return xhtml;
}
