/**
 * Page Templates
 *
 * XHTML documents for entity pages, supplementary documents and the
 * title page. All of them share the same outer layout.
 */

import type {
  DocumentedEntity,
  EntityKind,
  EntityMember,
  MemberKind,
  ResolvedPackageConfig,
} from '@docbinder/core';
import { STYLESHEET } from '../format.js';
import { escapeXml, XML_DECLARATION } from './xml.js';

const KIND_LABELS: Record<EntityKind, string | null> = {
  module: null,
  exception: 'exception',
  protocol: 'protocol',
};

const MEMBER_SECTIONS: ReadonlyArray<{ kind: MemberKind; heading: string; id: string }> = [
  { kind: 'type', heading: 'Types', id: 'types' },
  { kind: 'callback', heading: 'Callbacks', id: 'callbacks' },
  { kind: 'function', heading: 'Functions', id: 'functions' },
  { kind: 'macro', heading: 'Macros', id: 'macros' },
];

/**
 * Outer XHTML layout shared by every content page
 */
export function pageTemplate(
  config: ResolvedPackageConfig,
  title: string,
  content: string
): string {
  const lang = escapeXml(config.language);

  let xhtml = XML_DECLARATION;
  xhtml += '<!DOCTYPE html>\n';
  xhtml += `<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" xml:lang="${lang}" lang="${lang}">\n`;
  xhtml += '  <head>\n';
  xhtml += '    <meta charset="utf-8" />\n';
  xhtml += `    <title>${escapeXml(title)} - ${escapeXml(config.project)} v${escapeXml(config.version)}</title>\n`;
  xhtml += '    <meta name="generator" content="docbinder" />\n';
  xhtml += `    <link type="text/css" rel="stylesheet" href="${STYLESHEET}" />\n`;
  xhtml += '  </head>\n';
  xhtml += '  <body class="content-inner">\n';
  xhtml += content;
  xhtml += '  </body>\n';
  xhtml += '</html>\n';
  return xhtml;
}

export function entityPageTemplate(
  config: ResolvedPackageConfig,
  entity: DocumentedEntity
): string {
  const label = KIND_LABELS[entity.kind];
  const members = entity.members ?? [];

  let content = '    <h1 id="content">\n';
  content += `      ${escapeXml(entity.title)}\n`;
  if (label) {
    content += `      <small>${label}</small>\n`;
  }
  content += '    </h1>\n';

  if (entity.summary) {
    content += `    <p class="summary">${escapeXml(entity.summary)}</p>\n`;
  }

  if (entity.body) {
    content += `    <section id="moduledoc" class="docstring">\n${entity.body}\n    </section>\n`;
  }

  if (members.length > 0) {
    content += summaryTemplate(members);
    for (const section of MEMBER_SECTIONS) {
      const group = members.filter((member) => member.kind === section.kind);
      if (group.length > 0) {
        content += detailsTemplate(section.id, section.heading, group);
      }
    }
  }

  return pageTemplate(config, entity.title, content);
}

function summaryTemplate(members: readonly EntityMember[]): string {
  let html = '    <section id="summary" class="details-list">\n';
  html += '      <h1 class="section-heading">Summary</h1>\n';

  for (const section of MEMBER_SECTIONS) {
    const group = members.filter((member) => member.kind === section.kind);
    if (group.length === 0) {
      continue;
    }
    html += `      <h2>${section.heading}</h2>\n`;
    html += '      <ul>\n';
    for (const member of group) {
      html += `        <li><a href="#${escapeXml(member.id)}"><code>${escapeXml(member.signature)}</code></a></li>\n`;
    }
    html += '      </ul>\n';
  }

  html += '    </section>\n';
  return html;
}

function detailsTemplate(id: string, heading: string, members: readonly EntityMember[]): string {
  let html = `    <section id="${id}" class="details-list">\n`;
  html += `      <h1 class="section-heading">${heading}</h1>\n`;

  for (const member of members) {
    html += `      <div class="detail" id="${escapeXml(member.id)}">\n`;
    html += '        <div class="detail-header">\n';
    html += `          <code class="signature">${escapeXml(member.signature)}</code>\n`;
    html += '        </div>\n';
    if (member.body) {
      html += `        <section class="docstring">\n${member.body}\n        </section>\n`;
    }
    html += '      </div>\n';
  }

  html += '    </section>\n';
  return html;
}

/**
 * Page for a converted supplementary document
 */
export function extraPageTemplate(
  config: ResolvedPackageConfig,
  title: string,
  html: string
): string {
  return pageTemplate(config, title, `${html}\n`);
}

export function titlePageTemplate(config: ResolvedPackageConfig): string {
  let content = '    <div class="title-page">\n';
  if (config.logoFile) {
    content += `      <img src="${escapeXml(config.logoFile)}" alt="${escapeXml(config.project)} logo" />\n`;
  }
  content += `      <h1>${escapeXml(config.project)}</h1>\n`;
  content += `      <h2>v${escapeXml(config.version)}</h2>\n`;
  content += '    </div>\n';

  return pageTemplate(config, config.project, content);
}
