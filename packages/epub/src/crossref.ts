/**
 * Entity Reference Linking
 *
 * Links whole-entity references to the sibling page of that entity.
 * References to dependencies resolve against `config.deps`, keyed by the
 * first dotted segment of the reference. Anything else is left alone.
 */

import type { DocumentedEntity } from '@docbinder/core';
import { PAGE_EXTENSION } from './format.js';

const MARKDOWN_REFERENCE = /(\[)?`([A-Za-z0-9_.\-]+)`/g;
const HTML_REFERENCE = /<code>([A-Za-z0-9_.\-]+)<\/code>/g;
const ANCHOR_SPAN = /(<a\b[^>]*>[\s\S]*?<\/a>)/i;
const FENCED_BLOCK = /(^```[^\n]*\n[\s\S]*?^```[ \t]*$)/m;

export class ReferenceLinker {
  private readonly ids: ReadonlySet<string>;
  private readonly deps: ReadonlyMap<string, string>;

  constructor(
    entities: readonly DocumentedEntity[],
    deps: Readonly<Record<string, string>> = {}
  ) {
    this.ids = new Set(entities.map((entity) => entity.id));
    // own keys only
    this.deps = new Map(Object.entries(deps));
  }

  /**
   * Target for a reference, or null when it names nothing known
   */
  resolve(reference: string, currentId?: string): string | null {
    if (reference === currentId) {
      return null;
    }
    if (this.ids.has(reference)) {
      return `${reference}${PAGE_EXTENSION}`;
    }

    const [prefix] = reference.split('.');
    const base = prefix ? this.deps.get(prefix) : undefined;
    if (base) {
      return `${base.replace(/\/+$/, '')}/${reference}.html`;
    }
    return null;
  }

  /**
   * `Foo` -> [`Foo`](Foo.xhtml), outside fenced code blocks and existing links
   */
  linkMarkdown(source: string): string {
    return source
      .split(FENCED_BLOCK)
      .map((part, index) => {
        // odd indexes are the captured fenced blocks
        if (index % 2 === 1) {
          return part;
        }
        return part.replace(MARKDOWN_REFERENCE, (match, bracket: string | undefined, name: string) => {
          if (bracket) {
            return match;
          }
          const target = this.resolve(name);
          return target ? `[\`${name}\`](${target})` : match;
        });
      })
      .join('');
  }

  /**
   * <code>Foo</code> -> <a href="Foo.xhtml"><code>Foo</code></a>
   */
  linkHtml(html: string, currentId?: string): string {
    return html
      .split(ANCHOR_SPAN)
      .map((part, index) => {
        // odd indexes are existing anchors, links must not nest
        if (index % 2 === 1) {
          return part;
        }
        return part.replace(HTML_REFERENCE, (match, name: string) => {
          const target = this.resolve(name, currentId);
          return target ? `<a href="${target}"><code>${name}</code></a>` : match;
        });
      })
      .join('');
  }
}
