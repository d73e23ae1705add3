/**
 * Markdown Conversion
 */

import { Marked } from 'marked';

export interface MarkupConverter {
  /**
   * Convert lightweight markup into an XHTML fragment.
   * `file` is only used for diagnostics.
   */
  toXhtml(source: string, file: string): Promise<string>;
}

const VOID_ELEMENT = /<(br|hr|img|input|col|wbr|source)\b([^>]*?)\s*\/?>/g;

/**
 * HTML void elements must be self-closed inside XHTML documents
 */
export function closeVoidElements(html: string): string {
  return html.replace(VOID_ELEMENT, (_match, tag: string, attributes: string) => `<${tag}${attributes} />`);
}

export class MarkedConverter implements MarkupConverter {
  private readonly marked = new Marked({ gfm: true });

  async toXhtml(source: string, _file: string): Promise<string> {
    const html = await this.marked.parse(source);
    return closeVoidElements(html).trim();
  }
}
