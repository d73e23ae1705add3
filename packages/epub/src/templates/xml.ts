/**
 * Markup helpers shared by the templates
 */

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Turn an arbitrary name into a value usable as an XML id
 */
export function toXmlId(prefix: string, name: string): string {
  return `${prefix}-${name.replace(/[^A-Za-z0-9_.-]/g, '_')}`;
}

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';
