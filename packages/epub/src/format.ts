/**
 * EPUB container constants
 */

import { getExtension } from '@docbinder/utils';

export const EPUB_MIMETYPE = 'application/epub+zip';

export const MIMETYPE_FILE = 'mimetype';
export const META_INF_DIR = 'META-INF';
export const CONTENT_DIR = 'OEBPS';

// Below CONTENT_DIR
export const DIST_DIR = 'dist';
export const LOGO_DIR = 'assets';
export const STYLESHEET = `${DIST_DIR}/epub.css`;
export const PAGE_EXTENSION = '.xhtml';

export const EXTRA_EXTENSIONS = ['.md'] as const;
export const LOGO_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.svg'] as const;

/** Entries with these extensions are deflated; everything else is stored */
export const COMPRESSED_EXTENSIONS: ReadonlySet<string> = new Set([
  'css', 'js', 'xhtml', 'html', 'ncx', 'opf', 'jpg', 'jpeg', 'png', 'svg', 'xml',
]);

const MEDIA_TYPES: Readonly<Record<string, string>> = {
  xhtml: 'application/xhtml+xml',
  html: 'application/xhtml+xml',
  ncx: 'application/x-dtbncx+xml',
  opf: 'application/oebps-package+xml',
  css: 'text/css',
  js: 'application/javascript',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  svg: 'image/svg+xml',
  xml: 'application/xml',
};

export function mediaTypeFor(path: string): string {
  return MEDIA_TYPES[getExtension(path)] ?? 'application/octet-stream';
}

export function shouldCompress(entryPath: string): boolean {
  return entryPath !== MIMETYPE_FILE && COMPRESSED_EXTENSIONS.has(getExtension(entryPath));
}
