import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import JSZip from 'jszip';
import { UnsupportedFormatError, ValidationError, type DocumentedEntity } from '@docbinder/core';
import { buildEpub, EpubBuilder, partitionEntities } from './builder.js';

const fixedIdentity = () => ({
  uuid: 'urn:uuid:11111111-2222-4333-8444-555555555555',
  timestamp: '2024-05-06T07:08:09Z',
});

async function archiveEntries(archive: string): Promise<string[]> {
  const zip = await JSZip.loadAsync(await readFile(archive));
  return Object.keys(zip.files);
}

async function archiveText(archive: string, path: string): Promise<string> {
  const zip = await JSZip.loadAsync(await readFile(archive));
  const file = zip.file(path);
  if (!file) {
    throw new Error(`missing ${path}`);
  }
  return file.async('string');
}

describe('EpubBuilder', () => {
  let output: string;
  let sources: string;

  beforeEach(async () => {
    output = await mkdtemp(join(tmpdir(), 'docbinder-out-'));
    sources = await mkdtemp(join(tmpdir(), 'docbinder-src-'));
  });

  afterEach(async () => {
    await rm(output, { recursive: true, force: true });
    await rm(sources, { recursive: true, force: true });
  });

  it('packages a single module into a conformant archive', async () => {
    const archive = await buildEpub(
      [{ id: 'foo', title: 'foo', kind: 'module', body: '<p>Foo docs</p>' }],
      { output, project: 'demo', version: '1.0.0' }
    );

    expect(archive).toBe(join(output, 'demo-v1.0.0.epub'));
    expect((await archiveEntries(archive)).sort()).toEqual([
      'META-INF/com.apple.ibooks.display-options.xml',
      'META-INF/container.xml',
      'OEBPS/content.opf',
      'OEBPS/dist/epub.css',
      'OEBPS/foo.xhtml',
      'OEBPS/nav.xhtml',
      'OEBPS/title.xhtml',
      'OEBPS/toc.ncx',
      'mimetype',
    ]);

    const buffer = await readFile(archive);
    expect(buffer.toString('utf8', 30, 38)).toBe('mimetype');
    expect(buffer.readUInt16LE(8)).toBe(0);
    expect(await archiveText(archive, 'mimetype')).toBe('application/epub+zip');
    expect(await archiveText(archive, 'OEBPS/foo.xhtml')).toContain('<p>Foo docs</p>');
  });

  it('removes the staging tree after a successful run', async () => {
    await buildEpub([], { output, project: 'demo', version: '1.0.0' });

    expect(await readdir(output)).toEqual(['demo-v1.0.0.epub']);
  });

  it('clears whatever was in the output directory before', async () => {
    await writeFile(join(output, 'leftover.txt'), 'old');

    await buildEpub([], { output, project: 'demo', version: '1.0.0' });

    expect(await readdir(output)).toEqual(['demo-v1.0.0.epub']);
  });

  it('orders the reading order modules, exceptions, protocols', async () => {
    const entities: DocumentedEntity[] = [
      { id: 'Printable', title: 'Printable', kind: 'protocol', body: '' },
      { id: 'BadInput', title: 'BadInput', kind: 'exception', body: '' },
      { id: 'Zeta', title: 'Zeta', kind: 'module', body: '' },
      { id: 'Alpha', title: 'Alpha', kind: 'module', body: '' },
    ];

    const archive = await new EpubBuilder({ identity: fixedIdentity })
      .build(entities, { output, project: 'demo', version: '1.0.0' });

    const opf = await archiveText(archive, 'OEBPS/content.opf');
    const spine = [...opf.matchAll(/<itemref idref="([^"]+)" \/>/g)].map((match) => match[1]);
    expect(spine).toEqual(['title', 'page-Zeta', 'page-Alpha', 'page-BadInput', 'page-Printable']);
    expect(opf).toContain('urn:uuid:11111111-2222-4333-8444-555555555555');
    expect(opf).toContain('<meta property="dcterms:modified">2024-05-06T07:08:09Z</meta>');

    const ncx = await archiveText(archive, 'OEBPS/toc.ncx');
    expect(ncx).toContain('<meta name="dtb:uid" content="urn:uuid:11111111-2222-4333-8444-555555555555" />');
  });

  it('renders supplementary markdown with links to entity pages', async () => {
    const readme = join(sources, 'readme.md');
    await writeFile(readme, '# Hello\n\nSee `foo`.\n');

    const archive = await buildEpub(
      [{ id: 'foo', title: 'foo', kind: 'module', body: '' }],
      { output, project: 'demo', version: '1.0.0', extras: [readme] }
    );

    const page = await archiveText(archive, 'OEBPS/README.xhtml');
    expect(page).toContain('<title>README - demo v1.0.0</title>');
    expect(page).toContain('<h1>Hello</h1>');
    expect(page).toContain('<p>See <a href="foo.xhtml"><code>foo</code></a>.</p>');

    const nav = await archiveText(archive, 'OEBPS/nav.xhtml');
    expect(nav).toContain('<li><a href="README.xhtml">README</a></li>');
  });

  it('rejects a supplementary document that is not markdown and leaves nothing behind', async () => {
    const notes = join(sources, 'notes.txt');
    await writeFile(notes, 'plain text');

    const run = buildEpub([], { output, project: 'demo', version: '1.0.0', extras: [notes] });

    await expect(run).rejects.toBeInstanceOf(UnsupportedFormatError);
    await expect(run).rejects.toThrow(notes);
    expect(await readdir(output)).toEqual([]);
  });

  it('cleans up when the markup converter fails', async () => {
    const guide = join(sources, 'guide.md');
    await writeFile(guide, '# Guide\n');
    const builder = new EpubBuilder({
      converter: { toXhtml: async () => { throw new Error('conversion failed'); } },
    });

    await expect(builder.build([], { output, project: 'demo', version: '1.0.0', extras: [guide] }))
      .rejects.toThrow('conversion failed');
    expect(await readdir(output)).toEqual([]);
  });

  it('stages the logo as cover image', async () => {
    const logo = join(sources, 'brand.png');
    await writeFile(logo, Buffer.from([0x89, 0x50, 0x4e, 0x47]));

    const archive = await buildEpub([], { output, project: 'demo', version: '1.0.0', logo });

    expect(await archiveEntries(archive)).toContain('OEBPS/assets/logo.png');
    expect(await archiveText(archive, 'OEBPS/title.xhtml')).toContain('<img src="assets/logo.png" alt="demo logo" />');
    expect(await archiveText(archive, 'OEBPS/content.opf')).toContain('properties="cover-image"');
  });

  it('rejects a logo with an unsupported extension', async () => {
    const logo = join(sources, 'brand.gif');
    await writeFile(logo, 'GIF89a');

    await expect(buildEpub([], { output, project: 'demo', version: '1.0.0', logo }))
      .rejects.toThrow(`image format not recognized for ${logo}`);
    expect(await readdir(output)).toEqual([]);
  });

  it('rejects entity ids that would escape the content directory', async () => {
    const run = buildEpub(
      [{ id: '../leak', title: 'leak', kind: 'module', body: '' }],
      { output, project: 'demo', version: '1.0.0' }
    );

    await expect(run).rejects.toBeInstanceOf(ValidationError);
    await expect(run).rejects.toThrow('Validation failed for entities.0.id');
    expect(await readdir(output)).toEqual([]);
  });

  it('produces the same file set on repeated runs', async () => {
    const entities: DocumentedEntity[] = [
      { id: 'foo', title: 'foo', kind: 'module', body: '' },
      { id: 'FooError', title: 'FooError', kind: 'exception', body: '' },
    ];
    const config = { output, project: 'demo', version: '1.0.0' };

    const first = (await archiveEntries(await buildEpub(entities, config))).sort();
    const second = (await archiveEntries(await buildEpub(entities, config))).sort();

    expect(second).toEqual(first);
  });
});

describe('partitionEntities', () => {
  it('keeps input order within each kind', () => {
    const entities: DocumentedEntity[] = [
      { id: 'B', title: 'B', kind: 'module', body: '' },
      { id: 'E', title: 'E', kind: 'exception', body: '' },
      { id: 'A', title: 'A', kind: 'module', body: '' },
    ];

    const { modules, exceptions, protocols } = partitionEntities(entities);

    expect(modules.map((entity) => entity.id)).toEqual(['B', 'A']);
    expect(exceptions.map((entity) => entity.id)).toEqual(['E']);
    expect(protocols).toEqual([]);
  });
});
