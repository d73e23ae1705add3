import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { DocumentedEntity, ResolvedPackageConfig } from '@docbinder/core';
import { closeVoidElements, MarkedConverter } from './markdown.js';
import { extraTitle, isSupportedExtra, PageRenderer } from './renderer.js';
import { createStagingTree, stagingTreeFor, type StagingTree } from './staging.js';

const entities: DocumentedEntity[] = [
  {
    id: 'Queue',
    title: 'Queue',
    kind: 'module',
    summary: 'FIFO queue',
    body: '<p>Backed by <code>QueueEmpty</code> errors.</p>',
    members: [
      { id: 'push/2', kind: 'function', signature: 'push(queue, item)', body: '<p>Adds an item.</p>' },
      { id: 't:t/0', kind: 'type', signature: 't()', body: '' },
    ],
  },
  { id: 'QueueEmpty', title: 'QueueEmpty', kind: 'exception', body: '<p>Raised on pop.</p>' },
];

function entity(id: string): DocumentedEntity {
  const found = entities.find((candidate) => candidate.id === id);
  if (!found) {
    throw new Error(`fixture ${id} missing`);
  }
  return found;
}

describe('PageRenderer', () => {
  let root: string;
  let tree: StagingTree;
  let renderer: PageRenderer;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'docbinder-render-'));
    tree = stagingTreeFor(root);
    await createStagingTree(tree);

    const config: ResolvedPackageConfig = {
      output: root,
      outputDir: root,
      project: 'queues',
      version: '0.3.0',
      extras: [],
      deps: {},
      language: 'en',
      concurrency: 2,
    };
    renderer = new PageRenderer(tree, config, entities, new MarkedConverter());
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes one page per entity named by its identifier', async () => {
    const fileName = await renderer.writeEntityPage(entity('QueueEmpty'));

    expect(fileName).toBe('QueueEmpty.xhtml');
    expect(await readdir(tree.contentDir)).toEqual(['QueueEmpty.xhtml']);
    const page = await readFile(join(tree.contentDir, fileName), 'utf8');
    expect(page).toContain('<small>exception</small>');
    expect(page).toContain('<title>QueueEmpty - queues v0.3.0</title>');
  });

  it('renders members and links sibling entities', async () => {
    await renderer.writeEntityPage(entity('Queue'));

    const page = await readFile(join(tree.contentDir, 'Queue.xhtml'), 'utf8');
    expect(page).toContain('<p class="summary">FIFO queue</p>');
    expect(page).toContain('<p>Backed by <a href="QueueEmpty.xhtml"><code>QueueEmpty</code></a> errors.</p>');
    expect(page).toContain('<li><a href="#push/2"><code>push(queue, item)</code></a></li>');
    expect(page).toContain('<div class="detail" id="push/2">');
    expect(page.indexOf('<h1 class="section-heading">Types</h1>'))
      .toBeLessThan(page.indexOf('<h1 class="section-heading">Functions</h1>'));
    expect(page).not.toContain('<small>');
  });

  it('writes supplementary documents under the upper-cased stem', async () => {
    const source = join(root, 'changelog.md');
    await writeFile(source, '## v0.3.0\n\nFixed `Queue`.\n');

    const doc = await renderer.writeSupplementaryDocument(source);

    expect(doc).toMatchObject({ sourcePath: source, title: 'CHANGELOG', fileName: 'CHANGELOG.xhtml' });
    const page = await readFile(join(tree.contentDir, 'CHANGELOG.xhtml'), 'utf8');
    expect(page).toContain('<h2>v0.3.0</h2>');
    expect(page).toContain('<p>Fixed <a href="Queue.xhtml"><code>Queue</code></a>.</p>');
  });

  it('rejects other extensions without writing', async () => {
    const source = join(root, 'notes.rst');
    await writeFile(source, 'Notes\n=====\n');

    await expect(renderer.writeSupplementaryDocument(source)).rejects.toThrow(
      `file format not recognized for ${source}, allowed format is: .md`
    );
    expect(await readdir(tree.contentDir)).toEqual([]);
  });
});

describe('supplementary document naming', () => {
  it('upper-cases the stem', () => {
    expect(extraTitle('docs/getting-started.md')).toBe('GETTING-STARTED');
  });

  it('accepts only markdown', () => {
    expect(isSupportedExtra('README.md')).toBe(true);
    expect(isSupportedExtra('README.MD')).toBe(true);
    expect(isSupportedExtra('README.markdown')).toBe(false);
    expect(isSupportedExtra('README')).toBe(false);
  });
});

describe('closeVoidElements', () => {
  it('self-closes void elements', () => {
    expect(closeVoidElements('<p>a<br>b</p><hr><img src="x.png" alt="x">')).toBe(
      '<p>a<br />b</p><hr /><img src="x.png" alt="x" />'
    );
  });

  it('leaves already closed elements unchanged', () => {
    expect(closeVoidElements('<br />')).toBe('<br />');
  });
});
