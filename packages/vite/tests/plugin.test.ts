import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { MalformedPatternError } from '@stalewise/engine';
import stalewise, { VIRTUAL_MODULE_ID, fileToRoutePath, generateRoutesModule, isWatchedPage, scanPages } from '../src/index';

describe('scanPages', () => {
  let root: string;

  function touch(file: string): void {
    const full = join(root, file);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, 'export async function render() { return { body: "" }; }\n');
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'stalewise-pages-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('lists page files as sorted relative paths', () => {
    touch('index.tsx');
    touch('blog/[...slug].tsx');
    touch('about.ts');

    expect(scanPages(root)).toEqual(['about.ts', 'blog/[...slug].tsx', 'index.tsx']);
  });

  it('skips private files, declarations and other assets', () => {
    touch('index.tsx');
    touch('_layout.tsx');
    touch('_partials/header.tsx');
    touch('types.d.ts');
    touch('styles.css');

    expect(scanPages(root)).toEqual(['index.tsx']);
  });
});

describe('fileToRoutePath', () => {
  it('maps page files to route paths', () => {
    expect(fileToRoutePath('index.tsx')).toBe('/');
    expect(fileToRoutePath('about.ts')).toBe('/about');
    expect(fileToRoutePath('docs/index.js')).toBe('/docs');
    expect(fileToRoutePath('products/[id].tsx')).toBe('/products/[id]');
    expect(fileToRoutePath('blog/[...slug].jsx')).toBe('/blog/[...slug]');
    expect(fileToRoutePath('docs/[[...slug]].tsx')).toBe('/docs/[[...slug]]');
  });

  it('rejects malformed file names', () => {
    expect(() => fileToRoutePath('products/[id.tsx')).toThrow(MalformedPatternError);
  });
});

describe('generateRoutesModule', () => {
  it('imports every page and exports manifest entries', () => {
    expect(generateRoutesModule('src/pages', ['about.ts', 'index.tsx'])).toBe(
      [
        'import * as page0 from "/src/pages/about.ts";',
        'import * as page1 from "/src/pages/index.tsx";',
        '',
        'export default [',
        '  { id: "/about", path: "/about", module: page0 },',
        '  { id: "/", path: "/", module: page1 },',
        '];',
        '',
      ].join('\n'),
    );
  });

  it('exports an empty list without pages', () => {
    expect(generateRoutesModule('src/pages', [])).toBe('export default [];');
  });

  it('rejects two files for the same route', () => {
    expect(() => generateRoutesModule('src/pages', ['docs.tsx', 'docs/index.tsx'])).toThrow(
      '[stalewise] "docs.tsx" and "docs/index.tsx" both define /docs',
    );
  });
});

describe('isWatchedPage', () => {
  const pagesPath = join('/project', 'src', 'pages');

  it('accepts page files inside the pages directory', () => {
    expect(isWatchedPage(pagesPath, join(pagesPath, 'about.tsx'))).toBe(true);
    expect(isWatchedPage(pagesPath, join(pagesPath, 'blog', '[slug].ts'))).toBe(true);
  });

  it('ignores sibling directories that share the prefix', () => {
    expect(isWatchedPage(pagesPath, join('/project', 'src', 'pages-old', 'about.tsx'))).toBe(false);
  });

  it('ignores files the scan skips', () => {
    expect(isWatchedPage(pagesPath, join(pagesPath, '_layout.tsx'))).toBe(false);
    expect(isWatchedPage(pagesPath, join(pagesPath, '_partials', 'header.tsx'))).toBe(false);
    expect(isWatchedPage(pagesPath, join(pagesPath, 'styles.css'))).toBe(false);
  });
});

describe('stalewise plugin', () => {
  it('is named and exposes the virtual module id', () => {
    expect(stalewise().name).toBe('stalewise');
    expect(VIRTUAL_MODULE_ID).toBe('virtual:stalewise-routes');
  });
});
