import { describe, it, expect } from 'vitest';
import { routesFromManifest } from '../src/manifest';
import { InvalidManifestError } from '../src/errors';
import type { RenderResult } from '../src/types';

async function render(): Promise<RenderResult> {
  return { body: 'page' };
}

describe('routesFromManifest', () => {
  it('builds route definitions from page modules', () => {
    const routes = routesFromManifest([
      { id: 'index', path: '/', module: { render } },
      {
        id: 'products/[id]',
        path: '/products/[id]',
        module: { render, revalidate: 60, fallback: 'strict', paths: [{ id: '1' }] },
      },
    ]);

    expect(routes).toHaveLength(2);
    expect(routes[0]).toMatchObject({ id: 'index', path: '/', render });
    expect(routes[0].revalidate).toBeUndefined();
    expect(routes[1]).toMatchObject({ revalidate: 60, fallback: 'strict', paths: [{ id: '1' }] });
  });

  it('keeps a null revalidation interval', () => {
    const [route] = routesFromManifest([{ id: 'about', path: '/about', module: { render, revalidate: null } }]);
    expect(route.revalidate).toBeNull();
  });

  it('requires a render function', () => {
    expect(() => routesFromManifest([{ id: 'about', path: '/about', module: { render: 'nope' } }])).toThrow(
      'Invalid manifest entry "about": page module must export a render function',
    );
  });

  it('rejects malformed exports', () => {
    const cases = [
      { revalidate: -1 },
      { revalidate: '60' },
      { fallback: 'lazy' },
      { paths: [{ id: 1 }] },
      { paths: { id: '1' } },
      { placeholder: { body: 'loading' } },
    ];

    for (const exports of cases) {
      expect(() => routesFromManifest([{ id: 'x', path: '/x', module: { render, ...exports } }])).toThrow(
        InvalidManifestError,
      );
    }
  });

  it('names the allowed fallback modes', () => {
    expect(() => routesFromManifest([{ id: 'x', path: '/x', module: { render, fallback: 'lazy' } }])).toThrow(
      '`fallback` must be one of strict, block, placeholder',
    );
  });

  it('accepts placeholder artifacts and functions', () => {
    const artifact = { body: 'loading', status: 200, headers: {} };
    const placeholder = () => artifact;

    const [fixed, dynamic] = routesFromManifest([
      { id: 'a', path: '/a', module: { render, placeholder: artifact } },
      { id: 'b', path: '/b', module: { render, placeholder } },
    ]);

    expect(fixed.placeholder).toBe(artifact);
    expect(dynamic.placeholder).toBe(placeholder);
  });
});
