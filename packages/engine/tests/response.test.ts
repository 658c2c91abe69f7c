import { describe, it, expect } from 'vitest';
import { toResponse } from '../src/response';
import { resolveConfig } from '../src/config';
import { compilePattern } from '../src/pattern';
import { GenerationError, GenerationTimeoutError } from '../src/errors';
import type { EngineOutcome, RouteMatch } from '../src/types';

const match: RouteMatch = {
  route: compilePattern({ id: 'home', segments: [], fallback: 'block' }),
  params: {},
  path: '/',
};

const TEXT = { 'content-type': 'text/plain; charset=utf-8' };

function artifactOutcome(status: 'HIT' | 'STALE' | 'MISS' | 'PLACEHOLDER', head: boolean = false): EngineOutcome {
  return {
    type: 'artifact',
    artifact: { body: '<p>hi</p>', status: 200, headers: { 'content-type': 'text/html' } },
    status,
    match,
    head,
  };
}

describe('toResponse', () => {
  const config = resolveConfig();

  it('adds the cache status header to artifacts', () => {
    expect(toResponse(artifactOutcome('STALE'), config)).toEqual({
      status: 200,
      headers: { 'content-type': 'text/html', 'x-stalewise-cache': 'STALE' },
      body: '<p>hi</p>',
    });
  });

  it('uses the configured header name', () => {
    const custom = resolveConfig({ headers: { cacheStatus: 'x-cache' } });
    expect(toResponse(artifactOutcome('PLACEHOLDER'), custom).headers['x-cache']).toBe('PLACEHOLDER');
  });

  it('does not share headers with the cached artifact', () => {
    const outcome = artifactOutcome('HIT');
    toResponse(outcome, config);
    if (outcome.type === 'artifact') {
      expect(outcome.artifact.headers).toEqual({ 'content-type': 'text/html' });
    }
  });

  it('drops the body for HEAD requests', () => {
    const response = toResponse(artifactOutcome('HIT', true), config);
    expect(response.body).toBe('');
    expect(response.status).toBe(200);
  });

  it('maps failures to stable status codes', () => {
    expect(toResponse({ type: 'not-found', path: '/x' }, config)).toEqual({
      status: 404,
      headers: TEXT,
      body: 'Not Found',
    });
    expect(toResponse({ type: 'method-not-allowed', method: 'PUT' }, config)).toEqual({
      status: 405,
      headers: { ...TEXT, allow: 'GET, HEAD' },
      body: 'Method Not Allowed',
    });
    expect(
      toResponse({ type: 'generation-error', error: new GenerationError('k', new Error('boom')) }, config).status,
    ).toBe(500);
    expect(
      toResponse({ type: 'generation-timeout', error: new GenerationTimeoutError('k', 100) }, config),
    ).toEqual({ status: 504, headers: TEXT, body: 'Gateway Timeout' });
  });
});
