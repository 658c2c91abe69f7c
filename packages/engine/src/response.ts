import type { EngineOutcome, EngineResponse, StalewiseConfig } from './types';

const TEXT = { 'content-type': 'text/plain; charset=utf-8' };

/**
 * Translate an engine outcome into status, headers and body. The status codes are
 * stable: 404 for a path that doesn't exist, 500 and 504 for a page that can't be
 * generated right now.
 */
export function toResponse(outcome: EngineOutcome, config: Pick<StalewiseConfig, 'headers'>): EngineResponse {
  switch (outcome.type) {
    case 'artifact': {
      const headers = { ...outcome.artifact.headers };
      if (config.headers.expose) {
        headers[config.headers.cacheStatus] = outcome.status;
      }
      return {
        status: outcome.artifact.status,
        headers,
        body: outcome.head ? '' : outcome.artifact.body,
      };
    }
    case 'not-found':
      return { status: 404, headers: { ...TEXT }, body: 'Not Found' };
    case 'method-not-allowed':
      return { status: 405, headers: { ...TEXT, allow: 'GET, HEAD' }, body: 'Method Not Allowed' };
    case 'generation-error':
      return { status: 500, headers: { ...TEXT }, body: 'Internal Server Error' };
    case 'generation-timeout':
      return { status: 504, headers: { ...TEXT }, body: 'Gateway Timeout' };
    default: {
      const unknownOutcome: never = outcome;
      throw new Error(`Unknown outcome: ${JSON.stringify(unknownOutcome)}`);
    }
  }
}
