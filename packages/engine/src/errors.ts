export type StalewiseErrorCode =
  | 'MALFORMED_PATTERN'
  | 'DUPLICATE_ROUTE'
  | 'NOT_FOUND'
  | 'GENERATION_ERROR'
  | 'GENERATION_TIMEOUT'
  | 'INVALID_MANIFEST';

export class StalewiseError extends Error {
  readonly code: StalewiseErrorCode;

  constructor(code: StalewiseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StalewiseError';
    this.code = code;
  }
}

/**
 * A route definition breaks the segment rules. Fatal at build time.
 */
export class MalformedPatternError extends StalewiseError {
  readonly route: string;

  constructor(route: string, reason: string) {
    super('MALFORMED_PATTERN', `Malformed route "${route}": ${reason}`);
    this.name = 'MalformedPatternError';
    this.route = route;
  }
}

/**
 * Two route definitions have the same shape or the same id. Fatal at build time.
 */
export class DuplicateRouteError extends StalewiseError {
  readonly routes: [string, string];

  constructor(first: string, second: string, reason: string) {
    super('DUPLICATE_ROUTE', `Routes "${first}" and "${second}" ${reason}`);
    this.name = 'DuplicateRouteError';
    this.routes = [first, second];
  }
}

export class NotFoundError extends StalewiseError {
  readonly path: string;

  constructor(path: string) {
    super('NOT_FOUND', `No route for "${path}"`);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

/**
 * The render function threw, rejected or returned something that isn't a render result.
 */
export class GenerationError extends StalewiseError {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    super('GENERATION_ERROR', `Generation failed for ${key}: ${describe(cause)}`, { cause });
    this.name = 'GenerationError';
    this.key = key;
  }
}

export class GenerationTimeoutError extends StalewiseError {
  readonly key: string;
  readonly timeoutMs: number;

  constructor(key: string, timeoutMs: number) {
    super('GENERATION_TIMEOUT', `Generation for ${key} exceeded ${timeoutMs}ms`);
    this.name = 'GenerationTimeoutError';
    this.key = key;
    this.timeoutMs = timeoutMs;
  }
}

export class InvalidManifestError extends StalewiseError {
  readonly entry: string;

  constructor(entry: string, reason: string) {
    super('INVALID_MANIFEST', `Invalid manifest entry "${entry}": ${reason}`);
    this.name = 'InvalidManifestError';
    this.entry = entry;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
