import type { Finding } from '../src/types.js';

export function makeFinding(id: string, overrides: Partial<Finding> = {}): Finding {
  return {
    id,
    aliases: [],
    summary: '',
    url: '',
    fixedVersions: [],
    reachable: true,
    ...overrides,
  };
}

/** Run `fn` and return what it threw */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}
