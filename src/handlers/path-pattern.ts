/**
 * Object path patterns for handler registrations.
 *
 * A registration path is either an exact object path or a glob
 * (`/org/example/*`, `/org/example/**`, `/dev/sd?`).
 */

import { Minimatch } from 'minimatch';

export type PathMatcher = (path: string | undefined) => boolean;

const GLOB_CHARS = /[*?[\]{}]/;

export function isPathPattern(pattern: string): boolean {
  return GLOB_CHARS.test(pattern);
}

/**
 * Compile a registration path. No path matches every message.
 */
export function compilePathPattern(pattern?: string): PathMatcher {
  if (pattern === undefined) {
    return () => true;
  }
  if (!isPathPattern(pattern)) {
    return (path) => path === pattern;
  }
  const matcher = new Minimatch(pattern, { nonegate: true, nocomment: true, dot: true });
  return (path) => path !== undefined && matcher.match(path);
}

export function matchesPath(path: string | undefined, pattern?: string): boolean {
  return compilePathPattern(pattern)(path);
}
