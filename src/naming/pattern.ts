/**
 * Address pattern compilation.
 *
 * Patterns are written the way a scene is addressed in the host
 * application's scripting layer and are matched against full node paths:
 *
 * | Pattern    | Regex                     | Matches |
 * |------------|---------------------------|---------|
 * | `name`     | `(^\|.*\|)name$`          | any node whose leaf is `name` |
 * | `name*`    | `(^\|.*\|)name\w+$`       | leaves starting with `name` plus at least one more character |
 * | `a\|b`     | `(^\|.*\|)a\|b$`          | `b` directly under any `a` |
 * | `\|a\|b`   | `^\|a\|b$`                | only the top-level `a` and its child `b` |
 * | `""`       | `^$`                      | only the empty path |
 * | `null`     | (none)                    | every path |
 */

import { HIERARCHY_SEPARATOR, WILDCARD } from './constants.js';
import type { MatcherCache } from './matcher-cache.js';

export interface TPathMatcher {
  /** Source pattern; `null` when the matcher accepts everything */
  readonly pattern: string | null;
  /** Compiled expression; `null` when the matcher accepts everything */
  readonly regex: RegExp | null;
  test(path: string): boolean;
}

const MATCH_ALL: TPathMatcher = {
  pattern: null,
  regex: null,
  test: () => true,
};

const REGEX_SPECIAL_CHARS = /[.*+?^${}()|[\]\\]/g;

function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIAL_CHARS, '\\$&');
}

/**
 * Convert a pattern to regex source. Only `*` is special; every other
 * character, the hierarchy separator included, is matched literally.
 */
export function patternToRegexSource(pattern: string): string {
  if (pattern === '') {
    return '^$';
  }

  const body = pattern.split(WILDCARD).map(escapeRegex).join('\\w+');

  if (pattern.startsWith(HIERARCHY_SEPARATOR)) {
    return `^${body}$`;
  }
  return `(^|.*${escapeRegex(HIERARCHY_SEPARATOR)})${body}$`;
}

/**
 * Compile a pattern into a matcher over full node paths.
 *
 * @param cache - Optional memo shared by the caller; compiled matchers are pure
 *   so reusing them across calls never changes a result.
 */
export function compilePattern(
  pattern: string | null | undefined,
  cache?: MatcherCache<TPathMatcher>,
): TPathMatcher {
  if (pattern === null || pattern === undefined) {
    return MATCH_ALL;
  }
  if (cache) {
    return cache.getOrCreate(pattern, buildMatcher);
  }
  return buildMatcher(pattern);
}

function buildMatcher(pattern: string): TPathMatcher {
  const regex = new RegExp(patternToRegexSource(pattern));
  return {
    pattern,
    regex,
    test: (path: string) => regex.test(path),
  };
}

/**
 * One-shot convenience for `compilePattern(pattern).test(path)`.
 */
export function matchesPattern(pattern: string | null | undefined, path: string): boolean {
  return compilePattern(pattern).test(path);
}
