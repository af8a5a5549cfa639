/**
 * File Exclusion System
 *
 * Provides glob pattern matching to exclude files/directories from sync.
 * Supports simple globs: * (any chars except /), ** (any path), ? (single char)
 */

import { relative, sep } from 'path';

// ============================================================================
// Glob to Regex Conversion
// ============================================================================

/**
 * Escape special regex characters except glob wildcards
 */
function escapeRegexChars(str: string): string {
  return str.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

/**
 * Convert a simple glob pattern to a regex.
 *
 * Supported patterns:
 * - `*` matches any characters except `/`
 * - `**` matches any characters including `/` (any path depth)
 * - `?` matches a single character except `/`
 * - Literal characters are escaped
 *
 * The pattern matches against any segment of the path, so `node_modules`
 * will match `node_modules/foo`, `bar/node_modules/baz`, etc.
 */
function globToRegex(pattern: string): RegExp {
  const regexStr = escapeRegexChars(pattern)
    .replace(/\*\*/g, '{{GLOBSTAR}}')
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '[^/]')
    .replace(/{{GLOBSTAR}}/g, '.*');

  return new RegExp(`(^|/)${regexStr}($|/)`);
}

// ============================================================================
// Pattern Validation
// ============================================================================

/**
 * Validate that a glob pattern is syntactically correct.
 */
export function validateGlob(pattern: string): { valid: boolean; error?: string } {
  if (!pattern || pattern.trim() === '') {
    return { valid: false, error: 'Pattern cannot be empty' };
  }

  if (pattern.startsWith('/')) {
    return { valid: false, error: 'Pattern cannot start with / (use relative patterns)' };
  }

  if (pattern.includes('***')) {
    return { valid: false, error: 'Invalid pattern: *** is not allowed' };
  }

  try {
    globToRegex(pattern);
    return { valid: true };
  } catch (err) {
    return {
      valid: false,
      error: `Invalid pattern: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}

// ============================================================================
// Path Exclusion Check
// ============================================================================

/** Cache compiled regexes for performance */
const regexCache = new Map<string, RegExp>();

function getCachedRegex(pattern: string): RegExp {
  let regex = regexCache.get(pattern);
  if (!regex) {
    regex = globToRegex(pattern);
    regexCache.set(pattern, regex);
  }
  return regex;
}

/**
 * Check if a path should be excluded from sync.
 *
 * @param absolutePath - Full absolute path to the file/directory
 * @param root - The watched root this path belongs to
 * @param patterns - Glob patterns, matched against the path relative to root
 */
export function isPathExcluded(
  absolutePath: string,
  root: string,
  patterns: readonly string[]
): boolean {
  if (patterns.length === 0) {
    return false;
  }

  const relativePath = relative(root, absolutePath).split(sep).join('/');
  if (!relativePath || relativePath.startsWith('..')) {
    // The root itself, or outside it
    return false;
  }

  return patterns.some((pattern) => getCachedRegex(pattern).test(relativePath));
}

/**
 * Clear the regex cache (useful for config reload)
 */
export function clearRegexCache(): void {
  regexCache.clear();
}
