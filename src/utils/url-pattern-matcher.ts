/**
 * URL Pattern Matcher
 *
 * Shell-style glob matching for whitelist entries:
 * - `*` matches any run of characters, including `.` and `/`
 * - `?` matches exactly one character
 * - `[seq]` matches one character in seq, `[!seq]` one character not in seq
 *
 * Patterns are anchored at both ends and matched case-insensitively.
 */

export interface CompiledPattern {
  original: string;
  regex: RegExp;
}

// Pattern cache for performance
const patternCache = new Map<string, CompiledPattern>();
const MAX_CACHE_SIZE = 1000;

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

function escapeClassChar(ch: string): string {
  return /[\\\]\[^-]/.test(ch) ? `\\${ch}` : ch;
}

/**
 * Translate the inside of a `[...]` class. Ranges whose start sorts after
 * their end are empty and dropped, so the result is always a valid class.
 */
function translateClassBody(body: string): string {
  let out = '';
  let k = 0;

  while (k < body.length) {
    const start = body[k];
    if (body[k + 1] === '-' && k + 2 < body.length) {
      const end = body[k + 2];
      if (start <= end) {
        out += `${escapeClassChar(start)}-${escapeClassChar(end)}`;
      }
      k += 3;
    } else {
      out += escapeClassChar(start);
      k++;
    }
  }

  return out;
}

/**
 * Convert a glob pattern to a RegExp source string
 */
export function globToRegex(pattern: string): string {
  let out = '';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];
    i++;

    if (ch === '*') {
      // Collapse consecutive stars
      while (pattern[i] === '*') i++;
      out += '.*';
    } else if (ch === '?') {
      out += '.';
    } else if (ch === '[') {
      let j = i;
      if (pattern[j] === '!') j++;
      if (pattern[j] === ']') j++;
      while (j < pattern.length && pattern[j] !== ']') j++;

      if (j >= pattern.length) {
        // Unclosed bracket is a literal
        out += '\\[';
      } else {
        let body = pattern.slice(i, j);
        i = j + 1;
        let negate = false;
        if (body.startsWith('!')) {
          negate = true;
          body = body.slice(1);
        }
        const cls = translateClassBody(body);
        if (cls === '') {
          // Nothing left after dropping reversed ranges
          out += negate ? '.' : '(?!)';
        } else {
          out += negate ? `[^${cls}]` : `[${cls}]`;
        }
      }
    } else {
      out += escapeRegex(ch);
    }
  }

  return `^${out}$`;
}

/**
 * Compile a pattern for matching
 */
export function compilePattern(pattern: string): CompiledPattern {
  const cached = patternCache.get(pattern);
  if (cached) {
    return cached;
  }

  const compiled: CompiledPattern = {
    original: pattern,
    regex: new RegExp(globToRegex(pattern), 'is'),
  };

  if (patternCache.size >= MAX_CACHE_SIZE) {
    const firstKey = patternCache.keys().next().value;
    if (firstKey !== undefined) {
      patternCache.delete(firstKey);
    }
  }
  patternCache.set(pattern, compiled);

  return compiled;
}

/**
 * Clear the pattern cache
 */
export function clearPatternCache(): void {
  patternCache.clear();
}

/**
 * Match a string against a glob pattern
 */
export function matchGlob(value: string, pattern: string): boolean {
  return compilePattern(pattern).regex.test(value);
}

/**
 * Split a URL into the two strings whitelist patterns are tested against:
 * the host (with a non-default port) and host followed by path.
 * Returns null when the URL cannot be parsed.
 */
export function urlMatchTargets(url: string): { host: string; hostAndPath: string } | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  return {
    host: parsed.host,
    hostAndPath: `${parsed.host}${parsed.pathname}`,
  };
}
