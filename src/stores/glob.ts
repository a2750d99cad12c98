const cache = new Map<string, RegExp>();

/**
 * Compile a Redis-style glob (`*`, `?`, `\` escapes) into an anchored RegExp.
 * Character classes are not supported; `[` and `]` match literally.
 */
export function globToRegExp(pattern: string): RegExp {
  const cached = cache.get(pattern);
  if (cached) return cached;

  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '\\' && i + 1 < pattern.length) {
      i++;
      source += escapeRegExp(pattern[i]);
    } else {
      source += escapeRegExp(char);
    }
  }

  const compiled = new RegExp(`^${source}$`, 's');
  if (cache.size >= 256) cache.clear();
  cache.set(pattern, compiled);
  return compiled;
}

/**
 * Escape glob metacharacters so `text` matches only itself.
 */
export function escapeGlob(text: string): string {
  return text.replace(/[*?[\]\\]/g, (char) => `\\${char}`);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
