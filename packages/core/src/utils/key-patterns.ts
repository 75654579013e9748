/**
 * Key patterns used by `glot-message-keys` annotations. `*` stands for one
 * key segment, so `roles.*.name` matches `roles.admin.name` but never
 * `roles.admin.extra.name`.
 */

function escapeRegexChar(char: string): string {
  return char.replace(/[-[\]/{}()+?.\\^$|]/g, '\\$&');
}

export function isKeyPattern(key: string): boolean {
  return key.includes('*');
}

export function compileKeyPattern(pattern: string): RegExp {
  let source = '';
  for (const char of pattern) {
    source += char === '*' ? '[^.]*' : escapeRegexChar(char);
  }
  return new RegExp(`^${source}$`);
}

/**
 * Keys from `candidates` the pattern matches, in candidate order. A pattern
 * that matches nothing is returned as-is so it still surfaces as missing.
 */
export function expandKeyPattern(pattern: string, candidates: Iterable<string>): string[] {
  if (!isKeyPattern(pattern)) {
    return [pattern];
  }
  const matcher = compileKeyPattern(pattern);
  const matched: string[] = [];
  for (const key of candidates) {
    if (matcher.test(key)) {
      matched.push(key);
    }
  }
  return matched.length ? matched : [pattern];
}
