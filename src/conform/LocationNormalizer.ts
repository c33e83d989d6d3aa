import type { PrefixRule } from '../config/LocationPrefixes';

/**
 * Remove a rule's root prefix from the start of a path. Paths the rule does
 * not match come back unchanged; nothing past the prefix is touched.
 */
export function stripLocationPrefix(path: string, rule: PrefixRule): string {
  const match = rule.pattern.exec(path);
  if (!match || match.index !== 0) return path;
  return path.slice(match[0].length);
}
