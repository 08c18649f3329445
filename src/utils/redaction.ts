function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Patterns that hide a secret in human logs: the literal value and its
 * base64 form (tokens end up base64-encoded in Authorization headers).
 * Values shorter than four characters are not redacted; they would mangle
 * unrelated output.
 */
export function secretPatterns(val: string | undefined): RegExp[] {
  const patterns: RegExp[] = []
  if (typeof val !== 'string' || val.length < 4) return patterns
  patterns.push(new RegExp(escapeRegExp(val), 'g'))
  const b64: string = Buffer.from(val, 'utf8').toString('base64')
  if (b64.length >= 8) patterns.push(new RegExp(escapeRegExp(b64), 'g'))
  return patterns
}
