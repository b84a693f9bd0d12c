// Common speech-to-text misrecognitions. Applied in order, as plain substring
// replacements, so a later entry sees the output of earlier ones.
export const STT_FIXES: ReadonlyArray<readonly [string, string]> = [
  ['a count', 'account'],
  ['a/c', 'account'],
  ['a san', 'asaan'],
];

export function applySttFixes(
  text: string,
  fixes: ReadonlyArray<readonly [string, string]> = STT_FIXES,
): string {
  let fixed = text;
  for (const [source, target] of fixes) {
    fixed = fixed.replaceAll(source, target);
  }
  return fixed;
}

/**
 * Canonical form of a transcript: trimmed, single-spaced, lowercased, with the
 * STT fix table applied.
 */
export function normalize(
  raw: string,
  fixes: ReadonlyArray<readonly [string, string]> = STT_FIXES,
): string {
  const collapsed = raw.trim().split(/\s+/).filter(Boolean).join(' ');
  return applySttFixes(collapsed.toLowerCase(), fixes);
}
