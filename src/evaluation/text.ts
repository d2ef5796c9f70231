/** Lower-case and strip diacritics so "José" matches "jose" */
export function foldText(text: string): string {
  return text.normalize('NFD').replace(/\p{M}+/gu, '').toLowerCase();
}

/** Folded word tokens (letters, digits, apostrophes) */
export function wordTokens(text: string): string[] {
  return foldText(text).match(/[\p{L}\p{N}']+/gu) ?? [];
}

/** Whitespace-separated word count, as a reader would count it */
export function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Folded substring containment */
export function containsFolded(haystack: string, needle: string): boolean {
  const n = foldText(needle).trim();
  return n.length > 0 && foldText(haystack).includes(n);
}

/** Folded whole-word (or whole-phrase) containment */
export function containsWord(haystack: string, word: string): boolean {
  const target = wordTokens(word);
  if (target.length === 0) return false;
  const tokens = wordTokens(haystack);
  for (let i = 0; i + target.length <= tokens.length; i++) {
    if (target.every((t, k) => tokens[i + k] === t)) return true;
  }
  return false;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function asStringList(value: unknown): string[] {
  if (typeof value === 'string') {
    return value.split(',').map((s) => s.trim()).filter(Boolean);
  }
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string' && v.trim().length > 0);
  }
  return [];
}

export function asFiniteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
