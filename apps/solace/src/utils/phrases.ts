/**
 * Case-insensitive phrase matching on word boundaries
 *
 * A trailing `*` marks a stem: `frustrat*` matches "frustrated" and
 * "frustrating", while `mad` matches "mad" but not "made".
 */

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Lower-case and straighten typographic apostrophes
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[‘’]/g, "'");
}

export function compilePhrase(phrase: string): RegExp {
  const stem = phrase.endsWith('*');
  const body = normalizeText(stem ? phrase.slice(0, -1) : phrase).trim();
  const pattern = escapeRegExp(body).replace(/\s+/g, '\\s+');
  return new RegExp(`\\b${pattern}${stem ? '' : '\\b'}`);
}

export class PhraseMatcher {
  private readonly entries: ReadonlyArray<{ phrase: string; pattern: RegExp }>;

  constructor(phrases: readonly string[]) {
    this.entries = phrases.map((phrase) => ({ phrase, pattern: compilePhrase(phrase) }));
  }

  /**
   * Distinct phrases found in the text, in list order
   */
  matches(text: string): string[] {
    const normalized = normalizeText(text);
    return this.entries.filter(({ pattern }) => pattern.test(normalized)).map(({ phrase }) => phrase);
  }

  test(text: string): boolean {
    const normalized = normalizeText(text);
    return this.entries.some(({ pattern }) => pattern.test(normalized));
  }
}
