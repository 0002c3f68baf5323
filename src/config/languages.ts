/**
 * Display name to language code table, e.g. { English: 'en', French: 'fr' }
 */
export type LanguageMapping = Record<string, string>;

const AUTO_SENTINELS = new Set(['', 'auto', 'auto detect']);

/**
 * Parses "Display:code" pairs separated by commas.
 * Pairs without a colon are ignored; the first colon splits name and code.
 */
export function parseLanguageMapping(raw: string): LanguageMapping {
  const mapping: LanguageMapping = {};

  for (const pair of raw.split(',')) {
    const separator = pair.indexOf(':');
    if (separator === -1) {
      continue;
    }
    const displayName = pair.slice(0, separator).trim();
    const code = pair.slice(separator + 1).trim();
    if (displayName && code) {
      mapping[displayName] = code;
    }
  }

  return mapping;
}

/**
 * Looks up the code for a display name, falling back to "auto"
 */
export function getLanguageCode(mapping: LanguageMapping, displayName: string): string {
  return mapping[displayName] ?? 'auto';
}

/**
 * True when the value asks the recognizer to detect the language itself
 */
export function isAutoLanguage(language: string | null | undefined): boolean {
  if (language === null || language === undefined) {
    return true;
  }
  return AUTO_SENTINELS.has(language.trim().toLowerCase());
}
