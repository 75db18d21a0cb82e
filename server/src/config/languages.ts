// Map des codes de langue vers leurs noms complets
export const LANGUAGE_CODES: Readonly<Record<string, string>> = {
  'fr': 'French',
  'en': 'English',
  'es': 'Spanish',
  'de': 'German',
  'it': 'Italian',
  'pt': 'Portuguese',
  'nl': 'Dutch',
  'ru': 'Russian',
  'zh': 'Chinese',
  'ja': 'Japanese',
  'ko': 'Korean'
};

/**
 * Renvoie le nom complet d'une langue à partir de son code ou de son nom.
 * Une langue inconnue est renvoyée telle quelle.
 */
export function languageName(lang: string): string {
  const key = lang.trim().toLowerCase();
  const byCode = LANGUAGE_CODES[key];
  if (byCode) {
    return byCode;
  }
  const byName = Object.values(LANGUAGE_CODES).find(name => name.toLowerCase() === key);
  return byName || lang.trim();
}

/**
 * Renvoie le code court d'une langue, utilisé dans les noms de fichiers.
 */
export function languageCode(lang: string): string {
  const key = lang.trim().toLowerCase();
  if (LANGUAGE_CODES[key]) {
    return key;
  }
  const code = Object.entries(LANGUAGE_CODES).find(
    ([_, name]) => name.toLowerCase() === key
  )?.[0];
  return code || key;
}
