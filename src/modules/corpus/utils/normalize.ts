// Пунктуация и символы по краям (Unicode-категории P и S)
const EDGE_NOISE = /^[\p{P}\p{S}\s]+|[\p{P}\p{S}\s]+$/gu;
const WORD_EDGE_NOISE = /^[\p{P}\p{S}]+|[\p{P}\p{S}]+$/gu;

/**
 * Нормализует текст реплики или запроса:
 * нижний регистр, один пробел между словами, без пунктуации по краям.
 * Пунктуация внутри фразы остаётся: "wow, that's amazing"
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').replace(EDGE_NOISE, '');
}

/**
 * Слова нормализованного текста без пунктуации по краям каждого слова
 */
export function splitNormalizedWords(text: string): string[] {
  const normalized = normalizeText(text);
  if (!normalized) return [];

  return normalized
    .split(' ')
    .map((word) => word.replace(WORD_EDGE_NOISE, ''))
    .filter((word) => word.length > 0);
}

export function toWordSet(text: string): Set<string> {
  return new Set(splitNormalizedWords(text));
}
