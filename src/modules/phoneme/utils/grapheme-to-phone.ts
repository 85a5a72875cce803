import graphemeRules from '../constants/grapheme-rules.json';

const RULES: ReadonlyMap<string, readonly string[]> = new Map(Object.entries(graphemeRules.rules));
const VOWEL_LETTERS = new Set(graphemeRules.vowelLetters);
const MAX_GRAPHEME_LENGTH = Math.max(...[...RULES.keys()].map((grapheme) => grapheme.length));

/**
 * Приближённо переводит текст запроса в фоны нотации корпуса.
 *
 * Правила:
 * 1. Текст в нижнем регистре, слова: последовательности букв и апострофов
 * 2. Жадно берём самую длинную графему из таблицы (tch > ch > c)
 * 3. Удвоенная согласная внутри слова звучит один раз (ll, ss)
 * 4. Символы без правила отбрасываются
 *
 * Функция чистая и детерминированная: одинаковый текст даёт одинаковые фоны.
 */
export function graphemesToPhones(text: string): string[] {
  const phones: string[] = [];

  for (const word of splitIntoWords(text)) {
    phones.push(...wordToPhones(word));
  }

  return phones;
}

export function splitIntoWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}']+/u)
    .filter((word) => word.length > 0);
}

function wordToPhones(word: string): string[] {
  const phones: string[] = [];
  let i = 0;

  while (i < word.length) {
    const char = word[i];

    // Удвоенная согласная
    if (i > 0 && char === word[i - 1] && !VOWEL_LETTERS.has(char)) {
      i++;
      continue;
    }

    let matched = false;
    for (let length = Math.min(MAX_GRAPHEME_LENGTH, word.length - i); length > 0; length--) {
      const rule = RULES.get(word.slice(i, i + length));
      if (rule) {
        phones.push(...rule);
        i += length;
        matched = true;
        break;
      }
    }

    if (!matched) {
      i++;
    }
  }

  return phones;
}
