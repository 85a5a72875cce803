// Служебные символы фонемной нотации корпуса.
// Всё, что не маркер и не число, считается фоном (алфавит открытый).

export const UTTERANCE_END = '~';
export const WORD_BOUNDARY = '#';
export const SENTENCE_BOUNDARY = '.';
export const PAUSE = ',';
export const PUNCTUATION_MARKS = new Set(['!', '?']);

// Коды ударения, встречающиеся в корпусе. Парсер принимает любое целое.
export const PRIMARY_STRESS = 145;
export const SECONDARY_STRESS = 146;

export const STRESS_MARKER_PATTERN = /^[0-9]+$/;

// Разделитель слов в phone_sequence (как в исходных метаданных)
export const PHONE_GROUP_SEPARATOR = ' # ';
