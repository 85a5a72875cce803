import { PhonemeToken, PhoneToken, StressMarkerToken } from './tokenizer';
import { PHONE_GROUP_SEPARATOR } from '../constants/phoneme-markers';

// Содержимое слова: фоны и маркеры ударения. Границы служат только разделителями.
export type SegmentToken = PhoneToken | StressMarkerToken;

export interface StressMark {
  wordIndex: number;   // Индекс слова в words (с нуля)
  level: number;
}

export interface AnalysisReport {
  words: SegmentToken[][];
  stressPattern: StressMark[];
  phoneHistogram: Record<string, number>;
  phoneCount: number;
  wordCount: number;
}

/**
 * Разбирает поток токенов одной реплики: слова, ударения, частоты фонов.
 *
 * Сначала сегментация, потом ударения: маркер стоит рядом с фоном,
 * поэтому слово определяется по сегменту, который сейчас накапливается.
 * Пустые сегменты (## подряд, граница в начале/конце) не попадают в words.
 */
export function analyzeTokens(tokens: Iterable<PhonemeToken>): AnalysisReport {
  const words: SegmentToken[][] = [];
  const stressPattern: StressMark[] = [];
  const histogram = new Map<string, number>();
  let current: SegmentToken[] = [];
  let phoneCount = 0;

  const closeSegment = () => {
    if (current.length > 0) {
      words.push(current);
      current = [];
    }
  };

  for (const token of tokens) {
    switch (token.kind) {
      case 'WORD_BOUNDARY':
        closeSegment();
        break;

      case 'PHONE':
        current.push(token);
        histogram.set(token.value, (histogram.get(token.value) ?? 0) + 1);
        phoneCount++;
        break;

      case 'STRESS_MARKER':
        current.push(token);
        // Текущий сегмент станет следующим элементом words
        stressPattern.push({ wordIndex: words.length, level: token.level });
        break;

      default:
        // Паузы, пунктуация, конец предложения/реплики не входят в содержимое слова
        break;
    }
  }

  closeSegment();

  return {
    words,
    stressPattern,
    phoneHistogram: Object.fromEntries(histogram),
    phoneCount,
    wordCount: words.length,
  };
}

/**
 * Фоны слова без маркеров ударения
 */
export function segmentPhones(segment: SegmentToken[]): string[] {
  return segment.filter((token) => token.kind === 'PHONE').map((token) => token.value);
}

/**
 * Слово в исходной записи: "146 r 145 v L I N"
 */
export function formatSegment(segment: SegmentToken[]): string {
  return segment.map((token) => token.value).join(' ');
}

/**
 * phone_sequence, разбитая по границам слов, как в метаданных корпуса
 */
export function splitPhonemeGroups(sequence: string): string[] {
  return sequence
    .split(PHONE_GROUP_SEPARATOR)
    .map((group) => group.trim())
    .filter((group) => group.length > 0);
}
