import {
  UTTERANCE_END,
  WORD_BOUNDARY,
  SENTENCE_BOUNDARY,
  PAUSE,
  PUNCTUATION_MARKS,
  STRESS_MARKER_PATTERN,
} from '../constants/phoneme-markers';
import { MalformedTranscriptionError } from '../phoneme.errors';

export type PhonemeTokenKind =
  | 'PHONE'
  | 'WORD_BOUNDARY'
  | 'STRESS_MARKER'
  | 'SENTENCE_BOUNDARY'
  | 'PAUSE'
  | 'PUNCTUATION'
  | 'UTTERANCE_END';

export interface PhoneToken {
  kind: 'PHONE';
  value: string;
}

export interface StressMarkerToken {
  kind: 'STRESS_MARKER';
  value: string;
  // 145 основное ударение, 146 второстепенное.
  // Коды длиннее Number.MAX_SAFE_INTEGER приближённые, точный код в value.
  level: number;
}

export interface BoundaryToken {
  kind: Exclude<PhonemeTokenKind, 'PHONE' | 'STRESS_MARKER'>;
  value: string;
}

export type PhonemeToken = PhoneToken | StressMarkerToken | BoundaryToken;

/**
 * Классифицирует одну единицу транскрипции (без пробелов)
 */
export function classifyUnit(unit: string): PhonemeToken {
  if (unit === UTTERANCE_END) return { kind: 'UTTERANCE_END', value: unit };
  if (unit === WORD_BOUNDARY) return { kind: 'WORD_BOUNDARY', value: unit };
  if (unit === SENTENCE_BOUNDARY) return { kind: 'SENTENCE_BOUNDARY', value: unit };
  if (unit === PAUSE) return { kind: 'PAUSE', value: unit };
  if (PUNCTUATION_MARKS.has(unit)) return { kind: 'PUNCTUATION', value: unit };

  if (STRESS_MARKER_PATTERN.test(unit)) {
    return { kind: 'STRESS_MARKER', value: unit, level: parseInt(unit, 10) };
  }

  // Регистр важен: N и n разные фоны
  return { kind: 'PHONE', value: unit };
}

/**
 * Разбивает транскрипцию на токены.
 *
 * Последовательность ленивая и перезапускаемая: каждый проход
 * заново классифицирует единицы исходной строки.
 *
 * @throws MalformedTranscriptionError если строка пустая (или из одних пробелов)
 */
export function tokenize(transcription: string): Iterable<PhonemeToken> {
  const units = transcription.split(/\s+/).filter((unit) => unit.length > 0);

  if (units.length === 0) {
    throw new MalformedTranscriptionError(transcription);
  }

  return {
    *[Symbol.iterator]() {
      for (const unit of units) {
        yield classifyUnit(unit);
      }
    },
  };
}

export function tokenizeToArray(transcription: string): PhonemeToken[] {
  return [...tokenize(transcription)];
}

/**
 * Оставляет только значения фонов (без маркеров, границ и пунктуации).
 * Пустая строка даёт пустой массив, а не ошибку.
 */
export function extractPhones(sequence: string): string[] {
  if (!sequence.trim()) return [];

  const phones: string[] = [];
  for (const token of tokenize(sequence)) {
    if (token.kind === 'PHONE') {
      phones.push(token.value);
    }
  }
  return phones;
}
