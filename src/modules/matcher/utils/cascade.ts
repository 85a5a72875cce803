import { graphemesToPhones } from '../../phoneme/utils/grapheme-to-phone';
import { CorpusIndex, IndexedSample, Sample } from '../../corpus/corpus.types';
import { normalizeText, toWordSet } from '../../corpus/utils/normalize';
import { MATCH_SCORES } from '../constants/match-scores';
import { NoMatchError } from '../matcher.errors';
import { jaccard, levenshtein, normalizeDistance } from './similarity';

export type MatchStage = 'EXACT' | 'SUBSTRING' | 'WORD_OVERLAP' | 'PHONETIC';

export interface MatchResult {
  sampleId: string;
  sample: Sample;
  score: number;              // 0 - 100
  stage: MatchStage;          // Ступень каскада, которая дала результат
  distance?: number;          // Только для PHONETIC: Левенштейн по фонам
  normalizedDistance?: number;
}

interface Candidate {
  entry: IndexedSample;
  score: number;
  distance?: number;
  normalizedDistance?: number;
}

/**
 * Лучший кандидат: больше очков, при равенстве тот, что раньше в корпусе
 */
function pickBest(candidates: Iterable<Candidate>): Candidate | null {
  let best: Candidate | null = null;

  for (const candidate of candidates) {
    if (
      !best ||
      candidate.score > best.score ||
      (candidate.score === best.score && candidate.entry.order < best.entry.order)
    ) {
      best = candidate;
    }
  }

  return best;
}

function toResult(candidate: Candidate, stage: MatchStage): MatchResult {
  const result: MatchResult = {
    sampleId: candidate.entry.sample.id,
    sample: candidate.entry.sample,
    score: candidate.score,
    stage,
  };

  if (candidate.distance !== undefined) {
    result.distance = candidate.distance;
    result.normalizedDistance = candidate.normalizedDistance;
  }

  return result;
}

// =====================================================
// STAGES
// =====================================================

/**
 * 1. Точное совпадение нормализованного текста
 */
export function matchExact(normalizedQuery: string, index: CorpusIndex): MatchResult | null {
  if (!normalizedQuery) return null;

  // entries идут в порядке корпуса, первый найденный и есть ответ
  const entry = index.entries.find((e) => e.normalizedText === normalizedQuery);
  return entry ? toResult({ entry, score: MATCH_SCORES.exact }, 'EXACT') : null;
}

/**
 * 2. Подстрока: запрос внутри текста реплики или наоборот.
 * Чем ближе длины, тем выше очки.
 */
export function matchSubstring(normalizedQuery: string, index: CorpusIndex): MatchResult | null {
  if (!normalizedQuery) return null;

  const candidates: Candidate[] = [];

  for (const entry of index.entries) {
    const text = entry.normalizedText;
    // Текст из одной пунктуации нормализуется в "", а "" есть в любой строке
    if (!text) continue;
    if (!text.includes(normalizedQuery) && !normalizedQuery.includes(text)) continue;

    const shorter = Math.min(text.length, normalizedQuery.length);
    const longer = Math.max(text.length, normalizedQuery.length);

    candidates.push({
      entry,
      score: MATCH_SCORES.substringBase + MATCH_SCORES.substringBonus * (shorter / longer),
    });
  }

  const best = pickBest(candidates);
  return best ? toResult(best, 'SUBSTRING') : null;
}

/**
 * 3. Пересечение слов (Жаккар). Кандидаты берутся из
 * обратного индекса: реплики хотя бы с одним общим словом.
 */
export function matchWordOverlap(normalizedQuery: string, index: CorpusIndex): MatchResult | null {
  const queryWords = toWordSet(normalizedQuery);
  if (queryWords.size === 0) return null;

  const candidateIds = new Set<string>();
  for (const word of queryWords) {
    for (const id of index.invertedWordIndex.get(word) ?? []) {
      candidateIds.add(id);
    }
  }

  const candidates: Candidate[] = [];
  for (const id of candidateIds) {
    const entry = index.byId.get(id);
    if (!entry) continue;

    const score = MATCH_SCORES.wordOverlap * jaccard(queryWords, entry.wordSet);
    if (score > 0) {
      candidates.push({ entry, score });
    }
  }

  const best = pickBest(candidates);
  return best ? toResult(best, 'WORD_OVERLAP') : null;
}

/**
 * 4. Фонетика: приближённые фоны запроса против phone_sequence реплик
 */
export function matchPhonetic(normalizedQuery: string, index: CorpusIndex): MatchResult | null {
  const queryPhones = graphemesToPhones(normalizedQuery);

  const candidates = index.entries.map((entry): Candidate => {
    const distance = levenshtein(queryPhones, entry.phones);
    const normalizedDistance = normalizeDistance(distance, queryPhones, entry.phones);

    return {
      entry,
      score: MATCH_SCORES.phonetic * (1 - normalizedDistance),
      distance,
      normalizedDistance,
    };
  });

  const best = pickBest(candidates);
  return best ? toResult(best, 'PHONETIC') : null;
}

// =====================================================
// CASCADE
// =====================================================

const STAGES = [matchExact, matchSubstring, matchWordOverlap, matchPhonetic];

/**
 * Лучшая реплика для запроса.
 *
 * Ступени проверяются строго по порядку: exact → substring → word overlap → phonetic.
 * Первая ступень с кандидатом выигрывает, следующие не вызываются.
 * На непустом корпусе фонетическая ступень всегда что-то находит.
 *
 * @throws NoMatchError если корпус пуст
 */
export function findBestMatch(query: string, index: CorpusIndex): MatchResult {
  const normalizedQuery = normalizeText(query);

  for (const stage of STAGES) {
    const result = stage(normalizedQuery, index);
    if (result) return result;
  }

  throw new NoMatchError(query);
}
