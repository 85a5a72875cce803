import { CorpusIndex, Sample } from '../../corpus/corpus.types';
import { normalizeText, toWordSet } from '../../corpus/utils/normalize';

/**
 * Все реплики, где есть запрос как подстрока или хотя бы одно общее слово.
 * Без каскада и ранжирования, в порядке корпуса.
 */
export function searchSamples(query: string, index: CorpusIndex, limit?: number): Sample[] {
  const normalizedQuery = normalizeText(query);
  if (!normalizedQuery) return [];

  const queryWords = toWordSet(normalizedQuery);
  const results: Sample[] = [];

  for (const entry of index.entries) {
    if (limit !== undefined && results.length >= limit) break;

    const matches =
      entry.normalizedText.includes(normalizedQuery) ||
      [...queryWords].some((word) => entry.wordSet.has(word));

    if (matches) {
      results.push(entry.sample);
    }
  }

  return results;
}
