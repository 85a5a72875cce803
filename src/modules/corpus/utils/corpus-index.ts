import { extractPhones } from '../../phoneme/utils/tokenizer';
import { CorpusIndex, IndexedSample, Sample } from '../corpus.types';
import { normalizeText, toWordSet } from './normalize';

/**
 * Строит индекс по загруженным репликам.
 *
 * Входной массив и сами реплики копируются, поэтому последующие изменения
 * входа на индекс не влияют. При повторе id остаётся первая реплика.
 */
export function buildIndex(samples: readonly Sample[]): CorpusIndex {
  const entries: IndexedSample[] = [];
  const byId = new Map<string, IndexedSample>();
  const byCategory = new Map<string, Sample[]>();
  const invertedWordIndex = new Map<string, Set<string>>();

  for (const source of samples) {
    if (byId.has(source.id)) continue;

    const sample: Sample = Object.freeze({ ...source });
    const entry: IndexedSample = Object.freeze({
      sample,
      order: entries.length,
      normalizedText: normalizeText(sample.text),
      wordSet: toWordSet(sample.text),
      phones: Object.freeze(samplePhones(sample)),
    });

    entries.push(entry);
    byId.set(sample.id, entry);

    const categorySamples = byCategory.get(sample.category);
    if (categorySamples) {
      categorySamples.push(sample);
    } else {
      byCategory.set(sample.category, [sample]);
    }

    for (const word of entry.wordSet) {
      const ids = invertedWordIndex.get(word);
      if (ids) {
        ids.add(sample.id);
      } else {
        invertedWordIndex.set(word, new Set([sample.id]));
      }
    }
  }

  for (const categorySamples of byCategory.values()) {
    Object.freeze(categorySamples);
  }

  return Object.freeze({ entries, byId, byCategory, invertedWordIndex });
}

/**
 * Фоны реплики для фонетического сравнения.
 * Если phone_sequence пустая, берём фоны из транскрипции.
 */
function samplePhones(sample: Sample): string[] {
  if (sample.phoneSequence.trim()) {
    return extractPhones(sample.phoneSequence);
  }
  return extractPhones(sample.transcription);
}
