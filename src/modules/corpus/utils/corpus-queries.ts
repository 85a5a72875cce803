import { analyzeTokens, splitPhonemeGroups, AnalysisReport } from '../../phoneme/utils/analyzer';
import { tokenize } from '../../phoneme/utils/tokenizer';
import { UnknownCategoryError, UnknownSampleIdError } from '../corpus.errors';
import { CorpusIndex, Sample } from '../corpus.types';

export interface SampleAnalysis extends AnalysisReport {
  sampleId: string;
  text: string;
  transcription: string;
  phoneSequence: string;
  phonemeGroups: string[];
}

export function getSample(id: string, index: CorpusIndex): Sample {
  const entry = index.byId.get(id);
  if (!entry) {
    throw new UnknownSampleIdError(id);
  }
  return entry.sample;
}

/**
 * Реплики категории в порядке корпуса. Название сравнивается точно.
 */
export function listCategory(category: string, index: CorpusIndex): readonly Sample[] {
  const samples = index.byCategory.get(category);
  if (!samples) {
    throw new UnknownCategoryError(category);
  }
  return samples;
}

/**
 * Фонемный разбор реплики по её транскрипции
 */
export function analyzeSample(id: string, index: CorpusIndex): SampleAnalysis {
  const sample = getSample(id, index);
  const report = analyzeTokens(tokenize(sample.transcription));

  return {
    sampleId: sample.id,
    text: sample.text,
    transcription: sample.transcription,
    phoneSequence: sample.phoneSequence,
    phonemeGroups: splitPhonemeGroups(sample.phoneSequence),
    ...report,
  };
}
