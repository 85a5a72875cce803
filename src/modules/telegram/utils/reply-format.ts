import { Sample } from '../../corpus/corpus.types';
import { SampleAnalysis } from '../../corpus/utils/corpus-queries';
import { CorpusStats } from '../../corpus/utils/corpus-report';
import { MatchResult } from '../../matcher/utils/cascade';

export const SEARCH_PREVIEW = 10;
export const CATEGORY_PREVIEW = 15;
export const PHONEME_GROUPS_PREVIEW = 10;

// Лимит Telegram: 4096 символов на сообщение
export const MAX_MESSAGE_LENGTH = 4000;

const STAGE_LABELS: Record<MatchResult['stage'], string> = {
  EXACT: 'exact',
  SUBSTRING: 'substring',
  WORD_OVERLAP: 'word overlap',
  PHONETIC: 'phonetic',
};

function sampleLine(sample: Sample): string {
  return `  ${sample.id}: ${sample.text}`;
}

export function formatMatch(result: MatchResult): string {
  const lines = [
    `🎯 Closest match: ${result.sampleId}`,
    `Text: ${result.sample.text}`,
    `Category: ${result.sample.category}`,
    `Duration: ${result.sample.durationSeconds}s`,
    `Matched by: ${STAGE_LABELS[result.stage]} (score ${result.score.toFixed(2)})`,
  ];

  if (result.distance !== undefined) {
    lines.push(`Edit distance: ${result.distance}`);
  }

  return lines.join('\n');
}

export function formatSearchResults(samples: readonly Sample[]): string {
  const lines = [`🔎 Found ${samples.length} matches:`, ...samples.slice(0, SEARCH_PREVIEW).map(sampleLine)];

  if (samples.length > SEARCH_PREVIEW) {
    lines.push(`  …and ${samples.length - SEARCH_PREVIEW} more`);
  }

  return lines.join('\n');
}

export function formatCategoryListing(category: string, samples: readonly Sample[]): string {
  return [
    `📂 ${samples.length} samples in '${category}':`,
    ...samples.slice(0, CATEGORY_PREVIEW).map(sampleLine),
  ].join('\n');
}

export function formatAnalysis(analysis: SampleAnalysis): string {
  const groups = analysis.phonemeGroups.slice(0, PHONEME_GROUPS_PREVIEW).join(' ');
  const stress = analysis.stressPattern.map((mark) => `${mark.level}@${mark.wordIndex}`).join(', ');

  return [
    `🔬 ${analysis.sampleId}`,
    `Text: ${analysis.text}`,
    `Phoneme Count: ${analysis.phonemeGroups.length}`,
    `Phonemes: ${groups}...`,
    `Full Sequence: ${analysis.phoneSequence}`,
    `Words: ${analysis.wordCount}, phones: ${analysis.phoneCount}`,
    `Stress: ${stress || 'none'}`,
  ].join('\n');
}

export function formatStats(stats: CorpusStats): string {
  return [
    `📊 Total Samples: ${stats.sampleCount}`,
    `Categories: ${stats.categories.join(', ')}`,
    `Average Duration: ${stats.averageDuration}s`,
  ].join('\n');
}

export function truncateMessage(text: string, maxLength = MAX_MESSAGE_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 1)}…`;
}
