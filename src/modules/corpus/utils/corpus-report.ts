import { CorpusIndex } from '../corpus.types';

export interface CorpusStats {
  sampleCount: number;
  categoryCount: number;
  categories: string[];                     // Отсортированные названия
  categoryCounts: Record<string, number>;
  averageDuration: number;
  totalDuration: number;
}

const RULE_WIDTH = 60;
const REPORT_EXAMPLES = 5;
const PHONEMES_PREVIEW_LENGTH = 80;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function getStats(index: CorpusIndex): CorpusStats {
  const totalDuration = index.entries.reduce((sum, entry) => sum + entry.sample.durationSeconds, 0);
  const sampleCount = index.entries.length;

  const categoryCounts: Record<string, number> = Object.fromEntries(
    [...index.byCategory].map(([category, samples]) => [category, samples.length]),
  );

  return {
    sampleCount,
    categoryCount: index.byCategory.size,
    categories: [...index.byCategory.keys()].sort(),
    categoryCounts,
    averageDuration: sampleCount > 0 ? round2(totalDuration / sampleCount) : 0,
    totalDuration: round2(totalDuration),
  };
}

/**
 * Текстовый отчёт по корпусу: итоги, разбивка по категориям, первые примеры
 */
export function buildReport(index: CorpusIndex, title = 'UTTERANCE BANK REPORT'): string {
  const stats = getStats(index);
  const heavy = '='.repeat(RULE_WIDTH);
  const light = '-'.repeat(RULE_WIDTH);

  const report: string[] = [
    heavy,
    title,
    heavy,
    `\nTotal Samples: ${stats.sampleCount}`,
    `Categories: ${stats.categoryCount}`,
    `Average Duration: ${stats.averageDuration}s`,
    `Total Duration: ${stats.totalDuration}s`,
    `\nCategories: ${stats.categories.join(', ')}`,
    `\n${light}`,
    'CATEGORY BREAKDOWN',
    light,
  ];

  for (const category of stats.categories) {
    const samples = index.byCategory.get(category) ?? [];
    const duration = samples.reduce((sum, sample) => sum + sample.durationSeconds, 0);

    report.push(`\n${category.toUpperCase()}:`);
    report.push(`  Samples: ${samples.length}`);
    report.push(`  Total Duration: ${duration.toFixed(2)}s`);
    report.push(`  Avg Duration: ${(duration / samples.length).toFixed(2)}s`);
  }

  report.push(`\n${light}`);
  report.push(`SAMPLE EXAMPLES (First ${REPORT_EXAMPLES})`);
  report.push(light);

  index.entries.slice(0, REPORT_EXAMPLES).forEach(({ sample }, i) => {
    report.push(`\n${i + 1}. ${sample.id} (${sample.category})`);
    report.push(`   Text: ${sample.text}`);
    report.push(`   Duration: ${sample.durationSeconds}s`);
    report.push(`   Phonemes: ${sample.phoneSequence.slice(0, PHONEMES_PREVIEW_LENGTH)}...`);
  });

  return report.join('\n');
}
