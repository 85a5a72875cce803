import { mkdtemp, writeFile, rm } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getQueueToken } from '@nestjs/bullmq';
import { CorpusService } from './corpus.service';
import { CORPUS_QUEUE, RELOAD_CORPUS_JOB } from './corpus.constants';
import { CorpusLoadError, UnknownCategoryError, UnknownSampleIdError } from './corpus.errors';
import { normalizeText, splitNormalizedWords } from './utils/normalize';
import { buildIndex } from './utils/corpus-index';
import { getSample, listCategory, analyzeSample } from './utils/corpus-queries';
import { getStats, buildReport } from './utils/corpus-report';
import { loadCorpusFile, parseCorpusContent, toSamples } from './utils/corpus-loader';
import { SAMPLE_CORPUS, makeSample } from '../../testing/sample-corpus';

// Мок очереди BullMQ
const mockQueue = {
  add: jest.fn().mockResolvedValue({ id: '42' }),
  getJob: jest.fn().mockResolvedValue(undefined),
};

// Мок ConfigService
const mockConfigService = {
  get: jest.fn().mockReturnValue(''),
};

// Запись в формате файла метаданных
const record = (overrides: Record<string, unknown> = {}) => ({
  script_title: 'questions',
  transcription: 'h I # 145 D E r ? ~',
  utterance_name: 'questions_100',
  words: 'Hi there?',
  phone_sequence: 'h I # D E r',
  sentence_idx: 3,
  sentence_estimated_duration: 1.2,
  locale: 'en_US',
  paragraph_idx: 1,
  ...overrides,
});

describe('CorpusService', () => {
  let service: CorpusService;
  let tempDir: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'corpus-'));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CorpusService,
        { provide: getQueueToken(CORPUS_QUEUE), useValue: mockQueue },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<CorpusService>(CorpusService);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('should start with an empty index', () => {
    expect(service.getIndex().entries).toHaveLength(0);
    expect(service.getStats().sampleCount).toBe(0);
  });

  describe('publish', () => {
    it('should swap the index without touching the previous one', () => {
      const before = service.getIndex();
      const after = service.publish(SAMPLE_CORPUS);

      expect(service.getIndex()).toBe(after);
      expect(after.entries).toHaveLength(5);
      expect(before.entries).toHaveLength(0);
    });
  });

  describe('reloadFromFile', () => {
    it('should load valid records and report rejected ones', async () => {
      const file = path.join(tempDir, 'corpus.json');
      const records = [
        record(),
        record({ utterance_name: 'questions_101', words: '   ' }),
        record({ utterance_name: 'statements_100', script_title: 'statements', words: 'Fine.' }),
      ];
      await writeFile(file, JSON.stringify(records), 'utf-8');

      const result = await service.reloadFromFile(file);

      expect(result.sampleCount).toBe(2);
      expect(result.rejected).toEqual([{ position: 2, reason: 'words must not be blank' }]);
      expect(service.getSample('statements_100').text).toBe('Fine.');
    });

    it('should keep the current index when the file cannot be read', async () => {
      service.publish(SAMPLE_CORPUS);

      await expect(service.reloadFromFile(path.join(tempDir, 'missing.json'))).rejects.toThrow(
        CorpusLoadError,
      );
      expect(service.getIndex().entries).toHaveLength(5);
    });
  });

  describe('queueReload', () => {
    it('should enqueue a reload job with retries', async () => {
      const result = await service.queueReload();

      expect(result).toEqual({ jobId: '42' });
      expect(mockQueue.add).toHaveBeenCalledWith(
        RELOAD_CORPUS_JOB,
        { path: undefined },
        { attempts: 3, backoff: { type: 'exponential', delay: 1000 } },
      );
    });

    it('should return null for an unknown job', async () => {
      expect(await service.getJobStatus('nope')).toBeNull();
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      service.publish(SAMPLE_CORPUS);
    });

    it('should find a sample by id', () => {
      expect(service.getSample('questions_002').text).toBe('Where is the station?');
    });

    it('should fail on an unknown id', () => {
      expect(() => service.getSample('questions_999')).toThrow(UnknownSampleIdError);
      expect(() => service.analyzeSample('questions_999')).toThrow(UnknownSampleIdError);
    });

    it('should list a category in corpus order', () => {
      const ids = service.listCategory('statements').map((sample) => sample.id);
      expect(ids).toEqual(['statements_001', 'statements_002']);
    });

    it('should fail on an unknown category', () => {
      expect(() => service.listCategory('Statements')).toThrow(UnknownCategoryError);
    });

    it('should build a text report', () => {
      expect(service.getReport().split('\n')).toContain('Total Samples: 5');
    });
  });
});

// =====================================================
// NORMALIZATION
// =====================================================

describe('normalizeText', () => {
  it('should lowercase, collapse spaces and strip surrounding punctuation', () => {
    expect(normalizeText('  Hello,   World!  ')).toBe('hello, world');
    expect(normalizeText('Is Miami the capital of Florida?')).toBe('is miami the capital of florida');
  });

  it('should return an empty string for punctuation only', () => {
    expect(normalizeText(' ?! ')).toBe('');
  });
});

describe('splitNormalizedWords', () => {
  it('should strip punctuation around each word', () => {
    expect(splitNormalizedWords("Wow, that's amazing!")).toEqual(['wow', "that's", 'amazing']);
  });

  it('should return no words for punctuation only', () => {
    expect(splitNormalizedWords('... ?')).toEqual([]);
  });
});

// =====================================================
// INDEX
// =====================================================

describe('buildIndex', () => {
  const index = buildIndex(SAMPLE_CORPUS);

  it('should index samples by id and category', () => {
    expect(index.byId.get('questions_001')?.normalizedText).toBe('is miami the capital of florida');
    expect(index.byCategory.get('questions')?.map((sample) => sample.id)).toEqual([
      'questions_001',
      'questions_002',
    ]);
  });

  it('should build the inverted word index', () => {
    expect(index.invertedWordIndex.get('the')).toEqual(
      new Set(['questions_001', 'questions_002', 'statements_001', 'statements_002']),
    );
    expect(index.invertedWordIndex.get("that's")).toEqual(new Set(['exclamations_001']));
  });

  it('should keep insertion order', () => {
    expect(index.entries.map((entry) => entry.order)).toEqual([0, 1, 2, 3, 4]);
  });

  it('should extract phones from the phone sequence', () => {
    expect(index.byId.get('questions_002')?.phones).toEqual([
      'w', 'E', 'r', 'I', 'z', 'T', 'E', 's', 't', 'e', 'S', '@', 'n',
    ]);
  });

  it('should fall back to the transcription when the phone sequence is blank', () => {
    const single = buildIndex([
      makeSample({ id: 'a', text: 'Hi', category: 'c', transcription: 'h 145 I ~', phoneSequence: '' }),
    ]);
    expect(single.byId.get('a')?.phones).toEqual(['h', 'I']);
  });

  it('should keep the first sample when ids repeat', () => {
    const dup = buildIndex([
      makeSample({ id: 'a', text: 'First', category: 'c' }),
      makeSample({ id: 'a', text: 'Second', category: 'c' }),
    ]);
    expect(dup.entries).toHaveLength(1);
    expect(dup.byId.get('a')?.sample.text).toBe('First');
  });

  it('should give identical contents for the same input', () => {
    const again = buildIndex(SAMPLE_CORPUS);
    expect([...again.byId.keys()]).toEqual([...index.byId.keys()]);
    expect(again.invertedWordIndex).toEqual(index.invertedWordIndex);
  });

  it('should not change when the input is mutated afterwards', () => {
    const samples = [...SAMPLE_CORPUS];
    const built = buildIndex(samples);

    samples[0] = makeSample({ id: 'exclamations_001', text: 'Changed', category: 'other' });
    samples.push(makeSample({ id: 'late', text: 'Late', category: 'other' }));

    expect(built.entries).toHaveLength(5);
    expect(built.byId.get('exclamations_001')?.sample.text).toBe("Wow, that's amazing!");
    expect(built.byCategory.has('other')).toBe(false);
    expect(Object.isFrozen(built.entries[0].sample)).toBe(true);
  });

  it('should freeze the per-category lists', () => {
    const built = buildIndex(SAMPLE_CORPUS);

    expect(Object.isFrozen(built.byCategory.get('questions'))).toBe(true);
    expect(Object.isFrozen(listCategory('questions', built))).toBe(true);
  });
});

// =====================================================
// QUERIES, STATS, REPORT
// =====================================================

describe('corpus queries', () => {
  const index = buildIndex(SAMPLE_CORPUS);

  it('should return the sample for a known id', () => {
    expect(getSample('exclamations_001', index).category).toBe('exclamations');
  });

  it('should fail on unknown ids and categories', () => {
    expect(() => getSample('missing', index)).toThrow(UnknownSampleIdError);
    expect(() => listCategory('greetings', index)).toThrow(UnknownCategoryError);
  });

  it('should analyze a sample transcription', () => {
    const analysis = analyzeSample('statements_001', index);

    expect(analysis.sampleId).toBe('statements_001');
    expect(analysis.text).toBe('The weather is lovely today.');
    expect(analysis.wordCount).toBe(5);
    expect(analysis.phoneCount).toBe(17);
    expect(analysis.stressPattern).toEqual([
      { wordIndex: 1, level: 145 },
      { wordIndex: 3, level: 145 },
      { wordIndex: 4, level: 145 },
    ]);
    expect(analysis.phonemeGroups).toEqual(['T E', 'w E T r', 'I z', 'l ^ v l i', 't @ d e']);
  });
});

describe('getStats', () => {
  it('should summarize the corpus', () => {
    expect(getStats(buildIndex(SAMPLE_CORPUS))).toEqual({
      sampleCount: 5,
      categoryCount: 3,
      categories: ['exclamations', 'questions', 'statements'],
      categoryCounts: { exclamations: 1, questions: 2, statements: 2 },
      averageDuration: 2.1,
      totalDuration: 10.5,
    });
  });

  it('should report zeros for an empty corpus', () => {
    const stats = getStats(buildIndex([]));
    expect(stats.sampleCount).toBe(0);
    expect(stats.averageDuration).toBe(0);
    expect(stats.categories).toEqual([]);
  });
});

describe('buildReport', () => {
  const lines = buildReport(buildIndex(SAMPLE_CORPUS)).split('\n');

  it('should print totals', () => {
    expect(lines[1]).toBe('UTTERANCE BANK REPORT');
    expect(lines).toContain('Average Duration: 2.1s');
    expect(lines).toContain('Total Duration: 10.5s');
    expect(lines).toContain('Categories: exclamations, questions, statements');
  });

  it('should print a breakdown per category', () => {
    const start = lines.indexOf('QUESTIONS:');
    expect(lines.slice(start, start + 4)).toEqual([
      'QUESTIONS:',
      '  Samples: 2',
      '  Total Duration: 4.00s',
      '  Avg Duration: 2.00s',
    ]);
  });

  it('should print the first samples', () => {
    expect(lines).toContain('1. exclamations_001 (exclamations)');
    expect(lines).toContain("   Text: Wow, that's amazing!");
    expect(lines).toContain('   Duration: 1.5s');
    expect(lines).toContain('   Phonemes: w W # T @ t s # @ m e z I N...');
  });
});

// =====================================================
// LOADER
// =====================================================

describe('parseCorpusContent', () => {
  it('should parse a JSON array', () => {
    expect(parseCorpusContent(JSON.stringify([record(), record()]))).toHaveLength(2);
  });

  it('should parse JSON Lines and skip blank lines', () => {
    const content = `${JSON.stringify(record())}\n\n${JSON.stringify(record())}\n`;
    expect(parseCorpusContent(content)).toHaveLength(2);
  });

  it('should fail on invalid JSON', () => {
    expect(() => parseCorpusContent(`${JSON.stringify(record())}\n{oops`)).toThrow(CorpusLoadError);
    expect(() => parseCorpusContent('[1,')).toThrow(CorpusLoadError);
  });

  it('should return no records for empty content', () => {
    expect(parseCorpusContent('  \n ')).toEqual([]);
  });
});

describe('toSamples', () => {
  it('should map metadata fields onto samples', () => {
    const { samples, rejected } = toSamples([record()]);

    expect(rejected).toEqual([]);
    expect(samples).toEqual([
      {
        id: 'questions_100',
        text: 'Hi there?',
        transcription: 'h I # 145 D E r ? ~',
        phoneSequence: 'h I # D E r',
        category: 'questions',
        durationSeconds: 1.2,
        locale: 'en_US',
        sentenceIdx: 3,
        paragraphIdx: 1,
      },
    ]);
  });

  it('should reject invalid and duplicate records', () => {
    const { samples, rejected } = toSamples([
      record(),
      42,
      record({ utterance_name: 'questions_101', sentence_estimated_duration: 0 }),
      record(),
    ]);

    expect(samples).toHaveLength(1);
    expect(rejected.map((r) => r.position)).toEqual([2, 3, 4]);
    expect(rejected[0].reason).toBe('record is not an object');
    expect(rejected[1].reason).toBe('sentence_estimated_duration must be a positive number');
    expect(rejected[2].reason).toBe('duplicate utterance_name questions_100');
  });

  it('should reject records with missing text', () => {
    const { rejected } = toSamples([record({ words: undefined })]);
    expect(rejected[0].reason).toContain('words must be a string');
  });
});

describe('loadCorpusFile', () => {
  it('should fail for a missing file', async () => {
    await expect(loadCorpusFile(path.join(os.tmpdir(), 'no-such-corpus.json'))).rejects.toThrow(
      CorpusLoadError,
    );
  });
});
