import { readFile } from 'fs/promises';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { SampleRecordDto } from '../dto';
import { CorpusLoadError } from '../corpus.errors';
import { Sample } from '../corpus.types';

export interface RejectedRecord {
  position: number;   // Номер записи в файле (с единицы)
  reason: string;
}

export interface LoadResult {
  samples: Sample[];
  rejected: RejectedRecord[];
}

/**
 * Читает файл корпуса и превращает записи в реплики
 */
export async function loadCorpusFile(path: string): Promise<LoadResult> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new CorpusLoadError(path, error instanceof Error ? error.message : String(error));
  }

  return toSamples(parseCorpusContent(content, path));
}

/**
 * Поддерживает два формата:
 * - JSON-массив записей
 * - JSON Lines (одна запись на строку, пустые строки пропускаются)
 */
export function parseCorpusContent(content: string, path = '<inline>'): unknown[] {
  const trimmed = content.trim();
  if (!trimmed) return [];

  if (trimmed.startsWith('[')) {
    const parsed = parseJson(trimmed, path, 'array');
    if (!Array.isArray(parsed)) {
      throw new CorpusLoadError(path, 'expected a JSON array of records');
    }
    return parsed;
  }

  return trimmed
    .split('\n')
    .map((line, i) => ({ line: line.trim(), lineNumber: i + 1 }))
    .filter(({ line }) => line.length > 0)
    .map(({ line, lineNumber }) => parseJson(line, path, `line ${lineNumber}`));
}

function parseJson(text: string, path: string, where: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorpusLoadError(path, `invalid JSON at ${where}: ${reason}`);
  }
}

/**
 * Валидирует записи и переводит их в реплики.
 * Невалидные записи и повторные utterance_name отбрасываются с причиной.
 */
export function toSamples(records: unknown[]): LoadResult {
  const samples: Sample[] = [];
  const rejected: RejectedRecord[] = [];
  const seenIds = new Set<string>();

  records.forEach((record, i) => {
    const position = i + 1;

    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
      rejected.push({ position, reason: 'record is not an object' });
      return;
    }

    const dto = plainToInstance(SampleRecordDto, record);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const reason = errors
        .flatMap((error) => Object.values(error.constraints ?? {}))
        .join('; ');
      rejected.push({ position, reason });
      return;
    }

    if (seenIds.has(dto.utterance_name)) {
      rejected.push({ position, reason: `duplicate utterance_name ${dto.utterance_name}` });
      return;
    }
    seenIds.add(dto.utterance_name);

    samples.push(recordToSample(dto));
  });

  return { samples, rejected };
}

export function recordToSample(record: SampleRecordDto): Sample {
  return {
    id: record.utterance_name,
    text: record.words,
    transcription: record.transcription,
    phoneSequence: record.phone_sequence,
    category: record.script_title,
    durationSeconds: record.sentence_estimated_duration,
    locale: record.locale,
    sentenceIdx: record.sentence_idx,
    paragraphIdx: record.paragraph_idx,
  };
}
