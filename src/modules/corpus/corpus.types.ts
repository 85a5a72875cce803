/**
 * Одна реплика корпуса. Создаётся загрузчиком и больше не меняется.
 */
export interface Sample {
  readonly id: string;              // utterance_name
  readonly text: string;            // words
  readonly transcription: string;   // фонемы с маркерами границ и ударений
  readonly phoneSequence: string;   // только фоны (и границы слов)
  readonly category: string;        // script_title
  readonly durationSeconds: number;
  readonly locale: string;
  readonly sentenceIdx: number;
  readonly paragraphIdx: number;
}

export interface IndexedSample {
  readonly sample: Sample;
  readonly order: number;           // Позиция в корпусе, для стабильного выбора при равных очках
  readonly normalizedText: string;
  readonly wordSet: ReadonlySet<string>;
  readonly phones: readonly string[];
}

/**
 * Индекс корпуса. Строится один раз на загрузку и только читается.
 * Перезагрузка корпуса = новый индекс.
 */
export interface CorpusIndex {
  readonly entries: readonly IndexedSample[];
  readonly byId: ReadonlyMap<string, IndexedSample>;
  readonly byCategory: ReadonlyMap<string, readonly Sample[]>;
  readonly invertedWordIndex: ReadonlyMap<string, ReadonlySet<string>>;
}
