export const CORPUS_QUEUE = 'corpus';
export const RELOAD_CORPUS_JOB = 'reload-corpus';
export const DEFAULT_CORPUS_PATH = 'data/corpus.sample.json';

export interface ReloadJobData {
  path?: string;
}
