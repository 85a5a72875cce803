export * from './sample-record.dto';
export * from './reload-corpus.dto';
