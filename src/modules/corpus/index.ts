// Barrel export для удобного импорта
export * from './corpus.module';
export * from './corpus.service';
export * from './corpus.types';
export * from './corpus.errors';
export * from './utils/normalize';
export * from './utils/corpus-index';
export * from './utils/corpus-queries';
export * from './utils/corpus-report';
export * from './utils/corpus-loader';
