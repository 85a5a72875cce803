// Barrel export для удобного импорта
export * from './phoneme.module';
export * from './phoneme.service';
export * from './phoneme.errors';
export * from './utils/tokenizer';
export * from './utils/analyzer';
export * from './utils/grapheme-to-phone';
export * from './constants/phoneme-markers';
