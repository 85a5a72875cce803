// Barrel export для удобного импорта
export * from './matcher.module';
export * from './matcher.service';
export * from './matcher.errors';
export * from './utils/cascade';
export * from './utils/search';
export * from './utils/similarity';
