export * from './match-query.dto';
export * from './search-query.dto';
