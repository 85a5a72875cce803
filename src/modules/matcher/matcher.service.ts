import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CorpusService } from '../corpus/corpus.service';
import { Sample } from '../corpus/corpus.types';
import { findBestMatch, MatchResult } from './utils/cascade';
import { searchSamples } from './utils/search';
import { SearchQueryDto } from './dto';

const DEFAULT_SEARCH_LIMIT = 10;

@Injectable()
export class MatcherService {
  private readonly searchLimit: number;

  constructor(
    private readonly corpusService: CorpusService,
    private readonly configService: ConfigService,
  ) {
    this.searchLimit =
      parseInt(this.configService.get<string>('SEARCH_LIMIT') || '', 10) || DEFAULT_SEARCH_LIMIT;
  }

  /**
   * Лучшая реплика для фразы (каскад exact → substring → word overlap → phonetic)
   */
  findBestMatch(query: string): MatchResult {
    // Индекс берём один раз: перезагрузка во время запроса его не затронет
    return findBestMatch(query, this.corpusService.getIndex());
  }

  /**
   * Список реплик по подстроке или общим словам
   */
  search(dto: SearchQueryDto): Sample[] {
    const { query, limit = this.searchLimit } = dto;
    return searchSamples(query, this.corpusService.getIndex(), limit);
  }

  /**
   * Все совпадения без лимита (для подсчёта в ответах бота)
   */
  searchAll(query: string): Sample[] {
    return searchSamples(query, this.corpusService.getIndex());
  }
}
