import { Injectable } from '@nestjs/common';
import { tokenizeToArray, PhonemeToken } from './utils/tokenizer';
import { analyzeTokens, splitPhonemeGroups, AnalysisReport } from './utils/analyzer';
import { graphemesToPhones } from './utils/grapheme-to-phone';

@Injectable()
export class PhonemeService {
  /**
   * Токены транскрипции в исходном порядке
   */
  tokenize(transcription: string): PhonemeToken[] {
    return tokenizeToArray(transcription);
  }

  /**
   * Полный разбор транскрипции: слова, ударения, гистограмма фонов
   */
  analyze(transcription: string): AnalysisReport {
    return analyzeTokens(tokenizeToArray(transcription));
  }

  /**
   * Фонетическое приближение произвольного текста (для фонетического поиска)
   */
  toPhones(text: string): string[] {
    return graphemesToPhones(text);
  }

  /**
   * Группы фонов по словам
   */
  phonemeGroups(sequence: string): string[] {
    return splitPhonemeGroups(sequence);
  }
}
