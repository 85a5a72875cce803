import { Controller, Get, Post, Body, Query } from '@nestjs/common';
import { PhonemeService } from './phoneme.service';
import { TranscriptionDto } from './dto';

@Controller('api/phoneme')
export class PhonemeController {
  constructor(private readonly phonemeService: PhonemeService) {}

  /**
   * POST /api/phoneme/tokenize
   * Токены транскрипции
   */
  @Post('tokenize')
  tokenize(@Body() dto: TranscriptionDto) {
    return this.phonemeService.tokenize(dto.transcription);
  }

  /**
   * POST /api/phoneme/analyze
   * Слова, ударения и частоты фонов
   */
  @Post('analyze')
  analyze(@Body() dto: TranscriptionDto) {
    return this.phonemeService.analyze(dto.transcription);
  }

  /**
   * GET /api/phoneme/groups?sequence=...
   * Группы фонов по словам
   */
  @Get('groups')
  phonemeGroups(@Query('sequence') sequence = '') {
    return { groups: this.phonemeService.phonemeGroups(sequence) };
  }

  /**
   * GET /api/phoneme/g2p?text=...
   * Приближённая фонетика текста
   */
  @Get('g2p')
  graphemesToPhones(@Query('text') text = '') {
    return {
      text,
      phones: this.phonemeService.toPhones(text),
    };
  }
}
