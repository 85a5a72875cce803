import { Controller, Get, Post, Body, Param, NotFoundException } from '@nestjs/common';
import { CorpusService } from './corpus.service';
import { ReloadCorpusDto } from './dto';

@Controller('api/corpus')
export class CorpusController {
  constructor(private readonly corpusService: CorpusService) {}

  // =====================================================
  // STATS
  // =====================================================

  @Get('stats')
  getStats() {
    return this.corpusService.getStats();
  }

  @Get('report')
  getReport() {
    return { report: this.corpusService.getReport() };
  }

  // =====================================================
  // SAMPLES
  // =====================================================

  @Get('samples/:id')
  getSample(@Param('id') id: string) {
    return this.corpusService.getSample(id);
  }

  @Get('samples/:id/analysis')
  analyzeSample(@Param('id') id: string) {
    return this.corpusService.analyzeSample(id);
  }

  @Get('categories/:category')
  listCategory(@Param('category') category: string) {
    return this.corpusService.listCategory(category);
  }

  // =====================================================
  // RELOAD
  // =====================================================

  /**
   * POST /api/corpus/reload
   * Перечитывает файл корпуса сразу или через очередь
   */
  @Post('reload')
  async reload(@Body() dto: ReloadCorpusDto) {
    if (dto.async) {
      return this.corpusService.queueReload();
    }
    return this.corpusService.reloadFromFile();
  }

  @Get('job/:id')
  async getJobStatus(@Param('id') jobId: string) {
    const status = await this.corpusService.getJobStatus(jobId);

    if (!status) {
      throw new NotFoundException(`Job ${jobId} not found`);
    }

    return status;
  }
}
