import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { CorpusIndex, Sample } from './corpus.types';
import { buildIndex } from './utils/corpus-index';
import { loadCorpusFile, RejectedRecord } from './utils/corpus-loader';
import { getSample, listCategory, analyzeSample, SampleAnalysis } from './utils/corpus-queries';
import { getStats, buildReport, CorpusStats } from './utils/corpus-report';
import { CORPUS_QUEUE, DEFAULT_CORPUS_PATH, RELOAD_CORPUS_JOB, ReloadJobData } from './corpus.constants';

export interface ReloadResult {
  path: string;
  sampleCount: number;
  rejected: RejectedRecord[];
}

@Injectable()
export class CorpusService implements OnModuleInit {
  private readonly logger = new Logger(CorpusService.name);
  private readonly corpusPath: string;

  // Опубликованный индекс. Заменяется целиком, никогда не меняется на месте.
  private index: CorpusIndex = buildIndex([]);

  constructor(
    @InjectQueue(CORPUS_QUEUE) private readonly corpusQueue: Queue<ReloadJobData>,
    private readonly configService: ConfigService,
  ) {
    this.corpusPath = this.configService.get<string>('CORPUS_PATH') || DEFAULT_CORPUS_PATH;
  }

  async onModuleInit() {
    await this.reloadFromFile();
  }

  getIndex(): CorpusIndex {
    return this.index;
  }

  // =====================================================
  // LOADING
  // =====================================================

  /**
   * Строит новый индекс и публикует его одной заменой ссылки.
   * Запросы, уже получившие старый индекс, дорабатывают на нём.
   */
  publish(samples: readonly Sample[]): CorpusIndex {
    const next = buildIndex(samples);
    this.index = next;
    return next;
  }

  /**
   * Загружает корпус из файла и публикует новый индекс
   */
  async reloadFromFile(path = this.corpusPath): Promise<ReloadResult> {
    const { samples, rejected } = await loadCorpusFile(path);

    for (const record of rejected) {
      this.logger.warn(`Skipped record #${record.position} in ${path}: ${record.reason}`);
    }

    const index = this.publish(samples);
    this.logger.log(
      `Loaded ${index.entries.length} samples (${index.byCategory.size} categories) from ${path}`,
    );

    return { path, sampleCount: index.entries.length, rejected };
  }

  /**
   * Ставит перезагрузку в очередь (повторы при ошибках чтения делает очередь)
   */
  async queueReload(path?: string): Promise<{ jobId: string }> {
    const job = await this.corpusQueue.add(RELOAD_CORPUS_JOB, { path }, {
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
    });

    return { jobId: job.id || 'unknown' };
  }

  async getJobStatus(jobId: string) {
    const job = await this.corpusQueue.getJob(jobId);
    if (!job) return null;

    return {
      id: job.id,
      state: await job.getState(),
      progress: job.progress,
      data: job.data,
      result: job.returnvalue,
      failedReason: job.failedReason,
    };
  }

  // =====================================================
  // QUERIES
  // =====================================================

  getSample(id: string): Sample {
    return getSample(id, this.index);
  }

  listCategory(category: string): readonly Sample[] {
    return listCategory(category, this.index);
  }

  analyzeSample(id: string): SampleAnalysis {
    return analyzeSample(id, this.index);
  }

  getStats(): CorpusStats {
    return getStats(this.index);
  }

  getReport(): string {
    return buildReport(this.index);
  }
}
