import { Processor, WorkerHost, OnWorkerEvent } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { Injectable, Logger } from '@nestjs/common';
import { CorpusService, ReloadResult } from './corpus.service';
import { CORPUS_QUEUE, ReloadJobData } from './corpus.constants';

@Injectable()
@Processor(CORPUS_QUEUE)
export class CorpusProcessor extends WorkerHost {
  private readonly logger = new Logger(CorpusProcessor.name);

  constructor(private readonly corpusService: CorpusService) {
    super();
  }

  async process(job: Job<ReloadJobData>): Promise<ReloadResult> {
    this.logger.log(`Processing job ${job.id}: reload ${job.data.path ?? 'configured corpus'}`);

    await job.updateProgress(10);
    const result = await this.corpusService.reloadFromFile(job.data.path);
    await job.updateProgress(100);

    return result;
  }

  @OnWorkerEvent('completed')
  onCompleted(job: Job<ReloadJobData, ReloadResult>) {
    this.logger.log(`Job ${job.id} completed: ${job.returnvalue.sampleCount} samples`);
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<ReloadJobData>, error: Error) {
    this.logger.error(`Job ${job.id} failed (attempt ${job.attemptsMade}): ${error.message}`);
  }
}
