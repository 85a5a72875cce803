import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { CorpusService } from './corpus.service';
import { CorpusController } from './corpus.controller';
import { CorpusProcessor } from './corpus.processor';
import { CORPUS_QUEUE } from './corpus.constants';

@Module({
  imports: [
    // Очередь для фоновой перезагрузки корпуса
    BullModule.registerQueue({
      name: CORPUS_QUEUE,
    }),
  ],
  controllers: [CorpusController],
  providers: [CorpusService, CorpusProcessor],
  exports: [CorpusService],
})
export class CorpusModule {}
