import { Module } from '@nestjs/common';
import { TelegramService } from './telegram.service';
import { MatcherModule } from '../matcher/matcher.module';
import { CorpusModule } from '../corpus/corpus.module';

@Module({
  imports: [MatcherModule, CorpusModule],
  providers: [TelegramService],
  exports: [TelegramService],
})
export class TelegramModule {}
