import { Module } from '@nestjs/common';
import { MatcherService } from './matcher.service';
import { MatcherController } from './matcher.controller';
import { CorpusModule } from '../corpus/corpus.module';

@Module({
  imports: [CorpusModule],
  controllers: [MatcherController],
  providers: [MatcherService],
  exports: [MatcherService],
})
export class MatcherModule {}
