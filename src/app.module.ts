import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BullModule } from '@nestjs/bullmq';

// Модули приложения
import { PhonemeModule } from './modules/phoneme';
import { CorpusModule } from './modules/corpus';
import { MatcherModule } from './modules/matcher';
import { TelegramModule } from './modules/telegram/telegram.module';

@Module({
  imports: [
    // Загружает переменные окружения из .env файла
    ConfigModule.forRoot({
      isGlobal: true, // доступен во всех модулях без импорта
    }),

    // BullMQ для фоновой перезагрузки корпуса
    BullModule.forRoot({
      connection: {
        host: process.env.REDIS_HOST || 'localhost',
        port: parseInt(process.env.REDIS_PORT || '6379', 10),
      },
    }),

    PhonemeModule,
    CorpusModule,
    MatcherModule,
    TelegramModule,
  ],
})
export class AppModule {}
