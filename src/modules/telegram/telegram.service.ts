import { HttpException, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf, Context, Markup } from 'telegraf';
import { message } from 'telegraf/filters';
import { MatcherService } from '../matcher/matcher.service';
import { CorpusService } from '../corpus/corpus.service';
import {
  formatAnalysis,
  formatCategoryListing,
  formatMatch,
  formatSearchResults,
  formatStats,
  truncateMessage,
} from './utils/reply-format';

// =====================================================
// КНОПКИ МЕНЮ
// =====================================================
const BUTTONS = {
  STATS: '📊 Stats',
  REPORT: '📋 Report',
  HELP: '❓ Help',
} as const;

const USAGE = {
  search: 'Usage: /search <text>',
  analyze: 'Usage: /analyze <sample id>',
  list: 'Usage: /list <category>',
};

@Injectable()
export class TelegramService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TelegramService.name);
  private bot: Telegraf | null = null;
  private readonly botName: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly matcherService: MatcherService,
    private readonly corpusService: CorpusService,
  ) {
    this.botName = this.configService.get<string>('BOT_NAME') || 'Utterance Bank';
  }

  async onModuleInit() {
    const token = this.configService.get<string>('TELEGRAM_BOT_TOKEN');
    if (!token) {
      this.logger.warn('TELEGRAM_BOT_TOKEN not set, bot disabled');
      return;
    }

    this.bot = new Telegraf(token);
    this.setupHandlers();
    await this.setupCommands();

    // launch() завершается только при остановке бота
    this.bot.launch().catch((error: unknown) => {
      this.logger.error(`Telegram bot stopped: ${describeError(error)}`);
    });
    this.logger.log(`Telegram bot "${this.botName}" started`);
  }

  onModuleDestroy() {
    if (this.bot) {
      this.bot.stop('SIGTERM');
    }
  }

  // =====================================================
  // REPLIES (строятся без Telegram)
  // =====================================================

  replyForText(text: string): string {
    return formatMatch(this.matcherService.findBestMatch(text));
  }

  replyForSearch(query: string): string {
    if (!query.trim()) return USAGE.search;
    return formatSearchResults(this.matcherService.searchAll(query));
  }

  replyForAnalyze(sampleId: string): string {
    if (!sampleId.trim()) return USAGE.analyze;
    return formatAnalysis(this.corpusService.analyzeSample(sampleId.trim()));
  }

  replyForList(category: string): string {
    if (!category.trim()) return USAGE.list;
    const name = category.trim();
    return formatCategoryListing(name, this.corpusService.listCategory(name));
  }

  replyForStats(): string {
    return formatStats(this.corpusService.getStats());
  }

  replyForReport(): string {
    return truncateMessage(this.corpusService.getReport());
  }

  helpMessage(): string {
    return [
      `${this.botName}: finds the recorded utterance closest to your phrase.`,
      '',
      'Just type a phrase to get the closest match, or:',
      '/search <text>: samples containing the text',
      '/analyze <id>: phoneme breakdown of a sample',
      '/list <category>: samples in a category',
      '/stats: corpus statistics',
      '/report: full corpus report',
    ].join('\n');
  }

  // =====================================================
  // HANDLERS
  // =====================================================

  private getMainKeyboard() {
    return Markup.keyboard([[BUTTONS.STATS, BUTTONS.REPORT], [BUTTONS.HELP]]).resize();
  }

  private async setupCommands() {
    if (!this.bot) return;

    await this.bot.telegram.setMyCommands([
      { command: 'search', description: 'Search samples by text' },
      { command: 'analyze', description: 'Phoneme breakdown of a sample' },
      { command: 'list', description: 'List samples in a category' },
      { command: 'stats', description: 'Corpus statistics' },
      { command: 'report', description: 'Corpus report' },
      { command: 'help', description: 'Help' },
    ]);
  }

  private setupHandlers() {
    if (!this.bot) return;

    this.bot.start((ctx) => ctx.reply(this.helpMessage(), this.getMainKeyboard()));
    this.bot.help((ctx) => ctx.reply(this.helpMessage()));

    this.bot.command('search', (ctx) => this.respond(ctx, 'search', () => this.replyForSearch(ctx.payload)));
    this.bot.command('analyze', (ctx) => this.respond(ctx, 'analyze', () => this.replyForAnalyze(ctx.payload)));
    this.bot.command('list', (ctx) => this.respond(ctx, 'list', () => this.replyForList(ctx.payload)));
    this.bot.command('stats', (ctx) => this.respond(ctx, 'stats', () => this.replyForStats()));
    this.bot.command('report', (ctx) => this.respond(ctx, 'report', () => this.replyForReport()));

    // Кнопки главного меню
    this.bot.hears(BUTTONS.STATS, (ctx) => this.respond(ctx, 'stats', () => this.replyForStats()));
    this.bot.hears(BUTTONS.REPORT, (ctx) => this.respond(ctx, 'report', () => this.replyForReport()));
    this.bot.hears(BUTTONS.HELP, (ctx) => ctx.reply(this.helpMessage()));

    // Любой другой текст: поиск ближайшей реплики
    this.bot.on(message('text'), (ctx) => {
      const text = ctx.message.text;
      if (text.startsWith('/')) {
        return ctx.reply(this.helpMessage());
      }
      return this.respond(ctx, 'match', () => this.replyForText(text));
    });
  }

  /**
   * Отвечает результатом или понятной ошибкой.
   * Доменные ошибки (нет реплики, категории) уходят пользователю как есть,
   * остальные логируются.
   */
  private async respond(ctx: Context, label: string, build: () => string) {
    let reply: string;
    try {
      reply = build();
    } catch (error) {
      if (error instanceof HttpException) {
        reply = `⚠️ ${error.message}`;
      } else {
        this.logger.error(`${label} failed: ${describeError(error)}`);
        reply = '😢 Something went wrong, try again later';
      }
    }

    await ctx.reply(reply);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
