import {
  Inject,
  Injectable,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { Telegraf } from 'telegraf';
import type { Context } from 'telegraf';
import { ConversationFlowService } from '../conversation/conversation-flow.service';
import { messages } from '../conversation/conversation.messages';
import type { ExternalEvent } from '../conversation/conversation.types';
import type { DraftingMode } from '../sessions/session.types';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';
import { ChatContext, TelegramReplyChannel } from './telegram-reply.channel';
import { CALLBACK_EVENTS, keyboardFor, MENU_CANCEL, MENU_CREATE_DOCUMENT } from './telegram.keyboards';

export const TELEGRAF_BOT = 'TELEGRAF_BOT';

export const HELP_TEXT = [
  '📚 Я составляю юридические документы по российскому праву.',
  '',
  '/getdoc: составить документ с уточняющими вопросами',
  '/autodoc: быстрый черновик без вопросов',
  '/smartdoc: вопросы и подсказки по сторонам договора',
  '/cancel: отменить текущий документ',
  '/help: эта справка',
].join('\n');

const MODE_COMMANDS: Record<string, DraftingMode> = {
  getdoc: 'guided',
  autodoc: 'auto',
  smartdoc: 'smart',
};

type CallbackContext = ChatContext & Pick<Context, 'answerCbQuery'>;

@Injectable()
export class TelegramBotService implements OnApplicationBootstrap, OnApplicationShutdown {
  private running = false;

  constructor(
    @Inject(TELEGRAF_BOT) private readonly bot: Telegraf,
    private readonly flow: ConversationFlowService,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  onApplicationBootstrap(): void {
    this.registerHandlers();

    this.running = true;
    void this.logger.log('🤖 Telegram bot polling started');
    // resolves only when polling stops
    this.bot.launch().catch((error: unknown) => {
      this.running = false;
      void this.logger.error(
        `Telegram polling stopped: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    });
  }

  onApplicationShutdown(signal?: string): void {
    if (!this.running) return;
    this.running = false;
    try {
      this.bot.stop(signal ?? 'shutdown');
      void this.logger.log(`🛑 Telegram bot stopped (${signal ?? 'shutdown'})`);
    } catch (error: unknown) {
      void this.logger.warn(
        `Telegram bot stop failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  registerHandlers(): void {
    this.bot.start((ctx) => this.onStart(ctx, 'guided'));
    for (const [command, mode] of Object.entries(MODE_COMMANDS)) {
      this.bot.command(command, (ctx) => this.onStart(ctx, mode));
    }
    this.bot.command('cancel', (ctx) => this.dispatch(ctx, { type: 'cancel' }));
    this.bot.command('help', (ctx) => this.onHelp(ctx));

    this.bot.hears(MENU_CREATE_DOCUMENT, (ctx) => this.onStart(ctx, 'smart'));
    this.bot.hears(MENU_CANCEL, (ctx) => this.dispatch(ctx, { type: 'cancel' }));

    for (const [data, event] of Object.entries(CALLBACK_EVENTS)) {
      this.bot.action(data, (ctx) => this.onAction(ctx, event));
    }

    this.bot.on('text', (ctx) => this.onText(ctx, ctx.message.text));

    this.bot.catch((error: unknown, ctx: Context) => {
      void this.logger.error(
        `Unhandled Telegram update ${ctx.updateType}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
        { userId: ctx.from?.id },
      );
    });
  }

  onStart(ctx: ChatContext, mode: DraftingMode): void {
    this.dispatch(ctx, { type: 'start', mode });
  }

  async onHelp(ctx: ChatContext): Promise<void> {
    await ctx.reply(HELP_TEXT, { reply_markup: keyboardFor('main_menu') });
  }

  async onAction(ctx: CallbackContext, event: ExternalEvent): Promise<void> {
    await ctx.answerCbQuery();
    this.dispatch(ctx, event);
  }

  async onText(ctx: ChatContext, text: string): Promise<void> {
    // unknown commands
    if (text.startsWith('/')) {
      await this.onHelp(ctx);
      return;
    }
    this.dispatch(ctx, { type: 'text', text });
  }

  /**
   * Polling waits for every handler, so the flow runs detached; otherwise
   * a /cancel could not arrive while a draft is being generated.
   */
  dispatch(ctx: ChatContext, event: ExternalEvent): void {
    const userId = ctx.from?.id;
    if (userId === undefined) return;

    void this.flow
      .handle(String(userId), event, new TelegramReplyChannel(ctx))
      .catch((error: unknown) => this.reportFailure(ctx, userId, error));
  }

  private async reportFailure(ctx: ChatContext, userId: number, error: unknown): Promise<void> {
    await this.logger.error(
      `Conversation failed for ${userId}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error.stack : undefined,
      { userId },
    );
    try {
      await ctx.reply(messages.generationFailed);
    } catch (replyError: unknown) {
      await this.logger.warn(
        `Could not notify ${userId}: ${replyError instanceof Error ? replyError.message : String(replyError)}`,
      );
    }
  }
}
