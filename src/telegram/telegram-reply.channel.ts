import type { Context } from 'telegraf';
import type { BotReply, ReplyChannel } from '../conversation/conversation.types';
import { keyboardFor } from './telegram.keyboards';

export type ChatContext = Pick<Context, 'from' | 'reply' | 'replyWithDocument'>;

/** Renders flow replies into the chat the update came from. */
export class TelegramReplyChannel implements ReplyChannel {
  constructor(private readonly ctx: ChatContext) {}

  async send(reply: BotReply): Promise<void> {
    const reply_markup = reply.keyboard ? keyboardFor(reply.keyboard) : undefined;

    if (reply.kind === 'document') {
      await this.ctx.replyWithDocument(
        { source: reply.filePath, filename: reply.filename },
        { caption: reply.caption, reply_markup },
      );
      return;
    }

    await this.ctx.reply(reply.text, reply_markup ? { reply_markup } : undefined);
  }
}
