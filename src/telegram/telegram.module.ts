import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import { ConversationModule } from '../conversation/conversation.module';
import { TELEGRAF_BOT, TelegramBotService } from './telegram-bot.service';

@Module({
  imports: [ConversationModule],
  providers: [
    {
      provide: TELEGRAF_BOT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => new Telegraf(config.getOrThrow<string>('BOT_TOKEN')),
    },
    TelegramBotService,
  ],
})
export class TelegramModule {}
