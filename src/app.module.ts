import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validate } from './config/env.validation';
import { ConversationModule } from './conversation/conversation.module';
import { LoggingModule } from './shared/lib/logging/logging.module';
import { TelegramModule } from './telegram/telegram.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate }),
    LoggingModule,
    ConversationModule,
    TelegramModule,
  ],
})
export class AppModule {}
