import { Module } from '@nestjs/common';
import { AuditModule } from '../audit/audit.module';
import { DocumentsModule } from '../documents/documents.module';
import { DraftingModule } from '../drafting/drafting.module';
import { SessionsModule } from '../sessions/sessions.module';
import { ConversationFlowService } from './conversation-flow.service';

@Module({
  imports: [DraftingModule, DocumentsModule, SessionsModule, AuditModule],
  providers: [ConversationFlowService],
  exports: [ConversationFlowService],
})
export class ConversationModule {}
