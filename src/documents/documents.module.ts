import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { DocumentExporterService } from './document-exporter.service';
import { RoleClassifierService } from './role-classifier.service';

@Module({
  imports: [AiModule],
  providers: [DocumentExporterService, RoleClassifierService],
  exports: [DocumentExporterService, RoleClassifierService],
})
export class DocumentsModule {}
