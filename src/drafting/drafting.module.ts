import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { DraftCacheService } from './draft-cache.service';
import { DraftingService } from './drafting.service';

@Module({
  imports: [AiModule],
  providers: [DraftCacheService, DraftingService],
  exports: [DraftingService, AiModule],
})
export class DraftingModule {}
