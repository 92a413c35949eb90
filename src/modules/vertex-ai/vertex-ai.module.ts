import { Module } from '@nestjs/common';
import { VertexAiService } from '../../infrastructure/vertex-ai/vertex-ai.service';
import { AI_TEXT_GENERATOR } from '../../domains/shared/ports/ai-text-generator.port';

@Module({
  providers: [
    VertexAiService,
    {
      provide: AI_TEXT_GENERATOR,
      useExisting: VertexAiService,
    },
  ],
  exports: [VertexAiService, AI_TEXT_GENERATOR],
})
export class VertexAiModule {}
