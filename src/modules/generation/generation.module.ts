import { Module } from '@nestjs/common';
import { GenerationController } from './generation.controller';
import { GenerationService } from './generation.service';
import { VertexAiModule } from '../vertex-ai/vertex-ai.module';
import { ImageModule } from '../image/image.module';

@Module({
  imports: [VertexAiModule, ImageModule],
  controllers: [GenerationController],
  providers: [GenerationService],
})
export class GenerationModule {}
