import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

// Config
import appConfig from './config/app.config';
import vertexAiConfig from './config/vertex-ai.config';
import imageFetchConfig from './config/image-fetch.config';
import { validate } from './config/env.validation';

// Modules
import { HealthModule } from './modules/health/health.module';
import { GenerationModule } from './modules/generation/generation.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, vertexAiConfig, imageFetchConfig],
      envFilePath: ['.env.local', '.env'],
      validate,
    }),

    // Feature Modules
    HealthModule,
    GenerationModule,
  ],
})
export class AppModule {}
