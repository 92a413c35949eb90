/**
 * Test Application Factory
 *
 * Creates a NestJS test application with:
 * - VertexAiService mocked
 * - the same pipes, filters and middleware as main.ts
 *
 * Call createTestApp() in beforeAll (app bootstrap is done once) and
 * app.close() in afterAll.
 */
import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import { AppModule } from '../../src/app.module';
import { configureApp } from '../../src/app.setup';
import { VertexAiService } from '../../src/infrastructure/vertex-ai/vertex-ai.service';
import { ImageInput } from '../../src/domains/shared/ports/ai-text-generator.port';

/**
 * Mock implementation of VertexAiService.
 * All methods are jest.fn() for easy spying and per-test overrides.
 */
export const createMockVertexAiService = () => ({
  generateText: jest
    .fn<Promise<string>, [string]>()
    .mockResolvedValue('Mock AI response'),
  generateTextWithImage: jest
    .fn<Promise<string>, [string, ImageInput]>()
    .mockResolvedValue('Mock image description'),
  onApplicationBootstrap: jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
});

export type MockVertexAiService = ReturnType<typeof createMockVertexAiService>;

/**
 * Options for createTestApp
 */
export interface CreateTestAppOptions {
  /** Custom mock for VertexAiService */
  mockVertexAi?: MockVertexAiService;
}

export async function createTestApp(
  options: CreateTestAppOptions = {},
): Promise<{
  app: INestApplication;
  module: TestingModule;
  mocks: {
    vertexAi: MockVertexAiService;
  };
}> {
  const mockVertexAi = options.mockVertexAi || createMockVertexAiService();

  const module = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(VertexAiService)
    .useValue(mockVertexAi)
    .compile();

  const app = module.createNestApplication();

  // Matches production config in main.ts
  configureApp(app);

  await app.init();

  return {
    app,
    module,
    mocks: {
      vertexAi: mockVertexAi,
    },
  };
}
