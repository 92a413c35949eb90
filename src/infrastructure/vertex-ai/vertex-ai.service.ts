import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import {
  VertexAI,
  GenerativeModel,
  GenerateContentResult,
  Part,
} from '@google-cloud/vertexai';
import {
  AiTextGeneratorPort,
  ImageInput,
} from '../../domains/shared/ports/ai-text-generator.port';
import vertexAiConfig from '../../config/vertex-ai.config';
import { ModelServiceException } from '../../common/exceptions/generation.exceptions';

@Injectable()
export class VertexAiService
  implements AiTextGeneratorPort, OnApplicationBootstrap
{
  private readonly logger = new Logger(VertexAiService.name);
  private readonly vertexAI: VertexAI;
  private readonly model: GenerativeModel;

  constructor(
    @Inject(vertexAiConfig.KEY)
    private readonly config: ConfigType<typeof vertexAiConfig>,
  ) {
    this.logger.log(
      `Initializing Vertex AI with project: ${config.projectId}, region: ${config.region}, model: ${config.modelId}`,
    );

    this.vertexAI = new VertexAI({
      project: config.projectId,
      location: config.region,
      googleAuthOptions: {
        keyFilename: config.credentialsFile,
      },
    });

    this.model = this.vertexAI.getGenerativeModel(
      { model: config.modelId },
      { timeout: config.requestTimeoutMs },
    );
  }

  /**
   * Optionally spends one token-count call at startup so a rejected
   * credential stops the process before it accepts traffic.
   */
  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.verifyOnStartup) {
      return;
    }

    try {
      await this.model.countTokens({
        contents: [{ role: 'user', parts: [{ text: 'ping' }] }],
      });
      this.logger.log('Vertex AI credential verified');
    } catch (error) {
      this.logger.error('Vertex AI credential verification failed', error);
      throw error;
    }
  }

  async generateText(prompt: string): Promise<string> {
    this.logger.log(`Generating text for prompt: ${prompt.substring(0, 50)}...`);

    const text = await this.generate([{ text: prompt }]);

    this.logger.log(`Generated ${text.length} characters of text`);
    return text;
  }

  async generateTextWithImage(
    prompt: string,
    image: ImageInput,
  ): Promise<string> {
    this.logger.log(
      `Generating text with image (${image.mimeType}, ${image.buffer.length} bytes)`,
    );

    const text = await this.generate([
      { text: prompt },
      {
        inlineData: {
          mimeType: image.mimeType,
          data: image.buffer.toString('base64'),
        },
      },
    ]);

    this.logger.log(`Generated ${text.length} characters of text from image`);
    return text;
  }

  private async generate(parts: Part[]): Promise<string> {
    let response: GenerateContentResult;
    try {
      response = await this.model.generateContent({
        contents: [{ role: 'user', parts }],
      });
    } catch (error) {
      this.logger.error('Error calling Vertex AI', error);
      throw new ModelServiceException(
        error instanceof Error ? error.message : String(error),
      );
    }

    const candidates = response.response.candidates ?? [];
    const firstCandidate = candidates[0];

    if (!firstCandidate?.content?.parts?.length) {
      this.logger.warn('No candidates returned from Vertex AI');
      throw new ModelServiceException('model returned no candidates');
    }

    const text = firstCandidate.content.parts
      .map((part) => part.text ?? '')
      .join('');

    if (text.length === 0) {
      this.logger.warn(
        `Vertex AI candidate carried no text (finishReason: ${firstCandidate.finishReason ?? 'unknown'})`,
      );
      throw new ModelServiceException('model returned no text');
    }

    return text;
  }
}
