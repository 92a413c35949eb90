import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import {
  AI_TEXT_GENERATOR,
  AiTextGeneratorPort,
} from '../../domains/shared/ports/ai-text-generator.port';
import { ImageDownloaderService } from '../../infrastructure/image/image-downloader.service';
import { ImageDecoderService } from '../../infrastructure/image/image-decoder.service';
import imageFetchConfig from '../../config/image-fetch.config';
import { withTempFile } from '../../common/utils/temp-file';
import { GeneratedTextDto } from './dto/generated-text.dto';

export const IMAGE_DESCRIPTION_INSTRUCTION = 'What is in this photo?';

const TEMP_FILE_PREFIX = 'image-to-text-';

@Injectable()
export class GenerationService {
  private readonly logger = new Logger(GenerationService.name);

  constructor(
    @Inject(AI_TEXT_GENERATOR)
    private readonly aiTextGenerator: AiTextGeneratorPort,
    private readonly imageDownloader: ImageDownloaderService,
    private readonly imageDecoder: ImageDecoderService,
    @Inject(imageFetchConfig.KEY)
    private readonly imageConfig: ConfigType<typeof imageFetchConfig>,
  ) {}

  async generateText(prompt: string): Promise<GeneratedTextDto> {
    const generatedText = await this.aiTextGenerator.generateText(prompt);
    return { generated_text: generatedText };
  }

  /**
   * Downloads the image into a request-local temp file, decodes it and asks
   * the model to describe it. The temp file is removed on every exit path,
   * and the model is only called once decoding has succeeded.
   */
  async describeImage(url: string): Promise<GeneratedTextDto> {
    return withTempFile(
      this.imageConfig.tempDir,
      TEMP_FILE_PREFIX,
      async (filePath) => {
        const downloaded = await this.imageDownloader.download(url, filePath);
        const image = await this.imageDecoder.decode(downloaded.path);

        this.logger.log(
          `Describing ${image.mimeType} image (${image.width ?? '?'}x${image.height ?? '?'}) ` +
            `from ${downloaded.bytes} downloaded bytes served as ${downloaded.contentType ?? 'unknown type'}`,
        );

        const generatedText = await this.aiTextGenerator.generateTextWithImage(
          IMAGE_DESCRIPTION_INSTRUCTION,
          image,
        );
        return { generated_text: generatedText };
      },
    );
  }
}
