import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { GenerationService } from './generation.service';
import { GenerateTextDto } from './dto/generate-text.dto';
import { ImageToTextDto } from './dto/image-to-text.dto';
import { GeneratedTextDto } from './dto/generated-text.dto';
import { redactUrl } from '../../common/utils/redact-url';

@Controller()
export class GenerationController {
  private readonly logger = new Logger(GenerationController.name);

  constructor(private readonly generationService: GenerationService) {}

  /** Generates text based on the provided prompt. */
  @Post('generate_text')
  @HttpCode(HttpStatus.OK)
  async generateText(@Body() input: GenerateTextDto): Promise<GeneratedTextDto> {
    this.logger.log(
      `Received text generation request: ${input.prompt.substring(0, 50)}...`,
    );
    return this.generationService.generateText(input.prompt);
  }

  /** Describes the contents of the image at the provided URL. */
  @Post('image_to_text')
  @HttpCode(HttpStatus.OK)
  async imageToText(@Body() input: ImageToTextDto): Promise<GeneratedTextDto> {
    this.logger.log(
      `Received image description request for ${redactUrl(input.url)}`,
    );
    return this.generationService.describeImage(input.url);
  }
}
