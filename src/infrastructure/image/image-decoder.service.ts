import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import sharp from 'sharp';
import { ImageInput } from '../../domains/shared/ports/ai-text-generator.port';
import { ImageDecodeException } from '../../common/exceptions/generation.exceptions';

// Formats the model accepts as inline data without conversion.
const PASSTHROUGH_MIME_TYPES: Partial<Record<string, string>> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
};

@Injectable()
export class ImageDecoderService {
  private readonly logger = new Logger(ImageDecoderService.name);

  /**
   * Decodes the file at `filePath` as an image.
   * JPEG, PNG and WebP are returned as-is; any other format sharp can read
   * is re-encoded to PNG.
   */
  async decode(filePath: string): Promise<ImageInput> {
    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(filePath).metadata();
    } catch (error) {
      this.logger.warn(
        `Could not decode downloaded file: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new ImageDecodeException(
        error instanceof Error ? error.message : 'unknown format',
      );
    }

    const format = metadata.format;
    if (!format) {
      throw new ImageDecodeException('unknown format');
    }

    const passthroughMimeType = PASSTHROUGH_MIME_TYPES[format];
    if (passthroughMimeType) {
      return {
        buffer: await readFile(filePath),
        mimeType: passthroughMimeType,
        width: metadata.width,
        height: metadata.height,
      };
    }

    this.logger.log(`Converting ${format} image to png`);

    try {
      const buffer = await sharp(filePath).png().toBuffer();
      return {
        buffer,
        mimeType: 'image/png',
        width: metadata.width,
        height: metadata.height,
      };
    } catch (error) {
      throw new ImageDecodeException(
        error instanceof Error ? error.message : `cannot convert ${format}`,
      );
    }
  }
}
