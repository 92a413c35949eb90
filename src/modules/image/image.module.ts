import { Module } from '@nestjs/common';
import { ImageDownloaderService } from '../../infrastructure/image/image-downloader.service';
import { ImageDecoderService } from '../../infrastructure/image/image-decoder.service';

@Module({
  providers: [ImageDownloaderService, ImageDecoderService],
  exports: [ImageDownloaderService, ImageDecoderService],
})
export class ImageModule {}
