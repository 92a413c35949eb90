import { IsNotEmpty, IsString } from 'class-validator';

/**
 * Scheme and reachability are checked by the downloader, which owns the
 * allowed-protocol list; here the field only has to be present.
 */
export class ImageToTextDto {
  @IsString()
  @IsNotEmpty()
  url!: string;
}
