import { BadRequestException } from '@nestjs/common';
import { createValidationPipe } from './app.setup';
import { GenerateTextDto } from './modules/generation/dto/generate-text.dto';
import { ImageToTextDto } from './modules/generation/dto/image-to-text.dto';

describe('createValidationPipe', () => {
  const pipe = createValidationPipe();

  it('should strip fields the DTO does not declare', async () => {
    const body = await pipe.transform(
      { prompt: 'x', extra: 1 },
      { type: 'body', metatype: GenerateTextDto },
    );

    expect(body).toBeInstanceOf(GenerateTextDto);
    expect(body).toEqual({ prompt: 'x' });
  });

  it('should strip unknown fields from image requests', async () => {
    const body = await pipe.transform(
      { url: 'https://images.test/cat.png', prompt: 'ignored' },
      { type: 'body', metatype: ImageToTextDto },
    );

    expect(body).toEqual({ url: 'https://images.test/cat.png' });
  });

  it('should still reject a body missing a declared field', async () => {
    await expect(
      pipe.transform({ extra: 1 }, { type: 'body', metatype: GenerateTextDto }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });
});
