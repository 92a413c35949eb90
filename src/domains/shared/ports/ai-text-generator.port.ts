export const AI_TEXT_GENERATOR = 'AiTextGeneratorPort';

export interface ImageInput {
  buffer: Buffer;
  mimeType: string;
  width?: number;
  height?: number;
}

export interface AiTextGeneratorPort {
  generateText(prompt: string): Promise<string>;

  /**
   * Generate text from a prompt with an attached image (for multimodal models).
   * The prompt is sent first, followed by the image bytes inline.
   */
  generateTextWithImage(prompt: string, image: ImageInput): Promise<string>;
}
