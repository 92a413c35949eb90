import {
  BadGatewayException,
  BadRequestException,
  GatewayTimeoutException,
  PayloadTooLargeException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { redactUrl } from '../utils/redact-url';

// Errors raised while turning a URL into a model call. Each maps to the
// HTTP status a caller should see; the global filter writes the body.
// URLs are redacted to scheme, host and path before they reach a message.

export class UnsupportedImageUrlException extends BadRequestException {
  constructor(url: string, reason: string) {
    super(`Unsupported image URL "${redactUrl(url)}": ${reason}`);
  }
}

export class ImageFetchException extends BadGatewayException {
  constructor(url: string, reason: string) {
    super(`Failed to fetch image from ${redactUrl(url)}: ${reason}`);
  }
}

export class ImageFetchTimeoutException extends GatewayTimeoutException {
  constructor(url: string, timeoutMs: number) {
    super(
      `Timed out after ${timeoutMs}ms fetching image from ${redactUrl(url)}`,
    );
  }
}

export class ImageTooLargeException extends PayloadTooLargeException {
  constructor(url: string, maxBytes: number) {
    super(
      `Image at ${redactUrl(url)} exceeds the maximum size of ${maxBytes} bytes`,
    );
  }
}

export class ImageDecodeException extends UnprocessableEntityException {
  constructor(reason: string) {
    super(`Downloaded content is not a supported image: ${reason}`);
  }
}

export class ModelServiceException extends BadGatewayException {
  constructor(reason: string) {
    super(`Generative model request failed: ${reason}`);
  }
}
