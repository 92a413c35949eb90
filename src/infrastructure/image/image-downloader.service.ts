import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { open } from 'fs/promises';
import imageFetchConfig from '../../config/image-fetch.config';
import {
  ImageFetchException,
  ImageFetchTimeoutException,
  ImageTooLargeException,
  UnsupportedImageUrlException,
} from '../../common/exceptions/generation.exceptions';
import { redactUrl } from '../../common/utils/redact-url';

const MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface DownloadedFile {
  path: string;
  bytes: number;
  contentType: string | null;
}

@Injectable()
export class ImageDownloaderService {
  private readonly logger = new Logger(ImageDownloaderService.name);

  constructor(
    @Inject(imageFetchConfig.KEY)
    private readonly config: ConfigType<typeof imageFetchConfig>,
  ) {}

  /**
   * Streams the resource at `url` into `destination`.
   * Only the configured protocols are accepted, on the first request and on
   * every redirect hop. The timeout covers the whole transfer and the size
   * cap is enforced while streaming.
   */
  async download(url: string, destination: string): Promise<DownloadedFile> {
    const target = this.parseUrl(url);

    this.logger.log(`Downloading image from ${redactUrl(url)}`);

    const signal = AbortSignal.timeout(this.config.timeoutMs);
    try {
      const response = await this.fetchFollowingRedirects(url, target, signal);

      if (!response.ok) {
        await response.body?.cancel();
        throw new ImageFetchException(
          url,
          `HTTP ${response.status} ${response.statusText}`.trim(),
        );
      }

      const declaredLength = Number(response.headers.get('content-length'));
      if (Number.isFinite(declaredLength) && declaredLength > this.config.maxBytes) {
        await response.body?.cancel();
        throw new ImageTooLargeException(url, this.config.maxBytes);
      }

      if (!response.body) {
        throw new ImageFetchException(url, 'response has no body');
      }

      const bytes = await this.writeBody(url, response.body, destination);
      const contentType = response.headers.get('content-type');

      this.logger.log(
        `Downloaded ${bytes} bytes (${contentType ?? 'unknown type'}) from ${target.host}`,
      );

      return { path: destination, bytes, contentType };
    } catch (error) {
      throw this.toFetchError(url, error, signal);
    }
  }

  private async fetchFollowingRedirects(
    url: string,
    target: URL,
    signal: AbortSignal,
  ): Promise<Response> {
    let current = target;

    for (let hop = 0; ; hop++) {
      const response = await fetch(current, { signal, redirect: 'manual' });
      if (!REDIRECT_STATUSES.has(response.status)) {
        return response;
      }

      await response.body?.cancel();

      if (hop === MAX_REDIRECTS) {
        throw new ImageFetchException(url, `more than ${MAX_REDIRECTS} redirects`);
      }

      const location = response.headers.get('location');
      if (!location) {
        throw new ImageFetchException(
          url,
          `HTTP ${response.status} without a Location header`,
        );
      }

      current = this.parseUrl(new URL(location, current).toString());
      this.logger.log(`Following redirect to ${redactUrl(current.toString())}`);
    }
  }

  private parseUrl(url: string): URL {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      throw new UnsupportedImageUrlException(url, 'not an absolute URL');
    }

    if (!this.config.allowedProtocols.includes(target.protocol)) {
      throw new UnsupportedImageUrlException(
        url,
        `protocol ${target.protocol} is not allowed (allowed: ${this.config.allowedProtocols.join(', ')})`,
      );
    }

    return target;
  }

  private async writeBody(
    url: string,
    body: ReadableStream<Uint8Array>,
    destination: string,
  ): Promise<number> {
    const file = await open(destination, 'w');
    const reader = body.getReader();
    let total = 0;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }

        total += value.byteLength;
        if (total > this.config.maxBytes) {
          await reader.cancel();
          throw new ImageTooLargeException(url, this.config.maxBytes);
        }

        await file.write(value);
      }
    } finally {
      await file.close();
    }

    return total;
  }

  private toFetchError(url: string, error: unknown, signal: AbortSignal): Error {
    if (
      error instanceof UnsupportedImageUrlException ||
      error instanceof ImageFetchException ||
      error instanceof ImageTooLargeException
    ) {
      return error;
    }

    // A stalled body surfaces as a stream error rather than a TimeoutError.
    if (signal.aborted) {
      this.logger.warn(`Image download timed out after ${this.config.timeoutMs}ms`);
      return new ImageFetchTimeoutException(url, this.config.timeoutMs);
    }

    this.logger.error(`Image download from ${redactUrl(url)} failed`, error);
    const cause =
      error instanceof Error && error.cause instanceof Error
        ? error.cause.message
        : undefined;
    const reason = error instanceof Error ? error.message : String(error);
    return new ImageFetchException(url, cause ? `${reason} (${cause})` : reason);
  }
}
