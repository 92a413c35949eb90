import { registerAs } from '@nestjs/config';
import { tmpdir } from 'os';
import { resolve } from 'path';

export interface ImageFetchConfig {
  timeoutMs: number;
  maxBytes: number;
  /** URL protocols accepted for download, with trailing colon (e.g. `https:`). */
  allowedProtocols: string[];
  tempDir: string;
}

export default registerAs(
  'imageFetch',
  (): ImageFetchConfig => ({
    timeoutMs: parseInt(process.env.IMAGE_FETCH_TIMEOUT_MS || '10000', 10),
    maxBytes: parseInt(
      process.env.IMAGE_FETCH_MAX_BYTES || '10485760', // 10MB default
      10,
    ),
    allowedProtocols: (process.env.IMAGE_FETCH_ALLOWED_PROTOCOLS || 'http,https')
      .split(',')
      .map((protocol) => protocol.trim().toLowerCase())
      .filter((protocol) => protocol.length > 0)
      .map((protocol) => `${protocol.replace(/:$/, '')}:`),
    tempDir: resolve(process.env.IMAGE_TEMP_DIR || tmpdir()),
  }),
);
