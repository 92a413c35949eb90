import { registerAs } from '@nestjs/config';

export interface VertexAiConfig {
  projectId: string;
  region: string;
  modelId: string;
  /** Path to the service-account key file used to authenticate. */
  credentialsFile: string;
  requestTimeoutMs: number;
  verifyOnStartup: boolean;
}

export default registerAs(
  'vertexAi',
  (): VertexAiConfig => ({
    projectId: process.env.GCP_PROJECT_ID ?? '',
    region: process.env.VERTEX_REGION ?? 'us-central1',
    modelId: process.env.VERTEX_MODEL_ID ?? 'gemini-2.5-flash-lite',
    credentialsFile: process.env.GOOGLE_APPLICATION_CREDENTIALS ?? '',
    requestTimeoutMs: parseInt(
      process.env.VERTEX_REQUEST_TIMEOUT_MS || '60000',
      10,
    ),
    verifyOnStartup: process.env.VERTEX_VERIFY_ON_STARTUP !== 'false', // Enabled by default
  }),
);
