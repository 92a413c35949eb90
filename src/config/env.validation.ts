import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Environment contract checked once at startup by ConfigModule.
 * The service cannot reach the model without a project and a credential,
 * so both are required here rather than discovered on the first request.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT?: number;

  @IsString()
  @IsNotEmpty()
  GCP_PROJECT_ID!: string;

  @IsString()
  @IsNotEmpty()
  GOOGLE_APPLICATION_CREDENTIALS!: string;

  @IsOptional()
  @IsString()
  VERTEX_REGION?: string;

  @IsOptional()
  @IsString()
  VERTEX_MODEL_ID?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  VERTEX_REQUEST_TIMEOUT_MS?: number;

  @IsOptional()
  @IsIn(['true', 'false'])
  VERTEX_VERIFY_ON_STARTUP?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  IMAGE_FETCH_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  IMAGE_FETCH_MAX_BYTES?: number;

  @IsOptional()
  @IsString()
  IMAGE_FETCH_ALLOWED_PROTOCOLS?: string;

  @IsOptional()
  @IsString()
  IMAGE_TEMP_DIR?: string;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
