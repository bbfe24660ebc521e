import 'reflect-metadata';
import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

// Implicit conversion has already turned any non-empty string into `true`,
// so read the raw value.
const toBoolean = ({ obj, key, value }: TransformFnParams): unknown => {
  const raw: unknown = obj[key];
  return typeof raw === 'string' ? ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase()) : value;
};

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  @IsNotEmpty()
  MONGODB_URI: string = 'mongodb://localhost/receipts';

  @IsString()
  @IsNotEmpty()
  STORAGE_BUCKET!: string;

  @IsOptional()
  @IsString()
  STORAGE_KMS_KEY_NAME?: string;

  @IsInt()
  @Min(60)
  @Max(7 * 24 * 3600)
  STORAGE_SIGNED_URL_TTL_SECONDS: number = 3600;

  @IsUrl({ require_tld: false })
  OCR_SERVICE_URL: string = 'http://localhost:8000';

  @IsString()
  OCR_ANALYZE_PATH: string = '/api/v1/ocr/analyze';

  @IsInt()
  @Min(1)
  OCR_TIMEOUT_MS: number = 60_000;

  @IsInt()
  @Min(0)
  @Max(10)
  OCR_MAX_RETRIES: number = 3;

  @IsInt()
  @Min(0)
  OCR_RETRY_BASE_DELAY_MS: number = 2000;

  @Transform(toBoolean)
  @IsBoolean()
  OCR_RETRY_ON_NOT_FOUND: boolean = true;

  @IsNumber()
  @Min(0)
  @Max(1)
  RECEIPT_MIN_CONFIDENCE: number = 0.5;

  @IsNumber()
  @Min(0)
  @Max(1)
  RECEIPT_LOCATION_REVIEW_THRESHOLD: number = 0.5;

  @IsString()
  RECEIPT_REQUIRED_FIELDS: string = '';

  @IsString()
  @IsNotEmpty()
  DEFAULT_USER_ID: string = 'default-user';
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
