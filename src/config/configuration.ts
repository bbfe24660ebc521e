import { registerAs } from '@nestjs/config';

export interface StorageConfig {
  bucket: string;
  kmsKeyName?: string;
  signedUrlTtlSeconds: number;
}

export interface OcrConfig {
  baseUrl: string;
  analyzePath: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryOnNotFound: boolean;
}

export interface ProcessingConfig {
  minConfidence: number;
  locationReviewThreshold: number;
  requiredFields: string[];
  defaultUserId: string;
}

const numberFrom = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const storageConfig = registerAs(
  'storage',
  (): StorageConfig => ({
    bucket: process.env.STORAGE_BUCKET ?? '',
    kmsKeyName: process.env.STORAGE_KMS_KEY_NAME || undefined,
    signedUrlTtlSeconds: numberFrom(process.env.STORAGE_SIGNED_URL_TTL_SECONDS, 3600),
  }),
);

export const ocrConfig = registerAs(
  'ocr',
  (): OcrConfig => ({
    baseUrl: process.env.OCR_SERVICE_URL || 'http://localhost:8000',
    analyzePath: process.env.OCR_ANALYZE_PATH || '/api/v1/ocr/analyze',
    timeoutMs: numberFrom(process.env.OCR_TIMEOUT_MS, 60_000),
    maxRetries: numberFrom(process.env.OCR_MAX_RETRIES, 3),
    retryBaseDelayMs: numberFrom(process.env.OCR_RETRY_BASE_DELAY_MS, 2000),
    retryOnNotFound: !['0', 'false', 'no', 'off'].includes(
      (process.env.OCR_RETRY_ON_NOT_FOUND ?? 'true').trim().toLowerCase(),
    ),
  }),
);

export const processingConfig = registerAs(
  'processing',
  (): ProcessingConfig => ({
    minConfidence: numberFrom(process.env.RECEIPT_MIN_CONFIDENCE, 0.5),
    locationReviewThreshold: numberFrom(process.env.RECEIPT_LOCATION_REVIEW_THRESHOLD, 0.5),
    requiredFields: (process.env.RECEIPT_REQUIRED_FIELDS ?? '')
      .split(',')
      .map(field => field.trim())
      .filter(field => field.length > 0),
    defaultUserId: process.env.DEFAULT_USER_ID || 'default-user',
  }),
);
