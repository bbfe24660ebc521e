import { Logger } from '@nestjs/common';
import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import { delay, isAbortError, OperationAbortedError } from '../common/abort';
import { OcrRequestError } from './ocr.errors';
import { OcrAnalysis, ocrAnalyzeResponseSchema } from './ocr.types';
import { backoffDelay, DEFAULT_RETRY_POLICY, isRetryableStatus, RetryPolicy } from './retry-policy';

/** The slice of an axios instance the client uses. */
export interface OcrHttpClient {
  post(url: string, data: unknown, config: AxiosRequestConfig): Promise<AxiosResponse<unknown>>;
}

interface AttemptFailure {
  reason: string;
  retryable: boolean;
  status?: number;
  body?: string;
  cause?: unknown;
}

const serializeBody = (body: unknown): string | undefined => {
  if (body === undefined || body === null || body === '') {
    return undefined;
  }
  if (typeof body === 'string') {
    return body;
  }
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
};

/**
 * Client for the receipt analysis service. Sends the signed image URL and
 * retries transient failures with exponential backoff.
 */
export class OcrClient {
  private readonly logger = new Logger(OcrClient.name);

  constructor(
    private readonly http: OcrHttpClient,
    private readonly retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly analyzePath = '/api/v1/ocr/analyze',
  ) {}

  async analyzeReceipt(imageUrl: string, signal?: AbortSignal): Promise<OcrAnalysis> {
    const maxAttempts = this.retryPolicy.retries + 1;
    let failure: AttemptFailure | undefined;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const waitMs = backoffDelay(this.retryPolicy, attempt - 1);
        this.logger.warn(
          `OCR request failed. Retry ${attempt - 1}/${this.retryPolicy.retries}. ` +
            `Waiting ${waitMs / 1000}s before next attempt. Reason: ${failure?.reason ?? 'unknown'}`,
        );
        await delay(waitMs, signal);
      }

      attempts = attempt;
      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.post(
          this.analyzePath,
          { image_url: imageUrl },
          { signal, validateStatus: () => true },
        );
      } catch (error) {
        if (axios.isCancel(error) || isAbortError(error) || signal?.aborted) {
          throw new OperationAbortedError('OCR request was cancelled');
        }
        failure = {
          reason: error instanceof Error ? error.message : String(error),
          retryable: true,
          cause: error,
        };
        continue;
      }

      if (response.status >= 200 && response.status < 300) {
        return this.parse(response.data, attempt, response.status);
      }

      failure = {
        reason: `HTTP ${response.status}`,
        retryable: isRetryableStatus(this.retryPolicy, response.status),
        status: response.status,
        body: serializeBody(response.data),
      };
      if (!failure.retryable) {
        break;
      }
    }

    this.logger.error(`OCR analysis failed after ${attempts} attempt(s): ${failure?.reason ?? 'unknown'}`);
    throw new OcrRequestError(
      `OCR analysis failed: ${failure?.reason ?? 'unknown error'}`,
      attempts,
      failure?.status,
      failure?.body,
      { cause: failure?.cause },
    );
  }

  private parse(body: unknown, attempt: number, status: number): OcrAnalysis {
    const rawBody = serializeBody(body) ?? '';
    const parsed = ocrAnalyzeResponseSchema.safeParse(body);

    if (!parsed.success) {
      throw new OcrRequestError(
        `OCR response did not match the expected format: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        attempt,
        status,
        rawBody,
      );
    }

    const { success, data, validation, error } = parsed.data;
    if (!success || !data) {
      throw new OcrRequestError(`OCR analysis failed${error ? `: ${error}` : ''}`, attempt, status, rawBody);
    }

    return {
      docType: data.doc_type ?? '',
      confidence: data.confidence ?? 0,
      fields: data.fields ?? {},
      metadata: data.metadata ?? {},
      validation: validation
        ? {
            isValidReceipt: validation.is_valid_receipt,
            confidence: validation.confidence,
            message: validation.message ?? '',
            docType: validation.doc_type ?? undefined,
          }
        : undefined,
      raw: data,
      rawBody,
    };
  }
}
