import { readFileSync } from 'fs';
import { join } from 'path';
import { AxiosHeaders, AxiosRequestConfig, AxiosResponse, CanceledError } from 'axios';
import { OcrClient, OcrHttpClient } from '../../src/ocr/ocr.client';
import { OcrAnalysis } from '../../src/ocr/ocr.types';

export type FixtureName = 'ocr-response' | 'ocr-response-scalar-items' | 'ocr-response-not-a-receipt';

export function readFixture(name: FixtureName): unknown {
  return JSON.parse(readFileSync(join(__dirname, '..', 'fixtures', `${name}.json`), 'utf8'));
}

export function httpResponse(status: number, data: unknown): AxiosResponse<unknown> {
  return {
    status,
    statusText: '',
    data,
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

export interface RecordedRequest {
  url: string;
  data: unknown;
}

type ScriptEntry = AxiosResponse<unknown> | Error | 'hang';

/**
 * Plays back queued responses. A queued Error is thrown as a transport
 * failure; `hang` never answers and rejects once the request is aborted.
 */
export class ScriptedOcrHttp implements OcrHttpClient {
  readonly requests: RecordedRequest[] = [];
  private readonly script: ScriptEntry[] = [];

  reply(status: number, data: unknown): this {
    this.script.push(httpResponse(status, data));
    return this;
  }

  fail(error: Error): this {
    this.script.push(error);
    return this;
  }

  hang(): this {
    this.script.push('hang');
    return this;
  }

  async post(url: string, data: unknown, config: AxiosRequestConfig): Promise<AxiosResponse<unknown>> {
    this.requests.push({ url, data });
    const next = this.script.shift();
    if (!next) {
      throw new Error(`Unexpected OCR request to ${url}`);
    }
    if (next === 'hang') {
      return new Promise<AxiosResponse<unknown>>((_resolve, reject) => {
        config.signal?.addEventListener?.('abort', () => reject(new CanceledError()));
      });
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

/** Runs a fixture through the real client so tests see exactly what production parsing yields. */
export async function analysisFromBody(body: unknown): Promise<OcrAnalysis> {
  const http = new ScriptedOcrHttp().reply(200, body);
  return new OcrClient(http, { retries: 0, baseDelayMs: 0, retryOnNotFound: false }).analyzeReceipt(
    'https://storage.test/image.jpg',
  );
}

export function analysisFromFixture(name: FixtureName): Promise<OcrAnalysis> {
  return analysisFromBody(readFixture(name));
}

export function readFixtureObject(name: FixtureName): Record<string, unknown> {
  const value = readFixture(name);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Fixture ${name} is not a JSON object`);
  }
  return Object.fromEntries(Object.entries(value));
}
