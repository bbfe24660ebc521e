import { AxiosError } from 'axios';
import { readFixture, ScriptedOcrHttp } from '../../test/support/fixtures';
import { OcrClient } from './ocr.client';
import { OcrRequestError } from './ocr.errors';
import { RetryPolicy } from './retry-policy';

const IMAGE_URL = 'https://storage.test/users/u1/receipts/2024/03/05/r1/receipt.jpg';
const NO_WAIT: RetryPolicy = { retries: 3, baseDelayMs: 0, retryOnNotFound: true };

const timeout = () => new AxiosError('timeout of 60000ms exceeded', 'ECONNABORTED');

const failureOf = async (promise: Promise<unknown>): Promise<OcrRequestError> => {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason,
  );
  if (!(error instanceof OcrRequestError)) {
    throw new Error(`Expected OcrRequestError, got ${String(error)}`);
  }
  return error;
};

describe('OcrClient', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('posts the image URL and maps the response', async () => {
    const body = readFixture('ocr-response');
    const http = new ScriptedOcrHttp().reply(200, body);
    const client = new OcrClient(http, NO_WAIT);

    const analysis = await client.analyzeReceipt(IMAGE_URL);

    expect(http.requests).toEqual([{ url: '/api/v1/ocr/analyze', data: { image_url: IMAGE_URL } }]);
    expect(analysis.docType).toBe('receipt');
    expect(analysis.confidence).toBe(0.92);
    expect(analysis.validation).toEqual({
      isValidReceipt: true,
      confidence: 0.93,
      message: 'Valid receipt',
      docType: 'receipt',
    });
    expect(Object.keys(analysis.fields)).toContain('Items');
    expect(analysis.metadata).toMatchObject({ postal_code: '12345', country: 'US' });
    expect(analysis.rawBody).toBe(JSON.stringify(body));
  });

  it('uses the configured path', async () => {
    const http = new ScriptedOcrHttp().reply(200, readFixture('ocr-response'));
    await new OcrClient(http, NO_WAIT, '/v2/analyze').analyzeReceipt(IMAGE_URL);
    expect(http.requests[0].url).toBe('/v2/analyze');
  });

  it('leaves the verdict out when the service sends none', async () => {
    const http = new ScriptedOcrHttp().reply(200, { success: true, data: { doc_type: 'receipt', fields: {} } });
    const analysis = await new OcrClient(http, NO_WAIT).analyzeReceipt(IMAGE_URL);
    expect(analysis.validation).toBeUndefined();
    expect(analysis.confidence).toBe(0);
  });

  it('retries server errors until one succeeds', async () => {
    const http = new ScriptedOcrHttp()
      .reply(503, 'unavailable')
      .reply(500, { error: 'boom' })
      .reply(200, readFixture('ocr-response'));

    const analysis = await new OcrClient(http, NO_WAIT).analyzeReceipt(IMAGE_URL);

    expect(analysis.docType).toBe('receipt');
    expect(http.requests).toHaveLength(3);
  });

  it('retries 404 and transport errors', async () => {
    const http = new ScriptedOcrHttp()
      .reply(404, 'image not found')
      .fail(timeout())
      .reply(200, readFixture('ocr-response'));

    await new OcrClient(http, NO_WAIT).analyzeReceipt(IMAGE_URL);

    expect(http.requests).toHaveLength(3);
  });

  it('does not retry 404 when told not to', async () => {
    const http = new ScriptedOcrHttp().reply(404, 'image not found');
    const error = await failureOf(
      new OcrClient(http, { ...NO_WAIT, retryOnNotFound: false }).analyzeReceipt(IMAGE_URL),
    );
    expect(error.attempts).toBe(1);
    expect(error.status).toBe(404);
  });

  it('gives up at once on other client errors and keeps the body', async () => {
    const http = new ScriptedOcrHttp().reply(400, { detail: 'image_url must be https' });

    const error = await failureOf(new OcrClient(http, NO_WAIT).analyzeReceipt(IMAGE_URL));

    expect(http.requests).toHaveLength(1);
    expect(error.status).toBe(400);
    expect(error.attempts).toBe(1);
    expect(error.rawResponse).toBe('{"detail":"image_url must be https"}');
    expect(error.message).toBe('OCR analysis failed: HTTP 400');
  });

  it('fails without retrying when the service reports success=false', async () => {
    const body = { success: false, error: 'model unavailable' };
    const http = new ScriptedOcrHttp().reply(200, body);

    const error = await failureOf(new OcrClient(http, NO_WAIT).analyzeReceipt(IMAGE_URL));

    expect(http.requests).toHaveLength(1);
    expect(error.message).toBe('OCR analysis failed: model unavailable');
    expect(error.rawResponse).toBe(JSON.stringify(body));
  });

  it('rejects a body that does not match the wire format', async () => {
    const http = new ScriptedOcrHttp().reply(200, { success: 'yes' });
    const error = await failureOf(new OcrClient(http, NO_WAIT).analyzeReceipt(IMAGE_URL));
    expect(error.message).toMatch(/^OCR response did not match the expected format/);
    expect(error.rawResponse).toBe('{"success":"yes"}');
  });

  it('waits 2s, 4s and 8s between attempts before giving up', async () => {
    jest.useFakeTimers();
    const http = new ScriptedOcrHttp().fail(timeout()).fail(timeout()).fail(timeout()).fail(timeout());
    const client = new OcrClient(http);

    const pending = failureOf(client.analyzeReceipt(IMAGE_URL));

    await jest.advanceTimersByTimeAsync(1999);
    expect(http.requests).toHaveLength(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(http.requests).toHaveLength(2);
    await jest.advanceTimersByTimeAsync(3999);
    expect(http.requests).toHaveLength(2);
    await jest.advanceTimersByTimeAsync(1);
    expect(http.requests).toHaveLength(3);
    await jest.advanceTimersByTimeAsync(8000);
    expect(http.requests).toHaveLength(4);

    const error = await pending;
    expect(error.attempts).toBe(4);
    expect(error.message).toBe('OCR analysis failed: timeout of 60000ms exceeded');
  });

  it('stops when the caller aborts an in-flight request', async () => {
    const http = new ScriptedOcrHttp().hang();
    const controller = new AbortController();

    const pending = new OcrClient(http, NO_WAIT).analyzeReceipt(IMAGE_URL, controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
    expect(http.requests).toHaveLength(1);
  });

  it('stops when the caller aborts during backoff', async () => {
    jest.useFakeTimers();
    const http = new ScriptedOcrHttp().reply(503, 'unavailable');
    const controller = new AbortController();

    const pending = new OcrClient(http).analyzeReceipt(IMAGE_URL, controller.signal);
    const outcome = expect(pending).rejects.toMatchObject({ name: 'AbortError' });
    await jest.advanceTimersByTimeAsync(1000);
    controller.abort();

    await outcome;
    expect(http.requests).toHaveLength(1);
  });
});
