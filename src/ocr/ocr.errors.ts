/** Failure talking to the analysis service, after any retries. */
export class OcrRequestError extends Error {
  constructor(
    message: string,
    readonly attempts: number,
    readonly status?: number,
    readonly rawResponse?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'OcrRequestError';
  }
}
