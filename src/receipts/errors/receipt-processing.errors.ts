/**
 * Internal pipeline failures. They carry diagnostic context for logs and
 * failure records and must not be returned to API clients; the pipeline turns
 * them into {@link ReceiptIngestionError}.
 */
export abstract class ReceiptProcessingError extends Error {
  /** Prefix of the failure record reason. */
  abstract readonly reasonLabel: string;

  constructor(
    readonly receiptId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DuplicateReceiptError extends ReceiptProcessingError {
  readonly reasonLabel = 'Duplicate';

  constructor(
    receiptId: string,
    readonly existingReceiptId: string,
    readonly contentHash: string,
  ) {
    super(receiptId, `A receipt with the same image already exists. Existing receipt ID: ${existingReceiptId}`);
  }
}

export class OcrProcessingError extends ReceiptProcessingError {
  readonly reasonLabel = 'OCR failed';

  constructor(
    receiptId: string,
    message: string,
    readonly ocrResponse?: string,
    options?: { cause?: unknown },
  ) {
    super(receiptId, message, options);
  }
}

export class InvalidReceiptError extends ReceiptProcessingError {
  readonly reasonLabel = 'Invalid receipt';

  constructor(
    receiptId: string,
    readonly confidence: number,
    message: string,
  ) {
    super(receiptId, message);
  }
}

export class PoorImageQualityError extends ReceiptProcessingError {
  readonly reasonLabel = 'Poor quality';

  constructor(
    receiptId: string,
    readonly confidence: number,
  ) {
    super(
      receiptId,
      `Image quality is too poor for reliable OCR processing (confidence: ${Math.round(confidence * 100)}%)`,
    );
  }
}

export class MissingRequiredFieldsError extends ReceiptProcessingError {
  readonly reasonLabel = 'Missing fields';

  constructor(
    receiptId: string,
    readonly missingFields: string[],
  ) {
    super(receiptId, `Receipt is missing required fields: ${missingFields.join(', ')}`);
  }
}

export class ReceiptProcessingCancelledError extends ReceiptProcessingError {
  readonly reasonLabel = 'Cancelled';

  constructor(receiptId: string) {
    super(receiptId, 'Receipt processing was cancelled');
  }
}

export class UnexpectedProcessingError extends ReceiptProcessingError {
  readonly reasonLabel = 'Unexpected error';

  constructor(receiptId: string, cause: unknown) {
    super(receiptId, cause instanceof Error ? cause.message : String(cause), { cause });
  }
}

export type IngestionErrorKind =
  | 'duplicate'
  | 'ocr_failed'
  | 'invalid_receipt'
  | 'poor_image_quality'
  | 'missing_required_fields'
  | 'cancelled'
  | 'unexpected';

/** What crosses the service boundary: a kind, a user-safe message and ids. */
export class ReceiptIngestionError extends Error {
  constructor(
    readonly kind: IngestionErrorKind,
    message: string,
    readonly receiptId?: string,
    readonly existingReceiptId?: string,
  ) {
    super(message);
    this.name = 'ReceiptIngestionError';
  }
}
