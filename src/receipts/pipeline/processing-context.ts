import { Readable } from 'stream';
import { OcrAnalysis } from '../../ocr/ocr.types';
import { ReceiptLocation } from '../../storage/receipt-storage.service';
import { Receipt, ReceiptStatus } from '../interfaces/receipt.interface';
import { ValidationOutcome } from '../validation-gate';

export interface ReceiptUpload {
  userId: string;
  content: Buffer | Readable;
  contentType: string;
  filename: string;
}

/** State shared by the steps of one ingestion run. */
export interface ProcessingContext {
  readonly upload: ReceiptUpload;
  readonly location: ReceiptLocation;
  readonly signal?: AbortSignal;

  contentHash?: string;
  body?: Buffer;
  imageKey?: string;
  imageUrl?: string;
  analysis?: OcrAnalysis;
  outcome?: Extract<ValidationOutcome, { accepted: true }>;
  status: ReceiptStatus;
  rawSnapshotKey?: string;
  extractedSnapshotKey?: string;
  receipt?: Receipt;
}

export interface PipelineStep {
  readonly name: string;
  run(context: ProcessingContext): Promise<void>;
  /**
   * Undo or park what `run` left behind. Runs only after a terminal failure,
   * for completed steps and for the step that failed, which may have written
   * before it threw.
   */
  compensate?(context: ProcessingContext, reason: string): Promise<void>;
}
