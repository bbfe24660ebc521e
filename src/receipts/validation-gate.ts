import { ValidationVerdict } from '../ocr/ocr.types';
import { ReceiptStatus } from './interfaces/receipt.interface';

export const DEFAULT_MIN_CONFIDENCE = 0.5;

export interface ValidationGateOptions {
  minConfidence: number;
}

export type ValidationOutcome =
  | { accepted: true; status: ReceiptStatus.Validated | ReceiptStatus.PendingValidation; verdict?: ValidationVerdict }
  | { accepted: false; reason: 'not_a_receipt' | 'poor_image_quality'; verdict: ValidationVerdict };

/**
 * Decides whether an analyzed upload may be persisted. A response without a
 * verdict is accepted but left pending for review.
 */
export function evaluateVerdict(
  verdict: ValidationVerdict | undefined,
  options: ValidationGateOptions = { minConfidence: DEFAULT_MIN_CONFIDENCE },
): ValidationOutcome {
  if (!verdict) {
    return { accepted: true, status: ReceiptStatus.PendingValidation };
  }
  if (!verdict.isValidReceipt) {
    return { accepted: false, reason: 'not_a_receipt', verdict };
  }
  if (verdict.confidence < options.minConfidence) {
    return { accepted: false, reason: 'poor_image_quality', verdict };
  }
  return { accepted: true, status: ReceiptStatus.Validated, verdict };
}
