import { ValidationVerdict } from '../ocr/ocr.types';
import { ReceiptStatus } from './interfaces/receipt.interface';
import { evaluateVerdict } from './validation-gate';

const verdict = (isValidReceipt: boolean, confidence: number): ValidationVerdict => ({
  isValidReceipt,
  confidence,
  message: isValidReceipt ? 'Valid receipt' : 'Not a receipt',
});

describe('evaluateVerdict', () => {
  it.each([0, 0.49, 0.5, 0.51, 1])('rejects an invalid receipt as not a receipt at confidence %p', confidence => {
    expect(evaluateVerdict(verdict(false, confidence))).toEqual({
      accepted: false,
      reason: 'not_a_receipt',
      verdict: verdict(false, confidence),
    });
  });

  it.each([0, 0.25, 0.49, 0.4999])('rejects a valid receipt with confidence %p as poor quality', confidence => {
    const outcome = evaluateVerdict(verdict(true, confidence));
    expect(outcome).toEqual({ accepted: false, reason: 'poor_image_quality', verdict: verdict(true, confidence) });
  });

  it.each([0.5, 0.5001, 0.51, 0.9, 1])('accepts a valid receipt with confidence %p', confidence => {
    const outcome = evaluateVerdict(verdict(true, confidence));
    expect(outcome).toEqual({ accepted: true, status: ReceiptStatus.Validated, verdict: verdict(true, confidence) });
  });

  it('leaves a response without a verdict pending', () => {
    expect(evaluateVerdict(undefined)).toEqual({ accepted: true, status: ReceiptStatus.PendingValidation });
  });

  it('honours a configured threshold', () => {
    expect(evaluateVerdict(verdict(true, 0.7), { minConfidence: 0.8 })).toMatchObject({
      accepted: false,
      reason: 'poor_image_quality',
    });
    expect(evaluateVerdict(verdict(true, 0.8), { minConfidence: 0.8 })).toMatchObject({ accepted: true });
  });
});
