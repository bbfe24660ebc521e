export interface ExceptionSummary {
  name: string;
  message: string;
  stack?: string;
  cause?: string;
}

/**
 * Forensic record written next to a quarantined upload. Only produced for
 * terminal failures after the original image reached storage.
 */
export interface FailureRecord {
  receiptId: string;
  userId: string;
  reason: string;
  failedAt: string;
  ocrResponse?: string;
  exception?: ExceptionSummary;
}
