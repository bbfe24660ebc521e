import { ReceiptStatus } from './interfaces/receipt.interface';

const ALLOWED_TRANSITIONS: Record<ReceiptStatus, readonly ReceiptStatus[]> = {
  [ReceiptStatus.PendingValidation]: [ReceiptStatus.Validated, ReceiptStatus.ValidationFailed],
  [ReceiptStatus.Validated]: [],
  [ReceiptStatus.ValidationFailed]: [],
};

export class InvalidStatusTransitionError extends Error {
  constructor(
    readonly from: ReceiptStatus,
    readonly to: ReceiptStatus,
  ) {
    super(`Receipt status cannot move from ${from} to ${to}`);
    this.name = 'InvalidStatusTransitionError';
  }
}

export function canTransition(from: ReceiptStatus, to: ReceiptStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

/** Returns `to`, or throws when the move would go backwards. */
export function transitionStatus(from: ReceiptStatus, to: ReceiptStatus): ReceiptStatus {
  if (!canTransition(from, to)) {
    throw new InvalidStatusTransitionError(from, to);
  }
  return to;
}
