import { Receipt, ReceiptUpdate } from './interfaces/receipt.interface';

/** Raised by `create` when (userId, contentHash) is already taken. */
export class DuplicateContentHashError extends Error {
  constructor(
    readonly userId: string,
    readonly contentHash: string,
    readonly existingReceiptId?: string,
  ) {
    super(`Receipt with content hash ${contentHash} already exists for user ${userId}`);
    this.name = 'DuplicateContentHashError';
  }
}

/**
 * Persistence port for receipts. Items are stored with and deleted with their
 * receipt. Implementations enforce uniqueness of (userId, contentHash).
 */
export abstract class ReceiptRepository {
  abstract create(receipt: Receipt, signal?: AbortSignal): Promise<Receipt>;

  abstract findById(id: string, signal?: AbortSignal): Promise<Receipt | null>;

  abstract findByContentHash(userId: string, contentHash: string, signal?: AbortSignal): Promise<Receipt | null>;

  abstract findByUserId(userId: string, signal?: AbortSignal): Promise<Receipt[]>;

  abstract update(id: string, changes: ReceiptUpdate, signal?: AbortSignal): Promise<Receipt | null>;

  abstract delete(id: string, signal?: AbortSignal): Promise<boolean>;
}
