import { throwIfAborted } from '../../src/common/abort';
import { Receipt, ReceiptUpdate } from '../../src/receipts/interfaces/receipt.interface';
import { DuplicateContentHashError, ReceiptRepository } from '../../src/receipts/receipt.repository';

const clone = (receipt: Receipt): Receipt => ({
  ...receipt,
  items: receipt.items.map(item => ({ ...item })),
});

/** Repository over a Map with the same (userId, contentHash) uniqueness as the database. */
export class InMemoryReceiptRepository extends ReceiptRepository {
  readonly rows = new Map<string, Receipt>();
  /** Runs before `create` stores anything; lets a test insert a racing row. */
  beforeCreate?: (receipt: Receipt) => void;

  async create(receipt: Receipt, signal?: AbortSignal): Promise<Receipt> {
    throwIfAborted(signal);
    this.beforeCreate?.(receipt);
    const existing = this.find(receipt.userId, receipt.contentHash);
    if (existing) {
      throw new DuplicateContentHashError(receipt.userId, receipt.contentHash, existing.id);
    }
    this.rows.set(receipt.id, clone(receipt));
    return clone(receipt);
  }

  async findById(id: string, signal?: AbortSignal): Promise<Receipt | null> {
    throwIfAborted(signal);
    const row = this.rows.get(id);
    return row ? clone(row) : null;
  }

  async findByContentHash(userId: string, contentHash: string, signal?: AbortSignal): Promise<Receipt | null> {
    throwIfAborted(signal);
    const row = this.find(userId, contentHash);
    return row ? clone(row) : null;
  }

  async findByUserId(userId: string, signal?: AbortSignal): Promise<Receipt[]> {
    throwIfAborted(signal);
    return [...this.rows.values()]
      .filter(row => row.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(clone);
  }

  async update(id: string, changes: ReceiptUpdate, signal?: AbortSignal): Promise<Receipt | null> {
    throwIfAborted(signal);
    const row = this.rows.get(id);
    if (!row) {
      return null;
    }
    const updated = clone({ ...row, ...changes, updatedAt: new Date() });
    this.rows.set(id, updated);
    return clone(updated);
  }

  async delete(id: string, signal?: AbortSignal): Promise<boolean> {
    throwIfAborted(signal);
    return this.rows.delete(id);
  }

  private find(userId: string, contentHash: string): Receipt | undefined {
    return [...this.rows.values()].find(row => row.userId === userId && row.contentHash === contentHash);
  }
}
