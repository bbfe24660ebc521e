import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, mongo } from 'mongoose';
import { abortable } from '../common/abort';
import { Receipt, ReceiptUpdate } from './interfaces/receipt.interface';
import { itemsToRecords, toReceipt, toRecord } from './receipt.mapper';
import { DuplicateContentHashError, ReceiptRepository } from './receipt.repository';
import { ReceiptRecord } from './schemas/receipt.schema';

const DUPLICATE_KEY = 11000;

@Injectable()
export class MongooseReceiptRepository extends ReceiptRepository {
  private readonly logger = new Logger(MongooseReceiptRepository.name);

  constructor(@InjectModel(ReceiptRecord.name) private readonly receiptModel: Model<ReceiptRecord>) {
    super();
  }

  async create(receipt: Receipt, signal?: AbortSignal): Promise<Receipt> {
    try {
      await abortable(this.receiptModel.create(toRecord(receipt)), signal);
      return receipt;
    } catch (error) {
      if (error instanceof mongo.MongoServerError && error.code === DUPLICATE_KEY) {
        const existing = await this.findByContentHash(receipt.userId, receipt.contentHash);
        this.logger.warn(
          `Unique index rejected receipt ${receipt.id}; existing receipt ${existing?.id ?? 'unknown'} has the same content hash`,
        );
        throw new DuplicateContentHashError(receipt.userId, receipt.contentHash, existing?.id);
      }
      throw error;
    }
  }

  async findById(id: string, signal?: AbortSignal): Promise<Receipt | null> {
    const record = await abortable(this.receiptModel.findById(id).lean<ReceiptRecord>().exec(), signal);
    return record ? toReceipt(record) : null;
  }

  async findByContentHash(userId: string, contentHash: string, signal?: AbortSignal): Promise<Receipt | null> {
    const record = await abortable(
      this.receiptModel.findOne({ userId, contentHash }).lean<ReceiptRecord>().exec(),
      signal,
    );
    return record ? toReceipt(record) : null;
  }

  async findByUserId(userId: string, signal?: AbortSignal): Promise<Receipt[]> {
    const records = await abortable(
      this.receiptModel.find({ userId }).sort({ createdAt: -1 }).lean<ReceiptRecord[]>().exec(),
      signal,
    );
    return records.map(toReceipt);
  }

  async update(id: string, changes: ReceiptUpdate, signal?: AbortSignal): Promise<Receipt | null> {
    const { items, ...fields } = changes;
    const set: Partial<ReceiptRecord> = { ...fields, updatedAt: new Date() };
    if (items) {
      set.items = itemsToRecords(items);
    }

    const record = await abortable(
      this.receiptModel.findByIdAndUpdate(id, { $set: set }, { new: true }).lean<ReceiptRecord>().exec(),
      signal,
    );
    return record ? toReceipt(record) : null;
  }

  async delete(id: string, signal?: AbortSignal): Promise<boolean> {
    const result = await abortable(this.receiptModel.deleteOne({ _id: id }).exec(), signal);
    return result.deletedCount > 0;
  }
}
