import { Receipt, ReceiptItem } from './interfaces/receipt.interface';
import { ReceiptItemRecord, ReceiptRecord } from './schemas/receipt.schema';

const itemToRecord = (item: ReceiptItem): ReceiptItemRecord => ({
  id: item.id,
  name: item.name,
  quantity: item.quantity,
  price: item.price,
  unitPrice: item.unitPrice,
  totalPrice: item.totalPrice,
  confidence: item.confidence,
});

const itemFromRecord = (record: ReceiptItemRecord): ReceiptItem => ({
  id: record.id,
  name: record.name,
  quantity: record.quantity,
  price: record.price,
  unitPrice: record.unitPrice ?? undefined,
  totalPrice: record.totalPrice ?? undefined,
  confidence: record.confidence ?? undefined,
});

export function itemsToRecords(items: ReceiptItem[]): ReceiptItemRecord[] {
  return items.map(itemToRecord);
}

export function toRecord(receipt: Receipt): ReceiptRecord {
  const { id, items, ...rest } = receipt;
  return { _id: id, ...rest, items: itemsToRecords(items) };
}

export function toReceipt(record: ReceiptRecord): Receipt {
  return {
    id: record._id,
    userId: record.userId,
    contentHash: record.contentHash,
    storeName: record.storeName ?? '',
    storeAddress: record.storeAddress ?? undefined,
    storePhoneNumber: record.storePhoneNumber ?? undefined,
    postalCode: record.postalCode ?? undefined,
    country: record.country ?? undefined,
    purchaseDate: record.purchaseDate ?? undefined,
    totalAmount: record.totalAmount ?? undefined,
    subtotalAmount: record.subtotalAmount ?? undefined,
    taxAmount: record.taxAmount ?? undefined,
    tipAmount: record.tipAmount ?? undefined,
    receiptType: record.receiptType ?? undefined,
    transactionId: record.transactionId ?? undefined,
    items: (record.items ?? []).map(itemFromRecord),
    imageKey: record.imageKey,
    originalFileName: record.originalFileName,
    contentType: record.contentType,
    ocrProvider: record.ocrProvider,
    ocrConfidence: record.ocrConfidence ?? undefined,
    locationConfidence: record.locationConfidence ?? undefined,
    extractionStrategy: record.extractionStrategy ?? undefined,
    status: record.status,
    isValidReceipt: record.isValidReceipt ?? undefined,
    validationConfidence: record.validationConfidence ?? undefined,
    validationMessage: record.validationMessage ?? undefined,
    requiresManualReview: record.requiresManualReview ?? false,
    createdAt: record.createdAt,
    processedAt: record.processedAt ?? undefined,
    updatedAt: record.updatedAt ?? undefined,
  };
}
