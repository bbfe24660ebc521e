import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { elementsOf, entriesOf, scalarValue, toFieldNodes } from '../../ocr/ocr-field';
import { FieldNode, OcrAnalysis } from '../../ocr/ocr.types';
import { Receipt, ReceiptItem, ReceiptStatus } from '../interfaces/receipt.interface';
import { toDate, toNumber, toQuantity, toText } from './coerce';

export const UNKNOWN_STORE = 'Unknown Store';
export const DEFAULT_OCR_PROVIDER = 'document-intelligence';

/** Keys of the primary field map. */
const FIELD = {
  merchantName: 'MerchantName',
  merchantAddress: 'MerchantAddress',
  merchantPhone: 'MerchantPhoneNumber',
  transactionDate: 'TransactionDate',
  total: 'Total',
  subtotal: 'Subtotal',
  tax: 'TotalTax',
  tip: 'Tip',
  receiptType: 'ReceiptType',
  transactionId: 'TransactionId',
  items: 'Items',
} as const;

/** Keys of the location extractor's metadata map. */
const LOCATION = {
  merchantName: 'merchant_name',
  merchantAddress: 'merchant_address',
  merchantPhone: 'merchant_phone',
  postalCode: 'postal_code',
  country: 'country',
  confidence: ['location_confidence', 'tesseract_confidence'],
  strategy: 'extraction_strategy',
  provider: 'ocr_provider',
} as const;

/** Identity and storage facts known before extraction starts. */
export interface ReceiptSeed {
  id: string;
  userId: string;
  contentHash: string;
  imageKey: string;
  originalFileName: string;
  contentType: string;
  status: ReceiptStatus;
  createdAt: Date;
  isValidReceipt?: boolean;
  validationConfidence?: number;
  validationMessage?: string;
  requiresManualReview?: boolean;
}

export interface FieldExtractorOptions {
  /** Location confidence below this marks the receipt for manual review. */
  locationReviewThreshold: number;
  newItemId?: () => string;
}

export class FieldExtractor {
  private readonly logger = new Logger(FieldExtractor.name);
  private readonly newItemId: () => string;

  constructor(private readonly options: FieldExtractorOptions = { locationReviewThreshold: 0.5 }) {
    this.newItemId = options.newItemId ?? randomUUID;
  }

  extract(seed: ReceiptSeed, analysis: OcrAnalysis): Receipt {
    const fields = toFieldNodes(analysis.fields);
    const metadata = analysis.metadata;
    const text = (key: string) => toText(scalarValue(fields[key]));
    const amount = (key: string) => toNumber(scalarValue(fields[key]));

    this.logger.log(`Available OCR fields: ${Object.keys(fields).join(', ') || '(none)'}`);

    const merchantField = fields[FIELD.merchantName];
    if (merchantField?.source) {
      this.logger.log(`MerchantName extracted from: ${merchantField.source}. ReceiptId: ${seed.id}`);
    }

    const storeName = toText(metadata[LOCATION.merchantName]) ?? text(FIELD.merchantName) ?? '';
    const locationConfidence = this.firstNumber(metadata, LOCATION.confidence);

    const receipt: Receipt = {
      id: seed.id,
      userId: seed.userId,
      contentHash: seed.contentHash,

      storeName,
      storeAddress: toText(metadata[LOCATION.merchantAddress]) ?? text(FIELD.merchantAddress),
      storePhoneNumber: toText(metadata[LOCATION.merchantPhone]) ?? text(FIELD.merchantPhone),
      postalCode: toText(metadata[LOCATION.postalCode]),
      country: toText(metadata[LOCATION.country]),

      purchaseDate: toDate(scalarValue(fields[FIELD.transactionDate])),
      totalAmount: amount(FIELD.total),
      subtotalAmount: amount(FIELD.subtotal),
      taxAmount: amount(FIELD.tax),
      tipAmount: amount(FIELD.tip),
      receiptType: text(FIELD.receiptType),
      transactionId: text(FIELD.transactionId),

      items: this.extractItems(fields[FIELD.items], seed.id),

      imageKey: seed.imageKey,
      originalFileName: seed.originalFileName,
      contentType: seed.contentType,

      ocrProvider: toText(metadata[LOCATION.provider]) ?? DEFAULT_OCR_PROVIDER,
      ocrConfidence: analysis.confidence,
      locationConfidence,
      extractionStrategy: toText(metadata[LOCATION.strategy]),

      status: seed.status,
      isValidReceipt: seed.isValidReceipt,
      validationConfidence: seed.validationConfidence,
      validationMessage: seed.validationMessage,
      requiresManualReview: seed.requiresManualReview ?? false,

      createdAt: seed.createdAt,
    };

    const reviewReason = this.manualReviewReason(receipt, merchantField);
    if (reviewReason) {
      receipt.requiresManualReview = true;
      this.logger.warn(`Receipt marked for manual review: ${reviewReason}. ReceiptId: ${seed.id}`);
    }

    return receipt;
  }

  private manualReviewReason(receipt: Receipt, merchantField: FieldNode | undefined): string | undefined {
    if (merchantField?.requiresManualReview) {
      return `store name flagged by ${merchantField.source ?? 'extractor'}`;
    }
    if (!receipt.storeName || receipt.storeName === UNKNOWN_STORE) {
      return 'store name could not be detected';
    }
    if (
      receipt.locationConfidence !== undefined &&
      receipt.locationConfidence < this.options.locationReviewThreshold
    ) {
      return `low location confidence (${receipt.locationConfidence})`;
    }
    return undefined;
  }

  private firstNumber(metadata: Record<string, unknown>, keys: readonly string[]): number | undefined {
    for (const key of keys) {
      const value = toNumber(metadata[key]);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  private extractItems(node: FieldNode | undefined, receiptId: string): ReceiptItem[] {
    if (!node) {
      this.logger.warn(`Items field not found in OCR response. ReceiptId: ${receiptId}`);
      return [];
    }

    const elements = elementsOf(node);
    if (!elements || elements.length === 0) {
      this.logger.warn(`No items could be extracted from the receipt. ReceiptId: ${receiptId}`);
      return [];
    }

    const items: ReceiptItem[] = [];
    elements.forEach((element, index) => {
      try {
        const item = this.extractItem(element);
        if (item) {
          items.push(item);
          this.logger.debug(`Extracted item: ${item.name}, Qty: ${item.quantity}, Price: ${item.price}`);
        } else {
          this.logger.warn(`Skipping item ${index}: no item fields found. ReceiptId: ${receiptId}`);
        }
      } catch (error) {
        this.logger.error(
          `Error extracting item ${index} from receipt ${receiptId}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    });

    this.logger.log(`Extracted ${items.length} of ${elements.length} items. ReceiptId: ${receiptId}`);
    return items;
  }

  private extractItem(element: FieldNode): ReceiptItem | undefined {
    const entries = entriesOf(element);
    if (!entries || Object.keys(entries).length === 0) {
      return undefined;
    }

    const value = (key: string) => scalarValue(entries[key]);
    const totalPrice = toNumber(value('TotalPrice'));
    const unitPrice = toNumber(value('Price'));

    return {
      id: this.newItemId(),
      name: toText(value('Description')) ?? toText(value('Name')) ?? '',
      quantity: toQuantity(value('Quantity')),
      price: totalPrice ?? unitPrice ?? 0,
      unitPrice,
      totalPrice,
      confidence: element.confidence,
    };
  }
}
