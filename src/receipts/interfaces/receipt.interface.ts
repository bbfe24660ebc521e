export enum ReceiptStatus {
  PendingValidation = 'pending_validation',
  Validated = 'validated',
  ValidationFailed = 'validation_failed',
}

export interface ReceiptItem {
  id: string;
  name: string;
  quantity: number;
  /** Line total when the service reported one, otherwise the unit price. */
  price: number;
  unitPrice?: number;
  totalPrice?: number;
  confidence?: number;
}

export interface Receipt {
  id: string;
  userId: string;
  contentHash: string;

  storeName: string;
  storeAddress?: string;
  storePhoneNumber?: string;
  postalCode?: string;
  country?: string;

  purchaseDate?: Date;
  totalAmount?: number;
  subtotalAmount?: number;
  taxAmount?: number;
  tipAmount?: number;
  receiptType?: string;
  transactionId?: string;

  items: ReceiptItem[];

  imageKey: string;
  originalFileName: string;
  contentType: string;

  ocrProvider: string;
  ocrConfidence?: number;
  locationConfidence?: number;
  extractionStrategy?: string;

  status: ReceiptStatus;
  isValidReceipt?: boolean;
  validationConfidence?: number;
  validationMessage?: string;
  requiresManualReview: boolean;

  createdAt: Date;
  processedAt?: Date;
  updatedAt?: Date;
}

export type ReceiptUpdate = Partial<
  Pick<
    Receipt,
    | 'storeName'
    | 'storeAddress'
    | 'storePhoneNumber'
    | 'postalCode'
    | 'country'
    | 'purchaseDate'
    | 'totalAmount'
    | 'subtotalAmount'
    | 'taxAmount'
    | 'tipAmount'
    | 'items'
    | 'requiresManualReview'
  >
>;
