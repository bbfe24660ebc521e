import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { ReceiptStatus } from '../interfaces/receipt.interface';

@Schema({ _id: false })
export class ReceiptItemRecord {
  @Prop({ required: true })
  id!: string;

  @Prop({ default: '' })
  name!: string;

  @Prop({ required: true, default: 1 })
  quantity!: number;

  @Prop({ required: true, default: 0 })
  price!: number;

  @Prop()
  unitPrice?: number;

  @Prop()
  totalPrice?: number;

  @Prop()
  confidence?: number;
}

export const ReceiptItemRecordSchema = SchemaFactory.createForClass(ReceiptItemRecord);

@Schema({ collection: 'receipts', timestamps: false, versionKey: false })
export class ReceiptRecord {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true, index: true })
  userId!: string;

  @Prop({ required: true })
  contentHash!: string;

  @Prop({ default: '' })
  storeName!: string;

  @Prop()
  storeAddress?: string;

  @Prop()
  storePhoneNumber?: string;

  @Prop()
  postalCode?: string;

  @Prop()
  country?: string;

  @Prop()
  purchaseDate?: Date;

  @Prop()
  totalAmount?: number;

  @Prop()
  subtotalAmount?: number;

  @Prop()
  taxAmount?: number;

  @Prop()
  tipAmount?: number;

  @Prop()
  receiptType?: string;

  @Prop()
  transactionId?: string;

  @Prop({ type: [ReceiptItemRecordSchema], default: [] })
  items!: ReceiptItemRecord[];

  @Prop({ required: true })
  imageKey!: string;

  @Prop({ required: true })
  originalFileName!: string;

  @Prop({ required: true })
  contentType!: string;

  @Prop({ required: true })
  ocrProvider!: string;

  @Prop()
  ocrConfidence?: number;

  @Prop()
  locationConfidence?: number;

  @Prop()
  extractionStrategy?: string;

  @Prop({ type: String, enum: Object.values(ReceiptStatus), required: true })
  status!: ReceiptStatus;

  @Prop()
  isValidReceipt?: boolean;

  @Prop()
  validationConfidence?: number;

  @Prop()
  validationMessage?: string;

  @Prop({ default: false })
  requiresManualReview!: boolean;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop()
  processedAt?: Date;

  @Prop()
  updatedAt?: Date;
}

export const ReceiptRecordSchema = SchemaFactory.createForClass(ReceiptRecord);

// One receipt per uploaded image per user; a duplicate key error is the
// duplicate-upload signal.
ReceiptRecordSchema.index({ userId: 1, contentHash: 1 }, { unique: true });
ReceiptRecordSchema.index({ userId: 1, createdAt: -1 });
