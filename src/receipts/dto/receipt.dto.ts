import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsDate,
  IsNumber,
  IsOptional,
  IsString,
  Min,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { ReceiptStatus } from '../interfaces/receipt.interface';

export class ReceiptItemDto {
  @ApiProperty({ description: 'Item identifier', example: '0b9d2c1e-4a57-4d8e-9f3a-2c61f0e8d7b5' })
  @IsString()
  id!: string;

  @ApiProperty({ description: 'Name of the item', example: 'Coffee' })
  @IsString()
  name!: string;

  @ApiProperty({ description: 'Quantity of the item', example: 1, default: 1 })
  @IsNumber()
  @Min(1)
  quantity!: number;

  @ApiProperty({ description: 'Line total of the item', example: 3.99 })
  @IsNumber()
  price!: number;

  @ApiProperty({ description: 'Unit price', example: 3.99, required: false })
  @IsOptional()
  @IsNumber()
  unitPrice?: number;

  @ApiProperty({ description: 'Line total as reported by OCR', example: 3.99, required: false })
  @IsOptional()
  @IsNumber()
  totalPrice?: number;

  @ApiProperty({ description: 'OCR confidence for the line', example: 0.93, required: false })
  @IsOptional()
  @IsNumber()
  confidence?: number;
}

export class UpdateReceiptDto {
  @ApiProperty({ description: 'Name of the store', example: 'Corner Cafe', required: false })
  @IsOptional()
  @IsString()
  @MinLength(1)
  storeName?: string;

  @ApiProperty({ description: 'Store address', example: '1 Main Street', required: false })
  @IsOptional()
  @IsString()
  storeAddress?: string;

  @ApiProperty({ description: 'Store phone number', example: '+1 555 0100', required: false })
  @IsOptional()
  @IsString()
  storePhoneNumber?: string;

  @ApiProperty({ description: 'Postal code', example: '10001', required: false })
  @IsOptional()
  @IsString()
  postalCode?: string;

  @ApiProperty({ description: 'Country', example: 'US', required: false })
  @IsOptional()
  @IsString()
  country?: string;

  @ApiProperty({ description: 'Date of purchase', example: '2024-03-05T00:00:00Z', required: false })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  purchaseDate?: Date;

  @ApiProperty({ description: 'Total amount of the receipt', example: 12.99, required: false })
  @IsOptional()
  @IsNumber()
  totalAmount?: number;

  @ApiProperty({ description: 'Subtotal before tax', example: 11.99, required: false })
  @IsOptional()
  @IsNumber()
  subtotalAmount?: number;

  @ApiProperty({ description: 'Tax amount', example: 1, required: false })
  @IsOptional()
  @IsNumber()
  taxAmount?: number;

  @ApiProperty({ description: 'Tip amount', example: 0, required: false })
  @IsOptional()
  @IsNumber()
  tipAmount?: number;

  @ApiProperty({
    description: 'Items on the receipt',
    type: [ReceiptItemDto],
    required: false,
    isArray: true,
  })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ReceiptItemDto)
  items?: ReceiptItemDto[];

  @ApiProperty({ description: 'Whether the receipt still needs a human check', required: false })
  @IsOptional()
  @IsBoolean()
  requiresManualReview?: boolean;
}

export class ReceiptResponseDto {
  @ApiProperty({ description: 'Unique identifier', example: '6f1c2d3e-0a4b-4c5d-8e9f-0a1b2c3d4e5f' })
  id!: string;

  @ApiProperty({ description: 'User ID', example: 'default-user' })
  userId!: string;

  @ApiProperty({ description: 'SHA-256 of the uploaded image' })
  contentHash!: string;

  @ApiProperty({ description: 'Name of the store', example: 'Corner Cafe' })
  storeName!: string;

  @ApiProperty({ required: false })
  storeAddress?: string;

  @ApiProperty({ required: false })
  storePhoneNumber?: string;

  @ApiProperty({ required: false })
  postalCode?: string;

  @ApiProperty({ required: false })
  country?: string;

  @ApiProperty({ description: 'Date of purchase', required: false, example: '2024-03-05T00:00:00Z' })
  purchaseDate?: Date;

  @ApiProperty({ required: false, example: 12.99 })
  totalAmount?: number;

  @ApiProperty({ required: false })
  subtotalAmount?: number;

  @ApiProperty({ required: false })
  taxAmount?: number;

  @ApiProperty({ required: false })
  tipAmount?: number;

  @ApiProperty({ required: false })
  receiptType?: string;

  @ApiProperty({ required: false })
  transactionId?: string;

  @ApiProperty({ type: [ReceiptItemDto], isArray: true })
  items!: ReceiptItemDto[];

  @ApiProperty({ description: 'Object key of the stored image' })
  imageKey!: string;

  @ApiProperty({ description: 'Time-limited URL of the stored image' })
  imageUrl!: string;

  @ApiProperty()
  originalFileName!: string;

  @ApiProperty({ example: 'image/jpeg' })
  contentType!: string;

  @ApiProperty({ example: 'document-intelligence' })
  ocrProvider!: string;

  @ApiProperty({ required: false })
  ocrConfidence?: number;

  @ApiProperty({ required: false })
  locationConfidence?: number;

  @ApiProperty({ required: false })
  extractionStrategy?: string;

  @ApiProperty({ enum: ReceiptStatus })
  status!: ReceiptStatus;

  @ApiProperty({ required: false })
  isValidReceipt?: boolean;

  @ApiProperty({ required: false })
  validationConfidence?: number;

  @ApiProperty({ required: false })
  validationMessage?: string;

  @ApiProperty()
  requiresManualReview!: boolean;

  @ApiProperty({ description: 'Ingestion timestamp' })
  createdAt!: Date;

  @ApiProperty({ required: false })
  processedAt?: Date;

  @ApiProperty({ required: false })
  updatedAt?: Date;
}

export class UploadReceiptResponseDto {
  @ApiProperty({ description: 'Status message', example: 'Receipt processed successfully' })
  message!: string;

  @ApiProperty({ description: 'Stored receipt', type: ReceiptResponseDto })
  receipt!: ReceiptResponseDto;
}

export class DuplicateReceiptResponseDto {
  @ApiProperty({ example: 409 })
  statusCode!: number;

  @ApiProperty({ example: 'This receipt has already been uploaded.' })
  message!: string;

  @ApiProperty({ description: 'Receipt created by the earlier upload' })
  existingReceiptId!: string;
}
