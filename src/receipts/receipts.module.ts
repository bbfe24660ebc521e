import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { processingConfig } from '../config/configuration';
import { OcrModule } from '../ocr/ocr.module';
import { StorageModule } from '../storage/storage.module';
import { FieldExtractor } from './extraction/field-extractor';
import { ImageHashService } from './image-hash.service';
import { MongooseReceiptRepository } from './mongoose-receipt.repository';
import { ReceiptRepository } from './receipt.repository';
import { ReceiptsController } from './receipts.controller';
import { ReceiptsService } from './receipts.service';
import { ReceiptRecord, ReceiptRecordSchema } from './schemas/receipt.schema';

@Module({
  imports: [
    ConfigModule.forFeature(processingConfig),
    MongooseModule.forFeature([{ name: ReceiptRecord.name, schema: ReceiptRecordSchema }]),
    StorageModule,
    OcrModule,
  ],
  controllers: [ReceiptsController],
  providers: [
    ImageHashService,
    { provide: ReceiptRepository, useClass: MongooseReceiptRepository },
    {
      provide: FieldExtractor,
      inject: [processingConfig.KEY],
      useFactory: (config: ConfigType<typeof processingConfig>) =>
        new FieldExtractor({ locationReviewThreshold: config.locationReviewThreshold }),
    },
    ReceiptsService,
  ],
})
export class ReceiptsModule {}
