import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { storageConfig } from '../config/configuration';
import { GcsObjectStore } from './gcs-object-store';
import { ObjectStore } from './object-store';
import { ReceiptStorageService } from './receipt-storage.service';

@Module({
  imports: [ConfigModule.forFeature(storageConfig)],
  providers: [
    {
      provide: ObjectStore,
      inject: [storageConfig.KEY],
      useFactory: (config: ConfigType<typeof storageConfig>) =>
        new GcsObjectStore({ bucket: config.bucket, kmsKeyName: config.kmsKeyName }),
    },
    ReceiptStorageService,
  ],
  exports: [ReceiptStorageService],
})
export class StorageModule {}
