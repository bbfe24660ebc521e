import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import axios from 'axios';
import { ocrConfig } from '../config/configuration';
import { OcrClient } from './ocr.client';

@Module({
  imports: [ConfigModule.forFeature(ocrConfig)],
  providers: [
    {
      provide: OcrClient,
      inject: [ocrConfig.KEY],
      useFactory: (config: ConfigType<typeof ocrConfig>) =>
        new OcrClient(
          axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers: { 'Content-Type': 'application/json' },
          }),
          {
            retries: config.maxRetries,
            baseDelayMs: config.retryBaseDelayMs,
            retryOnNotFound: config.retryOnNotFound,
          },
          config.analyzePath,
        ),
    },
  ],
  exports: [OcrClient],
})
export class OcrModule {}
