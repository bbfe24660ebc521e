import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { isAbortError } from '../common/abort';
import { processingConfig } from '../config/configuration';
import { OcrClient } from '../ocr/ocr.client';
import { OcrRequestError } from '../ocr/ocr.errors';
import { imageKey, ReceiptLocation, ReceiptStorageService } from '../storage/receipt-storage.service';
import {
  DuplicateReceiptError,
  IngestionErrorKind,
  InvalidReceiptError,
  MissingRequiredFieldsError,
  OcrProcessingError,
  PoorImageQualityError,
  ReceiptIngestionError,
  ReceiptProcessingCancelledError,
  ReceiptProcessingError,
  UnexpectedProcessingError,
} from './errors/receipt-processing.errors';
import { FieldExtractor } from './extraction/field-extractor';
import { ImageHashService } from './image-hash.service';
import { ExceptionSummary, FailureRecord } from './interfaces/failure-record.interface';
import { Receipt, ReceiptStatus, ReceiptUpdate } from './interfaces/receipt.interface';
import { PipelineStep, ProcessingContext, ReceiptUpload } from './pipeline/processing-context';
import { DuplicateContentHashError, ReceiptRepository } from './receipt.repository';
import { transitionStatus } from './receipt-status';
import { evaluateVerdict } from './validation-gate';

const REQUIRED_FIELD_CHECKS: Record<string, (receipt: Receipt) => boolean> = {
  storeName: receipt => receipt.storeName.length > 0,
  storeAddress: receipt => !!receipt.storeAddress,
  storePhoneNumber: receipt => !!receipt.storePhoneNumber,
  purchaseDate: receipt => receipt.purchaseDate !== undefined,
  totalAmount: receipt => receipt.totalAmount !== undefined,
  subtotalAmount: receipt => receipt.subtotalAmount !== undefined,
  taxAmount: receipt => receipt.taxAmount !== undefined,
  tipAmount: receipt => receipt.tipAmount !== undefined,
  receiptType: receipt => !!receipt.receiptType,
  transactionId: receipt => !!receipt.transactionId,
  items: receipt => receipt.items.length > 0,
};

const USER_MESSAGES: Record<IngestionErrorKind, string> = {
  duplicate: 'This receipt has already been uploaded.',
  ocr_failed:
    'Failed to process receipt. The image may not contain a valid receipt or is too unclear to read.',
  invalid_receipt: 'The uploaded image is not a valid receipt.',
  poor_image_quality:
    'Image quality is too poor to read the receipt. Please take a clearer photo with good lighting.',
  missing_required_fields: 'Receipt is missing required information. Please upload a complete receipt.',
  cancelled: 'Receipt processing was cancelled.',
  unexpected:
    'An unexpected error occurred while processing your receipt. Please try again or contact support if the problem persists.',
};

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

@Injectable()
export class ReceiptsService {
  private readonly logger = new Logger(ReceiptsService.name);
  private readonly steps: PipelineStep[];

  constructor(
    private readonly imageHashService: ImageHashService,
    private readonly receiptRepository: ReceiptRepository,
    private readonly storage: ReceiptStorageService,
    private readonly ocrClient: OcrClient,
    private readonly fieldExtractor: FieldExtractor,
    @Inject(processingConfig.KEY) private readonly config: ConfigType<typeof processingConfig>,
  ) {
    for (const field of config.requiredFields) {
      if (!REQUIRED_FIELD_CHECKS[field]) {
        this.logger.warn(`Ignoring unknown required receipt field: ${field}`);
      }
    }
    this.steps = this.buildSteps();
  }

  async findAll(userId: string): Promise<Receipt[]> {
    return this.receiptRepository.findByUserId(userId);
  }

  async findOne(id: string, userId: string): Promise<Receipt> {
    const receipt = await this.receiptRepository.findById(id);
    if (!receipt || receipt.userId !== userId) {
      throw new NotFoundException(`Receipt with ID ${id} not found`);
    }
    return receipt;
  }

  async update(id: string, userId: string, changes: ReceiptUpdate): Promise<Receipt> {
    await this.findOne(id, userId);
    const updated = await this.receiptRepository.update(id, changes);
    if (!updated) {
      throw new NotFoundException(`Receipt with ID ${id} not found`);
    }
    return updated;
  }

  /** Deletes the receipt row and every live object stored for it. */
  async remove(id: string, userId: string): Promise<Receipt> {
    const receipt = await this.findOne(id, userId);
    const deleted = await this.receiptRepository.delete(id);
    if (!deleted) {
      throw new NotFoundException(`Receipt with ID ${id} not found`);
    }
    await this.storage.deleteAll({ userId, receiptId: id, ingestedAt: receipt.createdAt });
    return receipt;
  }

  getImageUrl(receipt: Receipt): Promise<string> {
    return this.storage.getImageUrl(receipt.imageKey);
  }

  /**
   * Runs one upload through hash, duplicate lookup, upload, analysis,
   * validation, raw snapshot, extraction, extracted snapshot and persistence.
   * Failures surface as {@link ReceiptIngestionError}.
   */
  async processReceipt(upload: ReceiptUpload, signal?: AbortSignal): Promise<Receipt> {
    const location: ReceiptLocation = {
      userId: upload.userId,
      receiptId: randomUUID(),
      ingestedAt: new Date(),
    };
    const context: ProcessingContext = {
      upload,
      location,
      signal,
      status: ReceiptStatus.PendingValidation,
    };
    const completed: PipelineStep[] = [];
    let current: PipelineStep | undefined;

    this.logger.log(
      `Starting receipt processing. ReceiptId: ${location.receiptId}, UserId: ${upload.userId}, Filename: ${upload.filename}`,
    );

    try {
      for (const [index, step] of this.steps.entries()) {
        if (signal?.aborted) {
          throw new ReceiptProcessingCancelledError(location.receiptId);
        }
        this.logger.log(`Step ${index + 1}/${this.steps.length}: ${step.name}. ReceiptId: ${location.receiptId}`);
        current = step;
        await step.run(context);
        completed.push(step);
        current = undefined;
      }
    } catch (error) {
      throw await this.handleFailure(context, current ? [...completed, current] : completed, error);
    }

    if (!context.receipt) {
      throw new ReceiptIngestionError('unexpected', USER_MESSAGES.unexpected, location.receiptId);
    }
    this.logger.log(`Receipt processing completed successfully. ReceiptId: ${location.receiptId}`);
    return context.receipt;
  }

  private buildSteps(): PipelineStep[] {
    const quarantineKey = (pick: (context: ProcessingContext) => string | undefined) =>
      async (context: ProcessingContext, reason: string) => {
        const key = pick(context);
        if (key) {
          await this.storage.quarantine(context.location, key, reason);
        }
      };

    return [
      {
        name: 'Computing image hash',
        run: async context => {
          const { hash, body } = await this.imageHashService.computeHash(context.upload.content, context.signal);
          context.contentHash = hash;
          context.body = body;
          this.logger.log(`Image hash computed: ${hash}, ReceiptId: ${context.location.receiptId}`);
        },
      },
      {
        name: 'Checking for duplicate receipt',
        run: async context => {
          const hash = this.require(context.contentHash, 'content hash');
          const existing = await this.receiptRepository.findByContentHash(
            context.upload.userId,
            hash,
            context.signal,
          );
          if (existing) {
            throw new DuplicateReceiptError(context.location.receiptId, existing.id, hash);
          }
        },
      },
      {
        name: 'Uploading image to storage',
        run: async context => {
          // Known before the write so cleanup can find a partially uploaded image.
          context.imageKey = imageKey(context.location, context.upload.filename);
          const { key, url } = await this.storage.upload(
            context.location,
            this.require(context.body, 'content'),
            context.upload.contentType,
            context.upload.filename,
            context.signal,
          );
          context.imageKey = key;
          context.imageUrl = url;
        },
        compensate: quarantineKey(context => context.imageKey),
      },
      {
        name: 'Calling OCR service',
        run: async context => {
          try {
            context.analysis = await this.ocrClient.analyzeReceipt(
              this.require(context.imageUrl, 'image URL'),
              context.signal,
            );
          } catch (error) {
            if (error instanceof OcrRequestError) {
              throw new OcrProcessingError(
                context.location.receiptId,
                'OCR service failed to process the receipt. The image may be unclear or not a valid receipt.',
                error.rawResponse ?? error.message,
                { cause: error },
              );
            }
            throw error;
          }
          this.logger.log(
            `OCR analysis completed. DocType: ${context.analysis.docType}, Confidence: ${context.analysis.confidence}, ReceiptId: ${context.location.receiptId}`,
          );
        },
      },
      {
        name: 'Validating receipt',
        run: async context => {
          const analysis = this.require(context.analysis, 'analysis');
          const outcome = evaluateVerdict(analysis.validation, { minConfidence: this.config.minConfidence });

          if (!outcome.accepted) {
            const { verdict } = outcome;
            this.logger.warn(
              `Receipt rejected (${outcome.reason}). IsValid: ${verdict.isValidReceipt}, Confidence: ${verdict.confidence}, ReceiptId: ${context.location.receiptId}`,
            );
            context.status = transitionStatus(context.status, ReceiptStatus.ValidationFailed);
            if (outcome.reason === 'not_a_receipt') {
              throw new InvalidReceiptError(
                context.location.receiptId,
                verdict.confidence,
                verdict.message || 'Receipt validation failed',
              );
            }
            throw new PoorImageQualityError(context.location.receiptId, verdict.confidence);
          }

          context.outcome = outcome;
          context.status = transitionStatus(context.status, outcome.status);
        },
      },
      {
        name: 'Saving raw OCR response',
        run: async context => {
          context.rawSnapshotKey = await this.storage.saveSnapshot(
            context.location,
            'raw',
            this.require(context.analysis, 'analysis').raw,
            context.signal,
          );
        },
        compensate: quarantineKey(context => context.rawSnapshotKey),
      },
      {
        name: 'Extracting structured data',
        run: async context => {
          const { location, upload } = context;
          const verdict = context.outcome?.verdict;
          const receipt = this.fieldExtractor.extract(
            {
              id: location.receiptId,
              userId: upload.userId,
              contentHash: this.require(context.contentHash, 'content hash'),
              imageKey: this.require(context.imageKey, 'image key'),
              originalFileName: upload.filename,
              contentType: upload.contentType,
              status: context.status,
              createdAt: location.ingestedAt,
              isValidReceipt: verdict?.isValidReceipt,
              validationConfidence: verdict?.confidence,
              validationMessage: verdict?.message || undefined,
              requiresManualReview: verdict === undefined,
            },
            this.require(context.analysis, 'analysis'),
          );

          const missing = this.config.requiredFields.filter(
            field => REQUIRED_FIELD_CHECKS[field] && !REQUIRED_FIELD_CHECKS[field](receipt),
          );
          if (missing.length > 0) {
            throw new MissingRequiredFieldsError(location.receiptId, missing);
          }

          context.receipt = receipt;
          this.logger.log(
            `Data extracted. MerchantName: ${receipt.storeName}, Items: ${receipt.items.length}, Total: ${receipt.totalAmount}, Status: ${receipt.status}, ReceiptId: ${location.receiptId}`,
          );
        },
      },
      {
        name: 'Saving extracted data',
        run: async context => {
          context.extractedSnapshotKey = await this.storage.saveSnapshot(
            context.location,
            'extracted',
            this.require(context.receipt, 'receipt'),
            context.signal,
          );
        },
        compensate: quarantineKey(context => context.extractedSnapshotKey),
      },
      {
        name: 'Saving receipt to database',
        run: async context => {
          const receipt = this.require(context.receipt, 'receipt');
          receipt.processedAt = new Date();
          try {
            await this.receiptRepository.create(receipt, context.signal);
          } catch (error) {
            if (error instanceof DuplicateContentHashError) {
              throw new DuplicateReceiptError(receipt.id, error.existingReceiptId ?? '', error.contentHash);
            }
            throw error;
          }
        },
      },
    ];
  }

  private async handleFailure(
    context: ProcessingContext,
    attempted: PipelineStep[],
    error: unknown,
  ): Promise<ReceiptIngestionError> {
    const { receiptId } = context.location;
    const failure = this.classify(context, error);

    if (failure instanceof DuplicateReceiptError) {
      this.logger.warn(
        `Duplicate receipt detected. ExistingReceiptId: ${failure.existingReceiptId}, ImageHash: ${failure.contentHash}`,
      );
      if (context.imageKey) {
        await this.removeUploadedObjects(context);
      }
      return new ReceiptIngestionError(
        'duplicate',
        USER_MESSAGES.duplicate,
        receiptId,
        failure.existingReceiptId || undefined,
      );
    }

    if (failure instanceof ReceiptProcessingCancelledError) {
      this.logger.warn(`Receipt processing cancelled. ReceiptId: ${receiptId}`);
      if (context.imageKey) {
        await this.removeUploadedObjects(context);
      }
      return new ReceiptIngestionError('cancelled', USER_MESSAGES.cancelled, receiptId);
    }

    const reason = `${failure.reasonLabel}: ${failure.message}`;
    this.logger.error(`Receipt processing failed. ReceiptId: ${receiptId}, Reason: ${reason}`, failure.stack);

    if (await this.imageReachedStorage(context)) {
      await this.compensate(context, attempted, reason);
      await this.recordFailure(context, failure, reason);
    }

    const kind = this.kindOf(failure);
    const message =
      failure instanceof MissingRequiredFieldsError
        ? `Receipt is missing required information: ${failure.missingFields.join(', ')}. Please upload a complete receipt.`
        : USER_MESSAGES[kind];
    return new ReceiptIngestionError(kind, message, receiptId);
  }

  private classify(context: ProcessingContext, error: unknown): ReceiptProcessingError {
    const { receiptId } = context.location;
    if (error instanceof ReceiptProcessingError) {
      return error;
    }
    if (isAbortError(error) || context.signal?.aborted) {
      return new ReceiptProcessingCancelledError(receiptId);
    }
    return new UnexpectedProcessingError(receiptId, error);
  }

  private kindOf(failure: ReceiptProcessingError): IngestionErrorKind {
    if (failure instanceof OcrProcessingError) return 'ocr_failed';
    if (failure instanceof InvalidReceiptError) return 'invalid_receipt';
    if (failure instanceof PoorImageQualityError) return 'poor_image_quality';
    if (failure instanceof MissingRequiredFieldsError) return 'missing_required_fields';
    return 'unexpected';
  }

  private async imageReachedStorage(context: ProcessingContext): Promise<boolean> {
    if (!context.imageKey) {
      return false;
    }
    if (context.imageUrl) {
      return true;
    }
    try {
      return await this.storage.exists(context.imageKey);
    } catch (error) {
      this.logger.error(
        `Could not check for the uploaded image. ReceiptId: ${context.location.receiptId}: ${errorMessage(error)}`,
      );
      return true;
    }
  }

  /** Runs compensations of attempted steps, newest first. */
  private async compensate(context: ProcessingContext, attempted: PipelineStep[], reason: string): Promise<void> {
    for (const step of [...attempted].reverse()) {
      if (!step.compensate) {
        continue;
      }
      try {
        await step.compensate(context, reason);
      } catch (error) {
        this.logger.error(
          `Compensation for "${step.name}" failed. ReceiptId: ${context.location.receiptId}: ${errorMessage(error)}`,
        );
      }
    }
  }

  private async recordFailure(
    context: ProcessingContext,
    failure: ReceiptProcessingError,
    reason: string,
  ): Promise<void> {
    const record: FailureRecord = {
      receiptId: context.location.receiptId,
      userId: context.upload.userId,
      reason,
      failedAt: new Date().toISOString(),
      ocrResponse: failure instanceof OcrProcessingError ? failure.ocrResponse : context.analysis?.rawBody,
      exception: this.summarize(failure),
    };
    try {
      await this.storage.saveFailureRecord(context.location, record);
    } catch (error) {
      this.logger.error(
        `Failed to save failure details. ReceiptId: ${context.location.receiptId}: ${errorMessage(error)}`,
      );
    }
  }

  private async removeUploadedObjects(context: ProcessingContext): Promise<void> {
    try {
      await this.storage.deleteAll(context.location);
    } catch (error) {
      this.logger.error(
        `Failed to clean up storage. ReceiptId: ${context.location.receiptId}: ${errorMessage(error)}`,
      );
    }
  }

  private summarize(error: Error): ExceptionSummary {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
    };
  }

  private require<T>(value: T | undefined, what: string): T {
    if (value === undefined) {
      throw new Error(`Pipeline state is missing ${what}`);
    }
    return value;
  }
}
