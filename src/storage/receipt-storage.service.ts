import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import * as path from 'path';
import { throwIfAborted } from '../common/abort';
import { storageConfig } from '../config/configuration';
import { FailureRecord } from '../receipts/interfaces/failure-record.interface';
import { ObjectStore } from './object-store';

/** Everything needed to derive a receipt's object keys. */
export interface ReceiptLocation {
  userId: string;
  receiptId: string;
  ingestedAt: Date;
}

export type SnapshotKind = 'raw' | 'extracted';

const SNAPSHOT_FILES: Record<SnapshotKind, string> = {
  raw: 'raw_response.json',
  extracted: 'extracted_data.json',
};

const FAILURE_RECORD_FILE = 'failure_details.json';

const datePath = (date: Date): string => {
  const yyyy = date.getUTCFullYear().toString().padStart(4, '0');
  const mm = (date.getUTCMonth() + 1).toString().padStart(2, '0');
  const dd = date.getUTCDate().toString().padStart(2, '0');
  return `${yyyy}/${mm}/${dd}`;
};

export function receiptPrefix(location: ReceiptLocation): string {
  return `users/${location.userId}/receipts/${datePath(location.ingestedAt)}/${location.receiptId}/`;
}

export function quarantinePrefix(location: ReceiptLocation): string {
  return `users/${location.userId}/failed-receipts/${datePath(location.ingestedAt)}/${location.receiptId}/`;
}

export function safeFileName(filename: string): string {
  const base = path.posix.basename(filename.replace(/\\/g, '/')).replace(/[^a-zA-Z0-9_.-]/g, '_');
  return base.replace(/^\.+/, '') || 'original';
}

export function imageKey(location: ReceiptLocation, filename: string): string {
  return `${receiptPrefix(location)}${safeFileName(filename)}`;
}

export function snapshotKey(location: ReceiptLocation, kind: SnapshotKind): string {
  return `${receiptPrefix(location)}${SNAPSHOT_FILES[kind]}`;
}

export function failureRecordKey(location: ReceiptLocation): string {
  return `${quarantinePrefix(location)}${FAILURE_RECORD_FILE}`;
}

export interface UploadResult {
  key: string;
  url: string;
}

@Injectable()
export class ReceiptStorageService {
  private readonly logger = new Logger(ReceiptStorageService.name);

  constructor(
    private readonly store: ObjectStore,
    @Inject(storageConfig.KEY) private readonly config: ConfigType<typeof storageConfig>,
  ) {}

  /**
   * Stores the original image and returns a signed read URL the OCR service
   * can fetch without storage credentials.
   */
  async upload(
    location: ReceiptLocation,
    body: Buffer,
    contentType: string,
    filename: string,
    signal?: AbortSignal,
  ): Promise<UploadResult> {
    const key = imageKey(location, filename);

    await this.store.put(
      key,
      body,
      {
        contentType,
        metadata: { 'receipt-id': location.receiptId, 'original-filename': filename },
      },
      signal,
    );
    throwIfAborted(signal);

    const url = await this.store.signedReadUrl(key, this.config.signedUrlTtlSeconds);
    this.logger.log(`Uploaded receipt image. ReceiptId: ${location.receiptId}, Key: ${key}`);

    return { key, url };
  }

  async saveSnapshot(
    location: ReceiptLocation,
    kind: SnapshotKind,
    payload: unknown,
    signal?: AbortSignal,
  ): Promise<string> {
    const key = snapshotKey(location, kind);
    await this.store.put(
      key,
      Buffer.from(JSON.stringify(payload, null, 2), 'utf8'),
      { contentType: 'application/json' },
      signal,
    );
    return key;
  }

  /**
   * Moves an object into the failed-receipts prefix. Copy then delete is not
   * atomic: an interruption between the two leaves the object in both places.
   * Re-running after such an interruption completes the move.
   */
  async quarantine(
    location: ReceiptLocation,
    key: string,
    reason: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const quarantineKey = `${quarantinePrefix(location)}${path.posix.basename(key)}`;

    if (!(await this.store.exists(key, signal))) {
      if (await this.store.exists(quarantineKey, signal)) {
        this.logger.warn(`Object already quarantined. ReceiptId: ${location.receiptId}, Key: ${quarantineKey}`);
        return quarantineKey;
      }
      throw new Error(`Cannot quarantine missing object ${key}`);
    }

    await this.store.copy(
      key,
      quarantineKey,
      {
        'failure-reason': reason,
        'failed-at': new Date().toISOString(),
        'original-key': key,
      },
      signal,
    );
    await this.store.delete(key, signal);

    this.logger.log(`Moved object to quarantine. ReceiptId: ${location.receiptId}, Reason: ${reason}`);
    return quarantineKey;
  }

  async saveFailureRecord(
    location: ReceiptLocation,
    record: FailureRecord,
    signal?: AbortSignal,
  ): Promise<string> {
    const key = failureRecordKey(location);
    await this.store.put(
      key,
      Buffer.from(JSON.stringify(record, null, 2), 'utf8'),
      { contentType: 'application/json' },
      signal,
    );
    this.logger.log(`Saved failure details. ReceiptId: ${location.receiptId}, Key: ${key}`);
    return key;
  }

  /** Removes every live object of a receipt. Quarantined objects are left alone. */
  async deleteAll(location: ReceiptLocation, signal?: AbortSignal): Promise<string[]> {
    const prefix = receiptPrefix(location);
    const keys = await this.store.list(prefix, signal);

    for (const key of keys) {
      await this.store.delete(key, signal);
      this.logger.debug(`Deleted object: ${key}`);
    }

    this.logger.log(
      `Deleted ${keys.length} object(s) for receipt. ReceiptId: ${location.receiptId}, Prefix: ${prefix}`,
    );
    return keys;
  }

  exists(key: string, signal?: AbortSignal): Promise<boolean> {
    return this.store.exists(key, signal);
  }

  getImageUrl(key: string): Promise<string> {
    return this.store.signedReadUrl(key, this.config.signedUrlTtlSeconds);
  }
}
