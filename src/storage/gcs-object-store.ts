import { Logger } from '@nestjs/common';
import { Bucket, File, Storage } from '@google-cloud/storage';
import { abortable } from '../common/abort';
import { ObjectStore, PutObjectOptions } from './object-store';

export interface GcsObjectStoreOptions {
  bucket: string;
  /** Customer-managed key; objects fall back to the bucket's default encryption when unset. */
  kmsKeyName?: string;
}

export class GcsObjectStore extends ObjectStore {
  private readonly logger = new Logger(GcsObjectStore.name);
  private readonly bucket: Bucket;

  constructor(
    private readonly options: GcsObjectStoreOptions,
    storage: Storage = new Storage(),
  ) {
    super();
    if (!options.bucket) {
      throw new Error('STORAGE_BUCKET is not configured');
    }
    this.bucket = storage.bucket(options.bucket);
  }

  private file(key: string): File {
    return this.bucket.file(key, this.options.kmsKeyName ? { kmsKeyName: this.options.kmsKeyName } : {});
  }

  async put(key: string, body: Buffer, options: PutObjectOptions, signal?: AbortSignal): Promise<void> {
    await abortable(
      this.file(key).save(body, {
        contentType: options.contentType,
        resumable: false,
        predefinedAcl: 'private',
        metadata: options.metadata ? { metadata: options.metadata } : undefined,
      }),
      signal,
    );
    this.logger.debug(`Stored gs://${this.options.bucket}/${key} (${body.length} bytes)`);
  }

  async copy(
    sourceKey: string,
    destinationKey: string,
    metadata: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<void> {
    const destination = this.file(destinationKey);
    await abortable(this.file(sourceKey).copy(destination), signal);
    await abortable(destination.setMetadata({ metadata }), signal);
  }

  async delete(key: string, signal?: AbortSignal): Promise<void> {
    await abortable(this.file(key).delete({ ignoreNotFound: true }), signal);
  }

  async exists(key: string, signal?: AbortSignal): Promise<boolean> {
    const [exists] = await abortable(this.file(key).exists(), signal);
    return exists;
  }

  async list(prefix: string, signal?: AbortSignal): Promise<string[]> {
    const [files] = await abortable(this.bucket.getFiles({ prefix }), signal);
    return files.map(file => file.name);
  }

  async signedReadUrl(key: string, ttlSeconds: number): Promise<string> {
    const [url] = await this.file(key).getSignedUrl({
      version: 'v4',
      action: 'read',
      expires: Date.now() + ttlSeconds * 1000,
    });
    return url;
  }
}
