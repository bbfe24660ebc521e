export interface PutObjectOptions {
  contentType: string;
  metadata?: Record<string, string>;
}

/**
 * Minimal bucket operations the receipt pipeline needs. Implementations must
 * make `copy` an overwrite and `delete` a no-op for missing keys, so that
 * quarantine moves can be retried.
 */
export abstract class ObjectStore {
  abstract put(key: string, body: Buffer, options: PutObjectOptions, signal?: AbortSignal): Promise<void>;

  abstract copy(
    sourceKey: string,
    destinationKey: string,
    metadata: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<void>;

  abstract delete(key: string, signal?: AbortSignal): Promise<void>;

  abstract exists(key: string, signal?: AbortSignal): Promise<boolean>;

  abstract list(prefix: string, signal?: AbortSignal): Promise<string[]>;

  abstract signedReadUrl(key: string, ttlSeconds: number): Promise<string>;
}
