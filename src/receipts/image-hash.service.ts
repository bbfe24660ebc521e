import { Injectable } from '@nestjs/common';
import { createHash } from 'crypto';
import { Readable } from 'stream';
import { OperationAbortedError, throwIfAborted } from '../common/abort';

export interface HashedContent {
  /** Lowercase hex SHA-256 of the full content. */
  hash: string;
  /** The bytes that were hashed, ready to be read again for upload. */
  body: Buffer;
}

const toBuffer = (chunk: unknown): Buffer => {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new TypeError('Receipt content stream must yield bytes');
};

/**
 * Content hash used to detect repeated uploads of the same image. Streams
 * cannot be rewound, so a stream source is buffered while it is hashed and
 * the buffer is handed back for the upload step.
 */
@Injectable()
export class ImageHashService {
  async computeHash(source: Buffer | Readable, signal?: AbortSignal): Promise<HashedContent> {
    throwIfAborted(signal);

    const body = Buffer.isBuffer(source) ? source : await this.drain(source, signal);
    const hash = createHash('sha256').update(body).digest('hex');

    return { hash, body };
  }

  private async drain(stream: Readable, signal?: AbortSignal): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      if (signal?.aborted) {
        stream.destroy();
        throw new OperationAbortedError();
      }
      chunks.push(toBuffer(chunk));
    }
    return Buffer.concat(chunks);
  }
}
