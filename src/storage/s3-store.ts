/**
 * S3-backed object store
 */

import {
  HeadObjectCommand,
  NotFound,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { StoreError, errorMessage } from '../utils/errors.js';
import type { ObjectStore } from './object-store.js';

export interface S3ObjectStoreOptions {
  bucket: string;
  region?: string;
  client?: S3Client;
}

function isNotFound(error: unknown): boolean {
  if (error instanceof NotFound) {
    return true;
  }
  return error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404;
}

export class S3ObjectStore implements ObjectStore {
  readonly bucket: string;
  private readonly client: S3Client;

  constructor(options: S3ObjectStoreOptions) {
    this.bucket = options.bucket;
    this.client = options.client ?? new S3Client(options.region ? { region: options.region } : {});
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new StoreError(`HEAD s3://${this.bucket}/${key} failed: ${errorMessage(error)}`, key, error);
    }
  }

  async put(key: string, body: Uint8Array | string, contentType: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        })
      );
    } catch (error) {
      throw new StoreError(`PUT s3://${this.bucket}/${key} failed: ${errorMessage(error)}`, key, error);
    }
  }

  destroy(): void {
    this.client.destroy();
  }
}
