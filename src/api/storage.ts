import { z } from 'zod';
import type { BlobStore, UploadOptions } from '../core/store.js';
import { HttpError, StorageError, errorMessage, type StorageOperation } from '../errors.js';
import type { GcpRestClient } from './gcp.js';

export const STORAGE_ENDPOINT = 'https://storage.googleapis.com';

const bucketSchema = z.object({ name: z.string() }).passthrough();

/**
 * Cloud Storage (JSON API) bucket used as the result blob store.
 */
export class GcsBlobStore implements BlobStore {
  private readonly client: GcpRestClient;
  private readonly bucket: string;
  private readonly projectId: string;
  private readonly endpoint: string;

  constructor(options: { client: GcpRestClient; bucket: string; projectId: string; endpoint?: string }) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.projectId = options.projectId;
    this.endpoint = options.endpoint ?? STORAGE_ENDPOINT;
  }

  async upload(path: string, content: string, options: UploadOptions): Promise<void> {
    const headers: Record<string, string> = { 'Content-Type': options.contentType };
    for (const [key, value] of Object.entries(options.metadata ?? {})) {
      headers[`x-goog-meta-${key}`] = value;
    }

    await this.call('Write', `upload gs://${this.bucket}/${path}`, () =>
      this.client.request({
        method: 'POST',
        url: `${this.endpoint}/upload/storage/v1/b/${encodeURIComponent(this.bucket)}/o`,
        query: { uploadType: 'media', name: path },
        headers,
        body: content,
      })
    );
  }

  async ensureBucket(): Promise<'exists' | 'created'> {
    return this.call('Bucket', `ensure bucket ${this.bucket}`, async () => {
      try {
        await this.client.requestJson(
          { method: 'GET', url: `${this.endpoint}/storage/v1/b/${encodeURIComponent(this.bucket)}` },
          bucketSchema
        );
        return 'exists';
      } catch (err) {
        if (!(err instanceof HttpError) || err.status !== 404) throw err;
      }

      await this.client.requestJson(
        {
          method: 'POST',
          url: `${this.endpoint}/storage/v1/b`,
          query: { project: this.projectId },
          json: { name: this.bucket },
        },
        bucketSchema
      );
      return 'created';
    });
  }

  private async call<T>(operation: StorageOperation, what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StorageError(operation, `Cloud Storage: could not ${what}: ${errorMessage(err)}`, err);
    }
  }
}
