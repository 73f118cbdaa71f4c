/**
 * Firestore (REST v1) implementation of the scan metadata store.
 */

import { z } from 'zod';
import type { MetadataStore } from '../core/store.js';
import { StorageError, errorMessage, type StorageOperation } from '../errors.js';
import type { ScanRecord } from '../types.js';
import type { GcpRestClient } from './gcp.js';

export const FIRESTORE_ENDPOINT = 'https://firestore.googleapis.com';

export type FirestoreValue =
  | { stringValue: string }
  | { integerValue: string }
  | { doubleValue: number }
  | { booleanValue: boolean }
  | { nullValue: null };

const runQueryResponseSchema = z.array(
  z
    .object({
      document: z.object({ name: z.string() }).passthrough().optional(),
      readTime: z.string().optional(),
    })
    .passthrough()
);

const commitResponseSchema = z.object({ commitTime: z.string().optional() }).passthrough();

export function toFirestoreValue(value: string | number | boolean | null): FirestoreValue {
  if (value === null) return { nullValue: null };
  if (typeof value === 'boolean') return { booleanValue: value };
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { integerValue: String(value) } : { doubleValue: value };
  }
  return { stringValue: value };
}

/**
 * Document fields for a record; undefined properties are left out.
 */
export function toFirestoreFields(record: ScanRecord): Record<string, FirestoreValue> {
  const fields: Record<string, FirestoreValue> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) fields[key] = toFirestoreValue(value);
  }
  return fields;
}

export class FirestoreMetadataStore implements MetadataStore {
  private readonly client: GcpRestClient;
  private readonly projectId: string;
  private readonly collection: string;
  private readonly database: string;
  private readonly endpoint: string;

  constructor(options: {
    client: GcpRestClient;
    projectId: string;
    collection: string;
    database?: string;
    endpoint?: string;
  }) {
    this.client = options.client;
    this.projectId = options.projectId;
    this.collection = options.collection;
    this.database = options.database ?? '(default)';
    this.endpoint = options.endpoint ?? FIRESTORE_ENDPOINT;
  }

  private get root(): string {
    return `projects/${this.projectId}/databases/${this.database}/documents`;
  }

  /**
   * Write the record, stamping `timestamp` with the server's commit time.
   */
  async put(scanId: string, record: ScanRecord): Promise<void> {
    await this.call('Write', `write ${this.collection}/${scanId}`, () =>
      this.client.requestJson(
        {
          method: 'POST',
          url: `${this.endpoint}/v1/${this.root}:commit`,
          json: {
            writes: [
              {
                update: {
                  name: `${this.root}/${this.collection}/${scanId}`,
                  fields: toFirestoreFields(record),
                },
                updateTransforms: [{ fieldPath: 'timestamp', setToServerValue: 'REQUEST_TIME' }],
              },
            ],
          },
        },
        commitResponseSchema
      )
    );
  }

  async queryRecent(sanitizedName: string, since: string, limit: number): Promise<string[]> {
    const rows = await this.call('Query', `query ${this.collection}`, () =>
      this.client.requestJson(
        {
          method: 'POST',
          url: `${this.endpoint}/v1/${this.root}:runQuery`,
          json: {
            structuredQuery: {
              from: [{ collectionId: this.collection }],
              where: {
                compositeFilter: {
                  op: 'AND',
                  filters: [
                    {
                      fieldFilter: {
                        field: { fieldPath: 'sanitized_image_name' },
                        op: 'EQUAL',
                        value: toFirestoreValue(sanitizedName),
                      },
                    },
                    {
                      fieldFilter: {
                        field: { fieldPath: 'timestamp_str' },
                        op: 'GREATER_THAN_OR_EQUAL',
                        value: toFirestoreValue(since),
                      },
                    },
                  ],
                },
              },
              limit,
            },
          },
        },
        runQueryResponseSchema
      )
    );

    const ids: string[] = [];
    for (const row of rows) {
      const name = row.document?.name;
      if (name) ids.push(name.slice(name.lastIndexOf('/') + 1));
    }
    return ids;
  }

  private async call<T>(operation: StorageOperation, what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StorageError(operation, `Firestore: could not ${what}: ${errorMessage(err)}`, err);
    }
  }
}
