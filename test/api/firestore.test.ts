import { describe, it, expect, afterEach, vi } from 'vitest';
import { FirestoreMetadataStore, toFirestoreFields, toFirestoreValue } from '../../src/api/firestore.js';
import { StorageError } from '../../src/errors.js';
import type { ScanRecord } from '../../src/types.js';
import { bodyOf, httpError, json, stubFetch, testClient } from '../helpers/http.js';

const ROOT = 'projects/test-project/databases/(default)/documents';

const record: ScanRecord = {
  image: 'docker.io/library/nginx:latest',
  scan_id: 'scan-1',
  timestamp_str: '2024-01-15T10:30:00.000Z',
  status: 'COMPLETED',
  container_type: 'cloudrun',
  service_name: 'web',
  vuln_critical: 0,
  vuln_high: 1,
  vuln_medium: 0,
  vuln_low: 0,
  vuln_informational: 0,
  vuln_total: 1,
  compliance_passed: 0,
  compliance_failed: 0,
  blob_path: 'docker.io_library_nginx_latest/scan-1.json',
  sanitized_image_name: 'docker.io_library_nginx_latest',
};

function store() {
  return new FirestoreMetadataStore({ client: testClient(), projectId: 'test-project', collection: 'scan_metadata' });
}

describe('api/firestore', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('toFirestoreValue', () => {
    it('encodes each scalar kind', () => {
      expect(toFirestoreValue('a')).toEqual({ stringValue: 'a' });
      expect(toFirestoreValue(3)).toEqual({ integerValue: '3' });
      expect(toFirestoreValue(1.5)).toEqual({ doubleValue: 1.5 });
      expect(toFirestoreValue(false)).toEqual({ booleanValue: false });
      expect(toFirestoreValue(null)).toEqual({ nullValue: null });
    });
  });

  describe('toFirestoreFields', () => {
    it('leaves out undefined properties', () => {
      const fields = toFirestoreFields({ ...record, project_id: undefined });

      expect(fields.project_id).toBeUndefined();
      expect(fields.service_name).toEqual({ stringValue: 'web' });
      expect(fields.vuln_high).toEqual({ integerValue: '1' });
    });
  });

  describe('FirestoreMetadataStore', () => {
    it('commits the record with a server timestamp', async () => {
      const requests = stubFetch(() => json({ commitTime: '2024-01-15T10:30:01Z' }));

      await store().put('scan-1', record);

      expect(requests[0].url).toBe(`https://firestore.googleapis.com/v1/${ROOT}:commit`);
      expect(bodyOf(requests[0])).toEqual({
        writes: [
          {
            update: { name: `${ROOT}/scan_metadata/scan-1`, fields: toFirestoreFields(record) },
            updateTransforms: [{ fieldPath: 'timestamp', setToServerValue: 'REQUEST_TIME' }],
          },
        ],
      });
    });

    it('wraps a write failure', async () => {
      stubFetch(() => httpError(403, 'Forbidden'));

      const put = store().put('scan-1', record);

      await expect(put).rejects.toBeInstanceOf(StorageError);
      await expect(put).rejects.toMatchObject({
        operation: 'Write',
        message: 'Firestore: could not write scan_metadata/scan-1: HTTP 403: Forbidden',
      });
    });

    it('queries by image and time and returns document ids', async () => {
      const requests = stubFetch(() =>
        json([{ document: { name: `${ROOT}/scan_metadata/scan-1` }, readTime: 'x' }, { readTime: 'x' }])
      );

      const ids = await store().queryRecent('docker.io_library_nginx_latest', '2024-01-14T10:30:00.000Z', 1);

      expect(ids).toEqual(['scan-1']);
      expect(requests[0].url).toBe(`https://firestore.googleapis.com/v1/${ROOT}:runQuery`);
      expect(bodyOf(requests[0])).toEqual({
        structuredQuery: {
          from: [{ collectionId: 'scan_metadata' }],
          where: {
            compositeFilter: {
              op: 'AND',
              filters: [
                {
                  fieldFilter: {
                    field: { fieldPath: 'sanitized_image_name' },
                    op: 'EQUAL',
                    value: { stringValue: 'docker.io_library_nginx_latest' },
                  },
                },
                {
                  fieldFilter: {
                    field: { fieldPath: 'timestamp_str' },
                    op: 'GREATER_THAN_OR_EQUAL',
                    value: { stringValue: '2024-01-14T10:30:00.000Z' },
                  },
                },
              ],
            },
          },
          limit: 1,
        },
      });
    });

    it('wraps a query failure', async () => {
      stubFetch(() => httpError(400, 'Bad Request'));

      await expect(store().queryRecent('x', '2024-01-14T10:30:00.000Z', 1)).rejects.toMatchObject({
        operation: 'Query',
      });
    });
  });
});
