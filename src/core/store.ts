import { StorageError, errorMessage } from '../errors.js';
import type { ErrorRecord, ScanRecord, ScanResultRecord } from '../types.js';
import { bestEffort } from '../utils/best-effort.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/retry.js';

export interface UploadOptions {
  contentType: string;
  metadata?: Record<string, string>;
}

/**
 * Object storage holding full result payloads.
 */
export interface BlobStore {
  upload(path: string, content: string, options: UploadOptions): Promise<void>;
  /** Create the backing bucket when missing */
  ensureBucket(): Promise<'exists' | 'created'>;
}

/**
 * Queryable store of compact scan records, keyed by scan id.
 */
export interface MetadataStore {
  put(scanId: string, record: ScanRecord): Promise<void>;
  /**
   * Ids of records with `sanitized_image_name == sanitizedName` and
   * `timestamp_str >= since`, at most `limit` of them.
   */
  queryRecent(sanitizedName: string, since: string, limit: number): Promise<string[]>;
}

export interface ResultStoreOptions {
  blobs: BlobStore;
  metadata: MetadataStore;
  cacheWindowHours: number;
  clock?: Clock;
  logger?: Logger;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Storage-safe form of an image name: `/`, `:` and `@` become `_`, then
 * anything outside `[A-Za-z0-9_.-]` does too. Used both in blob paths and as
 * the metadata lookup key.
 */
export function sanitizeName(name: string): string {
  return name.replace(/[/:@]/g, '_').replace(/[^A-Za-z0-9_.-]/g, '_');
}

export function scanBlobPath(record: Pick<ScanResultRecord, 'image' | 'scanId'>): string {
  return `${sanitizeName(record.image)}/${record.scanId}.json`;
}

export function errorBlobPath(record: Pick<ErrorRecord, 'image' | 'timestamp'>): string {
  return `errors/${sanitizeName(record.image)}/${record.timestamp}.json`;
}

export function toScanRecord(record: ScanResultRecord, blobPath: string): ScanRecord {
  const { counts, total } = record.vulnerabilities;
  return {
    image: record.image,
    scan_id: record.scanId,
    timestamp_str: record.timestamp,
    status: record.status,
    container_type: record.containerType,
    project_id: record.projectId,
    service_name: record.serviceName,
    location: record.location,
    vuln_critical: counts.CRITICAL,
    vuln_high: counts.HIGH,
    vuln_medium: counts.MEDIUM,
    vuln_low: counts.LOW,
    vuln_informational: counts.INFORMATIONAL,
    vuln_total: total,
    compliance_passed: record.compliance.passed,
    compliance_failed: record.compliance.failed,
    blob_path: blobPath,
    sanitized_image_name: sanitizeName(record.image),
  };
}

/**
 * Two-tier persistence: the full payload goes to the blob store, a compact
 * record to the metadata store where the recency check can find it.
 */
export class ResultStore {
  private readonly blobs: BlobStore;
  private readonly metadata: MetadataStore;
  private readonly cacheWindowHours: number;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: ResultStoreOptions) {
    this.blobs = options.blobs;
    this.metadata = options.metadata;
    this.cacheWindowHours = options.cacheWindowHours;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? defaultLogger).child({ component: 'store' });
  }

  async ensureStorage(): Promise<void> {
    const outcome = await bestEffort('Ensure results bucket', () => this.blobs.ensureBucket(), this.log);
    if (outcome === 'created') {
      this.log.info('Created results bucket');
    }
  }

  /**
   * @throws StorageError when either write fails
   */
  async saveScanResult(record: ScanResultRecord): Promise<ScanRecord> {
    const blobPath = scanBlobPath(record);

    try {
      await this.blobs.upload(blobPath, JSON.stringify(record, null, 2), {
        contentType: 'application/json',
        metadata: {
          image: record.image,
          scan_id: record.scanId,
          timestamp: record.timestamp,
        },
      });
      this.log.info({ blobPath }, 'Saved scan result to blob store');

      const scanRecord = toScanRecord(record, blobPath);
      await this.metadata.put(record.scanId, scanRecord);
      this.log.info({ scanId: record.scanId }, 'Saved scan metadata');

      return scanRecord;
    } catch (err) {
      this.log.error({ err, scanId: record.scanId }, `Error saving scan result: ${errorMessage(err)}`);
      if (err instanceof StorageError) throw err;
      throw new StorageError('Write', `Failed to save scan result ${record.scanId}: ${errorMessage(err)}`, err);
    }
  }

  /**
   * Record a per-image failure. Never throws.
   */
  async saveError(record: ErrorRecord): Promise<void> {
    const blobPath = errorBlobPath(record);
    const saved = await bestEffort(
      'Save error record',
      async () => {
        await this.blobs.upload(blobPath, JSON.stringify(record, null, 2), {
          contentType: 'application/json',
        });
        return blobPath;
      },
      this.log
    );
    if (saved) {
      this.log.info({ blobPath }, 'Saved error record to blob store');
    }
  }

  /**
   * Whether a scan of `image` was recorded within the last `windowHours`.
   * Fails open: a query error answers `false` so scanning goes ahead.
   */
  async isRecentlyScanned(image: string, windowHours: number = this.cacheWindowHours): Promise<boolean> {
    const since = new Date(this.clock() - windowHours * HOUR_MS).toISOString();
    const sanitized = sanitizeName(image);

    try {
      const matches = await this.metadata.queryRecent(sanitized, since, 1);
      if (matches.length > 0) {
        this.log.info({ image, scanId: matches[0] }, `Found recent scan for ${image}`);
        return true;
      }
      return false;
    } catch (err) {
      this.log.warn({ err, image }, `Error checking recent scans: ${errorMessage(err)}`);
      return false;
    }
  }
}
