import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { AlertThreshold } from './types.js';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  GCP_PROJECT_ID: z.string().trim().min(1, 'is required'),
  GCP_REGION: z.string().trim().min(1).default('us-central1'),
  SCAN_RESULTS_BUCKET: z.string().trim().min(1, 'is required'),
  QSCANNER_IMAGE: z.string().trim().min(1).default('qualys/qscanner:latest'),
  QUALYS_POD: z.string().trim().min(1, 'is required'),
  QUALYS_ACCESS_TOKEN: z.string().min(1, 'is required'),
  SCAN_TIMEOUT: positiveInt(1800),
  SCAN_POLL_INTERVAL: positiveInt(10),
  SCAN_CACHE_HOURS: positiveInt(24),
  NOTIFY_SEVERITY_THRESHOLD: z
    .string()
    .trim()
    .toUpperCase()
    .pipe(z.enum(['CRITICAL', 'HIGH']))
    .default('HIGH'),
  NOTIFICATION_TOPIC: optionalString,
  CLOUDRUN_SERVICE_ACCOUNT: optionalString,
  SCAN_METADATA_COLLECTION: z.string().trim().min(1).default('scan_metadata'),
});

/**
 * Process-wide settings, read once at start-up and handed to each component.
 */
export interface ScannerConfig {
  readonly projectId: string;
  readonly region: string;
  readonly resultsBucket: string;
  readonly scannerImage: string;
  readonly scannerPod: string;
  readonly scannerAccessToken: string;
  readonly scanTimeoutSeconds: number;
  readonly pollIntervalSeconds: number;
  readonly cacheWindowHours: number;
  readonly alertThreshold: AlertThreshold;
  readonly notificationTopic?: string;
  readonly serviceAccount?: string;
  readonly metadataCollection: string;
}

/**
 * Build the configuration from environment variables.
 * @throws ConfigError listing every missing or malformed variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScannerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    projectId: vars.GCP_PROJECT_ID,
    region: vars.GCP_REGION,
    resultsBucket: vars.SCAN_RESULTS_BUCKET,
    scannerImage: vars.QSCANNER_IMAGE,
    scannerPod: vars.QUALYS_POD,
    scannerAccessToken: vars.QUALYS_ACCESS_TOKEN,
    scanTimeoutSeconds: vars.SCAN_TIMEOUT,
    pollIntervalSeconds: vars.SCAN_POLL_INTERVAL,
    cacheWindowHours: vars.SCAN_CACHE_HOURS,
    alertThreshold: vars.NOTIFY_SEVERITY_THRESHOLD,
    notificationTopic: vars.NOTIFICATION_TOPIC,
    serviceAccount: vars.CLOUDRUN_SERVICE_ACCOUNT,
    metadataCollection: vars.SCAN_METADATA_COLLECTION,
  });
}
