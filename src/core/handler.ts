import { z } from 'zod';
import type { ScannerConfig } from '../config.js';
import { DecodeError, errorMessage } from '../errors.js';
import type { BatchReport, ScanResultRecord, ScanTags } from '../types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ProgressTracker } from '../utils/progress.js';
import { systemClock, type Clock } from '../utils/retry.js';
import { shouldAlert, type AlertDispatcher } from './alert.js';
import { parseImageReference } from './image.js';
import type { ScanOrchestrator } from './orchestrator.js';
import type { ResultStore } from './store.js';

export const CONTAINER_TYPE = 'cloudrun';

export const DEPLOYMENT_METHODS = [
  'google.cloud.run.v2.Services.CreateService',
  'google.cloud.run.v2.Services.UpdateService',
] as const;

/**
 * Pub/Sub message as delivered to a background function.
 */
export interface PubSubEnvelope {
  /** Base64-encoded audit log entry */
  data?: string | null;
  attributes?: Record<string, string>;
  messageId?: string;
}

export interface EventContext {
  eventId: string;
  timestamp?: string;
}

const containerSchema = z.object({ image: z.string().optional() }).passthrough();

const auditLogSchema = z.object({
  protoPayload: z
    .object({
      methodName: z.string().optional(),
      request: z
        .object({
          template: z
            .object({ containers: z.array(containerSchema).catch([]) })
            .partial()
            .catch({}),
        })
        .partial()
        .passthrough()
        .optional(),
    })
    .passthrough()
    .optional(),
  resource: z
    .object({ labels: z.record(z.string()).catch({}) })
    .partial()
    .passthrough()
    .optional(),
});

export type AuditLogEntry = z.infer<typeof auditLogSchema>;

/**
 * Decode the base64 JSON audit log carried by a Pub/Sub envelope.
 * @returns undefined when the envelope carries no payload
 * @throws DecodeError when the payload is not a JSON audit log entry
 */
export function decodeEvent(envelope: PubSubEnvelope): AuditLogEntry | undefined {
  if (!envelope.data) {
    return undefined;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(envelope.data, 'base64').toString('utf8'));
  } catch (err) {
    throw new DecodeError(`Event payload is not valid JSON: ${errorMessage(err)}`, err);
  }

  const parsed = auditLogSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DecodeError(`Event payload is not an audit log entry: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

/**
 * Accepts either a Pub/Sub envelope (`{ "data": "<base64>" }`) or a bare
 * audit log entry, which is wrapped into an envelope.
 */
export function toEnvelope(payload: unknown): PubSubEnvelope {
  if (typeof payload === 'object' && payload !== null && 'data' in payload) {
    const { data } = payload;
    if (typeof data === 'string') {
      const messageId = 'messageId' in payload && typeof payload.messageId === 'string' ? payload.messageId : undefined;
      return { data, messageId };
    }
  }
  return { data: Buffer.from(JSON.stringify(payload), 'utf8').toString('base64') };
}

export function isDeploymentMethod(methodName: string): boolean {
  return DEPLOYMENT_METHODS.some((method) => methodName.includes(method));
}

/**
 * Image names from `protoPayload.request.template.containers[].image`.
 */
export function extractImages(entry: AuditLogEntry): string[] {
  const containers = entry.protoPayload?.request?.template?.containers ?? [];
  return containers
    .map((container) => container.image)
    .filter((image): image is string => typeof image === 'string' && image.length > 0);
}

interface DeploymentLabels {
  projectId?: string;
  serviceName?: string;
  location?: string;
}

export function buildScanTags(labels: DeploymentLabels, eventId: string): ScanTags {
  const candidates: Record<string, string | undefined> = {
    container_type: CONTAINER_TYPE,
    gcp_project: labels.projectId,
    service_name: labels.serviceName,
    location: labels.location,
    event_id: eventId,
  };

  const tags: ScanTags = {};
  for (const [key, value] of Object.entries(candidates)) {
    if (value) tags[key] = value;
  }
  return tags;
}

export interface EventHandlerOptions {
  config: Pick<ScannerConfig, 'projectId' | 'alertThreshold'>;
  orchestrator: ScanOrchestrator;
  store: ResultStore;
  alerts: AlertDispatcher;
  clock?: Clock;
  logger?: Logger;
  progress?: ProgressTracker;
}

/**
 * Handles one deployment audit event: every image it names is scanned in
 * turn, and a failing image is recorded without stopping the others.
 */
export class EventHandler {
  private readonly options: EventHandlerOptions;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: EventHandlerOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? defaultLogger).child({ component: 'handler' });
  }

  /**
   * @returns the batch report, or undefined when the event is ignored
   * @throws DecodeError and any other whole-event failure, after logging it
   */
  async handle(envelope: PubSubEnvelope, context: EventContext): Promise<BatchReport | undefined> {
    this.log.info({ eventId: context.eventId }, `Processing Cloud Run event: ${context.eventId}`);

    try {
      this.options.progress?.emit('decoding-event', 'Decoding audit log entry');
      const entry = decodeEvent(envelope);
      if (!entry) {
        this.log.warn('No data in Pub/Sub message');
        return undefined;
      }

      const methodName = entry.protoPayload?.methodName ?? '';
      this.log.info({ methodName }, `Audit log method: ${methodName}`);
      if (!isDeploymentMethod(methodName)) {
        this.log.info(`Ignoring non-Cloud Run service event: ${methodName}`);
        return undefined;
      }

      const resourceLabels = entry.resource?.labels ?? {};
      const labels: DeploymentLabels = {
        projectId: resourceLabels.project_id,
        serviceName: resourceLabels.service_name,
        location: resourceLabels.location,
      };
      this.log.info(labels, `Cloud Run service: ${labels.serviceName} in ${labels.location}`);

      const images = extractImages(entry);
      if (images.length === 0) {
        this.log.warn('No container images found in service definition');
        return undefined;
      }
      this.log.info(`Found ${images.length} container images to scan`);

      const report: BatchReport = {
        eventId: context.eventId,
        serviceName: labels.serviceName,
        results: [],
        skipped: [],
        failures: [],
      };

      for (const [index, image] of images.entries()) {
        await this.processImage(image, labels, context.eventId, report, {
          imagesDone: index,
          totalImages: images.length,
        });
      }

      this.options.progress?.emit('finished', `Processed ${images.length} images`, {
        imagesDone: images.length,
        totalImages: images.length,
      });
      this.log.info(`Successfully processed ${report.results.length} images`);
      return report;
    } catch (err) {
      this.log.error({ err }, `Error processing event: ${errorMessage(err)}`);
      throw err;
    }
  }

  private async processImage(
    image: string,
    labels: DeploymentLabels,
    eventId: string,
    report: BatchReport,
    position: { imagesDone: number; totalImages: number }
  ): Promise<void> {
    const { orchestrator, store, alerts, config, progress } = this.options;
    this.log.info({ image }, `Processing image: ${image}`);

    const reference = parseImageReference(image);

    try {
      progress?.emit('checking-cache', `Checking recent scans of ${reference.fullName}`, { image, ...position });
      if (await store.isRecentlyScanned(reference.fullName)) {
        this.log.info({ image }, `Image ${image} was recently scanned, skipping`);
        report.skipped.push(image);
        return;
      }

      const result = await orchestrator.scanImage(reference, buildScanTags(labels, eventId), {
        projectId: labels.projectId ?? config.projectId,
      });

      const record: ScanResultRecord = {
        ...result,
        timestamp: new Date(this.clock()).toISOString(),
        containerType: CONTAINER_TYPE,
        originalImage: image,
        projectId: labels.projectId,
        serviceName: labels.serviceName,
        location: labels.location,
        eventId,
      };

      progress?.emit('saving-results', `Saving results for ${reference.fullName}`, { image, ...position });
      await store.saveScanResult(record);
      report.results.push(record);

      if (shouldAlert(record.vulnerabilities.counts, config.alertThreshold)) {
        await alerts.send(record);
      }
    } catch (err) {
      const message = errorMessage(err);
      this.log.error({ err, image }, `Error processing image ${image}: ${message}`);
      report.failures.push({ image, error: message });
      await store.saveError({
        timestamp: new Date(this.clock()).toISOString(),
        image: reference.fullName,
        error: message,
        projectId: labels.projectId,
        serviceName: labels.serviceName,
        location: labels.location,
        eventId,
      });
    }
  }
}
