import { CloudLoggingReader } from './api/cloud-logging.js';
import { CloudRunJobExecutor } from './api/cloud-run.js';
import { FirestoreMetadataStore } from './api/firestore.js';
import { GcpRestClient, type AccessTokenProvider } from './api/gcp.js';
import { PubSubAlertPublisher } from './api/pubsub.js';
import { GcsBlobStore } from './api/storage.js';
import { loadConfig, type ScannerConfig } from './config.js';
import { AlertDispatcher } from './core/alert.js';
import { EventHandler, type EventContext, type PubSubEnvelope } from './core/handler.js';
import { ScanOrchestrator } from './core/orchestrator.js';
import { ResultStore } from './core/store.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';
import type { ProgressTracker } from './utils/progress.js';

export interface Runtime {
  config: ScannerConfig;
  handler: EventHandler;
  store: ResultStore;
}

export interface RuntimeOptions {
  logger?: Logger;
  progress?: ProgressTracker;
  tokens?: AccessTokenProvider;
}

/**
 * Wire the handler to the Google Cloud adapters described by `config`.
 */
export function createRuntime(config: ScannerConfig, options: RuntimeOptions = {}): Runtime {
  const log = options.logger ?? defaultLogger;
  const client = new GcpRestClient({ tokens: options.tokens, logger: log });

  const executor = new CloudRunJobExecutor({
    client,
    logs: new CloudLoggingReader({ client }),
    region: config.region,
    logger: log,
  });

  const store = new ResultStore({
    blobs: new GcsBlobStore({ client, bucket: config.resultsBucket, projectId: config.projectId }),
    metadata: new FirestoreMetadataStore({
      client,
      projectId: config.projectId,
      collection: config.metadataCollection,
    }),
    cacheWindowHours: config.cacheWindowHours,
    logger: log,
  });

  const publisher = config.notificationTopic
    ? new PubSubAlertPublisher({ client, topic: config.notificationTopic, projectId: config.projectId })
    : undefined;

  const handler = new EventHandler({
    config,
    orchestrator: new ScanOrchestrator({ executor, config, logger: log, progress: options.progress }),
    store,
    alerts: new AlertDispatcher({ publisher, logger: log }),
    logger: log,
    progress: options.progress,
  });

  return { config, handler, store };
}

let runtime: Promise<Runtime> | undefined;

async function initRuntime(): Promise<Runtime> {
  const created = createRuntime(loadConfig());
  await created.store.ensureStorage();
  return created;
}

/**
 * Background function entry point, subscribed to the Pub/Sub topic that the
 * Cloud Run audit log sink publishes to. Configuration is read on the first
 * invocation and reused by the instance afterwards.
 */
export async function processDeploymentEvent(event: PubSubEnvelope, context: EventContext): Promise<void> {
  if (!runtime) {
    runtime = initRuntime().catch((err: unknown) => {
      runtime = undefined;
      throw err;
    });
  }
  const { handler } = await runtime;
  await handler.handle(event, context);
}
