export { processDeploymentEvent, createRuntime } from './function.js';
export type { Runtime, RuntimeOptions } from './function.js';
export { loadConfig } from './config.js';
export type { ScannerConfig } from './config.js';

export { parseImageReference } from './core/image.js';
export { interpretScanOutput, normalizeSeverity } from './core/interpreter.js';
export { ScanOrchestrator, generateJobName } from './core/orchestrator.js';
export { ResultStore, sanitizeName } from './core/store.js';
export type { BlobStore, MetadataStore } from './core/store.js';
export { AlertDispatcher, shouldAlert } from './core/alert.js';
export type { AlertPublisher, SecurityAlert } from './core/alert.js';
export { EventHandler, decodeEvent, extractImages } from './core/handler.js';
export type { EventContext, PubSubEnvelope } from './core/handler.js';
export type { JobExecutor, JobDefinition, ExecutionHandle, ExecutionStatus } from './core/executor.js';

export * from './errors.js';
export * from './types.js';
