import type { ScannerConfig } from '../config.js';
import { ScanTimeoutError, ScannerError, UnexpectedStateError, errorMessage } from '../errors.js';
import type { ImageReference, ScanJobSpec, ScanResult, ScanTags } from '../types.js';
import { bestEffort } from '../utils/best-effort.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ProgressTracker } from '../utils/progress.js';
import { pollUntil, realSleep, systemClock, type Clock, type Sleep } from '../utils/retry.js';
import type { ExecutionHandle, ExecutionStatus, JobDefinition, JobExecutor } from './executor.js';
import { interpretScanOutput } from './interpreter.js';

/** Job names are capped at 63 characters by the runner */
export const MAX_JOB_NAME_LENGTH = 63;

const JOB_NAME_PREFIX = 'qscanner';
const TIMESTAMP_LENGTH = 14;
const MAX_BASE_LENGTH = MAX_JOB_NAME_LENGTH - TIMESTAMP_LENGTH - 1;

export const SCANNER_COMMAND = 'qscanner';

export const JOB_LABELS: Readonly<Record<string, string>> = {
  purpose: 'qscanner',
  'managed-by': 'deployment-image-scanner',
};

export type OrchestratorConfig = Pick<
  ScannerConfig,
  | 'projectId'
  | 'scannerImage'
  | 'scannerPod'
  | 'scannerAccessToken'
  | 'scanTimeoutSeconds'
  | 'pollIntervalSeconds'
  | 'serviceAccount'
>;

export interface OrchestratorOptions {
  executor: JobExecutor;
  config: OrchestratorConfig;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
  progress?: ProgressTracker;
}

export interface ScanImageOptions {
  /** Project that hosts the scan job; defaults to the configured project */
  projectId?: string;
}

export interface RawScanOutput {
  jobSpec: ScanJobSpec;
  executionName: string;
  logs: string;
}

/** UTC `YYYYMMDDHHMMSS` */
export function formatJobTimestamp(now: Date): string {
  return now.toISOString().replace(/[-:T]/g, '').slice(0, TIMESTAMP_LENGTH);
}

/**
 * Unique job name of the form `qscanner-<repository>-<tag>-<YYYYMMDDHHMMSS>`,
 * restricted to `[a-z0-9-]` and at most 63 characters.
 */
export function generateJobName(repository: string, tag: string, now: Date): string {
  const base = `${JOB_NAME_PREFIX}-${repository}-${tag}`
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .slice(0, MAX_BASE_LENGTH);

  return `${base}-${formatJobTimestamp(now)}`;
}

export function buildScannerArgs(imageId: string, pod: string, tags: ScanTags): string[] {
  const args = ['image', imageId, '--pod', pod, '--output-format', 'json'];
  for (const [key, value] of Object.entries(tags)) {
    args.push('--tag', `${key}=${value}`);
  }
  return args;
}

/**
 * Runs the scanner for one image as a single-use job:
 * create → run → poll → fetch logs, always followed by a best-effort delete.
 */
export class ScanOrchestrator {
  private readonly executor: JobExecutor;
  private readonly config: OrchestratorConfig;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly log: Logger;
  private readonly progress?: ProgressTracker;

  constructor(options: OrchestratorOptions) {
    this.executor = options.executor;
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? realSleep;
    this.log = (options.logger ?? defaultLogger).child({ component: 'orchestrator' });
    this.progress = options.progress;
  }

  async scanImage(
    reference: ImageReference,
    tags: ScanTags = {},
    options: ScanImageOptions = {}
  ): Promise<ScanResult> {
    const raw = await this.runScan(reference, tags, options);
    return interpretScanOutput(
      raw.logs,
      {
        reference,
        jobName: raw.jobSpec.jobName,
        executionName: raw.executionName,
        now: new Date(this.clock()),
      },
      this.log
    );
  }

  /**
   * Execute the scan job and return its raw log output.
   * @throws ExecutorError when the job cannot be created, started or read
   * @throws ScanTimeoutError when the execution outlives the scan timeout
   * @throws UnexpectedStateError when the execution reports no task outcome
   */
  async runScan(
    reference: ImageReference,
    tags: ScanTags = {},
    options: ScanImageOptions = {}
  ): Promise<RawScanOutput> {
    const jobSpec: ScanJobSpec = {
      jobName: generateJobName(reference.repository, reference.tag, new Date(this.clock())),
      projectId: options.projectId ?? this.config.projectId,
      image: reference,
      tags,
      timeoutSeconds: this.config.scanTimeoutSeconds,
    };
    const ref = { projectId: jobSpec.projectId, jobName: jobSpec.jobName };
    const image = reference.fullName;

    this.log.info({ image, jobName: jobSpec.jobName }, `Scanning image ${image}`);

    try {
      this.progress?.emit('creating-job', `Creating scan job ${jobSpec.jobName}`, { image });
      await this.executor.createJob(this.buildJobDefinition(jobSpec));
      this.log.info({ jobName: jobSpec.jobName }, 'Job created');

      this.progress?.emit('running-job', `Starting scan job ${jobSpec.jobName}`, { image });
      const execution = await this.executor.runJob(ref);
      this.log.info({ execution: execution.name }, 'Job execution started');

      this.progress?.emit('waiting-for-execution', 'Waiting for scan to complete...', { image });
      await this.waitForCompletion(execution);

      this.progress?.emit('fetching-logs', 'Retrieving scanner output', { image });
      const logs = await this.executor.fetchLogs(execution);

      return { jobSpec, executionName: execution.name, logs };
    } catch (err) {
      this.log.error({ err, image }, `Error scanning image ${image}: ${errorMessage(err)}`);
      throw err;
    } finally {
      this.progress?.emit('cleaning-up', `Deleting scan job ${jobSpec.jobName}`, { image });
      await bestEffort(`Delete job ${jobSpec.jobName}`, () => this.executor.deleteJob(ref), this.log);
    }
  }

  buildJobDefinition(jobSpec: ScanJobSpec): JobDefinition {
    return {
      ref: { projectId: jobSpec.projectId, jobName: jobSpec.jobName },
      image: this.config.scannerImage,
      command: [SCANNER_COMMAND],
      args: buildScannerArgs(jobSpec.image.fullName, this.config.scannerPod, jobSpec.tags),
      env: { QUALYS_ACCESS_TOKEN: this.config.scannerAccessToken },
      cpu: '1',
      memory: '2Gi',
      timeoutSeconds: jobSpec.timeoutSeconds,
      maxRetries: 0,
      serviceAccount: this.config.serviceAccount,
      labels: { ...JOB_LABELS },
    };
  }

  private async waitForCompletion(execution: ExecutionHandle): Promise<ExecutionStatus> {
    const timeoutSeconds = this.config.scanTimeoutSeconds;

    const status = await pollUntil(
      async () => {
        const current = await this.executor.getExecution(execution);
        return current.completed ? current : undefined;
      },
      {
        intervalMs: this.config.pollIntervalSeconds * 1000,
        timeoutMs: timeoutSeconds * 1000,
        clock: this.clock,
        sleep: this.sleep,
        onCheckError: (err, attempt) => {
          const transient = err instanceof ScannerError && err.retryable;
          this.log.error({ err, attempt, transient }, `Error checking execution status: ${errorMessage(err)}`);
          return transient;
        },
        onTimeout: () => new ScanTimeoutError(execution.name, timeoutSeconds),
      }
    );

    if (status.succeededCount > 0) {
      this.log.info({ execution: execution.name }, 'Execution succeeded');
      return status;
    }

    // The scanner exits non-zero when it finds vulnerabilities, so a failed
    // task still carries a usable report
    if (status.failedCount > 0) {
      this.log.warn(
        { execution: execution.name, failedCount: status.failedCount },
        'Execution reported failed tasks, reading its output anyway'
      );
      return status;
    }

    throw new UnexpectedStateError(
      `Execution ${execution.name} completed without succeeded or failed tasks`
    );
  }
}
