/**
 * Cloud Run Jobs (Admin API v2) implementation of the job executor.
 */

import { z } from 'zod';
import type {
  ExecutionHandle,
  ExecutionStatus,
  JobDefinition,
  JobExecutor,
  JobRef,
} from '../core/executor.js';
import { ExecutorError, ScannerError, errorMessage, type ExecutorOperation } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { pollUntil, realSleep, systemClock, type Clock, type Sleep } from '../utils/retry.js';
import type { CloudLoggingReader } from './cloud-logging.js';
import type { GcpRestClient } from './gcp.js';

export const RUN_ENDPOINT = 'https://run.googleapis.com';

const OPERATION_POLL_MS = 2000;
const OPERATION_TIMEOUT_MS = 5 * 60 * 1000;

const operationSchema = z
  .object({
    name: z.string(),
    done: z.boolean().optional(),
    error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
    metadata: z.object({ name: z.string().optional() }).passthrough().optional(),
    response: z.object({ name: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

type Operation = z.infer<typeof operationSchema>;

const executionSchema = z
  .object({
    name: z.string(),
    completionTime: z.string().optional(),
    succeededCount: z.number().optional(),
    failedCount: z.number().optional(),
  })
  .passthrough();

export interface CloudRunJobExecutorOptions {
  client: GcpRestClient;
  logs: CloudLoggingReader;
  region: string;
  endpoint?: string;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Request body for `projects.locations.jobs.create`.
 */
export function toCloudRunJob(definition: JobDefinition): Record<string, unknown> {
  return {
    labels: definition.labels,
    template: {
      taskCount: 1,
      template: {
        containers: [
          {
            image: definition.image,
            command: definition.command,
            args: definition.args,
            env: Object.entries(definition.env).map(([name, value]) => ({ name, value })),
            resources: {
              limits: { cpu: definition.cpu, memory: definition.memory },
            },
          },
        ],
        maxRetries: definition.maxRetries,
        timeout: `${definition.timeoutSeconds}s`,
        serviceAccount: definition.serviceAccount,
      },
    },
  };
}

export class CloudRunJobExecutor implements JobExecutor {
  private readonly client: GcpRestClient;
  private readonly logs: CloudLoggingReader;
  private readonly region: string;
  private readonly endpoint: string;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(options: CloudRunJobExecutorOptions) {
    this.client = options.client;
    this.logs = options.logs;
    this.region = options.region;
    this.endpoint = options.endpoint ?? RUN_ENDPOINT;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? realSleep;
    this.log = (options.logger ?? defaultLogger).child({ component: 'cloud-run' });
  }

  parent(projectId: string): string {
    return `projects/${projectId}/locations/${this.region}`;
  }

  jobPath(job: JobRef): string {
    return `${this.parent(job.projectId)}/jobs/${job.jobName}`;
  }

  async createJob(definition: JobDefinition): Promise<void> {
    await this.call('CreateJob', async () => {
      const operation = await this.client.requestJson(
        {
          method: 'POST',
          url: `${this.endpoint}/v2/${this.parent(definition.ref.projectId)}/jobs`,
          query: { jobId: definition.ref.jobName },
          json: toCloudRunJob(definition),
        },
        operationSchema
      );
      await this.waitForOperation(operation, 'CreateJob');
    });
  }

  async runJob(job: JobRef): Promise<ExecutionHandle> {
    return this.call('RunJob', async () => {
      const operation = await this.client.requestJson(
        { method: 'POST', url: `${this.endpoint}/v2/${this.jobPath(job)}:run`, json: {} },
        operationSchema
      );
      if (operation.error) {
        throw new ExecutorError('RunJob', operation.error.message ?? `Run of ${job.jobName} failed`);
      }

      // The run operation stays open until the execution ends; its metadata
      // already names the execution
      const name = operation.metadata?.name ?? operation.response?.name;
      if (!name) {
        throw new ExecutorError('RunJob', `Run operation ${operation.name} did not name an execution`);
      }
      return { name, job };
    });
  }

  async getExecution(execution: ExecutionHandle): Promise<ExecutionStatus> {
    return this.call('GetExecution', async () => {
      const data = await this.client.requestJson(
        { method: 'GET', url: `${this.endpoint}/v2/${execution.name}` },
        executionSchema
      );
      return {
        name: data.name,
        completed: Boolean(data.completionTime),
        succeededCount: data.succeededCount ?? 0,
        failedCount: data.failedCount ?? 0,
      };
    });
  }

  async fetchLogs(execution: ExecutionHandle): Promise<string> {
    return this.call('FetchLogs', () => {
      const executionId = execution.name.split('/').pop() ?? execution.name;
      return this.logs.readExecutionLogs(execution.job.projectId, executionId);
    });
  }

  async deleteJob(job: JobRef): Promise<void> {
    await this.call('DeleteJob', async () => {
      this.log.info({ jobName: job.jobName }, `Deleting Cloud Run Job: ${job.jobName}`);
      const operation = await this.client.requestJson(
        { method: 'DELETE', url: `${this.endpoint}/v2/${this.jobPath(job)}` },
        operationSchema
      );
      await this.waitForOperation(operation, 'DeleteJob');
      this.log.info({ jobName: job.jobName }, `Job ${job.jobName} deleted`);
    });
  }

  private async waitForOperation(operation: Operation, kind: ExecutorOperation): Promise<Operation> {
    const finished = operation.done
      ? operation
      : await pollUntil(
          async () => {
            const current = await this.client.requestJson(
              { method: 'GET', url: `${this.endpoint}/v2/${operation.name}` },
              operationSchema
            );
            return current.done ? current : undefined;
          },
          {
            intervalMs: OPERATION_POLL_MS,
            timeoutMs: OPERATION_TIMEOUT_MS,
            clock: this.clock,
            sleep: this.sleep,
            onTimeout: () => new ExecutorError(kind, `Operation ${operation.name} did not finish`),
          }
        );

    if (finished.error) {
      throw new ExecutorError(kind, finished.error.message ?? `Operation ${finished.name} failed`);
    }
    return finished;
  }

  private async call<T>(kind: ExecutorOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ExecutorError) throw err;
      const detail = err instanceof ScannerError ? `${err.code}: ${err.message}` : errorMessage(err);
      throw new ExecutorError(kind, `Cloud Run ${kind} failed: ${detail}`, err);
    }
  }
}
