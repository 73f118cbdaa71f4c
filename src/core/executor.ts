/**
 * Contract for the managed job runner that executes the scanner container.
 */

export interface JobRef {
  projectId: string;
  jobName: string;
}

export interface JobDefinition {
  ref: JobRef;
  /** Container image of the scanner itself */
  image: string;
  command: string[];
  args: string[];
  env: Record<string, string>;
  cpu: string;
  memory: string;
  timeoutSeconds: number;
  maxRetries: number;
  serviceAccount?: string;
  labels: Record<string, string>;
}

export interface ExecutionHandle {
  /** Fully qualified execution name */
  name: string;
  job: JobRef;
}

export interface ExecutionStatus {
  name: string;
  /** True once the runner has stamped a completion time */
  completed: boolean;
  succeededCount: number;
  failedCount: number;
}

export interface JobExecutor {
  /** Submit the job definition. Resolves once the job exists. */
  createJob(definition: JobDefinition): Promise<void>;

  /** Start one execution of an existing job. */
  runJob(job: JobRef): Promise<ExecutionHandle>;

  getExecution(execution: ExecutionHandle): Promise<ExecutionStatus>;

  /** Concatenated log output of the execution, as opaque text. */
  fetchLogs(execution: ExecutionHandle): Promise<string>;

  deleteJob(job: JobRef): Promise<void>;
}
