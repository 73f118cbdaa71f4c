/**
 * Error hierarchy for the scanner.
 *
 * Every error carries a dotted `code` (e.g. `Executor.CreateJob`) and a
 * `retryable` flag so callers can branch without string matching.
 */

export class ScannerError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ScannerError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid or missing configuration. `issues` lists one line per bad variable.
 */
export class ConfigError extends ScannerError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'Configuration.Invalid');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * The inbound event payload could not be decoded.
 */
export class DecodeError extends ScannerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Event.Decode', { cause });
    this.name = 'DecodeError';
  }
}

/**
 * Non-2xx answer from a REST endpoint.
 */
export class HttpError extends ScannerError {
  public readonly status: number;
  public readonly body?: string;

  constructor(status: number, statusText: string, body?: string) {
    super(`HTTP ${status}: ${statusText}`, `Http.${status}`, {
      retryable: status === 429 || status >= 500,
    });
    this.name = 'HttpError';
    this.status = status;
    this.body = body;
  }
}

export type ExecutorOperation = 'CreateJob' | 'RunJob' | 'GetExecution' | 'FetchLogs' | 'DeleteJob';

/**
 * Failure talking to the job executor.
 */
export class ExecutorError extends ScannerError {
  public readonly operation: ExecutorOperation;

  constructor(operation: ExecutorOperation, message: string, cause?: unknown) {
    super(message, `Executor.${operation}`, {
      cause,
      retryable: operation === 'GetExecution',
    });
    this.name = 'ExecutorError';
    this.operation = operation;
  }
}

/**
 * The execution did not complete within the scan timeout.
 */
export class ScanTimeoutError extends ScannerError {
  public readonly timeoutSeconds: number;

  constructor(executionName: string, timeoutSeconds: number) {
    super(
      `Execution ${executionName} timed out after ${timeoutSeconds} seconds`,
      'Scan.Timeout'
    );
    this.name = 'ScanTimeoutError';
    this.timeoutSeconds = timeoutSeconds;
  }
}

/**
 * The execution completed without reporting any succeeded or failed task.
 */
export class UnexpectedStateError extends ScannerError {
  constructor(message: string) {
    super(message, 'Scan.UnexpectedState');
    this.name = 'UnexpectedStateError';
  }
}

export type StorageOperation = 'Write' | 'Query' | 'Bucket';

export class StorageError extends ScannerError {
  public readonly operation: StorageOperation;

  constructor(operation: StorageOperation, message: string, cause?: unknown) {
    super(message, `Storage.${operation}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
