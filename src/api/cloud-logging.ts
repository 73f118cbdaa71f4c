import { z } from 'zod';
import type { GcpRestClient } from './gcp.js';

export const LOGGING_ENDPOINT = 'https://logging.googleapis.com';

/** Upper bound on entries read back for one execution */
export const MAX_LOG_ENTRIES = 1000;

const entriesResponseSchema = z.object({
  entries: z
    .array(
      z
        .object({
          textPayload: z.string().optional(),
          jsonPayload: z.record(z.unknown()).optional(),
        })
        .passthrough()
    )
    .default([]),
  nextPageToken: z.string().optional(),
});

export function executionLogFilter(executionId: string): string {
  return `resource.type="cloud_run_job" AND labels."run.googleapis.com/execution_name"="${executionId}"`;
}

/**
 * Reads a job execution's stdout/stderr back from Cloud Logging.
 */
export class CloudLoggingReader {
  private readonly client: GcpRestClient;
  private readonly endpoint: string;

  constructor(options: { client: GcpRestClient; endpoint?: string }) {
    this.client = options.client;
    this.endpoint = options.endpoint ?? LOGGING_ENDPOINT;
  }

  /**
   * Log lines of the execution in timestamp order, joined with newlines.
   * Structured entries are re-serialised as JSON.
   */
  async readExecutionLogs(projectId: string, executionId: string): Promise<string> {
    const data = await this.client.requestJson(
      {
        method: 'POST',
        url: `${this.endpoint}/v2/entries:list`,
        json: {
          resourceNames: [`projects/${projectId}`],
          filter: executionLogFilter(executionId),
          orderBy: 'timestamp asc',
          pageSize: MAX_LOG_ENTRIES,
        },
      },
      entriesResponseSchema
    );

    const lines: string[] = [];
    for (const entry of data.entries) {
      if (entry.textPayload !== undefined) {
        lines.push(entry.textPayload);
      } else if (entry.jsonPayload !== undefined) {
        lines.push(JSON.stringify(entry.jsonPayload));
      }
    }
    return lines.join('\n');
  }
}
