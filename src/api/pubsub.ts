import { z } from 'zod';
import type { AlertPublisher, SecurityAlert } from '../core/alert.js';
import type { GcpRestClient } from './gcp.js';

export const PUBSUB_ENDPOINT = 'https://pubsub.googleapis.com';

const publishResponseSchema = z.object({ messageIds: z.array(z.string()).default([]) });

/**
 * Accepts `projects/<p>/topics/<t>` as is and expands a bare topic name.
 */
export function topicPath(topic: string, projectId: string): string {
  return topic.startsWith('projects/') ? topic : `projects/${projectId}/topics/${topic}`;
}

export class PubSubAlertPublisher implements AlertPublisher {
  private readonly client: GcpRestClient;
  private readonly topic: string;
  private readonly endpoint: string;

  constructor(options: { client: GcpRestClient; topic: string; projectId: string; endpoint?: string }) {
    this.client = options.client;
    this.topic = topicPath(options.topic, options.projectId);
    this.endpoint = options.endpoint ?? PUBSUB_ENDPOINT;
  }

  async publish(alert: SecurityAlert): Promise<void> {
    await this.client.requestJson(
      {
        method: 'POST',
        url: `${this.endpoint}/v1/${this.topic}:publish`,
        json: {
          messages: [
            {
              data: Buffer.from(JSON.stringify(alert), 'utf8').toString('base64'),
              attributes: { severity: alert.severity, image: alert.image },
            },
          ],
        },
      },
      publishResponseSchema
    );
  }
}
