/**
 * Authenticated JSON-over-HTTPS access to Google Cloud REST APIs.
 */

import { GoogleAuth } from 'google-auth-library';
import type { z } from 'zod';
import { ScannerError, errorMessage } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { fetchWithRetry, type RetryOptions } from '../utils/retry.js';

export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

/**
 * Application Default Credentials: the function's service account when
 * deployed, `gcloud auth application-default login` locally.
 */
export class GoogleAuthTokenProvider implements AccessTokenProvider {
  private readonly auth: GoogleAuth;

  constructor(scopes: string[] = [CLOUD_PLATFORM_SCOPE]) {
    this.auth = new GoogleAuth({ scopes });
  }

  async getAccessToken(): Promise<string> {
    const token = await this.auth.getAccessToken();
    if (!token) {
      throw new ScannerError('Failed to obtain access token from Application Default Credentials', 'Authentication.TokenRefreshFailed');
    }
    return token;
  }
}

export interface GcpRequest {
  method?: 'GET' | 'POST' | 'PATCH' | 'DELETE';
  url: string;
  query?: Record<string, string | number | undefined>;
  /** Serialised as the JSON request body */
  json?: unknown;
  /** Raw request body, used when `json` is absent */
  body?: string;
  headers?: Record<string, string>;
}

export interface GcpRestClientOptions {
  tokens?: AccessTokenProvider;
  retry?: RetryOptions;
  logger?: Logger;
}

export function buildUrl(url: string, query?: GcpRequest['query']): string {
  if (!query) return url;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.set(key, String(value));
  }
  const qs = params.toString();
  return qs ? `${url}?${qs}` : url;
}

export class GcpRestClient {
  private readonly tokens: AccessTokenProvider;
  private readonly retry: RetryOptions;
  private readonly log: Logger;

  constructor(options: GcpRestClientOptions = {}) {
    this.tokens = options.tokens ?? new GoogleAuthTokenProvider();
    this.retry = options.retry ?? {};
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Send an authenticated request.
   * @throws HttpError for non-2xx responses once retries are exhausted
   */
  async request(req: GcpRequest): Promise<Response> {
    const token = await this.tokens.getAccessToken();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      ...req.headers,
    };

    let body = req.body;
    if (req.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(req.json);
    }

    const url = buildUrl(req.url, req.query);
    this.log.debug({ method: req.method ?? 'GET', url }, 'GCP API request');

    return fetchWithRetry(url, { method: req.method ?? 'GET', headers, body }, this.retry, this.log);
  }

  /**
   * Send a request and validate the JSON answer against `schema`.
   */
  async requestJson<S extends z.ZodTypeAny>(req: GcpRequest, schema: S): Promise<z.output<S>> {
    const response = await this.request(req);
    const text = await response.text();

    let payload: unknown = {};
    if (text.length > 0) {
      try {
        payload = JSON.parse(text);
      } catch (err) {
        throw new ScannerError(`Malformed JSON from ${req.url}: ${errorMessage(err)}`, 'Response.Malformed', { cause: err });
      }
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ScannerError(`Unexpected response from ${req.url}: ${parsed.error.message}`, 'Response.Malformed', {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
