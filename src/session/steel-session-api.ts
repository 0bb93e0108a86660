/**
 * Steel Session API
 *
 * HTTP client for the Steel sessions REST API. Implements RemoteSessionApi for
 * the session manager and exposes the account-wide maintenance calls used by
 * the tools and scripts.
 */

import { z } from 'zod';
import { SteelApiError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import { DEFAULT_BASE_URL, DEFAULT_CONNECT_URL } from '../config/loader-config.js';
import type {
  CreateSessionOptions,
  RemoteSessionApi,
  RemoteSessionRecord,
} from './session.types.js';

const logger = createLogger('SteelSessionApi');

const SessionResponseSchema = z
  .object({
    id: z.string().min(1),
    status: z.string().optional(),
    createdAt: z.string().optional(),
    debugUrl: z.string().optional(),
    sessionViewerUrl: z.string().optional(),
  })
  .passthrough();

const SessionListResponseSchema = z.union([
  z.array(SessionResponseSchema),
  z.object({ sessions: z.array(SessionResponseSchema) }).passthrough(),
]);

const AnyResponseSchema = z.unknown();


/**
 * Summary of a session as listed by the service
 */
export interface SessionSummary {
  sessionId: string;
  status?: string;
  createdAt?: string;
  viewerUrl?: string;
}

export interface SteelSessionApiOptions {
  apiKey: string;
  baseUrl?: string;
  connectUrl?: string;
  /** Injected fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

export class SteelSessionApi implements RemoteSessionApi {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly connectUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SteelSessionApiOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.connectUrl = options.connectUrl ?? DEFAULT_CONNECT_URL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async createSession(options: CreateSessionOptions): Promise<RemoteSessionRecord> {
    const session = await this.request(
      'POST',
      '/sessions',
      SessionResponseSchema,
      {
        useProxy: options.useProxy,
        solveCaptcha: options.solveCaptcha,
        timeout: options.sessionTimeout,
      },
      options.signal,
    );

    logger.debug('Remote session created', { sessionId: session.id });

    return {
      sessionId: session.id,
      connectEndpoint: this.buildConnectEndpoint(session.id),
      viewerUrl: session.sessionViewerUrl ?? session.debugUrl,
    };
  }

  async releaseSession(sessionId: string, signal?: AbortSignal): Promise<void> {
    await this.request(
      'POST',
      `/sessions/${encodeURIComponent(sessionId)}/release`,
      AnyResponseSchema,
      {},
      signal,
    );
  }

  async listSessions(signal?: AbortSignal): Promise<SessionSummary[]> {
    const response = await this.request(
      'GET',
      '/sessions',
      SessionListResponseSchema,
      undefined,
      signal,
    );
    const sessions = Array.isArray(response) ? response : response.sessions;
    return sessions.map((session) => ({
      sessionId: session.id,
      status: session.status,
      createdAt: session.createdAt,
      viewerUrl: session.sessionViewerUrl ?? session.debugUrl,
    }));
  }

  /**
   * Release every active session on the account.
   */
  async releaseAllSessions(signal?: AbortSignal): Promise<void> {
    await this.request('POST', '/sessions/release', AnyResponseSchema, {}, signal);
  }

  /**
   * Websocket endpoint a CDP client connects to for a given session.
   */
  buildConnectEndpoint(sessionId: string): string {
    const url = new URL(this.connectUrl);
    url.searchParams.set('apiKey', this.apiKey);
    url.searchParams.set('sessionId', sessionId);
    return url.toString();
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: S,
    body?: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    const headers: Record<string, string> = { 'steel-api-key': this.apiKey };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body !== undefined ? JSON.stringify(body) : undefined,
      signal,
    });

    const text = await response.text();

    if (!response.ok) {
      throw new SteelApiError(response.status, text, `${method} ${path}`);
    }

    const json: unknown = text ? JSON.parse(text) : {};
    return schema.parse(json);
  }
}
