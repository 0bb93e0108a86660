/**
 * Session Manager
 *
 * Owns at most one remote browser session. Sessions are created lazily on
 * acquire(), optionally reused across acquires, and always given back on
 * release(), at the end of withSession(), or on SIGINT/SIGTERM through the
 * process-wide interrupt hook.
 *
 * acquire() and release() are serialized: at most one remote create or end
 * call is in flight per manager.
 */

import { createLogger } from '../shared/services/logging.service.js';
import {
  OperationTimeoutError,
  SessionCreationError,
  SessionTeardownError,
  extractErrorMessage,
  toError,
} from '../shared/errors/index.js';
import { SerialQueue, withTimeout } from '../lib/async-utils.js';
import { resolveLoaderConfig, type LoaderOptions } from '../config/loader-config.js';
import { getInterruptHook, type InterruptHook } from './interrupt-hook.js';
import { SteelSessionApi } from './steel-session-api.js';
import type {
  RemoteSessionApi,
  RemoteSessionHandle,
  SessionInfo,
  SessionState,
  SessionStateChangeEvent,
} from './session.types.js';

/**
 * Immutable snapshot of the settings a manager works with
 */
export interface SessionManagerConfig {
  readonly apiKey: string;
  readonly useProxy: boolean;
  readonly solveCaptcha: boolean;
  readonly timeout: number;
  readonly sessionTimeout: number;
  readonly reuseSession: boolean;
}

export interface SessionManagerDeps {
  /** Remote session service (default: SteelSessionApi over HTTP) */
  api?: RemoteSessionApi;
  /** Interrupt hook (default: the process-wide hook) */
  interruptHook?: InterruptHook;
}

/**
 * Matches remote responses for a session that is already gone.
 */
const ALREADY_STOPPED_PATTERN = /already (stopped|released|closed)/i;

export class SessionManager {
  readonly config: SessionManagerConfig;

  private readonly logger = createLogger('SessionManager');
  private readonly api: RemoteSessionApi;
  private readonly interruptHook: InterruptHook;
  private readonly queue = new SerialQueue();
  private readonly stateChangeListeners = new Set<(event: SessionStateChangeEvent) => void>();

  private _state: SessionState = 'idle';
  private current: RemoteSessionHandle | null = null;
  private _lastTeardownError: SessionTeardownError | null = null;

  /**
   * @param options - Loader options; the API key falls back to STEEL_API_KEY
   * @param deps - Injectable collaborators
   * @throws ConfigurationError when the configuration is invalid
   */
  constructor(options: LoaderOptions = {}, deps: SessionManagerDeps = {}) {
    const resolved = resolveLoaderConfig(options);
    this.config = Object.freeze({
      apiKey: resolved.apiKey,
      useProxy: resolved.useProxy,
      solveCaptcha: resolved.solveCaptcha,
      timeout: resolved.timeout,
      sessionTimeout: resolved.sessionTimeout,
      reuseSession: resolved.reuseSession,
    });
    this.api =
      deps.api ??
      new SteelSessionApi({
        apiKey: resolved.apiKey,
        baseUrl: resolved.baseUrl,
        connectUrl: resolved.connectUrl,
      });
    this.interruptHook = deps.interruptHook ?? getInterruptHook();
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Last non-fatal teardown failure, cleared by the next successful release
   */
  get lastTeardownError(): SessionTeardownError | null {
    return this._lastTeardownError;
  }

  isActive(): boolean {
    return this._state === 'active' && this.current !== null;
  }

  /**
   * Read-only copy of the current session's identifiers
   */
  getSessionInfo(): SessionInfo | undefined {
    if (!this.current) {
      return undefined;
    }
    return Object.freeze({ ...this.current });
  }

  /**
   * Subscribe to state changes. Returns an unsubscribe function.
   */
  onStateChange(listener: (event: SessionStateChangeEvent) => void): () => void {
    this.stateChangeListeners.add(listener);
    return () => this.stateChangeListeners.delete(listener);
  }

  /**
   * Get a live session handle.
   *
   * With reuseSession, an active session is returned as-is. Without it, the
   * active session is released first and a fresh one created.
   *
   * @throws SessionCreationError when the remote service rejects or times out
   */
  acquire(): Promise<RemoteSessionHandle> {
    return this.queue.run(() => this.acquireInternal());
  }

  /**
   * Give the session back. No-op when idle; never throws.
   */
  release(): Promise<void> {
    return this.queue.run(() => this.releaseInternal());
  }

  /**
   * Run work against a session and release it afterwards, whatever happens.
   */
  async withSession<T>(work: (handle: RemoteSessionHandle) => Promise<T>): Promise<T> {
    const handle = await this.acquire();
    try {
      return await work(handle);
    } finally {
      await this.release();
    }
  }

  /**
   * Release any held session and detach from the interrupt hook.
   */
  async dispose(): Promise<void> {
    await this.release();
    this.interruptHook.unregister(this);
    this.stateChangeListeners.clear();
  }

  private async acquireInternal(): Promise<RemoteSessionHandle> {
    if (this.current && this._state === 'active') {
      if (this.config.reuseSession) {
        this.logger.debug('Reusing active session', { sessionId: this.current.sessionId });
        return this.current;
      }
      this.logger.debug('Replacing active session', { sessionId: this.current.sessionId });
      await this.releaseInternal();
    }

    this.interruptHook.register(this);
    this.transitionTo('acquiring');

    const { timeout } = this.config;
    const controller = new AbortController();
    const creation = this.api.createSession({
      useProxy: this.config.useProxy,
      solveCaptcha: this.config.solveCaptcha,
      sessionTimeout: this.config.sessionTimeout,
      signal: controller.signal,
    });

    try {
      const record = await withTimeout(creation, timeout, () => {
        controller.abort();
        return new OperationTimeoutError('createSession', timeout);
      });

      const handle: RemoteSessionHandle = Object.freeze({
        sessionId: record.sessionId,
        connectEndpoint: record.connectEndpoint,
        ...(record.viewerUrl ? { viewerUrl: record.viewerUrl } : {}),
      });
      this.current = handle;
      this.transitionTo('active', handle.sessionId);
      this.logger.info('Session created', {
        sessionId: handle.sessionId,
        viewerUrl: handle.viewerUrl,
      });
      return handle;
    } catch (error) {
      this.current = null;
      this.transitionTo('idle');
      this.interruptHook.unregister(this);

      if (error instanceof OperationTimeoutError) {
        this.releaseOrphan(creation);
      }

      const creationError = SessionCreationError.fromCause(error, {
        useProxy: this.config.useProxy,
        solveCaptcha: this.config.solveCaptcha,
      });
      this.logger.error('Session creation failed', creationError, { code: creationError.code });
      throw creationError;
    }
  }

  private async releaseInternal(): Promise<void> {
    const handle = this.current;
    if (!handle) {
      return;
    }

    const { sessionId } = handle;
    const { timeout } = this.config;
    this.transitionTo('releasing', sessionId);

    const controller = new AbortController();
    try {
      await withTimeout(this.api.releaseSession(sessionId, controller.signal), timeout, () => {
        controller.abort();
        return new OperationTimeoutError('releaseSession', timeout);
      });
      this._lastTeardownError = null;
      this.logger.info('Session released', { sessionId });
    } catch (error) {
      if (ALREADY_STOPPED_PATTERN.test(extractErrorMessage(error))) {
        this._lastTeardownError = null;
        this.logger.debug('Session was already stopped', { sessionId });
      } else {
        const teardownError = new SessionTeardownError(sessionId, toError(error));
        this._lastTeardownError = teardownError;
        this.logger.warning(teardownError.message, { sessionId, code: teardownError.code });
      }
    } finally {
      this.current = null;
      this.transitionTo('idle');
      this.interruptHook.unregister(this);
    }
  }

  /**
   * A create that timed out locally may still succeed remotely. End that
   * session once it shows up so it does not run until its lifetime expires.
   */
  private releaseOrphan(creation: Promise<{ sessionId: string }>): void {
    creation
      .then(async ({ sessionId }) => {
        this.logger.debug('Releasing session created after timeout', { sessionId });
        await this.api.releaseSession(sessionId);
      })
      .catch((error: unknown) => {
        this.logger.debug('Late session cleanup skipped', { error: extractErrorMessage(error) });
      });
  }

  private transitionTo(newState: SessionState, sessionId?: string): void {
    const previousState = this._state;
    if (previousState === newState) return;

    this._state = newState;
    this.logger.debug('Session state changed', { previousState, currentState: newState });

    const event: SessionStateChangeEvent = {
      previousState,
      currentState: newState,
      sessionId,
      timestamp: new Date(),
    };
    for (const listener of this.stateChangeListeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('State change listener error', toError(error));
      }
    }
  }
}
