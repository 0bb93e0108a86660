/**
 * Session Types
 *
 * Value types shared by the session manager, the remote API client and the
 * consumers (loader, tools).
 */

/**
 * One remote browser session.
 *
 * Created only by SessionManager.acquire() and frozen; invalidated by release().
 */
export interface RemoteSessionHandle {
  /** Opaque identifier assigned by the remote service */
  readonly sessionId: string;
  /** URI used to attach a browser-automation client */
  readonly connectEndpoint: string;
  /** Debug viewer URL (absent if the service returns none) */
  readonly viewerUrl?: string;
}

/**
 * Read-only copy of the current session's identifying fields
 */
export type SessionInfo = Readonly<RemoteSessionHandle>;

/**
 * What the remote service returns for a newly created session
 */
export interface RemoteSessionRecord {
  sessionId: string;
  connectEndpoint: string;
  viewerUrl?: string;
}

/**
 * Options sent with a remote "create session" call
 */
export interface CreateSessionOptions {
  useProxy: boolean;
  solveCaptcha: boolean;
  /** Requested session lifetime (ms) */
  sessionTimeout: number;
  signal?: AbortSignal;
}

/**
 * Remote session service, as seen by the session manager
 */
export interface RemoteSessionApi {
  createSession(options: CreateSessionOptions): Promise<RemoteSessionRecord>;
  releaseSession(sessionId: string, signal?: AbortSignal): Promise<void>;
}

/**
 * Session manager state machine states
 */
export type SessionState = 'idle' | 'acquiring' | 'active' | 'releasing';

/**
 * Event emitted on session state changes
 */
export interface SessionStateChangeEvent {
  previousState: SessionState;
  currentState: SessionState;
  sessionId?: string;
  timestamp: Date;
}
