/**
 * Session Tools
 *
 * Session inspection and account-wide cleanup.
 */

import { createLogger } from '../shared/services/logging.service.js';
import type { SessionManager } from '../session/session-manager.js';
import type { SessionInfo } from '../session/session.types.js';

const logger = createLogger('SessionTools');

/**
 * The part of the session API these tools need
 */
export interface SessionMaintenanceApi {
  releaseAllSessions(signal?: AbortSignal): Promise<void>;
}

export interface SessionToolsOptions {
  sessionManager: SessionManager;
  api: SessionMaintenanceApi;
}

export class SessionTools {
  private readonly sessionManager: SessionManager;
  private readonly api: SessionMaintenanceApi;

  constructor(options: SessionToolsOptions) {
    this.sessionManager = options.sessionManager;
    this.api = options.api;
  }

  /**
   * Current session of the shared manager, or null when idle.
   */
  getSessionInfo(): { active: boolean; session: SessionInfo | null } {
    const session = this.sessionManager.getSessionInfo() ?? null;
    return { active: session !== null, session };
  }

  /**
   * Release the shared session, then every session on the account.
   */
  async releaseAllSessions(): Promise<{ released: true }> {
    await this.sessionManager.release();
    await this.api.releaseAllSessions();
    logger.notice('All sessions released');
    return { released: true };
  }
}
