/**
 * Server Types
 *
 * Core types for server orchestration
 */

import type { ShoppingTools } from '../tools/shopping-tools.js';
import type { FormTools } from '../tools/form-tools.js';
import type { AuthTools } from '../tools/auth-tools.js';
import type { SessionTools } from '../tools/session-tools.js';
import type { SessionManager } from '../session/session-manager.js';

/**
 * MCP Server configuration
 */
export interface ServerConfig {
  name: string;
  version: string;
  capabilities: {
    tools?: Record<string, unknown>;
    logging?: Record<string, unknown>;
  };
}

/**
 * Tool implementations the server routes to
 */
export interface ServerTools {
  /** Browse, HTML and shopping tools (ShoppingTools extends WebTools) */
  pages: ShoppingTools;
  forms: FormTools;
  auth: AuthTools;
  sessions: SessionTools;
  /** Session manager shared by the form, auth and session tools */
  sessionManager: SessionManager;
}
