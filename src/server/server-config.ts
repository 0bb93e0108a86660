/**
 * Server Configuration
 *
 * Global server configuration combining CLI args and environment variables,
 * plus the shared tool instances the MCP server routes to.
 */

import { parseArgs, type ServerArgs } from '../cli/args.js';
import { resolveLoaderConfig, type LoaderConfig } from '../config/loader-config.js';
import { SessionManager } from '../session/session-manager.js';
import { SteelSessionApi } from '../session/steel-session-api.js';
import { RemoteBrowser } from '../browser/remote-browser.js';
import { ShoppingTools } from '../tools/shopping-tools.js';
import { FormTools } from '../tools/form-tools.js';
import { AuthTools } from '../tools/auth-tools.js';
import { SessionTools } from '../tools/session-tools.js';
import { PageSession } from '../tools/page-session.js';
import { TOOL_LOADER_DEFAULTS } from '../tools/web-tools.js';
import type { ServerTools } from './types.js';

// Singleton instances
let serverConfig: LoaderConfig | null = null;
let serverTools: ServerTools | null = null;

/**
 * Initialize server configuration from CLI arguments and environment variables.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 * @param env - Environment (default: process.env)
 * @throws ConfigurationError on invalid flags or a missing API key
 */
export function initServerConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): LoaderConfig {
  const args: ServerArgs = parseArgs(argv);

  serverConfig = resolveLoaderConfig(
    {
      useProxy: args.useProxy,
      solveCaptcha: args.solveCaptcha,
      reuseSession: args.reuseSession,
      timeout: args.timeout ?? TOOL_LOADER_DEFAULTS.timeout,
      ...(args.extractStrategy ? { extractStrategy: args.extractStrategy } : {}),
    },
    env,
  );
  serverTools = null;
  return serverConfig;
}

/**
 * Get the current server configuration.
 * Throws if not initialized.
 */
export function getServerConfig(): LoaderConfig {
  if (!serverConfig) {
    throw new Error('Server config not initialized. Call initServerConfig() first.');
  }
  return serverConfig;
}

/**
 * Get or create the tool instances.
 *
 * Form and auth tools share one page session, and through it one session
 * manager, which is also the one reported by get_session_info and released by
 * release_all_sessions. The page session runs their calls one at a time.
 */
export function getServerTools(): ServerTools {
  if (serverTools) {
    return serverTools;
  }

  const config = getServerConfig();
  const api = new SteelSessionApi({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    connectUrl: config.connectUrl,
  });
  const sessionManager = new SessionManager(config, { api });
  const pageSession = new PageSession({ sessionManager, browser: new RemoteBrowser() });

  serverTools = {
    pages: new ShoppingTools({ loaderOptions: config }),
    forms: new FormTools(pageSession),
    auth: new AuthTools(pageSession),
    sessions: new SessionTools({ sessionManager, api }),
    sessionManager,
  };
  return serverTools;
}

/**
 * Release the shared session, if the tools were ever created.
 */
export async function disposeServerTools(): Promise<void> {
  if (serverTools) {
    await serverTools.sessionManager.dispose();
  }
}

/**
 * Reset server state (for testing).
 */
export function resetServerState(): void {
  serverConfig = null;
  serverTools = null;
}
