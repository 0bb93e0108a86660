/**
 * MCP Server Tests
 *
 * The server is constructed but never connected to stdio.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { SteelWebLoaderServer, executeWithLogging } from '../../../src/server/mcp-server.js';
import {
  getServerTools,
  initServerConfig,
  resetServerState,
} from '../../../src/server/server-config.js';
import { SessionError } from '../../../src/shared/errors/index.js';
import { getLogger } from '../../../src/shared/services/logging.service.js';
import { TEST_API_KEY } from '../../helpers/test-utils.js';

describe('executeWithLogging', () => {
  it('should wrap a result in a success response', async () => {
    const response = await executeWithLogging('browse_page', () => 'Page text');

    expect(response).toEqual({
      content: [{ type: 'text', text: 'Page text' }],
      isError: false,
    });
  });

  it('should turn a thrown error into an error response', async () => {
    const response = await executeWithLogging('get_session_info', async () => {
      throw SessionError.noActiveSession();
    });

    expect(response.isError).toBe(true);
    expect(response.content[0].text).toMatch(/^Error: No active session\nCode: NO_ACTIVE_SESSION/);
  });
});

describe('SteelWebLoaderServer', () => {
  afterEach(() => {
    getLogger().setMcpServer(null);
    resetServerState();
  });

  it('should register every tool', () => {
    initServerConfig([], { STEEL_API_KEY: TEST_API_KEY });
    const server = new SteelWebLoaderServer(
      { name: 'steel-web-loader', version: '0.0.0-test', capabilities: { tools: {}, logging: {} } },
      getServerTools(),
    );

    expect(server.registeredTools).toEqual([
      'browse_page',
      'get_page_html',
      'search_product',
      'filter_results',
      'compare_prices',
      'fill_form',
      'authenticate',
      'get_session_info',
      'release_all_sessions',
    ]);
  });
});
