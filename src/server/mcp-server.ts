/**
 * MCP Server
 *
 * Exposes the page, shopping, form, authentication and session tools over the
 * Model Context Protocol (stdio). Tool failures become structured error
 * responses rather than protocol errors.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ServerConfig, ServerTools } from './types.js';
import {
  AuthenticateInputSchema,
  BrowsePageInputSchema,
  ComparePricesInputSchema,
  FillFormInputSchema,
  FilterResultsInputSchema,
  GetPageHtmlInputSchema,
  ReleaseAllSessionsInputSchema,
  SearchProductInputSchema,
  SessionInfoInputSchema,
} from '../tools/tool-schemas.js';
import {
  createErrorResponse,
  createSuccessResponse,
  toError,
  type McpToolResponse,
} from '../shared/errors/index.js';
import {
  createLogger,
  getLogger,
  isLogLevel,
  type LogLevel,
  type McpNotificationSender,
} from '../shared/services/logging.service.js';

const logger = createLogger('McpServer');

/**
 * Run a tool handler, logging its duration and converting failures into
 * error responses.
 */
export async function executeWithLogging<T>(
  toolName: string,
  handler: () => Promise<T> | T,
): Promise<McpToolResponse> {
  const startTime = Date.now();

  try {
    logger.debug(`Executing tool: ${toolName}`);
    const result = await handler();
    logger.debug(`Tool ${toolName} completed in ${Date.now() - startTime}ms`);
    return createSuccessResponse(result);
  } catch (error) {
    logger.error(`Tool ${toolName} failed after ${Date.now() - startTime}ms`, toError(error), {
      toolName,
    });
    return createErrorResponse(error);
  }
}

export class SteelWebLoaderServer implements McpNotificationSender {
  private readonly server: McpServer;
  private readonly transport: StdioServerTransport;
  private readonly toolNames: string[] = [];

  constructor(
    private readonly config: ServerConfig,
    private readonly tools: ServerTools,
  ) {
    this.server = new McpServer(
      {
        name: config.name,
        version: config.version,
      },
      {
        capabilities: config.capabilities,
      },
    );

    this.transport = new StdioServerTransport();

    this.registerLoggingHandlers();
    this.registerPageTools();
    this.registerShoppingTools();
    this.registerInteractionTools();
    this.registerSessionTools();

    getLogger().setMcpServer(this);
  }

  /**
   * Names of the registered tools, in registration order
   */
  get registeredTools(): readonly string[] {
    return this.toolNames;
  }

  /**
   * Send logging message notification via MCP protocol
   */
  async sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void> {
    await this.server.server.notification({
      method: 'notifications/message',
      params: {
        level: params.level,
        logger: params.logger,
        data: params.data,
      },
    });
  }

  private registerLoggingHandlers(): void {
    this.server.server.setRequestHandler(SetLevelRequestSchema, (request) => {
      const { level } = request.params;
      if (isLogLevel(level)) {
        getLogger().setMinLevel(level);
        logger.info(`Log level set to: ${level}`);
      }
      return {};
    });
  }

  private registerPageTools(): void {
    const { pages } = this.tools;

    this.server.registerTool(
      'browse_page',
      {
        title: 'Browse Page',
        description:
          'Browse a webpage in a remote browser session and extract its text content. ' +
          'Input is a URL (e.g. example.com or www.example.com).',
        inputSchema: BrowsePageInputSchema.shape,
      },
      async ({ url }) => executeWithLogging('browse_page', () => pages.browsePage(url)),
    );

    this.server.registerTool(
      'get_page_html',
      {
        title: 'Get Page HTML',
        description:
          'Get the HTML structure of a webpage. Use when the text content is not enough, ' +
          'for example to analyze layout or find specific elements.',
        inputSchema: GetPageHtmlInputSchema.shape,
      },
      async ({ url }) => executeWithLogging('get_page_html', () => pages.getPageHtml(url)),
    );

    this.toolNames.push('browse_page', 'get_page_html');
  }

  private registerShoppingTools(): void {
    const { pages } = this.tools;

    this.server.registerTool(
      'search_product',
      {
        title: 'Search Product',
        description: 'Search for a product on a shopping website.',
        inputSchema: SearchProductInputSchema.shape,
      },
      async ({ query, searchUrlTemplate }) =>
        executeWithLogging('search_product', () => pages.searchProduct(query, searchUrlTemplate)),
    );

    this.server.registerTool(
      'filter_results',
      {
        title: 'Filter Results',
        description: 'Load a search results page with filter criteria applied.',
        inputSchema: FilterResultsInputSchema.shape,
      },
      async ({ url, criteria }) =>
        executeWithLogging('filter_results', () => pages.filterResults(url, criteria)),
    );

    this.server.registerTool(
      'compare_prices',
      {
        title: 'Compare Prices',
        description: 'Load two product pages and return their content side by side.',
        inputSchema: ComparePricesInputSchema.shape,
      },
      async ({ url1, url2 }) =>
        executeWithLogging('compare_prices', () => pages.comparePrices(url1, url2)),
    );

    this.toolNames.push('search_product', 'filter_results', 'compare_prices');
  }

  private registerInteractionTools(): void {
    const { forms, auth } = this.tools;

    this.server.registerTool(
      'fill_form',
      {
        title: 'Fill Form',
        description:
          'Fill form fields on a page, matched by name, id, aria-label or placeholder, ' +
          'and optionally submit the form.',
        inputSchema: FillFormInputSchema.shape,
      },
      async (input) => executeWithLogging('fill_form', () => forms.fillForm(input)),
    );

    this.server.registerTool(
      'authenticate',
      {
        title: 'Authenticate',
        description:
          'Log into a site with its login form (username/password, optional MFA code) ' +
          'or with a bearer token.',
        inputSchema: AuthenticateInputSchema.shape,
      },
      async (input) => executeWithLogging('authenticate', () => auth.authenticate(input)),
    );

    this.toolNames.push('fill_form', 'authenticate');
  }

  private registerSessionTools(): void {
    const { sessions } = this.tools;

    this.server.registerTool(
      'get_session_info',
      {
        title: 'Get Session Info',
        description: 'Report the remote browser session currently held by the server, if any.',
        inputSchema: SessionInfoInputSchema.shape,
      },
      async () => executeWithLogging('get_session_info', () => sessions.getSessionInfo()),
    );

    this.server.registerTool(
      'release_all_sessions',
      {
        title: 'Release All Sessions',
        description: 'Release the held session and every other active session on the account.',
        inputSchema: ReleaseAllSessionsInputSchema.shape,
      },
      async () => executeWithLogging('release_all_sessions', () => sessions.releaseAllSessions()),
    );

    this.toolNames.push('get_session_info', 'release_all_sessions');
  }

  async start(): Promise<void> {
    await this.server.connect(this.transport);
    logger.info(`${this.config.name} v${this.config.version} started`, {
      tools: this.toolNames.length,
    });
  }

  async stop(): Promise<void> {
    getLogger().setMcpServer(null);
    await this.server.close();
  }
}
