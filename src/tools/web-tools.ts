/**
 * Web Tools
 *
 * Page browsing for agents. Each call runs its own single-URL loader, so a
 * session lives exactly as long as the call. Failures come back as text the
 * model can read instead of exceptions.
 */

import { createLogger } from '../shared/services/logging.service.js';
import { extractErrorMessage } from '../shared/errors/index.js';
import type { ExtractStrategyName, LoaderOptions } from '../config/loader-config.js';
import { WebLoader, type DocumentLoader, type WebLoaderOptions } from '../loader/web-loader.js';
import type { Document } from '../loader/document.js';
import { normalizeUrl } from './url-utils.js';

const logger = createLogger('WebTools');

/**
 * Loader settings for tool calls: public pages, no proxy, generous timeout
 */
export const TOOL_LOADER_DEFAULTS = {
  useProxy: false,
  solveCaptcha: true,
  timeout: 60000,
} as const satisfies LoaderOptions;

export type LoaderFactory = (options: WebLoaderOptions) => DocumentLoader;

export interface WebToolsOptions {
  /** Overrides applied on top of TOOL_LOADER_DEFAULTS */
  loaderOptions?: LoaderOptions;
  /** Loader construction (default: WebLoader) */
  createLoader?: LoaderFactory;
}

export class WebTools {
  protected readonly loaderOptions: LoaderOptions;
  private readonly createLoader: LoaderFactory;

  constructor(options: WebToolsOptions = {}) {
    this.loaderOptions = { ...TOOL_LOADER_DEFAULTS, ...options.loaderOptions };
    this.createLoader = options.createLoader ?? ((loaderOptions) => new WebLoader(loaderOptions));
  }

  /**
   * Text content of a page.
   */
  async browsePage(url: string): Promise<string> {
    try {
      const document = await this.loadOne(normalizeUrl(url), 'text');
      return document?.pageContent ?? 'Failed to load page';
    } catch (error) {
      return this.failure('Error loading page', url, error);
    }
  }

  /**
   * HTML of a page, for layout analysis.
   */
  async getPageHtml(url: string): Promise<string> {
    try {
      const target = normalizeUrl(url);
      const document = await this.loadOne(target, 'html');
      if (!document) {
        return 'Failed to load page';
      }
      return `Page HTML structure from ${target}:\n${document.pageContent}`;
    } catch (error) {
      return this.failure('Error loading page', url, error);
    }
  }

  /**
   * Load a single URL with a fresh loader.
   */
  protected async loadOne(
    url: string,
    extractStrategy: ExtractStrategyName,
  ): Promise<Document | undefined> {
    const loader = this.createLoader({ ...this.loaderOptions, urls: [url], extractStrategy });
    const documents = await loader.load();
    return documents[0];
  }

  protected failure(prefix: string, url: string, error: unknown): string {
    const message = extractErrorMessage(error);
    logger.warning(prefix, { url, error: message });
    return `${prefix}: ${message}`;
  }
}
