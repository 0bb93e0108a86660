/**
 * Web Loader
 *
 * Loads URLs through a remote browser session and yields one Document per URL.
 *
 * With reuseSession (default) a batch runs on a single session; without it,
 * every URL gets a fresh one. The session is released when the batch ends,
 * whether it completes, fails or the consumer stops iterating early.
 */

import { createLogger } from '../shared/services/logging.service.js';
import {
  ExtractionError,
  ExtractionTimeoutError,
  SessionError,
} from '../shared/errors/index.js';
import { withTimeout } from '../lib/async-utils.js';
import { resolveLoaderConfig, type LoaderConfig, type LoaderOptions } from '../config/loader-config.js';
import { SessionManager } from '../session/session-manager.js';
import type { RemoteSessionApi, RemoteSessionHandle, SessionInfo } from '../session/session.types.js';
import { RemoteBrowser, closePage, toExtractionTarget } from '../browser/remote-browser.js';
import { getExtractionStrategy, type ExtractionStrategy } from '../extraction/strategies.js';
import type { Document } from './document.js';

const logger = createLogger('WebLoader');

export interface WebLoaderOptions extends LoaderOptions {
  urls: readonly string[];
}

export interface WebLoaderDeps {
  sessionManager?: SessionManager;
  browser?: RemoteBrowser;
  /** Remote session service for the default session manager */
  api?: RemoteSessionApi;
}

/**
 * Anything that can produce documents in one go
 */
export interface DocumentLoader {
  load(): Promise<Document[]>;
}

export class WebLoader implements DocumentLoader {
  readonly urls: readonly string[];
  readonly config: LoaderConfig;

  private readonly strategy: ExtractionStrategy;
  private readonly sessionManager: SessionManager;
  private readonly browser: RemoteBrowser;

  /**
   * @throws ConfigurationError on a missing API key or invalid option
   */
  constructor(options: WebLoaderOptions, deps: WebLoaderDeps = {}) {
    const { urls, ...loaderOptions } = options;
    this.urls = [...urls];
    this.config = resolveLoaderConfig(loaderOptions);
    this.strategy = getExtractionStrategy(this.config.extractStrategy);
    this.sessionManager =
      deps.sessionManager ?? new SessionManager(this.config, { api: deps.api });
    this.browser = deps.browser ?? new RemoteBrowser();
  }

  /**
   * Yield documents one URL at a time.
   */
  async *lazyLoad(): AsyncGenerator<Document, void, undefined> {
    try {
      for (const url of this.urls) {
        yield await this.loadUrl(url);
      }
    } finally {
      await this.browser.detach();
      await this.sessionManager.release();
    }
  }

  /**
   * Load every URL and collect the documents.
   */
  async load(): Promise<Document[]> {
    const documents: Document[] = [];
    for await (const document of this.lazyLoad()) {
      documents.push(document);
    }
    return documents;
  }

  /**
   * Identifiers of the session currently in use.
   *
   * @throws SessionError with code NO_ACTIVE_SESSION outside a load
   */
  getSessionInfo(): SessionInfo {
    const info = this.sessionManager.getSessionInfo();
    if (!info) {
      throw SessionError.noActiveSession();
    }
    return info;
  }

  private async loadUrl(url: string): Promise<Document> {
    const handle = await this.sessionManager.acquire();
    await this.browser.attach(handle);

    logger.info('Loading page', { url, sessionId: handle.sessionId, strategy: this.strategy.name });

    const pageContent = await this.extract(url, handle);

    return {
      pageContent,
      metadata: {
        source: url,
        sessionId: handle.sessionId,
        ...(handle.viewerUrl ? { viewerUrl: handle.viewerUrl } : {}),
        extractStrategy: this.strategy.name,
      },
    };
  }

  private async extract(url: string, handle: RemoteSessionHandle): Promise<string> {
    const { timeout } = this.config;
    const { sessionId } = handle;

    try {
      const { page } = await this.browser.openPage(url, { timeout });
      try {
        return await withTimeout(
          this.strategy.extract(toExtractionTarget(page)),
          timeout,
          () => new ExtractionTimeoutError(url, sessionId, timeout),
        );
      } finally {
        await closePage(page);
      }
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new ExtractionTimeoutError(url, sessionId, timeout);
      }
      throw ExtractionError.failed(url, sessionId, error);
    }
  }
}
