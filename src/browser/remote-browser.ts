/**
 * Remote Browser
 *
 * Attaches puppeteer-core to a remote session's websocket endpoint and opens
 * pages on it. The browser itself lives in the remote service: this side only
 * connects and disconnects, never launches or closes it.
 */

import puppeteer, { type Browser, type Page } from 'puppeteer-core';
import { createLogger } from '../shared/services/logging.service.js';
import {
  BrowserConnectionError,
  OperationTimeoutError,
  SessionError,
  extractErrorMessage,
  toError,
} from '../shared/errors/index.js';
import { delay, withTimeout } from '../lib/async-utils.js';
import type { RemoteSessionHandle } from '../session/session.types.js';
import type { ExtractionTarget } from '../extraction/strategies.js';

const logger = createLogger('RemoteBrowser');

/** Connection attempts before giving up */
export const DEFAULT_CONNECT_ATTEMPTS = 5;
/** Pause between connection attempts (ms) */
export const DEFAULT_RETRY_DELAY_MS = 2000;
/** Bound on a single connection attempt (ms) */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

export interface RemoteBrowserOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
  connectTimeoutMs?: number;
}

export interface OpenPageOptions {
  /** Navigation timeout (ms) */
  timeout: number;
  /** Extra HTTP headers sent with every request of the page */
  headers?: Record<string, string>;
}

export interface OpenedPage {
  page: Page;
  /** HTTP status of the main document, when a response was received */
  status?: number;
}

export class RemoteBrowser {
  private browser: Browser | null = null;
  private attachedSessionId: string | null = null;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly connectTimeoutMs: number;

  constructor(options: RemoteBrowserOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_CONNECT_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  }

  /**
   * Session the browser is currently attached to
   */
  get sessionId(): string | null {
    return this.attachedSessionId;
  }

  isAttachedTo(sessionId: string): boolean {
    return this.browser !== null && this.browser.connected && this.attachedSessionId === sessionId;
  }

  /**
   * Attach to the given session, detaching from any other one first.
   *
   * @throws BrowserConnectionError once every attempt has failed
   */
  async attach(handle: RemoteSessionHandle): Promise<void> {
    if (this.isAttachedTo(handle.sessionId)) {
      return;
    }
    await this.detach();

    let lastError: Error = new Error('No connection attempt made');

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        logger.debug('Connecting to remote browser', { sessionId: handle.sessionId, attempt });
        this.browser = await this.connectOnce(handle.connectEndpoint);
        this.attachedSessionId = handle.sessionId;
        logger.info('Attached to remote browser', { sessionId: handle.sessionId, attempt });
        return;
      } catch (error) {
        lastError = toError(error);
        logger.warning(`Connection attempt ${attempt} failed`, {
          sessionId: handle.sessionId,
          error: lastError.message,
        });
        if (attempt < this.maxAttempts) {
          await delay(this.retryDelayMs);
        }
      }
    }

    throw new BrowserConnectionError(handle.sessionId, this.maxAttempts, lastError);
  }

  /**
   * Open a new page and navigate it.
   *
   * The page is closed again if navigation fails.
   */
  async openPage(url: string, options: OpenPageOptions): Promise<OpenedPage> {
    if (!this.browser) {
      throw SessionError.noActiveSession();
    }

    const page = await this.browser.newPage();
    try {
      if (options.headers && Object.keys(options.headers).length > 0) {
        await page.setExtraHTTPHeaders(options.headers);
      }
      const response = await page.goto(url, {
        waitUntil: 'networkidle2',
        timeout: options.timeout,
      });
      return { page, status: response?.status() };
    } catch (error) {
      await closePage(page);
      throw error;
    }
  }

  /**
   * Disconnect from the remote browser. Never throws.
   */
  async detach(): Promise<void> {
    const browser = this.browser;
    if (!browser) {
      return;
    }
    this.browser = null;
    const sessionId = this.attachedSessionId;
    this.attachedSessionId = null;

    try {
      await browser.disconnect();
      logger.debug('Detached from remote browser', { sessionId });
    } catch (error) {
      logger.debug('Disconnect failed', { sessionId, error: extractErrorMessage(error) });
    }
  }

  private async connectOnce(browserWSEndpoint: string): Promise<Browser> {
    const connection = puppeteer.connect({ browserWSEndpoint, defaultViewport: null });
    try {
      return await withTimeout(
        connection,
        this.connectTimeoutMs,
        () => new OperationTimeoutError('connect', this.connectTimeoutMs),
      );
    } catch (error) {
      // A connection that completes after the timeout is dropped immediately.
      connection
        .then((late) => late.disconnect())
        .catch((lateError: unknown) => {
          logger.debug('Late connection discarded', { error: extractErrorMessage(lateError) });
        });
      throw error;
    }
  }
}

/**
 * Close a page, logging instead of throwing.
 */
export async function closePage(page: Page): Promise<void> {
  try {
    if (!page.isClosed()) {
      await page.close();
    }
  } catch (error) {
    logger.debug('Page close failed', { error: extractErrorMessage(error) });
  }
}

/**
 * View of a page for extraction strategies.
 */
export function toExtractionTarget(page: Page): ExtractionTarget {
  return {
    content: () => page.content(),
    innerText: (selector) =>
      page.$eval(selector, (element) =>
        element instanceof HTMLElement ? element.innerText : (element.textContent ?? '')
      ),
  };
}
