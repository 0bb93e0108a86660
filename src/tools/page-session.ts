/**
 * Page Session
 *
 * Runs interactive page work (forms, logins) inside a scoped remote session:
 * acquire, attach, open the page, run, then close and release on every path.
 * Runs are serialized: the manager and browser hold one session at a time,
 * so a second run starts only after the first has released.
 */

import type { Page } from 'puppeteer-core';
import type { LoaderOptions } from '../config/loader-config.js';
import { SessionManager } from '../session/session-manager.js';
import type { RemoteSessionHandle } from '../session/session.types.js';
import { RemoteBrowser, closePage } from '../browser/remote-browser.js';
import { SerialQueue } from '../lib/async-utils.js';
import { TOOL_LOADER_DEFAULTS } from './web-tools.js';

export interface PageSessionOptions {
  loaderOptions?: LoaderOptions;
  sessionManager?: SessionManager;
  browser?: RemoteBrowser;
}

export interface PageContext {
  handle: RemoteSessionHandle;
  /** HTTP status of the initial navigation */
  status?: number;
  /** Navigation timeout (ms) */
  timeout: number;
}

export interface RunOptions {
  /** Extra HTTP headers for the page */
  headers?: Record<string, string>;
}

export class PageSession {
  readonly sessionManager: SessionManager;
  private readonly browser: RemoteBrowser;
  private readonly queue = new SerialQueue();

  constructor(options: PageSessionOptions = {}) {
    this.sessionManager =
      options.sessionManager ??
      new SessionManager({ ...TOOL_LOADER_DEFAULTS, ...options.loaderOptions });
    this.browser = options.browser ?? new RemoteBrowser();
  }

  get timeout(): number {
    return this.sessionManager.config.timeout;
  }

  run<T>(
    url: string,
    work: (page: Page, context: PageContext) => Promise<T>,
    options: RunOptions = {},
  ): Promise<T> {
    return this.queue.run(() => this.runScoped(url, work, options));
  }

  private runScoped<T>(
    url: string,
    work: (page: Page, context: PageContext) => Promise<T>,
    options: RunOptions,
  ): Promise<T> {
    return this.sessionManager.withSession(async (handle) => {
      try {
        await this.browser.attach(handle);
        const { page, status } = await this.browser.openPage(url, {
          timeout: this.timeout,
          headers: options.headers,
        });
        try {
          return await work(page, { handle, status, timeout: this.timeout });
        } finally {
          await closePage(page);
        }
      } finally {
        await this.browser.detach();
      }
    });
  }
}
