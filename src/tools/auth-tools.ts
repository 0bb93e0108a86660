/**
 * Auth Tools
 *
 * Logs into a site inside a scoped session, either through its login form or
 * with a bearer token header.
 */

import type { Page } from 'puppeteer-core';
import { createLogger } from '../shared/services/logging.service.js';
import { ConfigurationError } from '../shared/errors/index.js';
import { PageSession, type PageContext, type PageSessionOptions } from './page-session.js';
import { submitForm, typeInto } from './page-actions.js';
import { AuthenticateInputSchema, type AuthenticateInput } from './tool-schemas.js';
import { normalizeUrl } from './url-utils.js';

const logger = createLogger('AuthTools');

export const USERNAME_SELECTORS = [
  'input[name="username"]',
  'input[name="email"]',
  'input[type="email"]',
  'input[id="username"]',
  'input[id="email"]',
  'input[autocomplete="username"]',
] as const;

export const PASSWORD_SELECTOR = 'input[type="password"]';

export const MFA_SELECTORS = [
  'input[autocomplete="one-time-code"]',
  'input[name*="otp"]',
  'input[name*="code"]',
] as const;

export interface AuthenticateResult {
  authenticated: boolean;
  method: AuthenticateInput['type'];
  finalUrl: string;
  sessionId: string;
  /** Why authentication is considered failed */
  reason?: string;
}

export class AuthTools {
  private readonly pageSession: PageSession;

  constructor(options: PageSessionOptions | PageSession = {}) {
    this.pageSession = options instanceof PageSession ? options : new PageSession(options);
  }

  /**
   * @throws ConfigurationError when the credentials do not fit the method
   */
  async authenticate(input: AuthenticateInput): Promise<AuthenticateResult> {
    const { url, type, credentials, mfaCode } = AuthenticateInputSchema.parse(input);
    const target = normalizeUrl(url);

    if (type === 'token') {
      const { token } = credentials;
      if (!token) {
        throw new ConfigurationError('Token authentication requires credentials.token');
      }
      return this.pageSession.run(
        target,
        async (page, context) => {
          const authenticated = context.status !== undefined && context.status < 400;
          const reason = authenticated ? undefined : `HTTP ${context.status ?? 'no response'}`;
          return this.result(page, context, 'token', authenticated, reason);
        },
        { headers: { Authorization: `Bearer ${token}` } },
      );
    }

    const { username, password } = credentials;
    if (!username || !password) {
      throw new ConfigurationError(
        'Form authentication requires credentials.username and credentials.password',
      );
    }

    return this.pageSession.run(target, async (page, context) => {
      if (!(await typeInto(page, USERNAME_SELECTORS, username))) {
        return this.result(page, context, 'form', false, 'Username field not found');
      }
      if (!(await typeInto(page, [PASSWORD_SELECTOR], password))) {
        return this.result(page, context, 'form', false, 'Password field not found');
      }
      await submitForm(page, context.timeout);

      if (mfaCode) {
        if (!(await typeInto(page, MFA_SELECTORS, mfaCode))) {
          return this.result(page, context, 'form', false, 'MFA field not found');
        }
        await submitForm(page, context.timeout);
      }

      // A login form that is still showing a password field did not accept the credentials.
      const passwordField = await page.$(PASSWORD_SELECTOR);
      const authenticated = passwordField === null;
      await passwordField?.dispose();
      const reason = authenticated ? undefined : 'Login form still present';
      return this.result(page, context, 'form', authenticated, reason);
    });
  }

  private result(
    page: Page,
    context: PageContext,
    method: AuthenticateInput['type'],
    authenticated: boolean,
    reason?: string,
  ): AuthenticateResult {
    logger.info('Authentication attempt finished', {
      method,
      authenticated,
      sessionId: context.handle.sessionId,
    });
    return {
      authenticated,
      method,
      finalUrl: page.url(),
      sessionId: context.handle.sessionId,
      ...(reason ? { reason } : {}),
    };
  }
}
