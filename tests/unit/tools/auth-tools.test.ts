/**
 * AuthTools Tests
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  createMockBrowser,
  createMockElement,
  createMockPage,
  createMockResponse,
  type MockElementHandle,
  type MockPage,
} from '../../mocks/puppeteer.mock.js';

vi.mock('puppeteer-core', () => ({
  default: {
    connect: vi.fn(),
  },
}));

import puppeteer from 'puppeteer-core';
import { AuthTools, PASSWORD_SELECTOR } from '../../../src/tools/auth-tools.js';
import { PageSession } from '../../../src/tools/page-session.js';
import { RemoteBrowser } from '../../../src/browser/remote-browser.js';
import { DEFAULT_SUBMIT_SELECTOR } from '../../../src/tools/page-actions.js';
import { ConfigurationError } from '../../../src/shared/errors/index.js';
import { createTestSession, type TestSession } from '../../helpers/session-fixtures.js';

describe('AuthTools', () => {
  let session: TestSession;
  let elements: Record<string, MockElementHandle>;
  let page: MockPage;
  let tools: AuthTools;

  beforeEach(() => {
    vi.clearAllMocks();
    session = createTestSession();
    elements = {};
    page = createMockPage({ url: 'https://www.example.com/login', elements });
    (puppeteer.connect as Mock).mockResolvedValue(createMockBrowser({ pages: [page] }));

    tools = new AuthTools(
      new PageSession({
        sessionManager: session.sessionManager,
        browser: new RemoteBrowser({ retryDelayMs: 0 }),
      }),
    );
  });

  describe('token', () => {
    it('should send the bearer token and accept a successful response', async () => {
      const result = await tools.authenticate({
        url: 'example.com/account',
        type: 'token',
        credentials: { token: 'test-token' },
      });

      expect(page.setExtraHTTPHeaders).toHaveBeenCalledWith({ Authorization: 'Bearer test-token' });
      expect(page.goto).toHaveBeenCalledWith('https://www.example.com/account', {
        waitUntil: 'networkidle2',
        timeout: 30000,
      });
      expect(result).toEqual({
        authenticated: true,
        method: 'token',
        finalUrl: 'https://www.example.com/login',
        sessionId: 's1',
      });
    });

    it('should report an error status', async () => {
      page.goto.mockResolvedValue(createMockResponse(401));

      const result = await tools.authenticate({
        url: 'example.com/account',
        type: 'token',
        credentials: { token: 'test-token' },
      });

      expect(result.authenticated).toBe(false);
      expect(result.reason).toBe('HTTP 401');
    });

    it('should require a token before creating a session', async () => {
      await expect(
        tools.authenticate({ url: 'example.com', type: 'token', credentials: {} }),
      ).rejects.toThrow(ConfigurationError);
      expect(session.api.createSession).not.toHaveBeenCalled();
    });
  });

  describe('form', () => {
    let username: MockElementHandle;
    let password: MockElementHandle;
    let submit: MockElementHandle;

    beforeEach(() => {
      username = createMockElement('text');
      password = createMockElement('text');
      submit = createMockElement();
      elements['input[name="email"]'] = username;
      elements[PASSWORD_SELECTOR] = password;
      elements[DEFAULT_SUBMIT_SELECTOR] = submit;
    });

    it('should log in when the password field goes away', async () => {
      submit.click.mockImplementation(async () => {
        delete elements[PASSWORD_SELECTOR];
      });

      const result = await tools.authenticate({
        url: 'example.com/login',
        type: 'form',
        credentials: { username: 'user@example.test', password: 'test-password' },
      });

      expect(username.type).toHaveBeenCalledWith('user@example.test');
      expect(password.type).toHaveBeenCalledWith('test-password');
      expect(submit.click).toHaveBeenCalledTimes(1);
      expect(result).toEqual({
        authenticated: true,
        method: 'form',
        finalUrl: 'https://www.example.com/login',
        sessionId: 's1',
      });
      expect(session.api.events).toEqual(['create:s1', 'release:s1']);
    });

    it('should fail when the login form is still present', async () => {
      const result = await tools.authenticate({
        url: 'example.com/login',
        type: 'form',
        credentials: { username: 'user@example.test', password: 'wrong' },
      });

      expect(result.authenticated).toBe(false);
      expect(result.reason).toBe('Login form still present');
    });

    it('should enter the MFA code and submit again', async () => {
      const code = createMockElement('text');
      elements['input[autocomplete="one-time-code"]'] = code;
      submit.click.mockImplementation(async () => {
        delete elements[PASSWORD_SELECTOR];
      });

      const result = await tools.authenticate({
        url: 'example.com/login',
        type: 'form',
        credentials: { username: 'user@example.test', password: 'test-password' },
        mfaCode: '123456',
      });

      expect(code.type).toHaveBeenCalledWith('123456');
      expect(submit.click).toHaveBeenCalledTimes(2);
      expect(result.authenticated).toBe(true);
    });

    it('should report a missing MFA field', async () => {
      const result = await tools.authenticate({
        url: 'example.com/login',
        type: 'form',
        credentials: { username: 'user@example.test', password: 'test-password' },
        mfaCode: '123456',
      });

      expect(result).toEqual({
        authenticated: false,
        method: 'form',
        finalUrl: 'https://www.example.com/login',
        sessionId: 's1',
        reason: 'MFA field not found',
      });
    });

    it('should report a missing username field', async () => {
      delete elements['input[name="email"]'];

      const result = await tools.authenticate({
        url: 'example.com/login',
        type: 'form',
        credentials: { username: 'user@example.test', password: 'test-password' },
      });

      expect(result.reason).toBe('Username field not found');
      expect(password.type).not.toHaveBeenCalled();
    });

    it('should require both username and password', async () => {
      await expect(
        tools.authenticate({
          url: 'example.com/login',
          type: 'form',
          credentials: { username: 'user@example.test' },
        }),
      ).rejects.toThrow(
        'Form authentication requires credentials.username and credentials.password',
      );
    });
  });
});
