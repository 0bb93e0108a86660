/**
 * FormTools Tests
 *
 * Puppeteer is mocked; the remote session service is the in-process fake.
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  createMockBrowser,
  createMockElement,
  createMockPage,
  type MockBrowser,
  type MockElementHandle,
  type MockPage,
} from '../../mocks/puppeteer.mock.js';

vi.mock('puppeteer-core', () => ({
  default: {
    connect: vi.fn(),
  },
}));

import puppeteer from 'puppeteer-core';
import { FormTools, describeFillFormResult } from '../../../src/tools/form-tools.js';
import { PageSession } from '../../../src/tools/page-session.js';
import { RemoteBrowser } from '../../../src/browser/remote-browser.js';
import { DEFAULT_SUBMIT_SELECTOR } from '../../../src/tools/page-actions.js';
import { createTestSession, type TestSession } from '../../helpers/session-fixtures.js';
import { delay } from '../../helpers/test-utils.js';

describe('FormTools', () => {
  let session: TestSession;
  let elements: Record<string, MockElementHandle>;
  let page: MockPage;
  let browser: MockBrowser;
  let tools: FormTools;

  beforeEach(() => {
    vi.clearAllMocks();
    session = createTestSession();
    elements = {};
    page = createMockPage({ url: 'https://www.example.com/signup', elements });
    browser = createMockBrowser({ pages: [page] });
    (puppeteer.connect as Mock).mockResolvedValue(browser);

    tools = new FormTools(
      new PageSession({
        sessionManager: session.sessionManager,
        browser: new RemoteBrowser({ retryDelayMs: 0 }),
      }),
    );
  });

  it('should fill fields matched by name, id, aria-label or placeholder', async () => {
    const email = createMockElement('text');
    const newsletter = createMockElement('checkable');
    const city = createMockElement('text');
    elements['[name="email"]'] = email;
    elements['[id="newsletter"]'] = newsletter;
    elements['[placeholder="City"]'] = city;

    const result = await tools.fillForm({
      url: 'example.com/signup',
      fields: { email: 'user@example.test', newsletter: true, City: 'Utrecht', phone: '000' },
    });

    expect(result).toEqual({
      url: 'https://www.example.com/signup',
      finalUrl: 'https://www.example.com/signup',
      sessionId: 's1',
      filled: ['email', 'newsletter', 'City'],
      missing: ['phone'],
      submitted: false,
    });
    expect(email.type).toHaveBeenCalledWith('user@example.test');
    expect(newsletter.click).toHaveBeenCalledTimes(1);
    expect(city.type).toHaveBeenCalledWith('Utrecht');
    expect(email.dispose).toHaveBeenCalled();
  });

  it('should choose select options through page.select', async () => {
    elements['[name="country"]'] = createMockElement('select');

    await tools.fillForm({ url: 'example.com/signup', fields: { country: 'NL' } });

    expect(page.select).toHaveBeenCalledWith('[name="country"]', 'NL');
  });

  it('should leave a checkbox alone when it already has the wanted state', async () => {
    const terms = createMockElement('checkable');
    terms.evaluate.mockReset();
    terms.evaluate.mockResolvedValueOnce('checkable').mockResolvedValueOnce(true);
    elements['[name="terms"]'] = terms;

    await tools.fillForm({ url: 'example.com/signup', fields: { terms: 'yes' } });

    expect(terms.click).not.toHaveBeenCalled();
  });

  it('should submit when asked', async () => {
    const button = createMockElement();
    elements[DEFAULT_SUBMIT_SELECTOR] = button;

    const result = await tools.fillForm({ url: 'example.com/signup', fields: {}, submit: true });

    expect(result.submitted).toBe(true);
    expect(button.click).toHaveBeenCalledTimes(1);
    expect(page.waitForNavigation).toHaveBeenCalledWith({ waitUntil: 'networkidle2', timeout: 30000 });
  });

  it('should report no submission when the submit control is missing', async () => {
    const result = await tools.fillForm({ url: 'example.com/signup', fields: {}, submit: true });

    expect(result.submitted).toBe(false);
  });

  it('should use a custom submit selector', async () => {
    const button = createMockElement();
    elements['#send'] = button;

    const result = await tools.fillForm({
      url: 'example.com/signup',
      fields: {},
      submit: true,
      submitSelector: '#send',
    });

    expect(result.submitted).toBe(true);
  });

  it('should release the session and close the page afterwards', async () => {
    await tools.fillForm({ url: 'example.com/signup', fields: {} });

    expect(session.api.events).toEqual(['create:s1', 'release:s1']);
    expect(page.close).toHaveBeenCalled();
    expect(browser.disconnect).toHaveBeenCalled();
    expect(session.sessionManager.state).toBe('idle');
  });

  it('should release the session when navigation fails', async () => {
    page.goto.mockRejectedValue(new Error('net::ERR_NAME_NOT_RESOLVED'));

    await expect(tools.fillForm({ url: 'example.com/signup', fields: {} })).rejects.toThrow(
      'net::ERR_NAME_NOT_RESOLVED',
    );
    expect(session.api.events).toEqual(['create:s1', 'release:s1']);
  });

  it('should run concurrent fills one session at a time', async () => {
    const firstEmail = createMockElement('text');
    const secondEmail = createMockElement('text');
    elements['[name="email"]'] = firstEmail;
    const secondPage = createMockPage({
      url: 'https://www.example.com/signup',
      elements: { '[name="email"]': secondEmail },
    });
    browser.newPage.mockResolvedValueOnce(page).mockResolvedValueOnce(secondPage);
    const liveDuringFill: string[][] = [];
    const recordLiveSessions = async (): Promise<void> => {
      liveDuringFill.push([...session.api.live]);
      await delay(5);
      liveDuringFill.push([...session.api.live]);
    };
    firstEmail.type.mockImplementation(recordLiveSessions);
    secondEmail.type.mockImplementation(recordLiveSessions);

    const [first, second] = await Promise.all([
      tools.fillForm({ url: 'example.com/signup', fields: { email: 'a@example.test' } }),
      tools.fillForm({ url: 'example.com/signup', fields: { email: 'b@example.test' } }),
    ]);

    expect([first.sessionId, second.sessionId]).toEqual(['s1', 's2']);
    expect(liveDuringFill).toEqual([['s1'], ['s1'], ['s2'], ['s2']]);
    expect(session.api.events).toEqual(['create:s1', 'release:s1', 'create:s2', 'release:s2']);
    expect(page.close).toHaveBeenCalled();
    expect(secondPage.close).toHaveBeenCalled();
  });

  it('should keep serving fills after one fails', async () => {
    page.goto.mockRejectedValueOnce(new Error('net::ERR_CONNECTION_RESET'));

    const results = await Promise.allSettled([
      tools.fillForm({ url: 'example.com/signup', fields: {} }),
      tools.fillForm({ url: 'example.com/signup', fields: {} }),
    ]);

    expect(results.map((result) => result.status)).toEqual(['rejected', 'fulfilled']);
    expect(session.api.events).toEqual(['create:s1', 'release:s1', 'create:s2', 'release:s2']);
  });

  it('should reject invalid input before creating a session', async () => {
    await expect(tools.fillForm({ url: '', fields: {} })).rejects.toThrow();
    expect(session.api.createSession).not.toHaveBeenCalled();
  });
});

describe('describeFillFormResult', () => {
  it('should summarize filled, missing and submission', () => {
    const text = describeFillFormResult({
      url: 'https://www.example.com/signup',
      finalUrl: 'https://www.example.com/welcome',
      sessionId: 's1',
      filled: ['email', 'name'],
      missing: ['phone'],
      submitted: true,
    });

    expect(text).toBe(
      'Filled 2 field(s) on https://www.example.com/signup.\n' +
        'Filled: email, name\n' +
        'Not found: phone\n' +
        'Submitted; now at https://www.example.com/welcome',
    );
  });

  it('should mention when nothing was submitted', () => {
    const text = describeFillFormResult({
      url: 'https://www.example.com/signup',
      finalUrl: 'https://www.example.com/signup',
      sessionId: 's1',
      filled: [],
      missing: [],
      submitted: false,
    });

    expect(text).toBe('Filled 0 field(s) on https://www.example.com/signup.\nNot submitted');
  });
});
