/**
 * Session Fixtures
 *
 * Session managers wired to the in-process session service and a private
 * interrupt hook, so tests never touch the network or process signals.
 */

import { vi } from 'vitest';
import { SessionManager } from '../../src/session/session-manager.js';
import { InterruptHook } from '../../src/session/interrupt-hook.js';
import type { LoaderOptions } from '../../src/config/loader-config.js';
import { FakeSessionApi } from '../mocks/fake-session-api.js';
import { TEST_API_KEY, createSignalSource } from './test-utils.js';

export interface TestSession {
  api: FakeSessionApi;
  hook: InterruptHook;
  sessionManager: SessionManager;
}

export function createTestSession(options: LoaderOptions = {}): TestSession {
  const api = new FakeSessionApi();
  const hook = new InterruptHook({ source: createSignalSource(), exit: vi.fn() });
  const sessionManager = new SessionManager(
    { apiKey: TEST_API_KEY, ...options },
    { api, interruptHook: hook },
  );
  return { api, hook, sessionManager };
}
