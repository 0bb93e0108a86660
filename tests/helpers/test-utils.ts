/**
 * Test Utilities
 *
 * Common test helpers and assertions for the test suite.
 */

import { EventEmitter } from 'node:events';
import { expect } from 'vitest';

/** Placeholder API key used across tests */
export const TEST_API_KEY = 'test-secret';

/**
 * Assert that an async function rejects, and return the rejection reason.
 */
export async function expectAsyncError(
  fn: () => Promise<unknown>,
  expectedMessage?: string | RegExp,
): Promise<Error> {
  let caught: unknown;
  let rejected = false;

  try {
    await fn();
  } catch (e) {
    caught = e;
    rejected = true;
  }

  expect(rejected).toBe(true);
  expect(caught).toBeInstanceOf(Error);
  const error = caught instanceof Error ? caught : new Error(String(caught));

  if (typeof expectedMessage === 'string') {
    expect(error.message).toContain(expectedMessage);
  } else if (expectedMessage) {
    expect(error.message).toMatch(expectedMessage);
  }

  return error;
}

/**
 * A promise with its resolve/reject exposed, for driving async code step by step.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Stand-in for `process` as a signal source.
 */
export function createSignalSource(): EventEmitter {
  return new EventEmitter();
}

/**
 * Create a delay for async tests
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
