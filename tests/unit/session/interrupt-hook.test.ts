/**
 * InterruptHook Tests
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import type { EventEmitter } from 'node:events';
import {
  InterruptHook,
  exitCodeForSignal,
  getInterruptHook,
  setInterruptHook,
  type InterruptibleSession,
} from '../../../src/session/interrupt-hook.js';
import { createSignalSource, deferred } from '../../helpers/test-utils.js';

function createMember(release: () => Promise<void> = () => Promise.resolve()): InterruptibleSession & {
  release: Mock<() => Promise<void>>;
} {
  return { release: vi.fn(release) };
}

describe('InterruptHook', () => {
  let source: EventEmitter;
  let exit: Mock<(code: number) => void>;
  let hook: InterruptHook;

  beforeEach(() => {
    source = createSignalSource();
    exit = vi.fn<(code: number) => void>();
    hook = new InterruptHook({ source, exit });
  });

  describe('registration', () => {
    it('should install listeners on first registration', () => {
      hook.register(createMember());

      expect(hook.isInstalled).toBe(true);
      expect(source.listenerCount('SIGINT')).toBe(1);
      expect(source.listenerCount('SIGTERM')).toBe(1);
    });

    it('should install listeners once for several members', () => {
      hook.register(createMember());
      hook.register(createMember());

      expect(hook.size).toBe(2);
      expect(source.listenerCount('SIGINT')).toBe(1);
    });

    it('should be idempotent per member', () => {
      const member = createMember();

      hook.register(member);
      hook.register(member);
      expect(hook.size).toBe(1);

      hook.unregister(member);
      hook.unregister(member);
      expect(hook.size).toBe(0);
    });

    it('should remove listeners after the last member unregisters', () => {
      const first = createMember();
      const second = createMember();
      hook.register(first);
      hook.register(second);

      hook.unregister(first);
      expect(hook.isInstalled).toBe(true);

      hook.unregister(second);
      expect(hook.isInstalled).toBe(false);
      expect(source.listenerCount('SIGINT')).toBe(0);
      expect(source.listenerCount('SIGTERM')).toBe(0);
    });

    it('should honour a custom signal list', () => {
      const custom = new InterruptHook({ source, exit, signals: ['SIGHUP'] });

      custom.register(createMember());

      expect(source.listenerCount('SIGHUP')).toBe(1);
      expect(source.listenerCount('SIGINT')).toBe(0);
    });
  });

  describe('handleSignal', () => {
    it('should release every member then exit with 128 + signal number', async () => {
      const first = createMember();
      const second = createMember();
      hook.register(first);
      hook.register(second);

      await hook.handleSignal('SIGINT');

      expect(first.release).toHaveBeenCalledTimes(1);
      expect(second.release).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledWith(130);
      expect(hook.isInstalled).toBe(false);
    });

    it('should still exit when a member fails to release', async () => {
      const failing = createMember(() => Promise.reject(new Error('release failed')));
      const healthy = createMember();
      hook.register(failing);
      hook.register(healthy);

      await hook.handleSignal('SIGTERM');

      expect(healthy.release).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledWith(143);
    });

    it('should exit immediately on a second signal during teardown', async () => {
      const pending = deferred();
      const slow = createMember(() => pending.promise);
      hook.register(slow);

      const firstSignal = hook.handleSignal('SIGINT');
      await hook.handleSignal('SIGINT');

      expect(exit).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledWith(130);

      pending.resolve();
      await firstSignal;
      expect(exit).toHaveBeenCalledTimes(2);
    });

    it('should run when the signal is emitted', async () => {
      const member = createMember();
      hook.register(member);

      source.emit('SIGTERM', 'SIGTERM');

      await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(143));
      expect(member.release).toHaveBeenCalledTimes(1);
    });
  });

  describe('exitCodeForSignal', () => {
    it('should map signals to shell exit codes', () => {
      expect(exitCodeForSignal('SIGINT')).toBe(130);
      expect(exitCodeForSignal('SIGTERM')).toBe(143);
      expect(exitCodeForSignal('SIGHUP')).toBe(129);
    });
  });

  describe('global hook', () => {
    it('should return the same instance until replaced', () => {
      setInterruptHook(null);
      const first = getInterruptHook();

      expect(getInterruptHook()).toBe(first);

      setInterruptHook(hook);
      expect(getInterruptHook()).toBe(hook);

      setInterruptHook(null);
    });
  });
});
