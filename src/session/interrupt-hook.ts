/**
 * Interrupt Hook
 *
 * Process-wide SIGINT/SIGTERM handling for session managers. Managers register
 * while they hold (or are creating) a remote session and unregister once idle.
 * Signal listeners are installed on the first registration and removed after
 * the last, so the hook never outlives the sessions it protects.
 */

import { createLogger } from '../shared/services/logging.service.js';
import { extractErrorMessage } from '../shared/errors/index.js';

const logger = createLogger('InterruptHook');

/**
 * Anything that can give back a remote session on interrupt
 */
export interface InterruptibleSession {
  release(): Promise<void>;
}

type SignalListener = (signal: NodeJS.Signals) => void;

/**
 * Subset of `process` the hook listens on
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface InterruptHookOptions {
  /** Signal source (default: process) */
  source?: SignalSource;
  /** Exit function (default: process.exit) */
  exit?: (code: number) => void;
  /** Signals to handle (default: SIGINT, SIGTERM) */
  signals?: NodeJS.Signals[];
}

/** Conventional signal numbers, used for the 128 + n exit code */
const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGTERM: 15,
};

export function exitCodeForSignal(signal: NodeJS.Signals): number {
  return 128 + (SIGNAL_NUMBERS[signal] ?? 0);
}

export class InterruptHook {
  private readonly members = new Set<InterruptibleSession>();
  private readonly source: SignalSource;
  private readonly exit: (code: number) => void;
  private readonly signals: NodeJS.Signals[];
  private readonly listener: SignalListener;
  private installed = false;
  private tearingDown = false;

  constructor(options: InterruptHookOptions = {}) {
    this.source = options.source ?? process;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.signals = options.signals ?? ['SIGINT', 'SIGTERM'];
    this.listener = (signal) => {
      void this.handleSignal(signal);
    };
  }

  /**
   * Number of registered sessions
   */
  get size(): number {
    return this.members.size;
  }

  /**
   * Whether signal listeners are currently installed
   */
  get isInstalled(): boolean {
    return this.installed;
  }

  /**
   * Register a session holder. Idempotent.
   */
  register(member: InterruptibleSession): void {
    if (this.members.has(member)) {
      return;
    }
    this.members.add(member);
    if (this.members.size === 1) {
      this.install();
    }
  }

  /**
   * Unregister a session holder. Idempotent.
   */
  unregister(member: InterruptibleSession): void {
    if (!this.members.delete(member)) {
      return;
    }
    if (this.members.size === 0) {
      this.uninstall();
    }
  }

  /**
   * Release every registered session, then exit.
   *
   * A second signal while teardown is running exits immediately.
   */
  async handleSignal(signal: NodeJS.Signals): Promise<void> {
    const exitCode = exitCodeForSignal(signal);

    if (this.tearingDown) {
      logger.warning('Second interrupt received, exiting without waiting for cleanup', { signal });
      this.exit(exitCode);
      return;
    }

    this.tearingDown = true;
    const members = Array.from(this.members);
    logger.warning('Interrupt received, releasing sessions', { signal, sessions: members.length });

    const results = await Promise.allSettled(members.map((member) => member.release()));
    const failed = results.filter((result) => result.status === 'rejected');
    for (const failure of failed) {
      logger.warning('Session release failed during interrupt', {
        error: extractErrorMessage(failure.reason),
      });
    }

    this.uninstall();
    this.tearingDown = false;
    logger.info('Cleanup complete', { released: results.length - failed.length });
    this.exit(exitCode);
  }

  private install(): void {
    if (this.installed) return;
    for (const signal of this.signals) {
      this.source.on(signal, this.listener);
    }
    this.installed = true;
    logger.debug('Interrupt listeners installed', { signals: this.signals });
  }

  private uninstall(): void {
    if (!this.installed) return;
    for (const signal of this.signals) {
      this.source.off(signal, this.listener);
    }
    this.installed = false;
    logger.debug('Interrupt listeners removed');
  }
}

let globalHook: InterruptHook | null = null;

/**
 * Get or create the process-wide hook
 */
export function getInterruptHook(): InterruptHook {
  globalHook ??= new InterruptHook();
  return globalHook;
}

/**
 * Replace the process-wide hook (for testing)
 */
export function setInterruptHook(hook: InterruptHook | null): void {
  globalHook = hook;
}
