/**
 * Session module exports
 */

export { SessionManager } from './session-manager.js';
export type { SessionManagerConfig, SessionManagerDeps } from './session-manager.js';
export { SteelSessionApi } from './steel-session-api.js';
export type { SteelSessionApiOptions, SessionSummary } from './steel-session-api.js';
export {
  InterruptHook,
  getInterruptHook,
  setInterruptHook,
  exitCodeForSignal,
} from './interrupt-hook.js';
export type { InterruptibleSession, InterruptHookOptions, SignalSource } from './interrupt-hook.js';
export type * from './session.types.js';
