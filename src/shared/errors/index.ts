/**
 * Error Handling
 *
 * Exports error types and utilities for structured error responses
 */

export * from './steel.error.js';
export * from './error-response.js';
