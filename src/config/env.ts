/**
 * Environment Loading
 *
 * Loads a .env file (if present) into process.env without overriding
 * variables already set in the shell.
 */

import dotenv from 'dotenv';

/**
 * Variables the CLI, scripts and agents read
 */
export const REQUIRED_ENV_VARS = {
  STEEL_API_KEY: 'Required for Steel browser automation',
  OPENAI_API_KEY: 'Required for the web and shopping agents',
} as const;

export function loadEnvironment(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

/**
 * Report which required variables are set.
 */
export function checkEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): { name: string; description: string; present: boolean }[] {
  return Object.entries(REQUIRED_ENV_VARS).map(([name, description]) => ({
    name,
    description,
    present: Boolean(env[name]),
  }));
}
