/**
 * Loader Configuration
 *
 * Resolves explicit options and environment variables into an immutable,
 * validated configuration snapshot. Invalid values fail at construction time.
 */

import { z } from 'zod';
import { ConfigurationError } from '../shared/errors/index.js';

/** Default Steel REST API base URL */
export const DEFAULT_BASE_URL = 'https://api.steel.dev/v1';
/** Default websocket endpoint for attaching a CDP client */
export const DEFAULT_CONNECT_URL = 'wss://connect.steel.dev';
/** Default navigation / remote call timeout (ms) */
export const DEFAULT_TIMEOUT_MS = 30000;
/** Default lifetime requested for a remote session (ms) */
export const DEFAULT_SESSION_TIMEOUT_MS = 300000;

export const API_KEY_ENV_VAR = 'STEEL_API_KEY';

/**
 * Closed set of extraction strategies
 */
export const ExtractStrategyNameSchema = z.enum(['text', 'html', 'markdown']);

export type ExtractStrategyName = z.infer<typeof ExtractStrategyNameSchema>;

export const LoaderOptionsSchema = z.object({
  /** Steel API key (falls back to STEEL_API_KEY) */
  apiKey: z.string().min(1, 'API key must not be empty'),
  /** Route traffic through Steel's proxy network */
  useProxy: z.boolean().default(true),
  /** Enable automated CAPTCHA solving */
  solveCaptcha: z.boolean().default(true),
  /** Bound for every remote call, navigation and extraction (ms) */
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  /** Lifetime requested for the remote session (ms) */
  sessionTimeout: z.number().int().positive().default(DEFAULT_SESSION_TIMEOUT_MS),
  /** Serve repeated acquire() calls with the same remote session */
  reuseSession: z.boolean().default(true),
  extractStrategy: ExtractStrategyNameSchema.default('text'),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  connectUrl: z.string().url().default(DEFAULT_CONNECT_URL),
});

/**
 * Options accepted by loaders and the session manager. Everything is optional;
 * the API key may come from the environment.
 */
export type LoaderOptions = Partial<z.input<typeof LoaderOptionsSchema>>;

export type LoaderConfig = Readonly<z.output<typeof LoaderOptionsSchema>>;

/**
 * Resolve options against the environment and validate.
 *
 * @param options - Explicit options (take precedence over env)
 * @param env - Environment (default: process.env)
 * @throws ConfigurationError on a missing API key or an invalid value
 */
export function resolveLoaderConfig(
  options: LoaderOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): LoaderConfig {
  const apiKey = options.apiKey ?? env[API_KEY_ENV_VAR];
  if (!apiKey) {
    throw ConfigurationError.missingApiKey(API_KEY_ENV_VAR, 'apiKey');
  }

  const envTimeout = env.STEEL_TIMEOUT_MS;

  const result = LoaderOptionsSchema.safeParse({
    ...options,
    apiKey,
    timeout: options.timeout ?? (envTimeout !== undefined ? Number(envTimeout) : undefined),
    baseUrl: options.baseUrl ?? env.STEEL_BASE_URL,
    connectUrl: options.connectUrl ?? env.STEEL_CONNECT_URL,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid loader configuration: ${issues.join('; ')}`, { issues });
  }

  return Object.freeze(result.data);
}
