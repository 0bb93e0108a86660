/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments for the MCP server. Flags override loader
 * defaults; anything not given falls back to the environment and defaults.
 */

import { ExtractStrategyNameSchema, type ExtractStrategyName } from '../config/loader-config.js';
import { ConfigurationError } from '../shared/errors/index.js';

/**
 * Server configuration from CLI arguments
 */
export interface ServerArgs {
  /** Route traffic through the service's proxy network (default: true) */
  useProxy: boolean;

  /** Enable automated CAPTCHA solving (default: true) */
  solveCaptcha: boolean;

  /** Reuse one session across calls (default: true) */
  reuseSession: boolean;

  /** Remote call and navigation timeout (ms) */
  timeout?: number;

  /** Extraction strategy for page tools */
  extractStrategy?: ExtractStrategyName;
}

/** Known CLI argument base names for validation */
const KNOWN_ARG_NAMES = new Set([
  'proxy',
  'no-proxy',
  'captcha',
  'no-captcha',
  'reuse',
  'no-reuse',
  'timeout',
  'strategy',
]);

/**
 * Check if an argument is a known CLI flag (handles --arg and --arg=value forms).
 */
function isKnownArg(arg: string): boolean {
  if (!arg.startsWith('--')) return true; // Not a flag, skip validation
  const withoutDashes = arg.slice(2);
  const baseName = withoutDashes.split('=')[0];
  return KNOWN_ARG_NAMES.has(baseName);
}

function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigurationError(`Invalid --timeout value "${value}": expected a positive integer`);
  }
  return timeout;
}

function parseStrategy(value: string): ExtractStrategyName {
  const result = ExtractStrategyNameSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid --strategy value "${value}": expected one of ${ExtractStrategyNameSchema.options.join(', ')}`,
    );
  }
  return result.data;
}

/**
 * Parse command-line arguments into ServerArgs.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 * @throws ConfigurationError on an invalid --timeout or --strategy value
 */
export function parseArgs(argv: string[]): ServerArgs {
  const args: ServerArgs = {
    useProxy: true,
    solveCaptcha: true,
    reuseSession: true,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--no-proxy') {
      args.useProxy = false;
    } else if (arg === '--proxy') {
      args.useProxy = true;
    } else if (arg === '--no-captcha') {
      args.solveCaptcha = false;
    } else if (arg === '--captcha') {
      args.solveCaptcha = true;
    } else if (arg === '--no-reuse') {
      args.reuseSession = false;
    } else if (arg === '--reuse') {
      args.reuseSession = true;
    } else if (arg.startsWith('--timeout=')) {
      args.timeout = parseTimeout(arg.slice('--timeout='.length));
    } else if (arg === '--timeout' && argv[i + 1]) {
      args.timeout = parseTimeout(argv[++i]);
    } else if (arg.startsWith('--strategy=')) {
      args.extractStrategy = parseStrategy(arg.slice('--strategy='.length));
    } else if (arg === '--strategy' && argv[i + 1]) {
      args.extractStrategy = parseStrategy(argv[++i]);
    } else if (!isKnownArg(arg)) {
      // Warn about unknown arguments to catch typos like --no-proxi
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    }
  }

  return args;
}
