#!/usr/bin/env tsx
/**
 * Release every active remote session on the account.
 *
 * Run: npx tsx scripts/cleanup-sessions.ts
 */

import { loadEnvironment } from '../src/config/env.js';
import { API_KEY_ENV_VAR } from '../src/config/loader-config.js';
import { SteelSessionApi } from '../src/session/steel-session-api.js';
import { extractErrorMessage } from '../src/shared/errors/index.js';

async function main(): Promise<number> {
  loadEnvironment();

  const apiKey = process.env[API_KEY_ENV_VAR];
  if (!apiKey) {
    console.error(`❌ ${API_KEY_ENV_VAR} not found in environment variables`);
    return 1;
  }

  const api = new SteelSessionApi({
    apiKey,
    baseUrl: process.env.STEEL_BASE_URL,
  });

  try {
    const sessions = await api.listSessions();
    console.log(`Releasing ${sessions.length} listed session(s)...`);
    await api.releaseAllSessions();
    console.log('✅ All sessions released');
    return 0;
  } catch (error) {
    console.error(`❌ Error releasing sessions: ${extractErrorMessage(error)}`);
    return 1;
  }
}

void main().then((code) => process.exit(code));
