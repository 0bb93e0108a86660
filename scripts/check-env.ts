#!/usr/bin/env tsx
/**
 * Check that the environment variables the loader and agents need are set.
 *
 * Run: npx tsx scripts/check-env.ts
 */

import { checkEnvironment, loadEnvironment } from '../src/config/env.js';

loadEnvironment();

console.log('\nChecking environment setup...\n');

const results = checkEnvironment();
for (const { name, description, present } of results) {
  console.log(`${present ? '✓' : '✗'} ${name} ${present ? 'is set' : 'is not set'} - ${description}`);
}

const missing = results.filter((result) => !result.present);

console.log(`\n${'='.repeat(50)}`);
if (missing.length === 0) {
  console.log('Environment is properly configured!');
  console.log('\nYou can now run an agent:');
  console.log('npx tsx scripts/run-agent.ts shopping "Find a laptop under $1000"');
} else {
  console.log('Missing required environment variables!');
  console.log('\nCreate a .env file in the project root with:');
  for (const { name } of missing) {
    console.log(`${name}=...`);
  }
}
console.log(`${'='.repeat(50)}\n`);

process.exitCode = missing.length === 0 ? 0 : 1;
