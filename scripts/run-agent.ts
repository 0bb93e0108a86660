#!/usr/bin/env tsx
/**
 * Run the web or shopping agent on a single task.
 *
 * Run: npx tsx scripts/run-agent.ts <web|shopping> "<task>"
 */

import { loadEnvironment } from '../src/config/env.js';
import { createShoppingAgent } from '../src/agents/shopping-agent.js';
import { createWebAgent } from '../src/agents/web-agent.js';
import { extractErrorMessage } from '../src/shared/errors/index.js';

async function main(): Promise<number> {
  loadEnvironment();

  const [kind, ...taskWords] = process.argv.slice(2);
  const task = taskWords.join(' ').trim();
  if ((kind !== 'web' && kind !== 'shopping') || !task) {
    console.error('Usage: run-agent.ts <web|shopping> "<task>"');
    return 2;
  }

  try {
    const agent = kind === 'web' ? createWebAgent() : createShoppingAgent();
    console.log(`🤖 ${agent.name} agent (tools: ${agent.toolNames.join(', ')})`);
    console.log(`📝 Task: ${task}\n`);

    const result = await agent.run(task);
    for (const [index, step] of result.steps.entries()) {
      for (const call of step.toolCalls) {
        console.log(`⚡ Step ${index + 1}: ${call.toolName} ${JSON.stringify(call.input)}`);
      }
    }
    console.log(`\n✅ ${result.output}`);
    return 0;
  } catch (error) {
    console.error(`❌ ${extractErrorMessage(error)}`);
    return 1;
  }
}

void main().then((code) => process.exit(code));
