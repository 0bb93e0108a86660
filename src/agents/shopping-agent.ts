/**
 * Shopping agent: searches, filters and compares products.
 */

import { ShoppingTools } from '../tools/shopping-tools.js';
import { SHOPPING_AGENT_PROMPT } from './prompts.js';
import { createShoppingToolSet } from './toolsets.js';
import { DEFAULT_MAX_STEPS, SteelAgent, resolveModel, type AgentOptions } from './steel-agent.js';

export interface ShoppingAgentOptions extends AgentOptions {
  shoppingTools?: ShoppingTools;
  searchUrlTemplate?: string;
}

/**
 * @throws ConfigurationError when no OpenAI API key is available
 */
export function createShoppingAgent(options: ShoppingAgentOptions = {}): SteelAgent {
  const model = resolveModel(options);
  const shoppingTools =
    options.shoppingTools ??
    new ShoppingTools({
      loaderOptions: options.loaderOptions,
      searchUrlTemplate: options.searchUrlTemplate,
    });

  return new SteelAgent('shopping', {
    model,
    system: SHOPPING_AGENT_PROMPT,
    tools: createShoppingToolSet(shoppingTools),
    maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
    temperature: options.temperature ?? 0,
  });
}
