export { SteelAgent, resolveModel, DEFAULT_MAX_STEPS, DEFAULT_MODEL_ID } from './steel-agent.js';
export type {
  AgentOptions,
  AgentRunResult,
  AgentStep,
  AgentToolCall,
  SteelAgentConfig,
} from './steel-agent.js';
export { createWebAgent } from './web-agent.js';
export type { WebAgentOptions } from './web-agent.js';
export { createShoppingAgent } from './shopping-agent.js';
export type { ShoppingAgentOptions } from './shopping-agent.js';
export { createWebToolSet, createShoppingToolSet } from './toolsets.js';
export { WEB_AGENT_PROMPT, SHOPPING_AGENT_PROMPT } from './prompts.js';
