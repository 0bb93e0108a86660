/**
 * Web agent: reads pages to answer questions.
 */

import { WebTools } from '../tools/web-tools.js';
import { WEB_AGENT_PROMPT } from './prompts.js';
import { createWebToolSet } from './toolsets.js';
import { DEFAULT_MAX_STEPS, SteelAgent, resolveModel, type AgentOptions } from './steel-agent.js';

export interface WebAgentOptions extends AgentOptions {
  webTools?: WebTools;
}

/**
 * @throws ConfigurationError when no OpenAI API key is available
 */
export function createWebAgent(options: WebAgentOptions = {}): SteelAgent {
  const model = resolveModel(options);
  const webTools = options.webTools ?? new WebTools({ loaderOptions: options.loaderOptions });

  return new SteelAgent('web', {
    model,
    system: WEB_AGENT_PROMPT,
    tools: createWebToolSet(webTools),
    maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
    temperature: options.temperature ?? 0,
  });
}
