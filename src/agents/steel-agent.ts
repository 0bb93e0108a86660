/**
 * Steel Agent
 *
 * A tool-calling loop over the AI SDK: a system prompt, a tool set and a cap on
 * the number of model steps.
 */

import { generateText, stepCountIs, type LanguageModel, type ToolSet } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createLogger } from '../shared/services/logging.service.js';
import { ConfigurationError } from '../shared/errors/index.js';
import type { LoaderOptions } from '../config/loader-config.js';

const logger = createLogger('SteelAgent');

export const OPENAI_API_KEY_ENV_VAR = 'OPENAI_API_KEY';
export const DEFAULT_MODEL_ID = 'gpt-4o-mini';
/** Model steps per run; each step may call tools */
export const DEFAULT_MAX_STEPS = 3;

export interface AgentOptions {
  /** OpenAI API key (falls back to OPENAI_API_KEY) */
  openaiApiKey?: string;
  /** OpenAI model id, or a ready language model */
  model?: LanguageModel;
  maxSteps?: number;
  temperature?: number;
  /** Options for the loaders the agent's tools create */
  loaderOptions?: LoaderOptions;
}

export interface AgentToolCall {
  toolName: string;
  input: unknown;
}

export interface AgentStep {
  text: string;
  toolCalls: AgentToolCall[];
}

export interface AgentRunResult {
  output: string;
  steps: AgentStep[];
}

export interface SteelAgentConfig {
  model: Exclude<LanguageModel, string>;
  system: string;
  tools: ToolSet;
  maxSteps: number;
  temperature: number;
}

/**
 * Resolve a language model from agent options.
 *
 * A string (or nothing) names an OpenAI model and needs an API key.
 *
 * @throws ConfigurationError when no OpenAI API key is available
 */
export function resolveModel(
  options: Pick<AgentOptions, 'model' | 'openaiApiKey'>,
  env: NodeJS.ProcessEnv = process.env,
): Exclude<LanguageModel, string> {
  const { model } = options;
  if (model !== undefined && typeof model !== 'string') {
    return model;
  }

  const apiKey = options.openaiApiKey ?? env[OPENAI_API_KEY_ENV_VAR];
  if (!apiKey) {
    throw ConfigurationError.missingApiKey(OPENAI_API_KEY_ENV_VAR, 'openaiApiKey');
  }
  return createOpenAI({ apiKey })(model ?? DEFAULT_MODEL_ID);
}

export class SteelAgent {
  constructor(
    readonly name: string,
    private readonly config: SteelAgentConfig,
  ) {}

  get toolNames(): string[] {
    return Object.keys(this.config.tools);
  }

  get maxSteps(): number {
    return this.config.maxSteps;
  }

  /**
   * Run one task to completion (or until the step cap).
   */
  async run(task: string): Promise<AgentRunResult> {
    logger.info('Agent run started', { agent: this.name, maxSteps: this.config.maxSteps });

    const result = await generateText({
      model: this.config.model,
      system: this.config.system,
      prompt: task,
      tools: this.config.tools,
      stopWhen: stepCountIs(this.config.maxSteps),
      temperature: this.config.temperature,
    });

    const steps: AgentStep[] = result.steps.map((step) => ({
      text: step.text,
      toolCalls: step.toolCalls.map((call) => ({ toolName: call.toolName, input: call.input })),
    }));

    logger.info('Agent run finished', { agent: this.name, steps: steps.length });
    return { output: result.text, steps };
  }
}
