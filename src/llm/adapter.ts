/**
 * LLM Adapter
 * Feature-flagged narrative generation; any failure yields a fixed apology
 * instead of an error.
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { createChildLogger } from '@/utils/logger';
import type { EnvConfig } from '@/core/env';

const logger = createChildLogger('llm_adapter');

export const NARRATIVE_UNAVAILABLE =
  'AI analysis is currently unavailable, please check the API configuration';

export const SYSTEM_PROMPT =
  'You are a professional market analyst who explains how macroeconomic factors drive instrument prices.';

export const DEFAULT_MODELS = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-sonnet-4-20250514',
} as const;

const TEMPERATURE = 0.3;
const MAX_TOKENS = 1000;

export interface NarrativeGenerator {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

export type CompletionFn = (prompt: string) => Promise<string>;

export class LlmNarrativeGenerator implements NarrativeGenerator {
  constructor(
    readonly name: string,
    private readonly complete: CompletionFn
  ) {}

  async generate(prompt: string): Promise<string> {
    try {
      logger.info({ provider: this.name }, 'Generating narrative');
      const text = await this.complete(prompt);
      if (!text.trim()) {
        logger.warn({ provider: this.name }, 'LLM returned an empty response');
        return NARRATIVE_UNAVAILABLE;
      }
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ provider: this.name, error: message }, 'LLM API call failed');
      return NARRATIVE_UNAVAILABLE;
    }
  }
}

export function openAiCompletion(client: OpenAI, model: string): CompletionFn {
  return async (prompt) => {
    const completion = await client.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      temperature: TEMPERATURE,
      max_tokens: MAX_TOKENS,
    });
    return completion.choices[0]?.message.content ?? '';
  };
}

export function anthropicCompletion(client: Anthropic, model: string): CompletionFn {
  return async (prompt) => {
    const message = await client.messages.create({
      model,
      system: SYSTEM_PROMPT,
      max_tokens: MAX_TOKENS,
      temperature: TEMPERATURE,
      messages: [{ role: 'user', content: prompt }],
    });
    for (const block of message.content) {
      if (block.type === 'text') return block.text;
    }
    return '';
  };
}

export class OpenAiNarrativeGenerator extends LlmNarrativeGenerator {
  constructor(apiKey: string, model: string = DEFAULT_MODELS.openai) {
    super('openai', openAiCompletion(new OpenAI({ apiKey }), model));
  }
}

export class AnthropicNarrativeGenerator extends LlmNarrativeGenerator {
  constructor(apiKey: string, model: string = DEFAULT_MODELS.anthropic) {
    super('anthropic', anthropicCompletion(new Anthropic({ apiKey }), model));
  }
}

export class UnavailableNarrativeGenerator implements NarrativeGenerator {
  readonly name = 'unavailable';

  async generate(): Promise<string> {
    return NARRATIVE_UNAVAILABLE;
  }
}

export function createNarrativeGenerator(
  env: Pick<EnvConfig, 'enableLlm' | 'llmProvider' | 'llmModel' | 'openaiApiKey' | 'anthropicApiKey'>
): NarrativeGenerator {
  if (!env.enableLlm) {
    logger.info('LLM disabled, narrative unavailable');
    return new UnavailableNarrativeGenerator();
  }
  if (env.llmProvider === 'openai' && env.openaiApiKey) {
    return new OpenAiNarrativeGenerator(env.openaiApiKey, env.llmModel ?? DEFAULT_MODELS.openai);
  }
  if (env.llmProvider === 'anthropic' && env.anthropicApiKey) {
    return new AnthropicNarrativeGenerator(env.anthropicApiKey, env.llmModel ?? DEFAULT_MODELS.anthropic);
  }
  logger.warn({ provider: env.llmProvider }, 'LLM enabled without a usable provider or key');
  return new UnavailableNarrativeGenerator();
}
