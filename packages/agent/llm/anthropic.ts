import Anthropic from '@anthropic-ai/sdk';
import { Logger } from '@nestjs/common';
import type { ConversationMessage } from '@voicedesk/types';
import type { LLM, LlmCallOptions } from './types.js';
import { DEFAULT_ANTHROPIC_MODEL, loadLLMConfig, type LLMConfig } from './config.js';

const logger = new Logger('AnthropicLLM');

/**
 * Create Anthropic (Claude) client
 */
const createAnthropicClient = (config: LLMConfig) => {
  const apiKey = config.anthropic?.apiKey;

  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required for Claude');
  }

  return new Anthropic({ apiKey });
};

/**
 * Creates a Claude LLM instance using Anthropic's API.
 *
 * @param client - Optional Anthropic client instance (useful for testing)
 */
export function makeAnthropicLLM(
  config: LLMConfig = loadLLMConfig(),
  client = createAnthropicClient(config),
): LLM {
  const defaultModel = config.anthropic?.model || DEFAULT_ANTHROPIC_MODEL;

  const complete = async (
    system: string | undefined,
    messages: ConversationMessage[],
    { temperature = 0.2, maxTokens = 300, timeoutMs = 15_000, metadata }: LlmCallOptions,
  ): Promise<string> => {
    const ctrl = new AbortController();
    const t = setTimeout(() => ctrl.abort(), timeoutMs);

    const modelOverride = metadata?.model;
    const chosenModel =
      typeof modelOverride === 'string' && modelOverride.trim().length > 0 ? modelOverride : defaultModel;

    try {
      const res = await client.messages.create(
        {
          model: chosenModel,
          messages: messages.map(
            (m): Anthropic.MessageParam => ({ role: m.role, content: m.content }),
          ),
          system: system || undefined,
          temperature,
          max_tokens: maxTokens,
        },
        { signal: ctrl.signal },
      );

      logger.debug({
        msg: 'completion',
        callId: metadata?.callId,
        requestType: metadata?.requestType ?? 'chat_completion',
        model: res.model ?? chosenModel,
        totalTokens: (res.usage.input_tokens ?? 0) + (res.usage.output_tokens ?? 0),
      });

      return res.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('\n');
    } finally {
      clearTimeout(t);
    }
  };

  return {
    async text({ system, user, ...options }) {
      return complete(system, [{ role: 'user', content: user }], options);
    },
    async chat({ system, messages, ...options }) {
      return complete(system, messages, options);
    },
  };
}
