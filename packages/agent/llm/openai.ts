import OpenAI from 'openai';
import { Logger } from '@nestjs/common';
import type { ConversationMessage } from '@voicedesk/types';
import type { LLM, LlmCallOptions } from './types.js';
import { DEFAULT_OPENAI_MODEL, loadLLMConfig, type LLMConfig } from './config.js';

const logger = new Logger('OpenAiLLM');

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;

// Create OpenAI client - supports both Azure OpenAI and regular OpenAI
const createOpenAIClient = (config: LLMConfig) => {
  if (config.provider === 'azure-openai') {
    const azure = config.azure;
    if (!azure) {
      throw new Error(
        'Azure OpenAI is selected but AZURE_OPENAI_API_KEY or AZURE_OPENAI_ENDPOINT is missing',
      );
    }

    return new OpenAI({
      apiKey: azure.apiKey,
      baseURL: `${azure.endpoint.replace(/\/$/, '')}/openai/deployments/${azure.deployment}`,
      defaultQuery: { 'api-version': azure.apiVersion },
      defaultHeaders: { 'api-key': azure.apiKey },
    });
  }

  return new OpenAI({
    apiKey: config.openai?.apiKey,
    baseURL: config.openai?.baseURL,
  });
};

const defaultModelFor = (config: LLMConfig) =>
  config.openai?.model || config.azure?.deployment || DEFAULT_OPENAI_MODEL;

export function makeOpenAiLLM(config: LLMConfig = loadLLMConfig(), client = createOpenAIClient(config)): LLM {
  const defaultModel = defaultModelFor(config);

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

    const payload: ChatMessageParam[] = [
      ...(system ? [{ role: 'system' as const, content: system }] : []),
      ...messages.map(
        (m): ChatMessageParam =>
          m.role === 'user' ? { role: 'user', content: m.content } : { role: 'assistant', content: m.content },
      ),
    ];

    try {
      const res = await client.chat.completions.create(
        {
          model: chosenModel,
          messages: payload,
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
        totalTokens: res.usage?.total_tokens ?? 0,
      });

      return res.choices?.[0]?.message?.content?.toString() ?? '';
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
