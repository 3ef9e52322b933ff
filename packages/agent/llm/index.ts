/**
 * LLM abstraction layer
 *
 * Provides a unified interface for OpenAI, Azure OpenAI and Anthropic.
 * Use `createLLM()` to get an LLM instance based on environment configuration.
 *
 * @module llm
 */

export type { LLM, LLMProvider, LlmCallMetadata, LlmCallOptions } from './types.js';
export type { LLMConfig } from './config.js';
export { createLLM } from './factory.js';
export {
  loadLLMConfig,
  validateLLMConfig,
  detectProvider,
  getProviderDisplayName,
  logLLMConfig,
} from './config.js';
export { makeOpenAiLLM } from './openai.js';
export { makeAnthropicLLM } from './anthropic.js';
