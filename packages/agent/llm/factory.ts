import { Logger } from '@nestjs/common';
import type { LLM, LLMProvider } from './types.js';
import { makeOpenAiLLM } from './openai.js';
import { makeAnthropicLLM } from './anthropic.js';
import { loadLLMConfig, validateLLMConfig, logLLMConfig } from './config.js';

const logger = new Logger('LLMFactory');

/**
 * Factory function to create the appropriate LLM instance based on provider.
 *
 * @param provider - The LLM provider to use (defaults to environment config)
 * @param verbose - If true, logs configuration details
 *
 * @example
 * ```typescript
 * // Use default provider from environment
 * const llm = createLLM();
 *
 * // Explicitly use Claude
 * const claudeLLM = createLLM('anthropic');
 * ```
 */
export function createLLM(provider?: LLMProvider, verbose = false): LLM {
  const config = loadLLMConfig();
  if (provider) {
    config.provider = provider;
  }

  validateLLMConfig(config);
  logger.log(`Creating LLM with provider: ${config.provider}`);

  if (verbose) {
    logLLMConfig(config);
  }

  switch (config.provider) {
    case 'anthropic':
      return makeAnthropicLLM(config);
    case 'azure-openai':
    case 'openai':
      return makeOpenAiLLM(config);
  }
}
