import { Logger } from '@nestjs/common';
import type { LLMProvider } from './types.js';

const logger = new Logger('LLMConfig');

/**
 * LLM Configuration interface
 */
export interface LLMConfig {
  provider: LLMProvider;
  openai?: {
    apiKey: string;
    model: string;
    baseURL?: string;
  };
  azure?: {
    apiKey: string;
    endpoint: string;
    apiVersion: string;
    deployment: string;
  };
  anthropic?: {
    apiKey: string;
    model: string;
  };
}

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-20241022';

/**
 * Load LLM configuration from environment variables
 */
export function loadLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  const config: LLMConfig = {
    provider: detectProvider(env),
  };

  if (env.OPENAI_API_KEY) {
    config.openai = {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL || DEFAULT_OPENAI_MODEL,
      baseURL: env.OPENAI_BASE_URL,
    };
  }

  if (env.AZURE_OPENAI_API_KEY && env.AZURE_OPENAI_ENDPOINT) {
    config.azure = {
      apiKey: env.AZURE_OPENAI_API_KEY,
      endpoint: env.AZURE_OPENAI_ENDPOINT,
      apiVersion: env.AZURE_OPENAI_API_VERSION || '2024-08-01-preview',
      deployment: env.AZURE_OPENAI_DEPLOYMENT || env.OPENAI_MODEL || DEFAULT_OPENAI_MODEL,
    };
  }

  if (env.ANTHROPIC_API_KEY) {
    config.anthropic = {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL || DEFAULT_ANTHROPIC_MODEL,
    };
  }

  return config;
}

/**
 * Detects which LLM provider to use based on environment variables.
 * Priority:
 * 1. LLM_PROVIDER env var (openai, azure, anthropic)
 * 2. USE_AZURE_OPENAI=true → azure-openai
 * 3. only ANTHROPIC_API_KEY present → anthropic
 * 4. Default to openai
 */
export function detectProvider(env: NodeJS.ProcessEnv = process.env): LLMProvider {
  const explicitProvider = env.LLM_PROVIDER?.toLowerCase();

  if (explicitProvider === 'anthropic' || explicitProvider === 'claude') {
    return 'anthropic';
  }

  if (explicitProvider === 'azure-openai' || explicitProvider === 'azure') {
    return 'azure-openai';
  }

  if (explicitProvider === 'openai') {
    return 'openai';
  }

  if (env.USE_AZURE_OPENAI === 'true') {
    return 'azure-openai';
  }

  if (env.ANTHROPIC_API_KEY && !env.OPENAI_API_KEY) {
    return 'anthropic';
  }

  return 'openai';
}

/**
 * @throws Error if the detected provider is missing its credentials
 */
export function validateLLMConfig(config: LLMConfig): void {
  switch (config.provider) {
    case 'openai':
      if (!config.openai?.apiKey) {
        throw new Error('OpenAI API key is required. Set OPENAI_API_KEY environment variable.');
      }
      break;

    case 'azure-openai':
      if (!config.azure?.apiKey || !config.azure?.endpoint) {
        throw new Error(
          'Azure OpenAI configuration is incomplete. Set AZURE_OPENAI_API_KEY and AZURE_OPENAI_ENDPOINT environment variables.',
        );
      }
      break;

    case 'anthropic':
      if (!config.anthropic?.apiKey) {
        throw new Error('Anthropic API key is required. Set ANTHROPIC_API_KEY environment variable.');
      }
      break;
  }
}

export function getProviderDisplayName(provider: LLMProvider): string {
  switch (provider) {
    case 'openai':
      return 'OpenAI';
    case 'azure-openai':
      return 'Azure OpenAI';
    case 'anthropic':
      return 'Anthropic Claude';
  }
}

/**
 * Log current LLM configuration (never logs API keys)
 */
export function logLLMConfig(config: LLMConfig): void {
  logger.log(`Provider: ${getProviderDisplayName(config.provider)}`);

  switch (config.provider) {
    case 'openai':
      logger.log(`Model: ${config.openai?.model}`);
      logger.log(`API Key: ${config.openai?.apiKey ? 'set' : 'missing'}`);
      break;

    case 'azure-openai':
      logger.log(`Deployment: ${config.azure?.deployment}`);
      logger.log(`Endpoint: ${config.azure?.endpoint}`);
      logger.log(`API Key: ${config.azure?.apiKey ? 'set' : 'missing'}`);
      break;

    case 'anthropic':
      logger.log(`Model: ${config.anthropic?.model}`);
      logger.log(`API Key: ${config.anthropic?.apiKey ? 'set' : 'missing'}`);
      break;
  }
}
