import type { LLM } from '../llm/types.js';

export const AGENT_LLM = Symbol('AGENT_LLM'); // LLM instance shared by every agent call

export interface AgentModuleOptions {
  // Inject a ready LLM (tests, custom providers); otherwise one is built from env
  llm?: LLM;
}
