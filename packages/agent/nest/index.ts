export { AgentModule } from './agent.module.js';
export { AgentService } from './agent.service.js';
export { AGENT_LLM, type AgentModuleOptions } from './agent.tokens.js';
