import { DynamicModule, Module, Provider } from '@nestjs/common';
import { AgentService } from './agent.service.js';
import { AGENT_LLM, type AgentModuleOptions } from './agent.tokens.js';
import { createLLM } from '../llm/factory.js';

@Module({})
export class AgentModule {
  static forRoot(options: AgentModuleOptions = {}): DynamicModule {
    const llmProvider: Provider = options.llm
      ? { provide: AGENT_LLM, useValue: options.llm }
      : { provide: AGENT_LLM, useFactory: () => createLLM() };

    return {
      module: AgentModule,
      providers: [llmProvider, AgentService],
      exports: [AgentService, AGENT_LLM],
    };
  }
}
