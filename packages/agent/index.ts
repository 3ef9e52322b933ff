export * from './llm/index.js';
export * from './nodes/index.js';
export * from './prompts/index.js';
export * from './nest/index.js';
