/**
 * @pacer/agents
 *
 * The runnable agents: the planner (biomechanics-lab), the validator
 * (life-sync) and the orchestrator, with their mocked tool data.
 */

export * from './planner/index.js';
export * from './validator/index.js';
export * from './orchestrator/index.js';
export * from './llm/index.js';
export * from './tools/index.js';

export { runAgent, createAgentLogger, advertisedUrl } from './runtime.js';
export type { RunAgentOptions } from './runtime.js';

export { AgentError } from './errors.js';
export { AgentErrorCode } from './error-codes.js';
