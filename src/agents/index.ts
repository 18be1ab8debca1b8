/**
 * Agents
 * Team participants: backend-driven leaves and team-wrapping composites
 */

export { LeafAgent } from './leaf-agent.js';
export type { LeafAgentOptions } from './leaf-agent.js';
export {
  CompositeAgent,
  DEFAULT_SUMMARY_INSTRUCTION,
  DEFAULT_RESPONSE_PROMPT,
  EMPTY_SUMMARY,
} from './composite-agent.js';
export type { CompositeAgentOptions } from './composite-agent.js';
export { assertValidAgentName } from './agent.js';
export type { Agent, RespondOptions } from './agent.js';
