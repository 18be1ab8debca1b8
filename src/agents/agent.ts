/**
 * Agent contract shared by every team participant
 */

import type { AgentId, Message } from '../types/index.js';
import { TeamConfigError } from '../types/index.js';
import type { SpanContext } from '../tracing/tracer.js';
import { USER_SOURCE } from '../teams/transcript.js';

export interface RespondOptions {
  signal?: AbortSignal;
  traceContext?: SpanContext;
}

/**
 * A participant that produces exactly one message per turn. The returned
 * message's sequence number is the transcript length it was given.
 */
export interface Agent {
  readonly name: AgentId;
  readonly description: string;

  respond(transcript: readonly Message[], options?: RespondOptions): Promise<Message>;
}

const AGENT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export function assertValidAgentName(name: string): void {
  if (!AGENT_NAME_PATTERN.test(name)) {
    throw new TeamConfigError(
      `Agent name "${name}" must only contain letters, digits, underscores and hyphens`
    );
  }
  if (name === USER_SOURCE) {
    throw new TeamConfigError(`Agent name "${USER_SOURCE}" is reserved for the task author`);
  }
}
