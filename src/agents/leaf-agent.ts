/**
 * Leaf Agent
 * A participant backed directly by the reasoning backend with a fixed persona
 */

import type { AgentId, Message } from '../types/index.js';
import type { ReasoningBackend } from '../backend/backend.js';
import { createMessage } from '../teams/transcript.js';
import { assertValidAgentName } from './agent.js';
import type { Agent, RespondOptions } from './agent.js';

export interface LeafAgentOptions {
  name: AgentId;
  persona: string;
  backend: ReasoningBackend;
  description?: string;
}

export class LeafAgent implements Agent {
  readonly name: AgentId;
  readonly description: string;
  readonly persona: string;
  private backend: ReasoningBackend;

  constructor(options: LeafAgentOptions) {
    assertValidAgentName(options.name);
    this.name = options.name;
    this.persona = options.persona;
    this.backend = options.backend;
    this.description = options.description ?? 'An agent that answers from its persona.';
  }

  async respond(transcript: readonly Message[], options: RespondOptions = {}): Promise<Message> {
    const content = await this.backend.complete(transcript, this.persona, {
      signal: options.signal,
      speaker: this.name,
      traceContext: options.traceContext,
    });
    return createMessage(this.name, content, transcript.length);
  }
}
