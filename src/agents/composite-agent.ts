/**
 * Composite Agent
 * Presents a whole inner team as one participant. Each turn runs the inner
 * team to its own termination and answers with a single summary message.
 */

import type { AgentId, Message } from '../types/index.js';
import { AgentBusyError } from '../types/index.js';
import type { ReasoningBackend } from '../backend/backend.js';
import type { Team } from '../teams/team.js';
import { drain } from '../teams/team.js';
import { createMessage, USER_SOURCE } from '../teams/transcript.js';
import { Tracer, createNoopTracer } from '../tracing/tracer.js';
import { assertValidAgentName } from './agent.js';
import type { Agent, RespondOptions } from './agent.js';

export const DEFAULT_SUMMARY_INSTRUCTION =
  'You speak for a team of specialists. Earlier the team was given a request and ' +
  'discussed it among themselves. Their full discussion is shown to you.';

export const DEFAULT_RESPONSE_PROMPT =
  'Write one standalone answer to the original request, based on the discussion above. ' +
  'Do not mention the team or the discussion itself.';

/** Summary used when the inner team stopped before any agent spoke. */
export const EMPTY_SUMMARY = 'No response.';

export interface CompositeAgentOptions {
  name: AgentId;
  /** Owned by this agent; must not be shared with any other participant. */
  team: Team;
  backend: ReasoningBackend;
  /** Persona for the summarizing call. */
  instruction?: string;
  /** Closing request appended after the inner transcript. */
  responsePrompt?: string;
  description?: string;
  tracer?: Tracer;
}

export class CompositeAgent implements Agent {
  readonly name: AgentId;
  readonly description: string;
  private readonly team: Team;
  private readonly backend: ReasoningBackend;
  private readonly instruction: string;
  private readonly responsePrompt: string;
  private readonly tracer: Tracer;
  private busy = false;

  constructor(options: CompositeAgentOptions) {
    assertValidAgentName(options.name);
    this.name = options.name;
    this.team = options.team;
    this.backend = options.backend;
    this.instruction = options.instruction ?? DEFAULT_SUMMARY_INSTRUCTION;
    this.responsePrompt = options.responsePrompt ?? DEFAULT_RESPONSE_PROMPT;
    this.description = options.description ?? `A team of agents acting as ${options.name}.`;
    this.tracer = options.tracer ?? createNoopTracer();
  }

  async respond(transcript: readonly Message[], options: RespondOptions = {}): Promise<Message> {
    if (this.busy) {
      throw new AgentBusyError(this.name);
    }
    this.busy = true;

    try {
      const task = transcript[transcript.length - 1]?.content ?? '';
      const inner = await drain(
        this.team.run(task, { signal: options.signal, traceContext: options.traceContext })
      );

      const content = await this.summarize(inner.messages, options);
      return createMessage(this.name, content, transcript.length);
    } finally {
      this.busy = false;
    }
  }

  private async summarize(inner: readonly Message[], options: RespondOptions): Promise<string> {
    // Only the task message: nobody on the team spoke
    if (inner.length <= 1) {
      return EMPTY_SUMMARY;
    }

    return this.tracer.trace(
      'agent.summarize',
      (span) => {
        span.setAttribute('agent.inner_messages', inner.length);
        const prompt = createMessage(USER_SOURCE, this.responsePrompt, inner.length);
        return this.backend.complete([...inner, prompt], this.instruction, {
          signal: options.signal,
          speaker: this.name,
          traceContext: span.getContext(),
        });
      },
      { 'agent.name': this.name },
      options.traceContext
    );
  }
}
