/**
 * Round-Robin Team
 * Serialized turn-taking over a fixed participant list
 */

import type { AgentId, Message, RunStream, TaskResult } from '../types/index.js';
import { ConversationAborted, InvalidReplyError, TeamConfigError } from '../types/index.js';
import type { Agent } from '../agents/agent.js';
import type { TerminationCondition } from '../conditions/termination.js';
import { Tracer, createNoopTracer } from '../tracing/tracer.js';
import type { Span } from '../tracing/tracer.js';
import { Transcript, createMessage, USER_SOURCE } from './transcript.js';
import { drain } from './team.js';
import type { Team, TeamRunOptions } from './team.js';

export interface RoundRobinTeamOptions {
  participants: Agent[];
  termination?: TerminationCondition;
  /** Upper bound on agent turns per run; the task message is not a turn. */
  maxTurns?: number;
  name?: string;
  tracer?: Tracer;
}

export class RoundRobinTeam implements Team {
  readonly name: string;
  private readonly participants: readonly Agent[];
  private readonly termination?: TerminationCondition;
  private readonly maxTurns?: number;
  private readonly tracer: Tracer;

  constructor(options: RoundRobinTeamOptions) {
    const { participants, termination, maxTurns } = options;

    const seen = new Set<AgentId>();
    for (const agent of participants) {
      if (seen.has(agent.name)) {
        throw new TeamConfigError(`Duplicate participant name: ${agent.name}`);
      }
      seen.add(agent.name);
    }
    if (maxTurns !== undefined && (!Number.isInteger(maxTurns) || maxTurns < 0)) {
      throw new TeamConfigError(`maxTurns must be a non-negative integer, got ${maxTurns}`);
    }
    if (participants.length > 0 && !termination && maxTurns === undefined) {
      throw new TeamConfigError('A team needs a termination condition or maxTurns');
    }

    this.name = options.name ?? 'RoundRobinTeam';
    this.participants = Object.freeze([...participants]);
    this.termination = termination;
    this.maxTurns = maxTurns;
    this.tracer = options.tracer ?? createNoopTracer();
  }

  get participantNames(): AgentId[] {
    return this.participants.map((agent) => agent.name);
  }

  /**
   * Yield the task message, then one message per agent turn, until the
   * termination condition holds or maxTurns turns have been taken.
   * Termination is checked after every append, the task message included.
   */
  async *run(task: string, options: TeamRunOptions = {}): RunStream {
    const { signal } = options;
    const transcript = new Transcript();
    const span = this.tracer.startSpan(
      'team.run',
      { 'team.name': this.name, 'team.participants': this.participantNames.join(',') },
      options.traceContext
    );

    let turn = 0;
    try {
      const taskMessage = createMessage(USER_SOURCE, task, transcript.nextSequenceNumber);
      transcript.append(taskMessage);
      yield taskMessage;

      for (;;) {
        const stopReason = this.checkStop(transcript.messages, turn);
        if (stopReason !== undefined) {
          span.setAttributes({
            'team.turns': turn,
            'team.messages': transcript.length,
            'team.stop_reason': stopReason,
          });
          return { messages: transcript.snapshot(), stopReason };
        }

        if (signal?.aborted) {
          throw new ConversationAborted(
            `Run cancelled before turn ${turn + 1}`,
            'cancelled',
            transcript.snapshot(),
            undefined,
            signal.reason
          );
        }

        const agent = this.participants[turn % this.participants.length];
        const message = await this.takeTurn(agent, transcript, turn, span, signal);
        transcript.append(message);
        turn++;
        yield message;
      }
    } catch (error) {
      span.recordException(error);
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Run to termination and return the full result
   */
  async runToCompletion(task: string, options?: TeamRunOptions): Promise<TaskResult> {
    return drain(this.run(task, options));
  }

  private checkStop(messages: readonly Message[], turn: number): string | undefined {
    if (this.participants.length === 0) {
      return 'No participants';
    }
    if (this.termination?.evaluate(messages)) {
      return this.termination.describe();
    }
    if (this.maxTurns !== undefined && turn >= this.maxTurns) {
      return `Maximum number of turns ${this.maxTurns} reached`;
    }
    return undefined;
  }

  private async takeTurn(
    agent: Agent,
    transcript: Transcript,
    turn: number,
    parent: Span,
    signal?: AbortSignal
  ): Promise<Message> {
    const span = parent.startChild('team.turn', { 'team.turn': turn + 1, 'agent.name': agent.name });
    const snapshot = transcript.snapshot();

    try {
      const message = await agent.respond(snapshot, { signal, traceContext: span.getContext() });
      this.validateReply(agent, message, snapshot.length);
      return message;
    } catch (error) {
      span.recordException(error);
      if (signal?.aborted) {
        throw new ConversationAborted(
          `Run cancelled during ${agent.name}'s turn`,
          'cancelled',
          snapshot,
          agent.name,
          error
        );
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConversationAborted(
        `${agent.name} failed on turn ${turn + 1}: ${detail}`,
        'agent_failed',
        snapshot,
        agent.name,
        error
      );
    } finally {
      span.end();
    }
  }

  private validateReply(agent: Agent, message: Message, expectedSequence: number): void {
    if (message.source !== agent.name) {
      throw new InvalidReplyError(
        `${agent.name} returned a message authored by ${message.source}`
      );
    }
    if (message.sequenceNumber !== expectedSequence) {
      throw new InvalidReplyError(
        `${agent.name} returned sequence number ${message.sequenceNumber}, expected ${expectedSequence}`
      );
    }
  }
}
