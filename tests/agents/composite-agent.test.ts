/**
 * Composite Agent Tests
 * A whole team acting as one participant of an outer team
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CompositeAgent,
  DEFAULT_RESPONSE_PROMPT,
  DEFAULT_SUMMARY_INSTRUCTION,
  EMPTY_SUMMARY,
} from '../../src/agents/composite-agent.js';
import { LeafAgent } from '../../src/agents/leaf-agent.js';
import { RoundRobinTeam } from '../../src/teams/round-robin.js';
import { createMessage } from '../../src/teams/transcript.js';
import { maxMessages } from '../../src/conditions/index.js';
import { Tracer } from '../../src/tracing/tracer.js';
import { AgentBusyError, ConversationAborted, TeamConfigError } from '../../src/types/index.js';
import type { Agent } from '../../src/agents/agent.js';
import type { Message } from '../../src/types/index.js';
import { HangingAgent, ScriptedBackend, StubAgent } from '../utils/mocks.js';

function nestedSetup() {
  const backend = new ScriptedBackend({
    Coach: ['First draft', 'Revised draft'],
    Reviewer: 'Needs more detail',
    Panel: 'Summary of the panel',
    Formatter: 'Formatted answer',
  });
  const inner = new RoundRobinTeam({
    name: 'Inner',
    participants: [
      new LeafAgent({ name: 'Coach', persona: 'coach', backend }),
      new LeafAgent({ name: 'Reviewer', persona: 'reviewer', backend }),
    ],
    termination: maxMessages(4),
  });
  const panel = new CompositeAgent({ name: 'Panel', team: inner, backend });
  const outer = new RoundRobinTeam({
    name: 'Outer',
    participants: [panel, new LeafAgent({ name: 'Formatter', persona: 'formatter', backend })],
    maxTurns: 2,
  });
  return { backend, outer };
}

describe('CompositeAgent', () => {
  describe('nested teams', () => {
    it('should_contributeOneMessage_when_innerTeamRunsToCompletion', async () => {
      const { outer } = nestedSetup();

      const result = await outer.runToCompletion('How do I document SOUP?');

      expect(result.messages.map((m) => [m.source, m.content])).toEqual([
        ['user', 'How do I document SOUP?'],
        ['Panel', 'Summary of the panel'],
        ['Formatter', 'Formatted answer'],
      ]);
      expect(result.stopReason).toBe('Maximum number of turns 2 reached');
    });

    it('should_runInnerTeamThenSummarize_when_respondingToTask', async () => {
      const { backend, outer } = nestedSetup();

      await outer.runToCompletion('How do I document SOUP?');

      expect(backend.calls.map((c) => c.speaker)).toEqual(['Coach', 'Reviewer', 'Coach', 'Panel', 'Formatter']);

      const [summary] = backend.callsFor('Panel');
      expect(summary.persona).toBe(DEFAULT_SUMMARY_INSTRUCTION);
      expect(summary.transcript.map((m) => m.content)).toEqual([
        'How do I document SOUP?',
        'First draft',
        'Needs more detail',
        'Revised draft',
        DEFAULT_RESPONSE_PROMPT,
      ]);
      expect(summary.transcript[4].source).toBe('user');
    });

    it('should_hideInnerMessages_when_outerAgentsTakeTurns', async () => {
      const { backend, outer } = nestedSetup();

      await outer.runToCompletion('Q');

      const [formatter] = backend.callsFor('Formatter');
      expect(formatter.transcript.map((m) => m.source)).toEqual(['user', 'Panel']);
    });

    it('should_useLatestMessageAsTask_when_transcriptHasSeveralMessages', async () => {
      const inner = new StubAgent('Inner_A');
      const agent = new CompositeAgent({
        name: 'Panel',
        team: new RoundRobinTeam({ participants: [inner], maxTurns: 1 }),
        backend: new ScriptedBackend({}, 'summary'),
      });

      await agent.respond([createMessage('user', 'first', 0), createMessage('Other', 'latest', 1)]);

      expect(inner.seen[0].map((m) => m.content)).toEqual(['latest']);
    });
  });

  describe('summary', () => {
    it('should_answerNoResponse_when_innerTeamStopsBeforeAnyTurn', async () => {
      const backend = new ScriptedBackend({}, 'unused');
      const agent = new CompositeAgent({
        name: 'Panel',
        team: new RoundRobinTeam({ participants: [new StubAgent('A')], termination: maxMessages(1) }),
        backend,
      });

      const message = await agent.respond([createMessage('user', 'Q', 0)]);

      expect(message).toEqual({ source: 'Panel', content: EMPTY_SUMMARY, sequenceNumber: 1 });
      expect(backend.calls).toHaveLength(0);
    });

    it('should_useCustomPrompts_when_provided', async () => {
      const backend = new ScriptedBackend({}, 'custom summary');
      const agent = new CompositeAgent({
        name: 'Panel',
        team: new RoundRobinTeam({ participants: [new StubAgent('A')], maxTurns: 1 }),
        backend,
        instruction: 'Summarize.',
        responsePrompt: 'Answer now.',
      });

      const message = await agent.respond([createMessage('user', 'Q', 0)]);

      expect(message.content).toBe('custom summary');
      expect(backend.calls[0].persona).toBe('Summarize.');
      expect(backend.calls[0].transcript.map((m) => m.content)).toEqual(['Q', 'A reply', 'Answer now.']);
    });
  });

  describe('failures', () => {
    it('should_failOuterTurn_when_innerAgentFails', async () => {
      const failing: Agent = {
        name: 'Broken',
        description: 'always fails',
        respond: async () => {
          throw new Error('backend down');
        },
      };
      const panel = new CompositeAgent({
        name: 'Panel',
        team: new RoundRobinTeam({ participants: [failing], maxTurns: 1 }),
        backend: new ScriptedBackend({}),
      });
      const outer = new RoundRobinTeam({ participants: [panel], maxTurns: 1 });

      const error = await outer.runToCompletion('Q').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConversationAborted);
      if (!(error instanceof ConversationAborted)) return;
      expect(error.agent).toBe('Panel');
      expect(error.message).toBe('Panel failed on turn 1: Broken failed on turn 1: backend down');
      expect(error.cause).toBeInstanceOf(ConversationAborted);
      expect(error.transcript).toHaveLength(1);
    });

    it('should_rejectSecondCall_when_alreadyResponding', async () => {
      const hanging = new HangingAgent('Slow');
      const agent = new CompositeAgent({
        name: 'Panel',
        team: new RoundRobinTeam({ participants: [hanging], maxTurns: 1 }),
        backend: new ScriptedBackend({}),
      });
      const controller = new AbortController();
      const transcript: Message[] = [createMessage('user', 'Q', 0)];

      const first = agent.respond(transcript, { signal: controller.signal }).catch((e: unknown) => e);
      await vi.waitFor(() => expect(hanging.started).toBe(1));

      await expect(agent.respond(transcript)).rejects.toThrow(AgentBusyError);
      await expect(agent.respond(transcript)).rejects.toThrow('Agent Panel is already responding');

      controller.abort(new Error('stop'));
      expect(await first).toBeInstanceOf(ConversationAborted);

      const done = new AbortController();
      done.abort();
      const afterwards = await agent.respond(transcript, { signal: done.signal }).catch((e: unknown) => e);
      expect(afterwards).toBeInstanceOf(ConversationAborted);
    });

    it('should_rejectReservedName_when_constructed', () => {
      expect(
        () =>
          new CompositeAgent({
            name: 'user',
            team: new RoundRobinTeam({ participants: [], maxTurns: 0 }),
            backend: new ScriptedBackend({}),
          })
      ).toThrow(TeamConfigError);
    });
  });

  describe('tracing', () => {
    it('should_nestInnerRunUnderCaller_when_traceContextGiven', async () => {
      const tracer = new Tracer({ enabled: true });
      const agent = new CompositeAgent({
        name: 'Panel',
        team: new RoundRobinTeam({ name: 'Inner', participants: [new StubAgent('A')], maxTurns: 1, tracer }),
        backend: new ScriptedBackend({}, 'summary'),
        tracer,
      });
      const parent = tracer.startSpan('team.turn');

      await agent.respond([createMessage('user', 'Q', 0)], { traceContext: parent.getContext() });

      const spans = tracer.getSpans();
      const run = spans.find((s) => s.name === 'team.run');
      const summarize = spans.find((s) => s.name === 'agent.summarize');
      expect(run?.context.parentSpanId).toBe(parent.getContext().spanId);
      expect(summarize?.context.parentSpanId).toBe(parent.getContext().spanId);
      expect(summarize?.attributes['agent.inner_messages']).toBe(2);
      expect(summarize?.context.traceId).toBe(parent.getContext().traceId);
    });
  });
});
