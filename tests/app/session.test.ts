/**
 * Consultation Session Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  interactiveSession,
  isExitCommand,
  runConsultation,
  welcomeBanner,
  SEPARATOR,
} from '../../src/app/session.js';
import { MemorySink } from '../../src/console/sink.js';
import { RoundRobinTeam } from '../../src/teams/round-robin.js';
import type { Team } from '../../src/teams/team.js';
import type { Agent } from '../../src/agents/agent.js';
import type { Message, RunStream } from '../../src/types/index.js';
import { StubAgent, fromLines } from '../utils/mocks.js';

function createTeam(): RoundRobinTeam {
  return new RoundRobinTeam({ participants: [new StubAgent('Coach', 'Answer')], maxTurns: 1 });
}

const failing: Agent = {
  name: 'F',
  description: 'fails',
  respond: async (): Promise<Message> => {
    throw new Error('boom');
  },
};

describe('isExitCommand', () => {
  it('should_matchIgnoringCaseAndSpace_when_exitWordGiven', () => {
    expect(isExitCommand('quit')).toBe(true);
    expect(isExitCommand(' BYE ')).toBe(true);
    expect(isExitCommand('q')).toBe(true);
  });

  it('should_notMatch_when_wordOnlyStartsLikeExit', () => {
    expect(isExitCommand('quitting')).toBe(false);
    expect(isExitCommand('how do I exit a design review?')).toBe(false);
  });
});

describe('runConsultation', () => {
  it('should_printHeaderAndFooter_when_runningQuery', async () => {
    const printed: string[] = [];
    const sink = new MemorySink();

    const result = await runConsultation(createTeam(), 'What is SOUP?', sink, (t) => printed.push(t));

    expect(printed[0]).toContain('\nQuery: What is SOUP?\n');
    expect(printed[1]).toBe(`\n${SEPARATOR}\n`);
    expect(sink.messages.map((m) => m.content)).toEqual(['What is SOUP?', 'Answer']);
    expect(result.stopReason).toBe('Maximum number of turns 1 reached');
  });

  it('should_passSignalToRun_when_given', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runConsultation(createTeam(), 'Q', new MemorySink(), () => undefined, controller.signal)
    ).rejects.toThrow('Run cancelled before turn 1');
  });
});

describe('welcomeBanner', () => {
  it('should_listExitWords_when_rendered', () => {
    expect(welcomeBanner()).toContain("Type 'quit' or 'exit' to leave.");
  });
});

describe('interactiveSession', () => {
  it('should_answerQuestionsUntilExit_when_linesProvided', async () => {
    const printed: string[] = [];
    const sink = new MemorySink();
    const prompt = vi.fn();

    const summary = await interactiveSession(fromLines(['', 'What is SOUP?', 'quit', 'never read']), {
      team: createTeam(),
      sink,
      print: (t) => printed.push(t),
      prompt,
    });

    expect(summary).toEqual({ consultations: 1, failures: 0 });
    expect(printed).toContain('Please enter a question.');
    expect(printed[printed.length - 1]).toBe(
      '\nThank you for using the Standards Coach. Stay compliant and safe!\n'
    );
    expect(sink.messages.map((m) => m.content)).toEqual(['What is SOUP?', 'Answer']);
    expect(prompt).toHaveBeenCalledTimes(3);
  });

  it('should_reportAndContinue_when_consultationFails', async () => {
    const printed: string[] = [];
    const team = new RoundRobinTeam({ participants: [failing], maxTurns: 1 });

    const summary = await interactiveSession(fromLines(['first', 'second']), {
      team,
      sink: new MemorySink(),
      print: (t) => printed.push(t),
    });

    expect(summary).toEqual({ consultations: 2, failures: 2 });
    expect(printed.filter((t) => t === '\nConsultation error: F failed on turn 1: boom')).toHaveLength(2);
    expect(printed).toContain('You can continue with a new question.\n');
    expect(printed[printed.length - 1]).toBe('\nSession ended. Goodbye!\n');
  });

  it('should_requestFreshSignal_when_eachConsultationStarts', async () => {
    const nextSignal = vi.fn(() => new AbortController().signal);

    await interactiveSession(fromLines(['one', '   ', 'two']), {
      team: createTeam(),
      sink: new MemorySink(),
      print: () => undefined,
      nextSignal,
    });

    expect(nextSignal).toHaveBeenCalledTimes(2);
  });

  it('should_reportSettled_when_eachConsultationEnds', async () => {
    const events: string[] = [];
    const team = new RoundRobinTeam({ participants: [failing], maxTurns: 1 });

    await interactiveSession(fromLines(['first', '', 'second']), {
      team,
      sink: new MemorySink(),
      print: () => undefined,
      nextSignal: () => {
        events.push('start');
        return undefined;
      },
      onSettled: () => events.push('settled'),
    });

    expect(events).toEqual(['start', 'settled', 'start', 'settled']);
  });

  it('should_rethrow_when_errorIsNotAConversationFailure', async () => {
    const broken: Team = {
      name: 'Broken',
      async *run(): RunStream {
        throw new TypeError('unexpected');
      },
    };

    await expect(
      interactiveSession(fromLines(['Q']), { team: broken, sink: new MemorySink(), print: () => undefined })
    ).rejects.toThrow(TypeError);
  });
});
