/**
 * Sink Tests
 */

import { describe, it, expect } from 'vitest';
import { ConsoleSink, MemorySink, consume } from '../../src/console/sink.js';
import type { MessageSink } from '../../src/console/sink.js';
import { RoundRobinTeam } from '../../src/teams/round-robin.js';
import { createMessage } from '../../src/teams/transcript.js';
import type { Message } from '../../src/types/index.js';
import { StubAgent } from '../utils/mocks.js';

describe('ConsoleSink', () => {
  it('should_printHeaderAndContent_when_messageWritten', () => {
    const out: string[] = [];
    const sink = new ConsoleSink({ write: (text) => out.push(text) });

    sink.write(createMessage('user', 'Which standard applies?', 0));
    sink.write(createMessage('Coach', 'IEC 62304.', 1));

    expect(out).toEqual([
      '---------- user ----------\nWhich standard applies?\n',
      '---------- Coach ----------\nIEC 62304.\n',
    ]);
  });

  it('should_printStopReason_when_closed', () => {
    const out: string[] = [];
    const sink = new ConsoleSink({ write: (text) => out.push(text) });

    sink.close({ messages: [], stopReason: 'Maximum number of turns 2 reached' });

    expect(out).toEqual(['[stopped: Maximum number of turns 2 reached]\n']);
  });

  it('should_stayQuietOnClose_when_stopReasonHidden', () => {
    const out: string[] = [];
    const sink = new ConsoleSink({ write: (text) => out.push(text), showStopReason: false });

    sink.close({ messages: [], stopReason: 'done' });

    expect(out).toEqual([]);
  });
});

describe('consume', () => {
  it('should_writeEveryMessageThenClose_when_runCompletes', async () => {
    const team = new RoundRobinTeam({ participants: [new StubAgent('A'), new StubAgent('B')], maxTurns: 2 });
    const sink = new MemorySink();

    const result = await consume(team.run('go'), sink);

    expect(sink.messages.map((m) => m.source)).toEqual(['user', 'A', 'B']);
    expect(sink.result).toBe(result);
    expect(result.messages).toEqual(sink.messages);
  });

  it('should_waitForSlowSink_when_writeIsAsync', async () => {
    const a = new StubAgent('A');
    const team = new RoundRobinTeam({ participants: [a], maxTurns: 2 });
    const callsAtWrite: number[] = [];
    const sink: MessageSink = {
      write: async (_message: Message) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        callsAtWrite.push(a.calls);
      },
    };

    await consume(team.run('go'), sink);

    expect(callsAtWrite).toEqual([0, 1, 2]);
  });
});
