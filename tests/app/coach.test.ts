/**
 * Standards Coach Wiring Tests
 */

import { describe, it, expect } from 'vitest';
import { createCoachTeam, AGENT_NAMES } from '../../src/app/coach.js';
import { loadPersonas } from '../../src/app/personas.js';
import type { CoachPersonas } from '../../src/app/personas.js';
import { ScriptedBackend } from '../utils/mocks.js';

const personas: CoachPersonas = {
  coach: 'coach persona',
  reviewer: 'reviewer persona',
  formatter: 'formatter persona',
};

const settings = { maxInnerMessages: 6, maxOuterTurns: 2, approvalKeyword: 'APPROVE' };

describe('createCoachTeam', () => {
  it('should_answerWithPanelThenFormatter_when_reviewerApproves', async () => {
    const backend = new ScriptedBackend({
      [AGENT_NAMES.coach]: 'Classify the software under IEC 62304.',
      [AGENT_NAMES.reviewer]: 'APPROVE',
      [AGENT_NAMES.panel]: 'Use IEC 62304 safety classes.',
      [AGENT_NAMES.formatter]: '# Software Classification',
    });
    const team = createCoachTeam(backend, personas, settings);

    const result = await team.runToCompletion('How do I classify my device software?');

    expect(result.messages.map((m) => [m.source, m.content])).toEqual([
      ['user', 'How do I classify my device software?'],
      ['Standards_Panel', 'Use IEC 62304 safety classes.'],
      ['Documentation_Formatter', '# Software Classification'],
    ]);
    expect(backend.calls.map((c) => c.speaker)).toEqual([
      'Standards_Coach',
      'Compliance_Reviewer',
      'Standards_Panel',
      'Documentation_Formatter',
    ]);
  });

  it('should_giveEachAgentItsPersona_when_called', async () => {
    const backend = new ScriptedBackend({ [AGENT_NAMES.reviewer]: 'APPROVE' });
    const team = createCoachTeam(backend, personas, settings);

    await team.runToCompletion('Q');

    expect(backend.callsFor(AGENT_NAMES.coach)[0].persona).toBe('coach persona');
    expect(backend.callsFor(AGENT_NAMES.reviewer)[0].persona).toBe('reviewer persona');
    expect(backend.callsFor(AGENT_NAMES.formatter)[0].persona).toBe('formatter persona');
  });

  it('should_capPanelDiscussion_when_reviewerNeverApproves', async () => {
    const backend = new ScriptedBackend({ [AGENT_NAMES.reviewer]: 'Not yet.' });
    const team = createCoachTeam(backend, personas, settings);

    await team.runToCompletion('Q');

    expect(backend.callsFor(AGENT_NAMES.coach)).toHaveLength(3);
    expect(backend.callsFor(AGENT_NAMES.reviewer)).toHaveLength(2);
    expect(backend.callsFor(AGENT_NAMES.panel)[0].transcript).toHaveLength(7);
  });

  it('should_ignoreKeywordInQuery_when_userTypesIt', async () => {
    const backend = new ScriptedBackend({ [AGENT_NAMES.reviewer]: ['Add risk controls.', 'APPROVE'] });
    const team = createCoachTeam(backend, personas, settings);

    await team.runToCompletion('Can you APPROVE my risk file?');

    expect(backend.callsFor(AGENT_NAMES.coach)).toHaveLength(2);
    expect(backend.callsFor(AGENT_NAMES.reviewer)).toHaveLength(2);
  });

  it('should_runFormatterOnlyWhenTurnsAllow_when_outerTurnsIsOne', async () => {
    const backend = new ScriptedBackend({ [AGENT_NAMES.reviewer]: 'APPROVE' });
    const team = createCoachTeam(backend, personas, { ...settings, maxOuterTurns: 1 });

    const result = await team.runToCompletion('Q');

    expect(result.messages.map((m) => m.source)).toEqual(['user', 'Standards_Panel']);
    expect(backend.callsFor(AGENT_NAMES.formatter)).toHaveLength(0);
  });
});

describe('loadPersonas', () => {
  it('should_readTrimmedPrompts_when_loadingDefaults', async () => {
    const loaded = await loadPersonas();

    expect(loaded.coach.startsWith('You are the Standards Coach')).toBe(true);
    expect(loaded.reviewer).toContain('reply with the single word APPROVE');
    expect(loaded.formatter.startsWith('You are the Documentation Formatter')).toBe(true);
    expect(loaded.coach).toBe(loaded.coach.trim());
  });

  it('should_reject_when_directoryMissing', async () => {
    await expect(loadPersonas(new URL('file:///nonexistent-roundtable-prompts/'))).rejects.toThrow(
      /ENOENT/
    );
  });
});
