/**
 * Standards Coach
 * Wires the consultation: a coach/reviewer panel nested inside a team with
 * a documentation formatter.
 */

import { LeafAgent } from '../agents/leaf-agent.js';
import { CompositeAgent } from '../agents/composite-agent.js';
import type { ReasoningBackend } from '../backend/backend.js';
import { maxMessages, textMention } from '../conditions/termination.js';
import { RoundRobinTeam } from '../teams/round-robin.js';
import type { Tracer } from '../tracing/tracer.js';
import type { CoachPersonas } from './personas.js';

export const AGENT_NAMES = {
  coach: 'Standards_Coach',
  reviewer: 'Compliance_Reviewer',
  formatter: 'Documentation_Formatter',
  panel: 'Standards_Panel',
} as const;

export interface CoachTeamSettings {
  /** Message cap for the coach/reviewer discussion, task included. */
  maxInnerMessages: number;
  /** Agent turns in the outer consultation. */
  maxOuterTurns: number;
  approvalKeyword: string;
  tracer?: Tracer;
}

/**
 * Build the consultation team. The returned team is reusable: each query is
 * a fresh run over the same agents.
 */
export function createCoachTeam(
  backend: ReasoningBackend,
  personas: CoachPersonas,
  settings: CoachTeamSettings
): RoundRobinTeam {
  const { tracer } = settings;

  const coach = new LeafAgent({
    name: AGENT_NAMES.coach,
    persona: personas.coach,
    backend,
    description: 'Gives guidance on medical device standards.',
  });
  const reviewer = new LeafAgent({
    name: AGENT_NAMES.reviewer,
    persona: personas.reviewer,
    backend,
    description: 'Reviews the guidance for regulatory accuracy.',
  });
  const formatter = new LeafAgent({
    name: AGENT_NAMES.formatter,
    persona: personas.formatter,
    backend,
    description: 'Formats the final guidance as QMS documentation.',
  });

  // Only the reviewer can approve; a task quoting the keyword does not end the panel
  const standardsTeam = new RoundRobinTeam({
    name: 'Standards_Team',
    participants: [coach, reviewer],
    termination: textMention(settings.approvalKeyword, { sources: [AGENT_NAMES.reviewer] }).or(
      maxMessages(settings.maxInnerMessages)
    ),
    tracer,
  });

  const panel = new CompositeAgent({
    name: AGENT_NAMES.panel,
    team: standardsTeam,
    backend,
    description: 'A coach and a reviewer who agree on guidance before answering.',
    tracer,
  });

  return new RoundRobinTeam({
    name: 'Consultation',
    participants: [panel, formatter],
    maxTurns: settings.maxOuterTurns,
    tracer,
  });
}
