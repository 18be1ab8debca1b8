export { createCoachTeam, AGENT_NAMES } from './coach.js';
export type { CoachTeamSettings } from './coach.js';
export { loadPersonas } from './personas.js';
export type { CoachPersonas } from './personas.js';
export {
  interactiveSession,
  runConsultation,
  isExitCommand,
  welcomeBanner,
  EXIT_COMMANDS,
  SEPARATOR,
} from './session.js';
export type { SessionOptions, SessionSummary } from './session.js';
