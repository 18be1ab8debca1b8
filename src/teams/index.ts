/**
 * Teams
 * Turn-taking schedulers and transcript primitives
 */

export { RoundRobinTeam } from './round-robin.js';
export type { RoundRobinTeamOptions } from './round-robin.js';
export { drain } from './team.js';
export type { Team, TeamRunOptions } from './team.js';
export { Transcript, createMessage, USER_SOURCE } from './transcript.js';
