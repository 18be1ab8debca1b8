/**
 * Persona texts for the standards-coach agents, read from prompts/
 */

import * as fs from 'fs/promises';

const PROMPTS_DIR = new URL('../../prompts/', import.meta.url);

export interface CoachPersonas {
  coach: string;
  reviewer: string;
  formatter: string;
}

const PERSONA_FILES: Record<keyof CoachPersonas, string> = {
  coach: 'standards-coach.md',
  reviewer: 'compliance-reviewer.md',
  formatter: 'documentation-formatter.md',
};

export async function loadPersonas(dir: URL = PROMPTS_DIR): Promise<CoachPersonas> {
  const read = (file: string) => fs.readFile(new URL(file, dir), 'utf-8').then((text) => text.trim());
  const [coach, reviewer, formatter] = await Promise.all([
    read(PERSONA_FILES.coach),
    read(PERSONA_FILES.reviewer),
    read(PERSONA_FILES.formatter),
  ]);
  return { coach, reviewer, formatter };
}
