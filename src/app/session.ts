/**
 * Consultation Session
 * Single-query and line-driven interactive front ends over a team
 */

import chalk from 'chalk';
import type { TaskResult } from '../types/index.js';
import { ConversationAborted } from '../types/index.js';
import type { Team } from '../teams/team.js';
import { consume } from '../console/sink.js';
import type { MessageSink } from '../console/sink.js';

export const EXIT_COMMANDS = ['quit', 'exit', 'q', 'bye'] as const;

export const SEPARATOR = '='.repeat(80);

const TITLE = 'Standards Coach - Medical Device Compliance Assistant';

export function isExitCommand(input: string): boolean {
  const normalized = input.trim().toLowerCase();
  return EXIT_COMMANDS.some((command) => command === normalized);
}

export interface SessionOptions {
  team: Team;
  sink: MessageSink;
  print: (text: string) => void;
  /** Called before each line is read. */
  prompt?: () => void;
  /** Signal for the next consultation, so the caller can cancel it. */
  nextSignal?: () => AbortSignal | undefined;
  /** Called once a consultation has finished, whether it succeeded or not. */
  onSettled?: () => void;
}

export interface SessionSummary {
  consultations: number;
  failures: number;
}

/**
 * Run one query through the team, rendering every message to the sink
 */
export async function runConsultation(
  team: Team,
  query: string,
  sink: MessageSink,
  print: (text: string) => void,
  signal?: AbortSignal
): Promise<TaskResult> {
  print(`\n${SEPARATOR}\n${TITLE}\n${SEPARATOR}\n\nQuery: ${query}\n\n${SEPARATOR}\n`);
  const result = await consume(team.run(query, { signal }), sink);
  print(`\n${SEPARATOR}\n`);
  return result;
}

export function welcomeBanner(): string {
  return [
    '',
    SEPARATOR,
    'Welcome to the Standards Coach',
    'Medical Device Compliance Assistant',
    SEPARATOR,
    '',
    'I can help you with:',
    '  - ISO 13485:2016 - Quality Management Systems',
    '  - IEC 62304:2006+A1:2015 - Software Life Cycle',
    '  - IEC 82304-1:2016 - Health Software',
    '  - ISO 14971:2019 - Risk Management',
    '',
    `Type '${EXIT_COMMANDS[0]}' or '${EXIT_COMMANDS[1]}' to leave.`,
    SEPARATOR,
    '',
  ].join('\n');
}

/**
 * Answer each input line until an exit command or the end of input.
 * A failed consultation is reported and the loop moves on to the next line.
 */
export async function interactiveSession(
  lines: AsyncIterable<string>,
  options: SessionOptions
): Promise<SessionSummary> {
  const { team, sink, print } = options;
  const summary: SessionSummary = { consultations: 0, failures: 0 };

  print(welcomeBanner());
  options.prompt?.();

  for await (const line of lines) {
    const query = line.trim();

    if (query.length === 0) {
      print(chalk.yellow('Please enter a question.'));
    } else if (isExitCommand(query)) {
      print(chalk.cyan('\nThank you for using the Standards Coach. Stay compliant and safe!\n'));
      return summary;
    } else {
      summary.consultations++;
      try {
        await runConsultation(team, query, sink, print, options.nextSignal?.());
      } catch (error) {
        if (!(error instanceof ConversationAborted)) {
          throw error;
        }
        summary.failures++;
        print(chalk.red(`\nConsultation error: ${error.message}`));
        print('You can continue with a new question.\n');
      } finally {
        options.onSettled?.();
      }
    }

    options.prompt?.();
  }

  print(chalk.cyan('\nSession ended. Goodbye!\n'));
  return summary;
}
