#!/usr/bin/env node
/**
 * Roundtable CLI
 * Standards-coach consultations from the terminal, one-shot or interactive
 */

import 'dotenv/config';
import * as readline from 'readline';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config/index.js';
import type { AppConfig } from './config/index.js';
import { ModelClient } from './client.js';
import { ModelBackend } from './backend/model-backend.js';
import { ConsoleSink } from './console/sink.js';
import { createCoachTeam } from './app/coach.js';
import { loadPersonas } from './app/personas.js';
import { interactiveSession, runConsultation } from './app/session.js';
import { ConfigurationError, ConversationAborted } from './types/index.js';

interface CliOptions {
  model?: string;
  maxInnerMessages?: number;
  maxOuterTurns?: number;
  trace?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function buildProgram(): Command {
  return new Command()
    .name('roundtable')
    .description('Medical device standards guidance from a team of cooperating agents')
    .version('0.1.0')
    .argument('[query...]', 'question to answer once before exiting')
    .option('-m, --model <name>', 'model used by every agent')
    .option('--max-inner-messages <n>', 'message cap for the coach/reviewer panel', parsePositiveInt)
    .option('--max-outer-turns <n>', 'agent turns in the outer consultation', parsePositiveInt)
    .option('--trace', 'record spans for runs, turns and model calls');
}

async function main(argv: string[]): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();
  const query = program.args.join(' ').trim();

  let config: AppConfig;
  try {
    config = loadConfig(process.env, {
      model: options.model,
      maxInnerMessages: options.maxInnerMessages,
      maxOuterTurns: options.maxOuterTurns,
      singleQuery: query.length > 0 ? query : undefined,
      trace: options.trace,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(chalk.red(`\nConfiguration Error: ${error.message}\n`));
      return 1;
    }
    throw error;
  }

  const client = new ModelClient({
    providers: config.providers,
    tracing: config.tracing,
    retry: { maxRetries: config.maxRetries },
    defaultTimeout: config.timeoutMs,
    ...(config.costAlertThreshold !== undefined && {
      costTracking: { enabled: true, alertThreshold: config.costAlertThreshold },
    }),
  });
  const backend = new ModelBackend({
    client,
    model: config.model,
    fallback: config.fallbackModels,
  });
  const team = createCoachTeam(backend, await loadPersonas(), {
    maxInnerMessages: config.maxInnerMessages,
    maxOuterTurns: config.maxOuterTurns,
    approvalKeyword: config.approvalKeyword,
    tracer: client.getTracer(),
  });
  const sink = new ConsoleSink();
  const print = (text: string) => console.log(text);

  try {
    if (config.singleQuery) {
      return await runOnce(config.singleQuery, (signal) =>
        runConsultation(team, config.singleQuery ?? '', sink, print, signal)
      );
    }

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.blue('\nYour question: '),
    });
    let current: AbortController | undefined;

    // Ctrl-C cancels a consultation in flight, otherwise ends the session
    rl.on('SIGINT', () => {
      if (current) {
        current.abort(new Error('Interrupted by user'));
      } else {
        rl.close();
      }
    });

    try {
      await interactiveSession(rl, {
        team,
        sink,
        print,
        prompt: () => rl.prompt(),
        nextSignal: () => {
          current = new AbortController();
          return current.signal;
        },
        onSettled: () => {
          current = undefined;
        },
      });
    } finally {
      rl.close();
    }
    return 0;
  } finally {
    await client.shutdown();
  }
}

async function runOnce(
  query: string,
  consult: (signal: AbortSignal) => Promise<unknown>
): Promise<number> {
  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error('Interrupted by user'));
  process.once('SIGINT', onSigint);

  try {
    await consult(controller.signal);
    return 0;
  } catch (error) {
    if (error instanceof ConversationAborted) {
      console.error(chalk.red(`\nConsultation error for "${query}": ${error.message}\n`));
      return 1;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(chalk.red(`\nUnexpected Error: ${error instanceof Error ? error.message : String(error)}\n`));
    process.exitCode = 1;
  }
);
