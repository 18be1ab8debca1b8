/**
 * Transcript Sinks
 * Consumers of a run's message stream
 */

import chalk from 'chalk';
import type { Message, RunStream, TaskResult } from '../types/index.js';
import { drain } from '../teams/team.js';
import { USER_SOURCE } from '../teams/transcript.js';

/**
 * Accepts messages in append order. A slow sink delays the next turn.
 */
export interface MessageSink {
  write(message: Message): void | Promise<void>;
  close?(result: TaskResult): void | Promise<void>;
}

/**
 * Feed a run into a sink and return the run's result
 */
export async function consume(stream: RunStream, sink: MessageSink): Promise<TaskResult> {
  const result = await drain(stream, (message) => sink.write(message));
  await sink.close?.(result);
  return result;
}

export interface ConsoleSinkOptions {
  /** Output function; defaults to stdout. */
  write?: (text: string) => void;
  /** Print the stop reason once the run ends. */
  showStopReason?: boolean;
}

/**
 * Renders each message under a header naming its author
 */
export class ConsoleSink implements MessageSink {
  private out: (text: string) => void;
  private showStopReason: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.out = options.write ?? ((text) => process.stdout.write(text));
    this.showStopReason = options.showStopReason ?? true;
  }

  write(message: Message): void {
    const header = `---------- ${message.source} ----------`;
    const styled = message.source === USER_SOURCE ? chalk.cyan(header) : chalk.bold.green(header);
    this.out(`${styled}\n${message.content}\n`);
  }

  close(result: TaskResult): void {
    if (this.showStopReason) {
      this.out(chalk.gray(`[stopped: ${result.stopReason}]`) + '\n');
    }
  }
}

/**
 * Keeps every message it is given
 */
export class MemorySink implements MessageSink {
  readonly messages: Message[] = [];
  result?: TaskResult;

  write(message: Message): void {
    this.messages.push(message);
  }

  close(result: TaskResult): void {
    this.result = result;
  }
}
