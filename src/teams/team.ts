/**
 * Team contract and run helpers
 */

import type { Message, RunOptions, RunStream, TaskResult } from '../types/index.js';
import type { SpanContext } from '../tracing/tracer.js';

export interface TeamRunOptions extends RunOptions {
  traceContext?: SpanContext;
}

/**
 * A scheduler that drives its participants from a task to termination.
 * Each call to `run` starts a fresh transcript.
 */
export interface Team {
  readonly name: string;

  run(task: string, options?: TeamRunOptions): RunStream;
}

/**
 * Pull a run to its end, handing each message to `onMessage` in order, and
 * return the run's result. A failing callback unwinds the run before the
 * error propagates.
 */
export async function drain(
  stream: RunStream,
  onMessage?: (message: Message) => void | Promise<void>
): Promise<TaskResult> {
  for (;;) {
    const next = await stream.next();
    if (next.done) {
      return next.value;
    }
    if (!onMessage) continue;

    try {
      await onMessage(next.value);
    } catch (error) {
      await stream.throw(error);
      throw error;
    }
  }
}
