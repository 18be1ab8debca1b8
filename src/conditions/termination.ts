/**
 * Termination Conditions
 * Composable predicates deciding when a team run stops
 */

import type { AgentId, Message } from '../types/index.js';

/**
 * Evaluated after every appended message. Implementations must be pure over
 * the transcript so one instance can serve any number of runs.
 */
export interface TerminationCondition {
  evaluate(transcript: readonly Message[]): boolean;

  /** Human-readable description, used as the run's stop reason. */
  describe(): string;
}

export abstract class BaseCondition implements TerminationCondition {
  abstract evaluate(transcript: readonly Message[]): boolean;

  abstract describe(): string;

  or(other: TerminationCondition): OrCondition {
    return new OrCondition(this, other);
  }

  and(other: TerminationCondition): AndCondition {
    return new AndCondition(this, other);
  }
}

export class MaxMessages extends BaseCondition {
  constructor(readonly maxMessages: number) {
    super();
    if (!Number.isInteger(maxMessages) || maxMessages < 0) {
      throw new RangeError(`maxMessages must be a non-negative integer, got ${maxMessages}`);
    }
  }

  evaluate(transcript: readonly Message[]): boolean {
    return transcript.length >= this.maxMessages;
  }

  describe(): string {
    return `Maximum number of messages ${this.maxMessages} reached`;
  }
}

export interface TextMentionOptions {
  /** Only messages from these authors count. */
  sources?: AgentId[];
}

export class TextMention extends BaseCondition {
  private sources?: ReadonlySet<AgentId>;

  constructor(
    readonly keyword: string,
    options: TextMentionOptions = {}
  ) {
    super();
    if (keyword.length === 0) {
      throw new RangeError('TextMention keyword must not be empty');
    }
    this.sources = options.sources ? new Set(options.sources) : undefined;
  }

  evaluate(transcript: readonly Message[]): boolean {
    return transcript.some(
      (message) =>
        (!this.sources || this.sources.has(message.source)) &&
        message.content.includes(this.keyword)
    );
  }

  describe(): string {
    return `Text '${this.keyword}' mentioned`;
  }
}

export class OrCondition extends BaseCondition {
  constructor(
    readonly left: TerminationCondition,
    readonly right: TerminationCondition
  ) {
    super();
  }

  evaluate(transcript: readonly Message[]): boolean {
    return this.left.evaluate(transcript) || this.right.evaluate(transcript);
  }

  describe(): string {
    return `(${this.left.describe()} or ${this.right.describe()})`;
  }
}

export class AndCondition extends BaseCondition {
  constructor(
    readonly left: TerminationCondition,
    readonly right: TerminationCondition
  ) {
    super();
  }

  evaluate(transcript: readonly Message[]): boolean {
    return this.left.evaluate(transcript) && this.right.evaluate(transcript);
  }

  describe(): string {
    return `(${this.left.describe()} and ${this.right.describe()})`;
  }
}

export function maxMessages(n: number): MaxMessages {
  return new MaxMessages(n);
}

export function textMention(keyword: string, options?: TextMentionOptions): TextMention {
  return new TextMention(keyword, options);
}

export function or(
  first: TerminationCondition,
  ...rest: TerminationCondition[]
): TerminationCondition {
  return rest.reduce<TerminationCondition>((acc, next) => new OrCondition(acc, next), first);
}

export function and(
  first: TerminationCondition,
  ...rest: TerminationCondition[]
): TerminationCondition {
  return rest.reduce<TerminationCondition>((acc, next) => new AndCondition(acc, next), first);
}
