export {
  BaseCondition,
  MaxMessages,
  TextMention,
  OrCondition,
  AndCondition,
  maxMessages,
  textMention,
  or,
  and,
} from './termination.js';
export type { TerminationCondition, TextMentionOptions } from './termination.js';
