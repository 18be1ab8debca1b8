export { consume, ConsoleSink, MemorySink } from './sink.js';
export type { MessageSink, ConsoleSinkOptions } from './sink.js';
