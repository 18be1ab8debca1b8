export { ModelBackend, toChatMessages } from './model-backend.js';
export type { ModelBackendOptions, CompletionClient } from './model-backend.js';
export type { ReasoningBackend, BackendCallOptions } from './backend.js';
