export {
  CompletionClient,
  type CompletionDetails,
  type CompletionResult,
} from './services/completion-client.js';
export { getCompletion, getCompletionFromMessages, type CompletionOptions } from './services/completions.js';
export {
  acceptConversation,
  appendAssistantReply,
  assertValidRequest,
  buildSinglePrompt,
  type BuiltRequest,
} from './services/request-builder.js';
export * from './providers/index.js';
export * from './errors.js';
export { loadConfig, type AppConfig } from './config/index.js';
export { logger } from './telemetry/logger.js';
export { getContentType, getMetrics, register } from './telemetry/metrics.js';
