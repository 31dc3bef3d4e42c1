import type { Message } from '../providers/base.js';
import type { CompletionClient, CompletionResult } from './completion-client.js';
import { acceptConversation, buildSinglePrompt } from './request-builder.js';

export interface CompletionOptions {
  model?: string;
  temperature?: number;
  signal?: AbortSignal;
}

export async function getCompletion(
  client: CompletionClient,
  prompt: string,
  options: CompletionOptions = {}
): Promise<CompletionResult> {
  const { conversation, config } = buildSinglePrompt(prompt, options.model, options.temperature);
  return client.complete(conversation, config, { signal: options.signal });
}

/**
 * Context-aware variant: the caller keeps the history (optionally led by a
 * system message) and passes all of it on every call.
 */
export async function getCompletionFromMessages(
  client: CompletionClient,
  messages: readonly Message[],
  options: CompletionOptions = {}
): Promise<CompletionResult> {
  const { conversation, config } = acceptConversation(messages, options.model, options.temperature);
  return client.complete(conversation, config, { signal: options.signal });
}
