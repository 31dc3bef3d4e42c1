import type { ZodType } from 'zod';
import { InvalidArgumentError } from '../errors.js';
import type { Conversation, GenerationConfig, Message } from '../providers/base.js';
import {
  ConversationSchema,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  GenerationConfigSchema,
  PromptSchema,
} from '../schemas/request.js';

export interface BuiltRequest {
  conversation: Conversation;
  config: GenerationConfig;
}

function validate<T>(schema: ZodType<T>, value: unknown, context: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(context, result.error.issues);
  }
  return result.data;
}

function buildConfig(model: string | undefined, temperature: number | undefined): GenerationConfig {
  return validate(
    GenerationConfigSchema,
    { model: model ?? DEFAULT_MODEL, temperature: temperature ?? DEFAULT_TEMPERATURE },
    'Invalid generation config'
  );
}

/**
 * Wraps a single prompt as a one-message conversation with role `user`.
 */
export function buildSinglePrompt(promptText: string, model?: string, temperature?: number): BuiltRequest {
  const config = buildConfig(model, temperature);
  const content = validate(PromptSchema, promptText, 'Invalid prompt');

  return {
    conversation: [{ role: 'user', content }],
    config,
  };
}

/**
 * Validates caller-owned history and forwards it in the same order. A system
 * message may only appear first.
 */
export function acceptConversation(
  messages: readonly Message[],
  model?: string,
  temperature?: number
): BuiltRequest {
  const config = buildConfig(model, temperature);
  const conversation = validate(ConversationSchema, messages, 'Invalid conversation');

  return { conversation, config };
}

export function assertValidRequest(conversation: Conversation, config: GenerationConfig): void {
  validate(ConversationSchema, conversation, 'Invalid conversation');
  validate(GenerationConfigSchema, config, 'Invalid generation config');
}

export function appendAssistantReply(conversation: readonly Message[], content: string): Conversation {
  return [...conversation, { role: 'assistant', content }];
}
