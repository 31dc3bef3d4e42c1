import OpenAI from 'openai';
import {
  AuthenticationError,
  CompletionError,
  ServiceError,
  TransportError,
  describeError,
} from '../errors.js';
import type {
  BackendOptions,
  CompletionBackend,
  CompletionEnvelope,
  Conversation,
  GenerationConfig,
  SendOptions,
} from './base.js';

export function toChatCompletionParams(
  conversation: Conversation,
  config: GenerationConfig
): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming {
  return {
    model: config.model,
    messages: conversation.map(({ role, content }) => ({ role, content })),
    temperature: config.temperature,
    max_tokens: config.maxTokens,
  };
}

export function toCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new AuthenticationError(`OpenAI rejected the credential: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new TransportError('Request was aborted', { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransportError(`Could not reach OpenAI: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    return new ServiceError(`OpenAI request failed: ${error.message}`, error.status, { cause: error });
  }
  return new TransportError(`OpenAI request failed: ${describeError(error)}`, { cause: error });
}

export class OpenAIBackend implements CompletionBackend {
  name = 'openai';
  private client: OpenAI;

  constructor(options: BackendOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeout,
      maxRetries: 0,
    });
  }

  async send(
    conversation: Conversation,
    config: GenerationConfig,
    options: SendOptions = {}
  ): Promise<CompletionEnvelope> {
    try {
      return await this.client.chat.completions.create(
        toChatCompletionParams(conversation, config),
        { signal: options.signal }
      );
    } catch (error) {
      throw toCompletionError(error);
    }
  }
}
