import Anthropic from '@anthropic-ai/sdk';
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
  Message,
  SendOptions,
} from './base.js';

export const DEFAULT_MAX_TOKENS = 1024;

type Turn = Message & { role: 'user' | 'assistant' };

function isTurn(message: Message): message is Turn {
  return message.role !== 'system';
}

/**
 * Anthropic takes the system prompt as a separate field, so a leading system
 * message is lifted out of the turn list.
 */
export function toMessageParams(
  conversation: Conversation,
  config: GenerationConfig
): Anthropic.MessageCreateParamsNonStreaming {
  const systemMsg = conversation.find(m => m.role === 'system');

  return {
    model: config.model,
    system: systemMsg?.content,
    messages: conversation.filter(isTurn).map(({ role, content }) => ({ role, content })),
    max_tokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
    temperature: config.temperature,
  };
}

/**
 * The parts of an Anthropic message reply that end up in the envelope.
 */
export interface MessageReply {
  id: string;
  model: string;
  content: Array<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

export function toEnvelope(response: MessageReply): CompletionEnvelope {
  const text = response.content.flatMap(block =>
    block.type === 'text' && typeof block.text === 'string' ? [block.text] : []
  );
  const promptTokens = response.usage.input_tokens;
  const completionTokens = response.usage.output_tokens;

  return {
    id: response.id,
    object: 'chat.completion',
    created: Math.floor(Date.now() / 1000),
    model: response.model,
    choices: text.length === 0 ? [] : [{
      index: 0,
      message: { role: 'assistant', content: text.join('') },
      finish_reason: response.stop_reason === 'max_tokens' ? 'length' : 'stop',
    }],
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens,
    },
  };
}

export function toCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }
  if (error instanceof Anthropic.AuthenticationError || error instanceof Anthropic.PermissionDeniedError) {
    return new AuthenticationError(`Anthropic rejected the credential: ${error.message}`, { cause: error });
  }
  if (error instanceof Anthropic.APIUserAbortError) {
    return new TransportError('Request was aborted', { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new TransportError(`Could not reach Anthropic: ${error.message}`, { cause: error });
  }
  if (error instanceof Anthropic.APIError) {
    return new ServiceError(`Anthropic request failed: ${error.message}`, error.status, { cause: error });
  }
  return new TransportError(`Anthropic request failed: ${describeError(error)}`, { cause: error });
}

export class AnthropicBackend implements CompletionBackend {
  name = 'anthropic';
  private client: Anthropic;

  constructor(options: BackendOptions) {
    this.client = new Anthropic({
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
    let response: MessageReply;
    try {
      response = await this.client.messages.create(
        toMessageParams(conversation, config),
        { signal: options.signal }
      );
    } catch (error) {
      throw toCompletionError(error);
    }
    return toEnvelope(response);
  }
}
