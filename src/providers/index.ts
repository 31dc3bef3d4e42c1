import { OpenAIBackend } from './openai.js';
import { AnthropicBackend } from './anthropic.js';
import type { BackendOptions, CompletionBackend, ProviderName } from './base.js';

export { OpenAIBackend, AnthropicBackend };
export { DEFAULT_MODELS, PROVIDERS } from './base.js';
export type {
  BackendOptions,
  Choice,
  CompletionBackend,
  CompletionEnvelope,
  Conversation,
  GenerationConfig,
  Message,
  ProviderName,
  Role,
  SendOptions,
  Usage,
} from './base.js';

export function createBackend(provider: ProviderName, options: BackendOptions): CompletionBackend {
  switch (provider) {
    case 'openai':
      return new OpenAIBackend(options);
    case 'anthropic':
      return new AnthropicBackend(options);
  }
}
