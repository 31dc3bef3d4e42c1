export type Role = 'system' | 'user' | 'assistant';

export interface Message {
  role: Role;
  content: string;
}

export type Conversation = Message[];

export interface GenerationConfig {
  model: string;
  temperature: number;
  maxTokens?: number;
}

export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface Choice {
  index?: number;
  message?: {
    role?: string;
    content?: string | null;
  } | null;
  finish_reason?: string | null;
}

/**
 * Response body in the chat-completions wire shape. Backends that talk to a
 * service with a different shape map into this one.
 */
export interface CompletionEnvelope {
  id?: string;
  object?: string;
  created?: number;
  model?: string;
  choices: Choice[];
  usage?: Usage | null;
}

export interface SendOptions {
  signal?: AbortSignal;
}

export interface CompletionBackend {
  name: string;
  send(conversation: Conversation, config: GenerationConfig, options?: SendOptions): Promise<CompletionEnvelope>;
}

export const PROVIDERS = ['openai', 'anthropic'] as const;

export type ProviderName = (typeof PROVIDERS)[number];

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-3.5-turbo',
  anthropic: 'claude-3-haiku-20240307',
};

export interface BackendOptions {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
}
