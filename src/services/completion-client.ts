import { randomUUID } from 'node:crypto';
import type { ZodIssue } from 'zod';
import { logger } from '../telemetry/logger.js';
import { trackCompletion, trackCompletionError, trackTokens } from '../telemetry/metrics.js';
import {
  CompletionError,
  MalformedResponseError,
  TransportError,
  describeError,
} from '../errors.js';
import type {
  CompletionBackend,
  CompletionEnvelope,
  Conversation,
  GenerationConfig,
  SendOptions,
  Usage,
} from '../providers/base.js';
import { ChoiceSchema, CompletionEnvelopeSchema } from '../schemas/response.js';
import { assertValidRequest } from './request-builder.js';

export type CompletionResult = string;

export interface CompletionDetails {
  requestId: string;
  content: CompletionResult;
  envelope: CompletionEnvelope;
  usage?: Usage;
  finishReason?: string;
}

function malformed(issues: ZodIssue[], cause: unknown): MalformedResponseError {
  const reasons = issues.map(issue => issue.message).join('; ');
  return new MalformedResponseError(`Malformed completion response: ${reasons}`, { cause });
}

export class CompletionClient {
  private backend: CompletionBackend;

  constructor(backend: CompletionBackend) {
    this.backend = backend;
  }

  async complete(
    conversation: Conversation,
    config: GenerationConfig,
    options?: SendOptions
  ): Promise<CompletionResult> {
    const details = await this.completeWithDetails(conversation, config, options);
    return details.content;
  }

  async completeWithDetails(
    conversation: Conversation,
    config: GenerationConfig,
    options: SendOptions = {}
  ): Promise<CompletionDetails> {
    assertValidRequest(conversation, config);

    const requestId = randomUUID();
    const provider = this.backend.name;
    const startTime = Date.now();

    logger.info({
      requestId,
      provider,
      model: config.model,
      messageCount: conversation.length,
    }, 'Completion request');

    try {
      const envelope = await this.backend.send(conversation, config, options);
      const details = this.unwrap(requestId, envelope);

      trackCompletion(provider, config.model, 'success', (Date.now() - startTime) / 1000);
      if (details.usage) {
        trackTokens(provider, config.model, details.usage.prompt_tokens, details.usage.completion_tokens);
      }

      logger.info({
        requestId,
        responseId: envelope.id,
        finishReason: details.finishReason,
        tokens: details.usage?.total_tokens,
      }, 'Completion success');
      logger.debug({ requestId, envelope }, 'Completion envelope');

      return details;
    } catch (error) {
      const failure = error instanceof CompletionError
        ? error
        : new TransportError(`Completion request failed: ${describeError(error)}`, { cause: error });

      trackCompletion(provider, config.model, 'error', (Date.now() - startTime) / 1000);
      trackCompletionError(provider, failure.name);

      logger.error({
        requestId,
        provider,
        error: failure.message,
        errorType: failure.name,
      }, 'Completion failed');

      throw failure;
    }
  }

  private unwrap(requestId: string, envelope: CompletionEnvelope): CompletionDetails {
    const parsed = CompletionEnvelopeSchema.safeParse(envelope);
    if (!parsed.success) {
      throw malformed(parsed.error.issues, parsed.error);
    }

    const choice = ChoiceSchema.safeParse(parsed.data.choices[0]);
    if (!choice.success) {
      throw malformed(choice.error.issues, choice.error);
    }

    return {
      requestId,
      content: choice.data.message.content,
      envelope,
      usage: parsed.data.usage ?? undefined,
      finishReason: choice.data.finish_reason ?? undefined,
    };
  }
}
