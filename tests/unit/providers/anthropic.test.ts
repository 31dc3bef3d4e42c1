import { describe, it, expect } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import {
  AnthropicBackend,
  DEFAULT_MAX_TOKENS,
  toCompletionError,
  toEnvelope,
  toMessageParams,
  type MessageReply,
} from '../../../src/providers/anthropic.js';
import { AuthenticationError, ServiceError, TransportError } from '../../../src/errors.js';

function reply(overrides: Partial<MessageReply> = {}): MessageReply {
  return {
    id: 'msg_test',
    model: 'claude-3-haiku-20240307',
    content: [{ type: 'text', text: 'The capital of New York is Albany.' }],
    stop_reason: 'end_turn',
    usage: { input_tokens: 20, output_tokens: 9 },
    ...overrides,
  };
}

describe('AnthropicBackend', () => {
  it('is named anthropic', () => {
    expect(new AnthropicBackend({ apiKey: 'test-key' }).name).toBe('anthropic');
  });

  describe('toMessageParams', () => {
    it('lifts the system message out of the turns', () => {
      const params = toMessageParams(
        [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'hello' },
          { role: 'user', content: 'bye' },
        ],
        { model: 'claude-3-haiku-20240307', temperature: 0 }
      );

      expect(params).toEqual({
        model: 'claude-3-haiku-20240307',
        system: 'Be brief.',
        messages: [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'hello' },
          { role: 'user', content: 'bye' },
        ],
        max_tokens: DEFAULT_MAX_TOKENS,
        temperature: 0,
      });
    });

    it('leaves system unset without a system message', () => {
      const params = toMessageParams(
        [{ role: 'user', content: 'hi' }],
        { model: 'claude-3-haiku-20240307', temperature: 0.4, maxTokens: 64 }
      );

      expect(params.system).toBeUndefined();
      expect(params.max_tokens).toBe(64);
    });
  });

  describe('toEnvelope', () => {
    it('maps the reply into a single choice', () => {
      const envelope = toEnvelope(reply());

      expect(envelope.id).toBe('msg_test');
      expect(envelope.model).toBe('claude-3-haiku-20240307');
      expect(envelope.choices).toEqual([
        {
          index: 0,
          message: { role: 'assistant', content: 'The capital of New York is Albany.' },
          finish_reason: 'stop',
        },
      ]);
      expect(envelope.usage).toEqual({ prompt_tokens: 20, completion_tokens: 9, total_tokens: 29 });
    });

    it('joins text blocks and skips other blocks', () => {
      const envelope = toEnvelope(reply({
        content: [
          { type: 'text', text: 'Albany' },
          { type: 'tool_use' },
          { type: 'text', text: ', NY' },
        ],
      }));

      expect(envelope.choices[0]?.message?.content).toBe('Albany, NY');
    });

    it('maps max_tokens to a length finish reason', () => {
      const envelope = toEnvelope(reply({ stop_reason: 'max_tokens' }));
      expect(envelope.choices[0]?.finish_reason).toBe('length');
    });

    it('returns no choices when there is no text', () => {
      const envelope = toEnvelope(reply({ content: [] }));
      expect(envelope.choices).toEqual([]);
    });
  });

  describe('toCompletionError', () => {
    it('maps 401 to AuthenticationError', () => {
      const error = new Anthropic.AuthenticationError(401, undefined, 'invalid x-api-key', undefined);
      expect(toCompletionError(error)).toBeInstanceOf(AuthenticationError);
    });

    it('maps connection failures to TransportError', () => {
      const mapped = toCompletionError(new Anthropic.APIConnectionError({ message: 'Connection error.' }));

      expect(mapped).toBeInstanceOf(TransportError);
      expect(mapped.message).toBe('Could not reach Anthropic: Connection error.');
    });

    it('maps server errors to ServiceError', () => {
      const mapped = toCompletionError(new Anthropic.InternalServerError(500, undefined, 'overloaded', undefined));

      expect(mapped).toBeInstanceOf(ServiceError);
      if (mapped instanceof ServiceError) {
        expect(mapped.status).toBe(500);
      }
    });
  });
});
