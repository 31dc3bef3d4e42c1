/**
 * Tests for the Prometheus metrics registry.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  trackCompletion,
  trackCompletionError,
  trackTokens,
  getContentType,
  getMetrics,
  register,
} from '../../../src/telemetry/metrics.js';

async function metricValues(name: string) {
  const metrics = await register.getMetricsAsJSON();
  return metrics.find(metric => metric.name === name)?.values ?? [];
}

describe('Metrics', () => {
  beforeEach(() => {
    register.resetMetrics();
  });

  describe('getMetrics', () => {
    it('should return Prometheus formatted metrics', async () => {
      const metrics = await getMetrics();

      expect(metrics).toContain('# HELP prompt_relay_completion_duration_seconds');
      expect(metrics).toContain('# TYPE prompt_relay_tokens_total counter');
      expect(metrics).toContain('# TYPE prompt_relay_completion_errors_total counter');
    });

    it('should expose the Prometheus content type', () => {
      expect(getContentType()).toContain('text/plain');
    });

    it('should be reachable from the package entry', async () => {
      const entry = await import('../../../src/index.js');

      expect(entry.getContentType()).toBe(getContentType());
      expect(entry.register).toBe(register);
    });
  });

  describe('trackCompletion', () => {
    it('should record one observation per call', async () => {
      trackCompletion('openai', 'gpt-3.5-turbo', 'success', 1.5);
      trackCompletion('openai', 'gpt-3.5-turbo', 'success', 0.7);

      const metrics = await getMetrics();
      expect(metrics).toContain(
        'prompt_relay_completion_duration_seconds_count{provider="openai",model="gpt-3.5-turbo",status="success"} 2'
      );
    });
  });

  describe('trackTokens', () => {
    it('should accumulate prompt and completion tokens', async () => {
      trackTokens('openai', 'gpt-3.5-turbo', 100, 50);
      trackTokens('openai', 'gpt-3.5-turbo', 10, 5);

      const tokens = await metricValues('prompt_relay_tokens_total');
      expect(tokens.find(v => v.labels.type === 'prompt')?.value).toBe(110);
      expect(tokens.find(v => v.labels.type === 'completion')?.value).toBe(55);
    });
  });

  describe('trackCompletionError', () => {
    it('should count errors per type', async () => {
      trackCompletionError('anthropic', 'TransportError');
      trackCompletionError('anthropic', 'TransportError');
      trackCompletionError('anthropic', 'AuthenticationError');

      const errors = await metricValues('prompt_relay_completion_errors_total');
      expect(errors.find(v => v.labels.error === 'TransportError')?.value).toBe(2);
      expect(errors.find(v => v.labels.error === 'AuthenticationError')?.value).toBe(1);
    });
  });
});
