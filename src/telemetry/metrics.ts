/**
 * Prometheus metrics for completion calls.
 */

import client from 'prom-client';

const register = new client.Registry();

const completionDuration = new client.Histogram({
  name: 'prompt_relay_completion_duration_seconds',
  help: 'Duration of completion requests in seconds',
  labelNames: ['provider', 'model', 'status'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

const tokensUsed = new client.Counter({
  name: 'prompt_relay_tokens_total',
  help: 'Total tokens reported by the completion service',
  labelNames: ['provider', 'model', 'type'],
  registers: [register],
});

const completionErrors = new client.Counter({
  name: 'prompt_relay_completion_errors_total',
  help: 'Total number of failed completion requests',
  labelNames: ['provider', 'error'],
  registers: [register],
});

/**
 * Track completion latency.
 */
export function trackCompletion(
  provider: string,
  model: string,
  status: 'success' | 'error',
  durationSeconds: number
): void {
  completionDuration.observe({ provider, model, status }, durationSeconds);
}

/**
 * Track token usage.
 */
export function trackTokens(
  provider: string,
  model: string,
  promptTokens: number,
  completionTokens: number
): void {
  tokensUsed.inc({ provider, model, type: 'prompt' }, promptTokens);
  tokensUsed.inc({ provider, model, type: 'completion' }, completionTokens);
}

export function trackCompletionError(provider: string, error: string): void {
  completionErrors.inc({ provider, error });
}

/**
 * Get metrics in Prometheus format.
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}

export { register };
