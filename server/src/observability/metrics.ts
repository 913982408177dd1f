import { collectDefaultMetrics, Histogram, Registry } from 'prom-client';

export type UpstreamProvider = 'google' | 'astronomy';
export type UpstreamOutcome = 'ok' | 'http_error' | 'status_error' | 'malformed' | 'transport_error';

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const upstreamLatency = new Histogram({
  name: 'upstream_request_duration_ms',
  help: 'Latency of calls to Google Maps and AstronomyAPI',
  labelNames: ['provider', 'operation', 'outcome'],
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000, 120000],
  registers: [registry]
});

export const metricsContentType = registry.contentType;

export function recordUpstreamCall(
  provider: UpstreamProvider,
  operation: string,
  outcome: UpstreamOutcome,
  latencyMs: number
): void {
  upstreamLatency.observe({ provider, operation, outcome }, latencyMs);
}

export function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
