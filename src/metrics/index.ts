import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

let defaultMetricsEnabled = false;

/** Add the process metrics of prom-client to `registry`; later calls do nothing. */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  collectDefaultMetrics({ register: registry });
  defaultMetricsEnabled = true;
}

export const emissionsTotal = new Counter({
  name: 'bus_emissions_total',
  help: 'Total emissions accepted by a bus',
  labelNames: ['bus'] as const, // bus: blocking|async|threaded
  registers: [registry],
});

export const listenerErrorsTotal = new Counter({
  name: 'bus_listener_errors_total',
  help: 'Total listener errors forwarded to an error handler',
  labelNames: ['bus'] as const,
  registers: [registry],
});

// From emit (or dequeue, for queued buses) until the last group settled
export const dispatchDurationSeconds = new Histogram({
  name: 'bus_dispatch_duration_seconds',
  help: 'Time to fully dispatch one emission (seconds)',
  labelNames: ['bus'] as const,
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

export const queueDepth = new Gauge({
  name: 'bus_queue_depth',
  help: 'Emissions waiting in threaded bus queues',
  registers: [registry],
});

export function metricsSummary(): Promise<string> {
  return registry.metrics();
}
