import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type PrometheusMetrics = ReturnType<typeof createPrometheusMetrics>;

/**
 * Prometheus series for the monitored API paths, on a registry owned by
 * one application instance.
 */
export function createPrometheusMetrics(registry: Registry = new Registry()) {
    return {
        registry,
        requestsTotal: new Counter<'method' | 'endpoint' | 'status_code'>({
            name: 'http_requests_total',
            help: 'Total count of HTTP requests',
            labelNames: ['method', 'endpoint', 'status_code'],
            registers: [registry],
        }),
        requestDuration: new Histogram<'method' | 'endpoint'>({
            name: 'http_request_duration_seconds',
            help: 'HTTP request latency in seconds',
            labelNames: ['method', 'endpoint'],
            buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
            registers: [registry],
        }),
        errorsTotal: new Counter<'method' | 'endpoint' | 'status_code'>({
            name: 'http_errors_total',
            help: 'Total count of HTTP errors',
            labelNames: ['method', 'endpoint', 'status_code'],
            registers: [registry],
        }),
        activeRequests: new Gauge<'method' | 'endpoint'>({
            name: 'http_active_requests',
            help: 'Number of currently active HTTP requests',
            labelNames: ['method', 'endpoint'],
            registers: [registry],
        }),
        entitiesDetected: new Counter<'entity_type' | 'language'>({
            name: 'pii_entities_detected_total',
            help: 'Total count of PII entities detected',
            labelNames: ['entity_type', 'language'],
            registers: [registry],
        }),
    };
}
