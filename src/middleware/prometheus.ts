import { PipelineMiddleware, PipelineContext, NextFunction } from './types';
import { PrometheusMetrics } from '../metrics/prometheus';

// =================================================================
// PROMETHEUS MIDDLEWARE
// =================================================================
// Records request count, latency, errors and in-flight requests for
// the monitored paths only (by default the analyze endpoints).
// Everything else, including the metrics endpoints, passes through.
// =================================================================

export class PrometheusMiddleware implements PipelineMiddleware {
    name = 'prometheus';
    private monitored: Set<string>;

    constructor(
        private metrics: PrometheusMetrics,
        apiPrefix: string,
        monitoredPaths: string[],
    ) {
        this.monitored = new Set(monitoredPaths.map(p => `${apiPrefix}/${p.replace(/^\/+/, '')}`));
    }

    async handle(ctx: PipelineContext, next: NextFunction): Promise<void> {
        const { req, res, path } = ctx;

        if (!this.monitored.has(path)) {
            await next();
            return;
        }

        const labels = { method: req.method, endpoint: path };
        const endTimer = this.metrics.requestDuration.startTimer(labels);
        this.metrics.activeRequests.inc(labels);

        let statusCode = 500;
        try {
            await next();
            statusCode = res.statusCode;
        } finally {
            endTimer();
            this.metrics.activeRequests.dec(labels);

            const statusLabels = { ...labels, status_code: String(statusCode) };
            this.metrics.requestsTotal.inc(statusLabels);
            if (statusCode >= 400) {
                this.metrics.errorsTotal.inc(statusLabels);
            }
        }
    }
}
