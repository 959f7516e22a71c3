import { PipelineMiddleware, PipelineContext, NextFunction } from './types';
import { MetricsCollector } from '../metrics/metrics-collector';

// =================================================================
// METRICS MIDDLEWARE
// =================================================================
// Wraps everything downstream of it in MetricsCollector.observe().
// The status recorded is whatever the response ended with; a fault
// thrown below is counted as a 500 and re-thrown to the pipeline.
// =================================================================

export class MetricsMiddleware implements PipelineMiddleware {
    name = 'metrics';

    constructor(private collector: MetricsCollector) {}

    async handle(ctx: PipelineContext, next: NextFunction): Promise<void> {
        const { res, clientKey, path, query } = ctx;
        await this.collector.observe({ clientId: clientKey, path, query }, async () => {
            await next();
            return { statusCode: res.statusCode };
        });
    }
}
