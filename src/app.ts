import express, { Express } from 'express';
import { Settings } from './config';
import { TextAnalyzer } from './analyzer/types';
import { MetricsCollector } from './metrics/metrics-collector';
import { createPrometheusMetrics, PrometheusMetrics } from './metrics/prometheus';
import { RateLimiter } from './rate-limiters/types';
import { SlidingWindowRateLimiter } from './rate-limiters/sliding-window';
import { MiddlewarePipeline } from './middleware/pipeline';
import { SecurityHeadersMiddleware } from './middleware/security-headers';
import { CorsMiddleware } from './middleware/cors';
import { RateLimitMiddleware } from './middleware/rate-limit';
import { PrometheusMiddleware } from './middleware/prometheus';
import { MetricsMiddleware } from './middleware/metrics';
import { RouterMiddleware } from './middleware/router';
import { requestLogger } from './middleware/request-logger';
import { createApiRouter } from './routes/analyze';

// =================================================================
// APPLICATION
// =================================================================
//
//   request logger (pino-http)
//     └─ pipeline: security headers → CORS → rate limit
//                  → prometheus → metrics → API router
//
// State lives in the objects passed in (or created here), one set
// per app, so tests can build as many isolated apps as they like.
// =================================================================

export interface AppDependencies {
    settings: Settings;
    analyzer: TextAnalyzer | null;
    rateLimiter?: RateLimiter;
    metrics?: MetricsCollector;
    prometheus?: PrometheusMetrics;
}

export interface App {
    app: Express;
    pipeline: MiddlewarePipeline;
    rateLimiter: RateLimiter;
    metrics: MetricsCollector;
    prometheus: PrometheusMetrics;
}

export function createApp(deps: AppDependencies): App {
    const { settings } = deps;

    const rateLimiter = deps.rateLimiter ?? new SlidingWindowRateLimiter(settings.rateLimit);
    const metrics = deps.metrics ?? new MetricsCollector();
    const prometheus = deps.prometheus ?? createPrometheusMetrics();

    const router = createApiRouter({
        analyzer: deps.analyzer,
        metrics,
        rateLimiter,
        prometheus,
        maxTextLength: settings.analyzer.maxTextLength,
    });

    const api = express.Router();
    api.use(settings.apiPrefix, router);

    const pipeline = new MiddlewarePipeline()
        .use(new SecurityHeadersMiddleware())
        .use(new CorsMiddleware(settings.allowedOrigins))
        .use(new RateLimitMiddleware(rateLimiter))
        .use(new PrometheusMiddleware(prometheus, settings.apiPrefix, settings.prometheusMonitoredPaths))
        .use(new MetricsMiddleware(metrics))
        .use(new RouterMiddleware(api));

    const app = express();
    app.disable('x-powered-by');
    app.use(requestLogger(`${settings.apiPrefix}/health`));
    app.use(pipeline.handler());

    return { app, pipeline, rateLimiter, metrics, prometheus };
}
