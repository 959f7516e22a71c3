import express, { ErrorRequestHandler, Router } from 'express';
import { z, ZodError } from 'zod';
import { AnalyzerUnavailableError, errorMessage, HttpError } from '../errors';
import { componentLogger } from '../logger';
import { AnalyzerResult, TextAnalyzer } from '../analyzer/types';
import { MetricsCollector } from '../metrics/metrics-collector';
import { PrometheusMetrics } from '../metrics/prometheus';
import { RateLimiter } from '../rate-limiters/types';

// =================================================================
// API ROUTES  (mounted under /api/<version>)
// =================================================================
//
//   GET  /                    → status
//   POST /analyze             → PII entities in one text
//   POST /analyze/batch       → PII entities in many texts
//   GET  /health              → liveness + rate limiter counters
//   GET  /metrics             → MetricsCollector report (JSON)
//   GET  /metrics/prometheus  → Prometheus exposition
//
// Validation errors and HttpErrors are answered here. Anything else
// leaves the router as a fault for the pipeline to record and answer.
// =================================================================

export interface ApiDependencies {
    analyzer: TextAnalyzer | null;
    metrics: MetricsCollector;
    rateLimiter: RateLimiter;
    prometheus: PrometheusMetrics;
    maxTextLength: number;
}

export interface EntityResponse {
    entity_type: string;
    start: number;
    end: number;
    score: number;
    text: string;
}

export interface AnalyzeResponse {
    entities: EntityResponse[];
    cached: boolean;
}

const language = z.string().regex(/^[a-z]{2}$/, 'Two-letter language code (ISO 639-1)').default('en');

export function createApiRouter(deps: ApiDependencies): Router {
    const { metrics, rateLimiter, prometheus } = deps;
    const log = componentLogger('api');
    const router = express.Router();

    const analyzeRequest = z.object({
        text: z.string().min(1).max(deps.maxTextLength),
        language,
    });

    const batchRequest = z.object({
        texts: z.array(z.string().max(deps.maxTextLength)),
        language,
    });

    const requireAnalyzer = (): TextAnalyzer => {
        if (!deps.analyzer) {
            log.error('analyzer service not available');
            throw new AnalyzerUnavailableError();
        }
        return deps.analyzer;
    };

    const toEntities = (text: string, lang: string, results: AnalyzerResult[]): EntityResponse[] =>
        results.map(r => {
            prometheus.entitiesDetected.inc({ entity_type: r.entityType, language: lang });
            return {
                entity_type: r.entityType,
                start: r.start,
                end: r.end,
                score: r.score,
                text: text.slice(r.start, r.end),
            };
        });

    router.use(express.json({ limit: '1mb' }));

    router.get('/', (_req, res) => {
        res.json({ status: 'ok' });
    });

    router.post('/analyze', async (req, res) => {
        const body = analyzeRequest.parse(req.body);
        const analyzer = requireAnalyzer();

        log.info({ language: body.language }, 'analyzing text');
        const results = await analyzer.analyze(body.text, body.language);
        const entities = toEntities(body.text, body.language, results);
        log.info({ entities: entities.length }, 'analysis complete');

        const response: AnalyzeResponse = { entities, cached: false };
        res.json(response);
    });

    router.post('/analyze/batch', async (req, res) => {
        const body = batchRequest.parse(req.body);
        const analyzer = requireAnalyzer();

        const results: AnalyzeResponse[] = [];
        for (const text of body.texts) {
            try {
                const found = await analyzer.analyze(text, body.language);
                results.push({ entities: toEntities(text, body.language, found), cached: false });
            } catch (err) {
                log.error({ err }, `error analyzing text in batch: ${errorMessage(err)}`);
                results.push({ entities: [], cached: false });
            }
        }

        log.info({ texts: results.length }, 'batch analysis complete');
        res.json({ results });
    });

    router.get('/health', (_req, res) => {
        const stats = rateLimiter.stats();
        res.json({
            status: 'healthy',
            rate_limiter: {
                algorithm: rateLimiter.name,
                tracked_clients: stats.trackedClients,
                blocked_clients: stats.blockedClients,
            },
        });
    });

    router.get('/metrics', (_req, res) => {
        const report = metrics.getMetrics();
        log.debug({ total: report.total_requests }, 'metrics requested');
        res.json(report);
    });

    router.get('/metrics/prometheus', async (_req, res) => {
        res.type(prometheus.registry.contentType);
        res.send(await prometheus.registry.metrics());
    });

    router.use(apiErrorHandler);

    return router;
}

const apiErrorHandler: ErrorRequestHandler = (err, _req, res, next) => {
    if (err instanceof ZodError) {
        res.status(400).json({
            detail: err.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
        });
        return;
    }

    if (err instanceof HttpError) {
        res.status(err.status).json({ detail: err.detail });
        return;
    }

    // body-parser: malformed JSON, payload too large
    if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
        res.status(err.status).json({ detail: err.message });
        return;
    }

    next(err);
};
