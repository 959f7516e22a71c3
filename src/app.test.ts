import http from 'http';
import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import { createApp } from './app';
import { parseSettings } from './config';
import { AnalyzerResult, TextAnalyzer } from './analyzer/types';
import { SECURITY_HEADERS } from './middleware/security-headers';

class FakeAnalyzer implements TextAnalyzer {
    calls: Array<{ text: string; language: string }> = [];

    constructor(private respond: (text: string) => AnalyzerResult[] = () => []) {}

    async analyze(text: string, language: string): Promise<AnalyzerResult[]> {
        this.calls.push({ text, language });
        return this.respond(text);
    }

    supportedLanguages(): string[] {
        return ['en'];
    }
}

const emailFinder = (text: string): AnalyzerResult[] => {
    const start = text.indexOf('jane.doe@example.com');
    return start < 0 ? [] : [{ entityType: 'EMAIL_ADDRESS', start, end: start + 20, score: 0.85 }];
};

function build(env: NodeJS.ProcessEnv = {}, analyzer: TextAnalyzer | null = new FakeAnalyzer(emailFinder)) {
    const settings = parseSettings({ REQUESTS_PER_MINUTE: '5', BURST_LIMIT: '5', BLOCK_DURATION: '60', ...env });
    return createApp({ settings, analyzer });
}

describe('rate limiting', () => {
    it('sets X-RateLimit headers on admitted responses', async () => {
        const { app } = build();

        const res = await request(app).get('/api/v1/');

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ status: 'ok' });
        expect(res.headers['x-ratelimit-limit']).toBe('5');
        expect(res.headers['x-ratelimit-remaining']).toBe('4');
        expect(res.headers['x-ratelimit-reset']).toBe('0');
    });

    it('answers 429 with detail and retry_after, and keeps rejections out of metrics', async () => {
        const { app, metrics } = build({ REQUESTS_PER_MINUTE: '2', BURST_LIMIT: '2', BLOCK_DURATION: '90' });

        expect((await request(app).get('/api/v1/')).status).toBe(200);
        expect((await request(app).get('/api/v1/')).status).toBe(200);

        const burst = await request(app).get('/api/v1/');
        expect(burst.status).toBe(429);
        expect(burst.body).toEqual({ detail: 'Too many requests - IP blocked', retry_after: 90 });
        expect(burst.headers['retry-after']).toBe('90');
        expect(burst.headers['x-ratelimit-limit']).toBeUndefined();

        const blocked = await request(app).get('/api/v1/');
        expect(blocked.status).toBe(429);
        expect(blocked.body.detail).toBe('IP address blocked due to rate limit violation');

        expect(metrics.getMetrics().requests_by_path).toEqual({ '/api/v1/': 2 });
        expect(metrics.getMetrics().total_requests).toBe(2);
    });

    it('stamps security headers on rejected responses too', async () => {
        const { app } = build({ REQUESTS_PER_MINUTE: '1', BURST_LIMIT: '1' });

        await request(app).get('/api/v1/');
        const res = await request(app).get('/api/v1/');

        expect(res.status).toBe(429);
        for (const [header, value] of Object.entries(SECURITY_HEADERS)) {
            expect(res.headers[header.toLowerCase()]).toBe(value);
        }
    });

    it('answers CORS preflight without counting it', async () => {
        const { app, rateLimiter } = build();

        const res = await request(app).options('/api/v1/analyze').set('Origin', 'https://app.example');

        expect(res.status).toBe(204);
        expect(res.headers['access-control-allow-origin']).toBe('*');
        expect(rateLimiter.stats()).toEqual({ trackedClients: 0, blockedClients: 0 });
    });
});

describe('POST /api/v1/analyze', () => {
    it('returns entities with the matched text', async () => {
        const analyzer = new FakeAnalyzer(emailFinder);
        const { app } = build({}, analyzer);

        const res = await request(app)
            .post('/api/v1/analyze')
            .send({ text: 'Contact jane.doe@example.com today' });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({
            entities: [{ entity_type: 'EMAIL_ADDRESS', start: 8, end: 28, score: 0.85, text: 'jane.doe@example.com' }],
            cached: false,
        });
        expect(analyzer.calls).toEqual([{ text: 'Contact jane.doe@example.com today', language: 'en' }]);
    });

    it('validates the request body', async () => {
        const { app, metrics } = build();

        const empty = await request(app).post('/api/v1/analyze').send({ text: '' });
        expect(empty.status).toBe(400);
        expect(empty.body.detail).toMatch(/^text: /);

        const badLanguage = await request(app).post('/api/v1/analyze').send({ text: 'hi', language: 'eng' });
        expect(badLanguage.status).toBe(400);
        expect(badLanguage.body.detail).toBe('language: Two-letter language code (ISO 639-1)');

        expect(metrics.getMetrics().error_counts).toEqual({ '400': 2 });
    });

    it('answers 400 for malformed JSON', async () => {
        const { app } = build();

        const res = await request(app)
            .post('/api/v1/analyze')
            .set('Content-Type', 'application/json')
            .send('{"text": ');

        expect(res.status).toBe(400);
    });

    it('answers 503 when no analyzer is available', async () => {
        const { app, metrics } = build({}, null);

        const res = await request(app).post('/api/v1/analyze').send({ text: 'hello' });

        expect(res.status).toBe(503);
        expect(res.body).toEqual({ detail: 'Analyzer service not available' });
        expect(metrics.getMetrics().error_counts).toEqual({ '503': 1 });
    });

    it('records an analyzer fault as a 500 and answers with a generic error', async () => {
        const failing: TextAnalyzer = {
            analyze: async () => {
                throw new Error('engine crashed');
            },
            supportedLanguages: () => ['en'],
        };
        const { app, metrics } = build({}, failing);

        const res = await request(app).post('/api/v1/analyze').send({ text: 'hello' });

        expect(res.status).toBe(500);
        expect(res.body).toEqual({ detail: 'Internal server error occurred' });

        const report = metrics.getMetrics();
        expect(report.requests_by_path).toEqual({ '/api/v1/analyze': 1 });
        expect(report.error_counts).toEqual({ '500': 1 });
        expect(report.error_rate).toBe(1);
    });
});

describe('POST /api/v1/analyze/batch', () => {
    it('analyzes each text and isolates per-text failures', async () => {
        const analyzer = new FakeAnalyzer((text) => {
            if (text === 'boom') throw new Error('bad text');
            return emailFinder(text);
        });
        const { app } = build({}, analyzer);

        const res = await request(app)
            .post('/api/v1/analyze/batch')
            .send({ texts: ['mail jane.doe@example.com', 'boom', 'nothing here'] });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({
            results: [
                {
                    entities: [{ entity_type: 'EMAIL_ADDRESS', start: 5, end: 25, score: 0.85, text: 'jane.doe@example.com' }],
                    cached: false,
                },
                { entities: [], cached: false },
                { entities: [], cached: false },
            ],
        });
    });
});

describe('monitoring endpoints', () => {
    it('reports metrics for earlier requests', async () => {
        const { app } = build();

        await request(app).get('/api/v1/');
        await request(app).get('/api/v1/nope');

        const res = await request(app).get('/api/v1/metrics');

        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({
            total_requests: 2,
            requests_by_path: { '/api/v1/': 1, '/api/v1/nope': 1 },
            requests_in_last_minute: 2,
            error_rate: 0.5,
            error_counts: { '404': 1 },
            suspicious_requests: {},
        });
        expect(res.body.average_response_time).toBeGreaterThanOrEqual(0.001);
    });

    it('answers unknown routes with 404', async () => {
        const { app } = build();

        const res = await request(app).get('/does-not-exist');

        expect(res.status).toBe(404);
        expect(res.body).toEqual({ detail: 'Not Found' });
    });

    it('counts suspicious requests per client', async () => {
        const { app, metrics } = build();

        await request(app).get('/api/v1/').query({ q: 'SELECT name FROM users' });
        await request(app).get('/api/v1/').query({ q: '<script>alert(1)</script>' });
        await request(app).get('/api/v1/').query({ q: 'fine' });

        expect(Object.values(metrics.getMetrics().suspicious_requests)).toEqual([2]);
    });

    it('has no endpoint that clears collected metrics', async () => {
        const { app, metrics } = build();

        await request(app).get('/api/v1/').query({ q: 'select * from users' });
        const res = await request(app).post('/api/v1/metrics/reset');

        expect(res.status).toBe(404);
        const report = metrics.getMetrics();
        expect(report.total_requests).toBe(2);
        expect(report.requests_by_path).toEqual({ '/api/v1/': 1, '/api/v1/metrics/reset': 1 });
        expect(Object.values(report.suspicious_requests)).toEqual([1]);
    });

    it('reports health with rate limiter counters', async () => {
        const { app } = build();

        const res = await request(app).get('/api/v1/health');

        expect(res.body).toEqual({
            status: 'healthy',
            rate_limiter: { algorithm: 'sliding-window', tracked_clients: 1, blocked_clients: 0 },
        });
    });

    it('exposes Prometheus series for monitored paths', async () => {
        const { app } = build();

        await request(app).post('/api/v1/analyze').send({ text: 'jane.doe@example.com' });
        await request(app).get('/api/v1/');

        const res = await request(app).get('/api/v1/metrics/prometheus');
        expect(res.status).toBe(200);
        expect(res.headers['content-type']).toMatch(/^text\/plain/);

        const lines = res.text.split('\n');
        const requestLines = lines.filter(l => l.startsWith('http_requests_total{'));
        expect(requestLines).toHaveLength(1);
        expect(requestLines[0]).toContain('endpoint="/api/v1/analyze"');
        expect(requestLines[0]).toContain('status_code="200"');
        expect(requestLines[0].endsWith(' 1')).toBe(true);

        const entityLines = lines.filter(l => l.startsWith('pii_entities_detected_total{'));
        expect(entityLines).toHaveLength(1);
        expect(entityLines[0]).toContain('entity_type="EMAIL_ADDRESS"');
        expect(entityLines[0].endsWith(' 1')).toBe(true);
    });
});

describe('client disconnects', () => {
    it('records a request cancelled mid-analysis as a 500', async () => {
        let markStarted: () => void = () => undefined;
        const analysisStarted = new Promise<void>(resolve => {
            markStarted = resolve;
        });
        const hanging: TextAnalyzer = {
            analyze: () => {
                markStarted();
                return new Promise<AnalyzerResult[]>(() => undefined);
            },
            supportedLanguages: () => ['en'],
        };
        const { app, metrics } = build({}, hanging);

        const server = app.listen(0);
        await new Promise<void>(resolve => server.once('listening', () => resolve()));

        try {
            const address = server.address();
            if (address === null || typeof address === 'string') throw new Error('server has no port');

            const req = http.request({
                host: '127.0.0.1',
                port: address.port,
                method: 'POST',
                path: '/api/v1/analyze',
                headers: { 'content-type': 'application/json' },
            });
            req.on('error', () => undefined); // socket hang up after destroy()
            req.end(JSON.stringify({ text: 'hello' }));

            await analysisStarted;
            req.destroy();

            await vi.waitFor(() => expect(metrics.getMetrics().total_requests).toBe(1));
            const report = metrics.getMetrics();
            expect(report.error_counts).toEqual({ '500': 1 });
            expect(report.requests_by_path).toEqual({ '/api/v1/analyze': 1 });
        } finally {
            server.closeAllConnections();
            await new Promise<void>(resolve => server.close(() => resolve()));
        }
    });
});
