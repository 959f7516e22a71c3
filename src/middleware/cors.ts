import { PipelineMiddleware, PipelineContext, NextFunction } from './types';

// =================================================================
// CORS MIDDLEWARE
// =================================================================
// Adds CORS headers to ALL responses (even 429).
// Handles preflight OPTIONS requests.
// =================================================================

export class CorsMiddleware implements PipelineMiddleware {
    name = 'cors';

    constructor(
        private allowedOrigins: string[] = ['*'],
        private allowedMethods: string[] = ['GET', 'POST', 'OPTIONS'],
    ) {}

    async handle(ctx: PipelineContext, next: NextFunction): Promise<void> {
        const { req, res } = ctx;
        const origin = req.headers.origin;

        const allowedOrigin = this.allowedOrigins.includes('*')
            ? '*'
            : origin && this.allowedOrigins.includes(origin) ? origin : '';

        if (allowedOrigin) {
            res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
            res.setHeader('Access-Control-Allow-Methods', this.allowedMethods.join(', '));
            res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Request-Id');
            res.setHeader('Access-Control-Expose-Headers', 'X-RateLimit-Limit, X-RateLimit-Remaining, X-RateLimit-Reset, Retry-After');
            res.setHeader('Access-Control-Max-Age', '86400');
            if (allowedOrigin !== '*') res.setHeader('Vary', 'Origin');
        }

        // Preflight is answered here, before the rate limiter counts it
        if (req.method === 'OPTIONS') {
            res.status(204).end();
            return;
        }

        await next();
    }
}
