import { PipelineMiddleware, PipelineContext, NextFunction } from './types';
import { RateLimiter, RejectionReason } from '../rate-limiters/types';

// =================================================================
// RATE LIMIT MIDDLEWARE
// =================================================================
// Checks the rate limiter. If exceeded, returns 429.
// Does NOT call next() on rejection — stops the pipeline, so the
// request is never seen by the metrics collector.
// =================================================================

const REJECTION_DETAIL: Record<RejectionReason, string> = {
    blocked: 'IP address blocked due to rate limit violation',
    burst: 'Too many requests - IP blocked',
    rate: 'Too many requests',
};

export class RateLimitMiddleware implements PipelineMiddleware {
    name = 'rate-limit';

    constructor(private limiter: RateLimiter) {}

    async handle(ctx: PipelineContext, next: NextFunction): Promise<void> {
        const { res, clientKey } = ctx;
        const result = await this.limiter.consume(clientKey);

        if (!result.allowed) {
            ctx.meta.rateLimited = result.reason;

            res.setHeader('Retry-After', result.retryAfter);
            res.status(429).json({
                detail: REJECTION_DETAIL[result.reason],
                retry_after: result.retryAfter,
            });
            return; // STOP — don't call next()
        }

        res.setHeader('X-RateLimit-Limit', result.limit);
        res.setHeader('X-RateLimit-Remaining', result.remaining);
        res.setHeader('X-RateLimit-Reset', result.reset);

        await next();
    }
}
