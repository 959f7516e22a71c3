import { PipelineMiddleware, PipelineContext, NextFunction } from './types';

// Stamped on every response, including 429s and error bodies.
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'X-XSS-Protection': '1; mode=block',
    'Strict-Transport-Security': 'max-age=31536000; includeSubDomains',
    'Content-Security-Policy': "default-src 'self'; frame-ancestors 'none'",
    'Referrer-Policy': 'strict-origin-when-cross-origin',
    'Permissions-Policy': 'geolocation=(), microphone=(), camera=()',
};

export class SecurityHeadersMiddleware implements PipelineMiddleware {
    name = 'security-headers';

    async handle(ctx: PipelineContext, next: NextFunction): Promise<void> {
        for (const [header, value] of Object.entries(SECURITY_HEADERS)) {
            ctx.res.setHeader(header, value);
        }
        await next();
    }
}
