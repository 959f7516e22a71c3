import type { Request, RequestHandler, Response } from 'express';
import { errorMessage } from '../errors';
import { componentLogger } from '../logger';
import { serializeQuery } from '../metrics/suspicious-patterns';
import { PipelineContext, PipelineMiddleware, UNKNOWN_CLIENT } from './types';

// =================================================================
// MIDDLEWARE PIPELINE
// =================================================================
//
// Chains middleware together in order.
// Each middleware calls next() to continue, or doesn't to stop.
//
//   pipeline.use(securityHeaders); // 1st
//   pipeline.use(cors);            // 2nd
//   pipeline.use(rateLimit);       // 3rd — might stop here (429)
//   pipeline.use(prometheus);      // 4th
//   pipeline.use(metrics);         // 5th — times everything below it
//   pipeline.use(router);          // 6th — final destination
//
// The order MATTERS:
//   Headers first (rejected responses still need them)
//   Rate limit before metrics (rejections never reach MetricsState)
//   Router is always last (the actual work)
//
// A fault that escapes the chain is logged and answered with a 500.
// =================================================================

export class MiddlewarePipeline {
    private middleware: PipelineMiddleware[] = [];
    private log = componentLogger('pipeline');

    use(mw: PipelineMiddleware): MiddlewarePipeline {
        this.middleware.push(mw);
        return this; // Chainable: pipeline.use(a).use(b).use(c)
    }

    /**
     * Execute the pipeline for a request.
     * Each middleware gets a next() that calls the NEXT middleware.
     */
    async execute(req: Request, res: Response): Promise<void> {
        const ctx = createContext(req, res);

        let index = 0;

        const next = async (): Promise<void> => {
            if (index >= this.middleware.length) return;

            const mw = this.middleware[index];
            index++;

            await mw.handle(ctx, next);
        };

        try {
            await next();

            if (ctx.meta.rateLimited) {
                this.log.info(
                    { client: ctx.clientKey, path: ctx.path, reason: ctx.meta.rateLimited },
                    'request rejected by rate limiter'
                );
            }
        } catch (err) {
            this.log.error({ err, path: ctx.path, client: ctx.clientKey }, `request failed: ${errorMessage(err)}`);

            if (!res.headersSent) {
                res.status(500).json({ detail: 'Internal server error occurred' });
            }
        }
    }

    /** Mount the whole chain as one Express handler. */
    handler(): RequestHandler {
        return (req, res, next) => {
            this.execute(req, res).catch(next);
        };
    }

    getMiddlewareNames(): string[] {
        return this.middleware.map(m => m.name);
    }
}

function createContext(req: Request, res: Response): PipelineContext {
    const queryStart = req.originalUrl.indexOf('?');

    return {
        req,
        res,
        startTime: Date.now(),
        clientKey: req.socket.remoteAddress || UNKNOWN_CLIENT,
        path: req.path,
        query: queryStart >= 0 ? serializeQuery(req.originalUrl.slice(queryStart + 1)) : '',
        meta: {},
    };
}
