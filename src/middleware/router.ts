import type { Router } from 'express';
import { DownstreamFaultError, RequestAbortedError } from '../errors';
import { PipelineMiddleware, PipelineContext } from './types';

// =================================================================
// ROUTER MIDDLEWARE — Final step in the pipeline
// =================================================================
// Hands the request to the Express router and settles once the
// response is done:
//
//   response finished             → resolve
//   router called next(err)       → reject DownstreamFaultError
//   connection closed mid-request → reject RequestAbortedError
//   no route answered             → 404
// =================================================================

export class RouterMiddleware implements PipelineMiddleware {
    name = 'router';

    constructor(private router: Router) {}

    async handle(ctx: PipelineContext): Promise<void> {
        const { req, res, path } = ctx;

        return new Promise<void>((resolve, reject) => {
            const cleanup = () => {
                res.off('finish', onFinish);
                res.off('close', onClose);
            };

            const onFinish = () => {
                cleanup();
                resolve();
            };

            const onClose = () => {
                cleanup();
                if (res.writableFinished) {
                    resolve();
                } else {
                    reject(new RequestAbortedError(path));
                }
            };

            res.on('finish', onFinish);
            res.on('close', onClose);

            this.router(req, res, (err?: unknown) => {
                if (err && err !== 'route' && err !== 'router') {
                    cleanup();
                    reject(new DownstreamFaultError(err));
                    return;
                }

                if (!res.headersSent) {
                    res.status(404).json({ detail: 'Not Found' });
                }
            });
        });
    }
}
