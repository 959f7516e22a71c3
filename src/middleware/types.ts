// =================================================================
// MIDDLEWARE TYPES
// =================================================================
//
// Every middleware receives a PipelineContext and a next() function.
//
// PipelineContext carries data between middleware:
//   - The Express req/res
//   - Client key (for rate limiting and suspicious-request counts)
//   - Decoded query string (for the suspicious-pattern check)
//   - What each stage decided, for logging
//
// next() passes control to the next middleware in the chain.
// If a middleware doesn't call next(), the chain stops.
// This is how rate limiting rejects requests — it never calls next().
// =================================================================

import { Request, Response } from 'express';
import type { RejectionReason } from '../rate-limiters/types';

/** Shared key for every request whose peer address is unknown. */
export const UNKNOWN_CLIENT = 'unknown_client';

export interface PipelineMeta {
    rateLimited?: RejectionReason;
}

export interface PipelineContext {
    req: Request;
    res: Response;
    startTime: number;

    clientKey: string;
    path: string;
    query: string;

    meta: PipelineMeta;
}

export type NextFunction = () => Promise<void>;

export interface PipelineMiddleware {
    name: string;
    handle(ctx: PipelineContext, next: NextFunction): Promise<void>;
}
