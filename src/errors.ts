// =================================================================
// ERROR TYPES
// =================================================================
//
//   HttpError            → expected, client-facing (400, 404, 503)
//   ConfigurationError   → bad settings at startup, never at runtime
//   DownstreamFaultError → the route chain failed; metrics records it
//                          as a 500 and re-raises it unchanged
//   RequestAbortedError  → client went away before the response ended
//
// Rate limit rejections are NOT errors. The limiter answers 429
// itself and nothing is thrown across its boundary.
// =================================================================

export class HttpError extends Error {
    constructor(
        public readonly status: number,
        public readonly detail: string,
    ) {
        super(detail);
        this.name = 'HttpError';
    }
}

export class AnalyzerUnavailableError extends HttpError {
    constructor() {
        super(503, 'Analyzer service not available');
        this.name = 'AnalyzerUnavailableError';
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class DownstreamFaultError extends Error {
    constructor(cause: unknown) {
        super(cause instanceof Error ? cause.message : String(cause), { cause });
        this.name = 'DownstreamFaultError';
    }
}

export class RequestAbortedError extends Error {
    constructor(path: string) {
        super(`Client closed the connection before ${path} completed`);
        this.name = 'RequestAbortedError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
