// =================================================================
// Rate Limiter Interface
// =================================================================

export type RejectionReason = 'blocked' | 'burst' | 'rate';

export interface RateLimitAdmitted {
    allowed: true;
    limit: number;  // Max requests allowed per window
    remaining: number; // Requests remaining in current window
    reset: number; // Seconds since the oldest request still in the window
}

export interface RateLimitRejected {
    allowed: false;
    reason: RejectionReason;
    limit: number;
    remaining: 0;
    retryAfter: number; // Whole seconds until the client can retry
}

export type RateLimitResult = RateLimitAdmitted | RateLimitRejected;

export interface RateLimiterStats {
    trackedClients: number;
    blockedClients: number;
}

export interface RateLimiter {
    /** Check if a request from this key (IP, API key, etc.) is allowed */
    consume(key: string): Promise<RateLimitResult>;

    /** Counters for the health endpoint */
    stats(): RateLimiterStats;

    /** Algorithm name (for logs and health output) */
    name: string;
}
