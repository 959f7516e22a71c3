import { ConfigurationError } from '../errors';
import { componentLogger } from '../logger';
import { RateLimiter, RateLimiterStats, RateLimitResult } from './types';

// =================================================================
// SLIDING WINDOW RATE LIMITER WITH BURST BLOCKING
// =================================================================
//
// HOW IT WORKS:
//   Store the TIMESTAMP of every admitted request per client.
//   To check: count timestamps in the last 60 seconds.
//
//   count >= burstLimit          → BLOCK the client for blockDuration
//   count >= requestsPerMinute   → reject, retry when the oldest expires
//   otherwise                    → admit and record the timestamp
//
//   While blocked, the window is not consulted at all.
//
//   Timestamps: [10:00:01, 10:00:15, 10:00:30]   limit 3, burst 5
//   Now = 10:00:40 → 3 >= 3 → rejected, retry in 21s (10:01:01)
//   Now = 10:01:05 → 10:00:01 pruned → 2 < 3 → admitted
//
// NOTES:
//   - Lazy pruning on every evaluation; sweep() (optionally on a
//     timer) deletes windows that pruned down to nothing.
//   - A block clears the client's window, so once it expires the
//     client starts over with an empty window.
//   - evaluate() never awaits. Node runs it to completion before any
//     other request is looked at, so two concurrent requests from the
//     same client can never both see the same window and both slip in.
// =================================================================

const WINDOW_MS = 60_000;

export interface SlidingWindowOptions {
    requestsPerMinute?: number;
    burstLimit?: number;
    blockDurationSec?: number;
    sweepIntervalMs?: number; // 0 = no background sweep
}

export class SlidingWindowRateLimiter implements RateLimiter {
    name = 'sliding-window';
    private windows: Map<string, number[]> = new Map();
    private blocks: Map<string, number> = new Map(); // client → blocked until (ms)
    private sweepTimer?: NodeJS.Timeout;
    private log = componentLogger('rate-limiter');

    readonly requestsPerMinute: number;
    readonly burstLimit: number;
    readonly blockDurationSec: number;

    constructor(options: SlidingWindowOptions = {}) {
        const {
            requestsPerMinute = 60,
            burstLimit = 100,
            blockDurationSec = 300,
            sweepIntervalMs = 0,
        } = options;

        for (const [key, value] of Object.entries({ requestsPerMinute, burstLimit, blockDurationSec })) {
            if (!Number.isInteger(value) || value <= 0) {
                throw new ConfigurationError(`${key} must be a positive integer, got ${value}`);
            }
        }
        // Settings enforce burstLimit >= requestsPerMinute. Below that the
        // burst check fires first and every overflow becomes a block.
        if (burstLimit < requestsPerMinute) {
            this.log.warn({ burstLimit, requestsPerMinute }, 'burstLimit is below requestsPerMinute');
        }

        this.requestsPerMinute = requestsPerMinute;
        this.burstLimit = burstLimit;
        this.blockDurationSec = blockDurationSec;

        if (sweepIntervalMs > 0) {
            this.sweepTimer = setInterval(() => this.sweep(), sweepIntervalMs);
            this.sweepTimer.unref();
        }
    }

    async consume(key: string): Promise<RateLimitResult> {
        return this.evaluate(key, Date.now());
    }

    evaluate(key: string, now: number = Date.now()): RateLimitResult {
        // 1. Active block → reject without touching the window
        const blockedUntil = this.blocks.get(key);
        if (blockedUntil !== undefined) {
            if (blockedUntil > now) {
                return this.reject('blocked', Math.ceil((blockedUntil - now) / 1000));
            }
            this.blocks.delete(key);
        }

        // 2. Remove timestamps outside the window
        const timestamps = (this.windows.get(key) || []).filter(t => now - t < WINDOW_MS);

        // 3. Burst ceiling → block. The triggering request is not recorded.
        if (timestamps.length >= this.burstLimit) {
            this.blocks.set(key, now + this.blockDurationSec * 1000);
            this.windows.delete(key);
            this.log.warn(
                { client: key, requests: timestamps.length, blockDurationSec: this.blockDurationSec },
                'client blocked for burst limit violation'
            );
            return this.reject('burst', this.blockDurationSec);
        }

        // 4. Steady-state limit → reject until the oldest request expires
        if (timestamps.length >= this.requestsPerMinute) {
            this.windows.set(key, timestamps);
            const oldest = timestamps[0];
            return this.reject('rate', Math.ceil((oldest + WINDOW_MS - now) / 1000));
        }

        // 5. Admit
        timestamps.push(now);
        this.windows.set(key, timestamps);

        return {
            allowed: true,
            limit: this.requestsPerMinute,
            remaining: this.requestsPerMinute - timestamps.length,
            reset: Math.floor((now - timestamps[0]) / 1000),
        };
    }

    /** Drop expired blocks and windows with no request left in them. */
    sweep(now: number = Date.now()): number {
        let removed = 0;

        for (const [key, timestamps] of this.windows) {
            const live = timestamps.filter(t => now - t < WINDOW_MS);
            if (live.length === 0) {
                this.windows.delete(key);
                removed++;
            } else if (live.length !== timestamps.length) {
                this.windows.set(key, live);
            }
        }

        for (const [key, blockedUntil] of this.blocks) {
            if (blockedUntil <= now) {
                this.blocks.delete(key);
                removed++;
            }
        }

        if (removed > 0) {
            this.log.debug({ removed }, 'swept idle rate limit entries');
        }
        return removed;
    }

    stats(): RateLimiterStats {
        return {
            trackedClients: this.windows.size,
            blockedClients: this.blocks.size,
        };
    }

    stop(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = undefined;
        }
    }

    private reject(reason: 'blocked' | 'burst' | 'rate', retryAfter: number): RateLimitResult {
        return {
            allowed: false,
            reason,
            limit: this.requestsPerMinute,
            remaining: 0,
            retryAfter: Math.max(retryAfter, 1),
        };
    }
}
