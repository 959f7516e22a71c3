import { performance } from 'perf_hooks';
import { isSuspiciousRequest } from './suspicious-patterns';

// =================================================================
// METRICS COLLECTOR
// =================================================================
//
// Observes every request that got past the rate limiter:
//
//   start timer → flag suspicious → run downstream → record outcome
//
// One update group per request, applied in a single synchronous step:
//   requestsByPath[path]++, responseTimes.push(duration),
//   errorCounts[status]++ (status >= 400 only)
//
// A thrown downstream fault is recorded as a 500 and re-thrown
// unchanged. Nothing here ever awaits while holding state, so no
// snapshot can observe half an update.
// =================================================================

export const MAX_RESPONSE_SAMPLES = 1000;

/** Average reported when no latency has been sampled yet. */
export const RESPONSE_TIME_FLOOR = 0.001;

export interface ObservedRequest {
    clientId: string;
    path: string;
    query: string; // serialized query string
}

export interface DownstreamOutcome {
    statusCode: number;
}

export interface MetricsSnapshot {
    total_requests: number;
    requests_by_path: Readonly<Record<string, number>>;
    response_times: readonly number[];
    error_counts: Readonly<Record<string, number>>;
    suspicious_requests: Readonly<Record<string, number>>;
    average_response_time: number;
    error_rate: number;
}

/** JSON body of the metrics endpoint. */
export interface MetricsReport {
    total_requests: number;
    requests_by_path: Record<string, number>;
    average_response_time: number;
    requests_in_last_minute: number;
    error_rate: number;
    error_counts: Record<string, number>;
    suspicious_requests: Record<string, number>;
}

const round3 = (n: number): number => Math.round(n * 1000) / 1000;

const increment = <K>(map: Map<K, number>, key: K): void => {
    map.set(key, (map.get(key) || 0) + 1);
};

export class MetricsCollector {
    private readonly requestsByPath: Map<string, number> = new Map();
    private readonly responseTimes: number[] = [];
    private readonly errorCounts: Map<number, number> = new Map();
    private readonly suspiciousRequests: Map<string, number> = new Map();

    /** @param clock milliseconds, monotonic */
    constructor(private clock: () => number = () => performance.now()) {}

    async observe<T extends DownstreamOutcome>(
        request: ObservedRequest,
        downstream: () => Promise<T>,
    ): Promise<T> {
        const start = this.clock();

        if (isSuspiciousRequest(request.path, request.query)) {
            this.recordSuspicious(request.clientId);
        }

        let outcome: T;
        try {
            outcome = await downstream();
        } catch (err) {
            this.recordOutcome(request.path, this.elapsedSec(start), 500);
            throw err;
        }

        this.recordOutcome(request.path, this.elapsedSec(start), outcome.statusCode);
        return outcome;
    }

    recordSuspicious(clientId: string): void {
        increment(this.suspiciousRequests, clientId);
    }

    recordOutcome(path: string, durationSec: number, statusCode: number): void {
        increment(this.requestsByPath, path);

        this.responseTimes.push(durationSec);
        if (this.responseTimes.length > MAX_RESPONSE_SAMPLES) {
            this.responseTimes.splice(0, this.responseTimes.length - MAX_RESPONSE_SAMPLES);
        }

        if (statusCode >= 400) {
            increment(this.errorCounts, statusCode);
        }
    }

    /** Deep, frozen copy of the current state. */
    getSnapshot(): Readonly<MetricsSnapshot> {
        // Total is derived from the per-path counts, never kept separately
        const totalRequests = sumValues(this.requestsByPath);
        const totalErrors = sumValues(this.errorCounts);
        const responseTimes = Object.freeze([...this.responseTimes]);

        const average = responseTimes.length > 0
            ? Math.max(responseTimes.reduce((a, b) => a + b, 0) / responseTimes.length, RESPONSE_TIME_FLOOR)
            : RESPONSE_TIME_FLOOR;

        return Object.freeze({
            total_requests: totalRequests,
            requests_by_path: toFrozenRecord(this.requestsByPath),
            response_times: responseTimes,
            error_counts: toFrozenRecord(this.errorCounts),
            suspicious_requests: toFrozenRecord(this.suspiciousRequests),
            average_response_time: average,
            error_rate: totalRequests > 0 ? totalErrors / totalRequests : 0,
        });
    }

    getMetrics(): MetricsReport {
        const snapshot = this.getSnapshot();
        return {
            total_requests: snapshot.total_requests,
            requests_by_path: { ...snapshot.requests_by_path },
            average_response_time: round3(snapshot.average_response_time),
            requests_in_last_minute: snapshot.response_times.length,
            error_rate: round3(snapshot.error_rate),
            error_counts: { ...snapshot.error_counts },
            suspicious_requests: { ...snapshot.suspicious_requests },
        };
    }

    private elapsedSec(start: number): number {
        return (this.clock() - start) / 1000;
    }
}

function sumValues<K>(map: Map<K, number>): number {
    let total = 0;
    for (const v of map.values()) total += v;
    return total;
}

function toFrozenRecord<K extends string | number>(map: Map<K, number>): Readonly<Record<string, number>> {
    const record: Record<string, number> = {};
    for (const [key, value] of map) record[String(key)] = value;
    return Object.freeze(record);
}
