import path from 'path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';

// =================================================================
// SETTINGS
// =================================================================
// Read once from the environment (and .env, if present), validated
// with zod, frozen. Values may carry an inline "# comment", which
// is stripped before parsing:
//
//   BLOCK_DURATION=300 # seconds
// =================================================================

const stripComment = (value: unknown): unknown =>
    typeof value === 'string' ? value.split('#')[0].trim() : value;

const int = (fallback: number) =>
    z.preprocess(stripComment, z.coerce.number().int().positive().default(fallback));

const str = (fallback: string) =>
    z.preprocess(stripComment, z.string().default(fallback));

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z
    .object({
        API_VERSION: str('v1'),
        SERVER_HOST: str('0.0.0.0'),
        SERVER_PORT: int(8000),
        LOG_LEVEL: z.preprocess(
            (v) => (typeof v === 'string' ? String(stripComment(v)).toLowerCase() : v),
            z.enum(LOG_LEVELS).default('info'),
        ),

        REQUESTS_PER_MINUTE: int(60),
        BURST_LIMIT: int(100),
        BLOCK_DURATION: int(300),
        RATE_LIMIT_SWEEP_INTERVAL_MS: z.preprocess(
            stripComment,
            z.coerce.number().int().nonnegative().default(0),
        ),

        MAX_TEXT_LENGTH: int(102400),
        MIN_CONFIDENCE_SCORE: z.preprocess(
            stripComment,
            z.coerce.number().min(0).max(1).default(0.5),
        ),
        RECOGNIZERS_CONFIG: str(path.resolve(__dirname, '..', 'config', 'recognizers.json')),

        ALLOWED_ORIGINS: str(''),
        PROMETHEUS_MONITORED_PATHS: str('analyze,analyze/batch'),
    })
    .refine((env) => env.BURST_LIMIT >= env.REQUESTS_PER_MINUTE, {
        message: 'BURST_LIMIT must be greater than or equal to REQUESTS_PER_MINUTE',
        path: ['BURST_LIMIT'],
    });

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Settings {
    apiVersion: string;
    apiPrefix: string;
    server: { host: string; port: number };
    logLevel: LogLevel;
    rateLimit: {
        requestsPerMinute: number;
        burstLimit: number;
        blockDurationSec: number;
        sweepIntervalMs: number;
    };
    analyzer: {
        maxTextLength: number;
        minConfidenceScore: number;
        recognizersConfig: string;
    };
    allowedOrigins: string[];
    prometheusMonitoredPaths: string[];
}

const splitList = (value: string): string[] =>
    value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);

export function parseSettings(env: NodeJS.ProcessEnv): Settings {
    const result = envSchema.safeParse(env);

    if (!result.success) {
        const issues = result.error.issues
            .map((i) => `${i.path.join('.') || 'env'}: ${i.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }

    const e = result.data;
    const origins = splitList(e.ALLOWED_ORIGINS);

    return Object.freeze({
        apiVersion: e.API_VERSION,
        apiPrefix: `/api/${e.API_VERSION}`,
        server: { host: e.SERVER_HOST, port: e.SERVER_PORT },
        logLevel: e.LOG_LEVEL,
        rateLimit: {
            requestsPerMinute: e.REQUESTS_PER_MINUTE,
            burstLimit: e.BURST_LIMIT,
            blockDurationSec: e.BLOCK_DURATION,
            sweepIntervalMs: e.RATE_LIMIT_SWEEP_INTERVAL_MS,
        },
        analyzer: {
            maxTextLength: e.MAX_TEXT_LENGTH,
            minConfidenceScore: e.MIN_CONFIDENCE_SCORE,
            recognizersConfig: e.RECOGNIZERS_CONFIG,
        },
        allowedOrigins: origins.length > 0 ? origins : ['*'],
        prometheusMonitoredPaths: splitList(e.PROMETHEUS_MONITORED_PATHS),
    });
}

let cached: Settings | undefined;

export function getSettings(): Settings {
    if (!cached) {
        loadEnv();
        cached = parseSettings(process.env);
    }
    return cached;
}
