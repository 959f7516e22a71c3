import { createApp } from './app';
import { getSettings } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import { PatternAnalyzer } from './analyzer/pattern-analyzer';
import { SlidingWindowRateLimiter } from './rate-limiters/sliding-window';

// =================================================================
// Start the service: load recognizers, build the app, listen.
// =================================================================

async function main(): Promise<void> {
    const settings = getSettings();

    const analyzer = await PatternAnalyzer.fromFile(settings.analyzer.recognizersConfig, {
        minScore: settings.analyzer.minConfidenceScore,
    });
    const rateLimiter = new SlidingWindowRateLimiter(settings.rateLimit);

    const { app } = createApp({ settings, analyzer, rateLimiter });

    const server = app.listen(settings.server.port, settings.server.host, () => {
        logger.info(
            {
                host: settings.server.host,
                port: settings.server.port,
                api: settings.apiPrefix,
                rateLimit: settings.rateLimit,
            },
            'PII analyzer gateway listening'
        );
    });

    server.on('error', (err) => {
        logger.fatal({ err }, `server error: ${err.message}`);
        process.exit(1);
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, 'shutting down');
        rateLimiter.stop();
        server.close((err) => {
            if (err) {
                logger.error({ err }, 'error while closing server');
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    logger.fatal({ err }, `startup failed: ${errorMessage(err)}`);
    process.exit(1);
});
