import { randomUUID } from 'crypto';
import pinoHttp from 'pino-http';
import { logger } from '../logger';

// =================================================================
// REQUEST LOGGER
// =================================================================
// Mounted before the pipeline, so every request is logged once the
// response ends, rejected ones (429) included.
//
//   2xx/3xx → info, 4xx → warn, 5xx or error → error
//
// Reuses x-request-id when the caller sent one and echoes it back.
// =================================================================

export function requestLogger(healthPath: string) {
    return pinoHttp({
        logger: logger.child({ component: 'http' }),

        genReqId: (req, res) => {
            const header = req.headers['x-request-id'];
            const id = (Array.isArray(header) ? header[0] : header) || randomUUID();
            res.setHeader('x-request-id', id);
            return id;
        },

        customLogLevel(_req, res, err) {
            if (err || res.statusCode >= 500) return 'error';
            if (res.statusCode >= 400) return 'warn';
            return 'info';
        },

        autoLogging: {
            ignore: (req) => req.url === healthPath,
        },

        serializers: {
            req: (req: { method: string; url: string; id: unknown }) => ({
                id: req.id,
                method: req.method,
                url: req.url,
            }),
        },
    });
}
