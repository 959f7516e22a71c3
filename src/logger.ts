import pino, { type Logger } from 'pino';
import { getSettings } from './config';

export const logger: Logger = pino({
    name: 'pii-analyzer-gateway',
    level: getSettings().logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
});

/** Child logger tagged with the component that writes through it. */
export function componentLogger(component: string): Logger {
    return logger.child({ component });
}
