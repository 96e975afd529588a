import { pino } from 'pino';
import type { DestinationStream, LevelWithSilent, Logger, LoggerOptions } from 'pino';
import { REDACT_KEYS, REDACT_CENSOR } from './redactionConfig.js';
import { resolveLogLevel } from './logLevel.js';

/**
 * Builds a logger with the package's base bindings and redaction paths.
 * Tests pass a destination to capture lines.
 */
export function createLogger(level: LevelWithSilent, destination?: DestinationStream): Logger {
    const options: LoggerOptions = {
        level,
        base: {
            system: 'prepro'
        },
        redact: {
            paths: REDACT_KEYS,
            censor: REDACT_CENSOR
        }
    };
    return destination ? pino(options, destination) : pino(options);
}

export const logger: Logger = createLogger(resolveLogLevel(process.env));

/**
 * Returns a child logger bound to a mediator component and the record type it serves.
 */
export function getComponentLogger(component: string, recordType?: string, parent: Logger = logger): Logger {
    return parent.child(recordType === undefined ? { component } : { component, recordType });
}
