import type { LevelWithSilent } from 'pino';
import { ConfigGuard, type GuardRule } from '../config-guard.js';
import { LOG_LEVELS, LogLevelSchema, resolveLogLevel, type Env } from '../../logging/logLevel.js';

export { resolveLogLevel };

export interface PreproConfig {
    readonly logLevel: LevelWithSilent;
    readonly locale: string;
    readonly timeZone: string;
}

function isSupportedTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone });
        return true;
    } catch {
        return false;
    }
}

function isSupportedLocale(locale: string): boolean {
    try {
        return Intl.DateTimeFormat.supportedLocalesOf([locale]).length > 0;
    } catch {
        return false;
    }
}

/**
 * Configuration guards for the PREPRO_* environment.
 * Unset variables fall back to defaults; set ones must be well-formed.
 */
export const PREPRO_CONFIG_GUARDS: GuardRule[] = [
    {
        type: 'assert',
        check: (env) => env.PREPRO_LOG_LEVEL === undefined || LogLevelSchema.safeParse(env.PREPRO_LOG_LEVEL).success,
        message: `PREPRO_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`
    },
    {
        type: 'assert',
        check: (env) => env.PREPRO_TIME_ZONE === undefined || isSupportedTimeZone(env.PREPRO_TIME_ZONE),
        message: 'PREPRO_TIME_ZONE must be an IANA time zone'
    },
    {
        type: 'assert',
        check: (env) => env.PREPRO_LOCALE === undefined || isSupportedLocale(env.PREPRO_LOCALE),
        message: 'PREPRO_LOCALE must be a supported BCP 47 locale'
    },
    {
        type: 'forbidIf',
        name: 'PREPRO_LOG_LEVEL',
        when: (env) => env.NODE_ENV === 'production' && (env.PREPRO_LOG_LEVEL === 'debug' || env.PREPRO_LOG_LEVEL === 'trace'),
        message: 'Processor hooks log attribute payloads at debug level; production must log at info or above'
    }
];

export function loadPreproConfig(env: Env = process.env): PreproConfig {
    ConfigGuard.enforce(PREPRO_CONFIG_GUARDS, env);

    return Object.freeze({
        logLevel: resolveLogLevel(env),
        locale: env.PREPRO_LOCALE ?? 'en-US',
        timeZone: env.PREPRO_TIME_ZONE ?? 'UTC'
    });
}

let processConfig: PreproConfig | undefined;

/**
 * Configuration of the running process, guarded once and then reused.
 */
export function getPreproConfig(): PreproConfig {
    processConfig ??= loadPreproConfig(process.env);
    return processConfig;
}
