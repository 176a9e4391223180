/**
 * Pino logger factory.
 *
 * Emits JSON to stderr so answers written to stdout stay pipeable. Reads
 * LOG_LEVEL and NODE_ENV directly so it is safe to call at module scope;
 * an explicit level wins over LOG_LEVEL.
 * Logging is silenced under Vitest.
 */

import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export function makeLogger(bindings: Record<string, unknown> = {}, levelOverride?: string): Logger {
    const isVitest = process.env.VITEST === 'true';
    const nodeEnv = process.env.NODE_ENV ?? 'development';
    const level = levelOverride || process.env.LOG_LEVEL?.trim().toLowerCase() || 'warn';

    return pino(
        {
            level,
            enabled: !(isVitest || nodeEnv === 'test'),
            base: { ...bindings, app: 'course-assistant' },
            messageKey: 'msg',
            timestamp: pino.stdTimeFunctions.isoTime,
            redact: { paths: ['apiKey', '*.apiKey', 'headers.Authorization'], censor: '[REDACTED]' },
        },
        pino.destination({ dest: 2, sync: true })
    );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
    return pino({ enabled: false });
}
