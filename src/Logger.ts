/**
 * Logger: Process-wide pino Instance
 *
 * Writes to stderr: stdout carries the JSON-RPC stream when running over
 * the stdio transport.
 *
 * LOG_LEVEL   → pino level (default `info`)
 * LOG_PRETTY=1 → human-readable output via pino-pretty
 */
import pino from 'pino';

const STDERR = 2;

export function createLogger(env: NodeJS.ProcessEnv = process.env): pino.Logger {
    const level = env.LOG_LEVEL || 'info';

    if (env.LOG_PRETTY === '1') {
        return pino(
            { level, name: 'pushover-mcp' },
            pino.transport({
                target: 'pino-pretty',
                options: { colorize: true, destination: STDERR },
            }),
        );
    }

    return pino({ level, name: 'pushover-mcp' }, pino.destination(STDERR));
}

export const logger = createLogger();
