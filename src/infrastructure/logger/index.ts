import log from 'loglevel';

const LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

function isLogLevel(value: string): value is (typeof LEVELS)[number] {
    return (LEVELS as readonly string[]).includes(value);
}

// Default log level comes from the environment
const envLevel = (process.env['LEXINDEX_LOG_LEVEL'] || 'info').toLowerCase();
log.setLevel(isLogLevel(envLevel) ? envLevel : 'info');

export const logger = {
    debug: (message: string, ...args: unknown[]) => log.debug(`[DEBUG] ${message}`, ...args),
    info: (message: string, ...args: unknown[]) => log.info(`[INFO] ${message}`, ...args),
    warn: (message: string, ...args: unknown[]) => log.warn(`[WARN] ${message}`, ...args),
    error: (message: string, ...args: unknown[]) => log.error(`[ERROR] ${message}`, ...args),
    setLevel: (level: log.LogLevelDesc) => log.setLevel(level)
};

export default logger;
