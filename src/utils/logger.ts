import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red.bold,
};

export type LogSink = (line: string) => void;

/**
 * Console logger. Lines below `level` are dropped; `sink` defaults to stdout
 * so the CLI's diagnostics land on standard output.
 */
export function createLogger(level: LogLevel = 'info', sink: LogSink = line => console.log(line)): Logger {
    const write = (lineLevel: LogLevel, message: string) => {
        if (LEVEL_ORDER[lineLevel] < LEVEL_ORDER[level]) return;
        const tag = LEVEL_STYLE[lineLevel](`[${lineLevel.toUpperCase()}]`);
        sink(`${chalk.gray(new Date().toISOString())} ${tag} ${message}`);
    };

    return {
        debug: message => write('debug', message),
        info: message => write('info', message),
        warn: message => write('warn', message),
        error: message => write('error', message),
    };
}

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
