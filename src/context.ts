import type { AppConfig } from './config.js';
import { createLogger, type Logger } from './utils/logger.js';

/** Everything a pipeline run needs that is not the invoice itself. */
export interface PipelineContext {
    config: AppConfig;
    logger: Logger;
    clock: () => Date;
}

export function createContext(config: AppConfig, logger?: Logger, clock: () => Date = () => new Date()): PipelineContext {
    return {
        config,
        logger: logger ?? createLogger(config.logLevel),
        clock,
    };
}
