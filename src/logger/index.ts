import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    return pino({
        name: 'roomlog',
        level: config.logLevel,
        transport: config.logLevel === 'debug' || config.logLevel === 'trace'
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined,
    })
}
