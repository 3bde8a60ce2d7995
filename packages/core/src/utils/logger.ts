import 'reflect-metadata'
import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { Logger, type LoggerService, type LogLevel } from '@nestjs/common'
import { getErrorMessage } from './errors'

export { Logger }

export const DEFAULT_LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug']

function formatParam(value: unknown): string {
    if (typeof value === 'string') return value
    if (value instanceof Error) return value.stack ?? value.message
    try {
        return JSON.stringify(value) ?? String(value)
    } catch {
        return String(value)
    }
}

/**
 * Appends one line per message to a file. Nest passes the logger context as
 * the last optional parameter.
 */
export class FileLogger implements LoggerService {
    private readonly levels: Set<LogLevel>

    constructor(
        readonly filePath: string,
        levels: LogLevel[] = DEFAULT_LOG_LEVELS,
    ) {
        this.levels = new Set(levels)
        mkdirSync(dirname(filePath), { recursive: true })
    }

    log(message: unknown, ...optionalParams: unknown[]): void {
        this.append('log', message, optionalParams)
    }

    error(message: unknown, ...optionalParams: unknown[]): void {
        this.append('error', message, optionalParams)
    }

    warn(message: unknown, ...optionalParams: unknown[]): void {
        this.append('warn', message, optionalParams)
    }

    debug(message: unknown, ...optionalParams: unknown[]): void {
        this.append('debug', message, optionalParams)
    }

    verbose(message: unknown, ...optionalParams: unknown[]): void {
        this.append('verbose', message, optionalParams)
    }

    private append(level: LogLevel, message: unknown, optionalParams: unknown[]): void {
        if (!this.levels.has(level)) return

        const params = [...optionalParams]
        const last = params[params.length - 1]
        const context = typeof last === 'string' ? last : undefined
        if (context !== undefined) params.pop()

        const extra = params
            .filter((param) => param !== undefined)
            .map(formatParam)
            .join(' ')
        const scope = context ? ` [${context}]` : ''
        const line = `${new Date().toISOString()} ${level.toUpperCase()}${scope} ${formatParam(message)}${extra ? ` ${extra}` : ''}\n`
        appendFileSync(this.filePath, line, 'utf8')
    }
}

export type LoggingOptions = {
    /** Log file; logging is off when absent so nothing reaches the terminal. */
    filePath?: string
    levels?: LogLevel[]
}

export function configureLogging(options: LoggingOptions = {}): LoggerService | null {
    if (!options.filePath) {
        Logger.overrideLogger(false)
        return null
    }
    try {
        const logger = new FileLogger(options.filePath, options.levels)
        Logger.overrideLogger(logger)
        return logger
    } catch (error) {
        Logger.overrideLogger(false)
        throw new Error(`cannot open log file ${options.filePath}: ${getErrorMessage(error)}`)
    }
}
