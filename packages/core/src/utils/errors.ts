export type ConfigErrorCode = 'INVALID_CONFIG' | 'READ_FAILED'

export class ConfigError extends Error {
    constructor(
        readonly code: ConfigErrorCode,
        message: string,
    ) {
        super(message)
        this.name = 'ConfigError'
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isNotFoundError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
