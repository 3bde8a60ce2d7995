import { COMPLETION_SOURCES, type CompletionSourceName } from '@gridline/core'

export type CliOptions = {
    showHelp: boolean
    showVersion: boolean
    source?: CompletionSourceName
    words: string[]
}

export type ParsedArgs = {
    options: CliOptions
    errors: string[]
}

export const HELP_TEXT = `
Usage: gridline [options]

Reads lines with grid completion and echoes each submitted line.

Options:
  --source <path|words|tab>  completion source (default from config, else "path")
  --words <a,b,c>            complete from a fixed word list (implies --source words)
  -v, --version              print the version
  -h, --help                 print this help

Keys: Tab lists candidates, Tab again selects, arrows move, Enter accepts, Esc cancels.
`

function isCompletionSource(value: string): value is CompletionSourceName {
    return (COMPLETION_SOURCES as readonly string[]).includes(value)
}

function splitWords(value: string): string[] {
    return value
        .split(',')
        .map((word) => word.trim())
        .filter(Boolean)
}

/** Minimal argv parsing for gridline flags. */
export function parseArgs(argv: string[]): ParsedArgs {
    const options: CliOptions = {
        showHelp: false,
        showVersion: false,
        words: [],
    }
    const errors: string[] = []

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i]
        if (arg === undefined) continue

        if (arg === '--help' || arg === '-h') {
            options.showHelp = true
            continue
        }
        if (arg === '--version' || arg === '-v') {
            options.showVersion = true
            continue
        }
        if (arg === '--source' || arg.startsWith('--source=')) {
            const value = arg === '--source' ? argv[++i] : arg.slice('--source='.length)
            if (value && isCompletionSource(value)) {
                options.source = value
            } else {
                errors.push(`--source expects one of ${COMPLETION_SOURCES.join(', ')}`)
            }
            continue
        }
        if (arg === '--words' || arg.startsWith('--words=')) {
            const value = arg === '--words' ? argv[++i] : arg.slice('--words='.length)
            const words = value ? splitWords(value) : []
            if (words.length) {
                options.words.push(...words)
                options.source ??= 'words'
            } else {
                errors.push('--words expects a comma-separated list')
            }
            continue
        }
        errors.push(`unknown argument: ${arg}`)
    }

    return { options, errors }
}
