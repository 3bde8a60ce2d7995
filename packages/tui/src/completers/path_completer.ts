import { readdirSync } from 'node:fs'
import { homedir } from 'node:os'
import { isAbsolute, join } from 'node:path'
import { Logger, getErrorMessage, type PrefixCompleter, type PrefixCompletion } from '@gridline/core'
import { tokenStart } from './tokens'

const DEFAULT_MAX_ENTRIES = 500

export type PathCompleterOptions = {
    cwd?: string
    /** List dot-files even when the typed name does not start with a dot. */
    showHidden?: boolean
    maxEntries?: number
}

type DirectoryEntry = {
    name: string
    isDir: boolean
}

const EMPTY: PrefixCompletion = { suffixes: [], sharedLength: 0 }

/**
 * Completes the path token before the cursor from the directory it names.
 * Directories complete with a trailing `/` so the next trigger descends.
 */
export class PathCompleter implements PrefixCompleter {
    private readonly logger = new Logger(PathCompleter.name)
    private readonly cwd: string
    private readonly showHidden: boolean
    private readonly maxEntries: number

    constructor(options: PathCompleterOptions = {}) {
        this.cwd = options.cwd ?? process.cwd()
        this.showHidden = options.showHidden ?? false
        this.maxEntries =
            typeof options.maxEntries === 'number'
                ? Math.max(1, options.maxEntries)
                : DEFAULT_MAX_ENTRIES
    }

    complete(line: string, pos: number): PrefixCompletion {
        const token = line.slice(tokenStart(line, pos), pos)
        const slash = token.lastIndexOf('/')
        const dirPart = token.slice(0, slash + 1)
        const base = token.slice(slash + 1)

        const entries = this.listDirectory(this.resolveDirectory(dirPart))
        if (!entries) return EMPTY

        const includeHidden = this.showHidden || base.startsWith('.')
        const suffixes = entries
            .filter((entry) => entry.name.startsWith(base))
            .filter((entry) => includeHidden || !entry.name.startsWith('.'))
            .sort((a, b) => a.name.localeCompare(b.name))
            .slice(0, this.maxEntries)
            .map((entry) => `${entry.name.slice(base.length)}${entry.isDir ? '/' : ''}`)

        return { suffixes, sharedLength: base.length }
    }

    private resolveDirectory(dirPart: string): string {
        if (!dirPart) return this.cwd
        if (dirPart.startsWith('~/')) {
            return join(homedir(), dirPart.slice(2))
        }
        if (isAbsolute(dirPart)) return dirPart
        return join(this.cwd, dirPart)
    }

    private listDirectory(dir: string): DirectoryEntry[] | null {
        try {
            return readdirSync(dir, { withFileTypes: true }).map((dirent) => ({
                name: dirent.name,
                isDir: dirent.isDirectory(),
            }))
        } catch (error) {
            this.logger.debug(`cannot list ${dir}: ${getErrorMessage(error)}`)
            return null
        }
    }
}
