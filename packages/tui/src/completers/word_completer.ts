import type { Candidate, CandidateCompleter } from '@gridline/core'
import { tokenStart } from './tokens'

/** Completes the word under the cursor from a fixed list. */
export class WordCompleter implements CandidateCompleter {
    private readonly words: string[]

    constructor(words: readonly string[]) {
        this.words = [...new Set(words)]
    }

    candidates(line: string, pos: number): Candidate[] {
        const start = tokenStart(line, pos)
        const typed = line.slice(start, pos)
        const before = line.slice(0, start)
        const after = line.slice(pos)

        return this.words
            .filter((word) => word.startsWith(typed))
            .map((word) => ({ newLine: `${before}${word}${after}`, display: word }))
    }
}
