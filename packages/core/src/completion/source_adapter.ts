import { clampCursorToBoundary } from '../utils/text'
import type {
    Candidate,
    CandidateCompleter,
    CandidateSource,
    Completer,
    PrefixCompleter,
} from '../types'

export function isCandidateCompleter(completer: Completer): completer is CandidateCompleter {
    return 'candidates' in completer && typeof completer.candidates === 'function'
}

/**
 * Wraps a shared-prefix completer: each suffix is inserted at the cursor, and
 * its label keeps the `sharedLength` characters already typed before it.
 */
export function adaptPrefixCompleter(completer: PrefixCompleter): CandidateSource {
    return {
        fetch(line: string, pos: number): Candidate[] {
            const { suffixes, sharedLength } = completer.complete(line, pos)
            if (!suffixes.length) return []

            const cursor = clampCursorToBoundary(line, pos)
            const shared = Number.isFinite(sharedLength)
                ? Math.min(cursor, Math.max(0, Math.floor(sharedLength)))
                : 0
            const before = line.slice(0, cursor)
            const after = line.slice(cursor)
            const typed = line.slice(clampCursorToBoundary(line, cursor - shared), cursor)

            return suffixes.map((suffix) => ({
                newLine: `${before}${suffix}${after}`,
                display: `${typed}${suffix}`,
            }))
        },
    }
}

/** One-time capability check; the engine only ever sees the returned source. */
export function toCandidateSource(completer: Completer): CandidateSource {
    if (isCandidateCompleter(completer)) {
        return {
            fetch: (line, pos) => completer.candidates(line, pos),
        }
    }
    return adaptPrefixCompleter(completer)
}
