import { isHighSurrogate } from '../utils/text'
import type { Candidate } from '../types'

/**
 * Length of the longest prefix every line shares, scanning left to right and
 * stopping at the first disagreement or the end of the shortest line. Never
 * ends between the two halves of a surrogate pair.
 */
export function commonPrefixLength(lines: readonly string[]): number {
    const [first, ...rest] = lines
    if (first === undefined) return 0

    let length = 0
    while (length < first.length) {
        const code = first.charCodeAt(length)
        const diverged = rest.some(
            (line) => length >= line.length || line.charCodeAt(length) !== code,
        )
        if (diverged) break
        length += 1
    }

    if (length > 0 && isHighSurrogate(first.charCodeAt(length - 1))) {
        length -= 1
    }
    return length
}

/**
 * "Complete as far as possible": when every candidate keeps the text around
 * the cursor and inserts text that starts the same way, returns a synthetic
 * candidate inserting only that common part. Returns null when the candidates
 * add nothing in common at the cursor.
 */
export function aggregateCandidates(
    sourceLine: string,
    candidates: readonly Candidate[],
    cursor = sourceLine.length,
): Candidate | null {
    if (!candidates.length) return null

    const before = sourceLine.slice(0, cursor)
    const after = sourceLine.slice(cursor)
    const inserted: string[] = []
    for (const { newLine } of candidates) {
        const extendsSource =
            newLine.length >= sourceLine.length &&
            newLine.startsWith(before) &&
            newLine.endsWith(after)
        if (!extendsSource) return null
        inserted.push(newLine.slice(before.length, newLine.length - after.length))
    }

    const length = commonPrefixLength(inserted)
    if (length === 0) return null

    const common = (inserted[0] ?? '').slice(0, length)
    return {
        newLine: `${before}${common}${after}`,
        display: common,
    }
}
