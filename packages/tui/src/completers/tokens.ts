const TOKEN_DELIMITERS = new Set([' ', '\t', '"', "'", '='])

/** Start of the token that ends at `pos`: just after the last delimiter before it. */
export function tokenStart(line: string, pos: number): number {
    for (let i = pos - 1; i >= 0; i -= 1) {
        if (TOKEN_DELIMITERS.has(line[i] ?? '')) {
            return i + 1
        }
    }
    return 0
}
