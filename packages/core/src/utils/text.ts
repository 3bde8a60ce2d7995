const SURROGATE_HIGH_MIN = 0xd800
const SURROGATE_HIGH_MAX = 0xdbff
const SURROGATE_LOW_MIN = 0xdc00
const SURROGATE_LOW_MAX = 0xdfff

export function isHighSurrogate(value: number): boolean {
    return value >= SURROGATE_HIGH_MIN && value <= SURROGATE_HIGH_MAX
}

export function isLowSurrogate(value: number): boolean {
    return value >= SURROGATE_LOW_MIN && value <= SURROGATE_LOW_MAX
}

/** Clamps an offset into `[0, value.length]`, moving it off the middle of a surrogate pair. */
export function clampCursorToBoundary(value: string, cursor: number): number {
    if (!Number.isFinite(cursor)) return 0
    if (cursor <= 0) return 0
    if (cursor >= value.length) return value.length

    const normalized = Math.floor(cursor)
    if (normalized <= 0) return 0

    const current = value.charCodeAt(normalized)
    const previous = value.charCodeAt(normalized - 1)

    if (isLowSurrogate(current) && isHighSurrogate(previous)) {
        return normalized - 1
    }

    return normalized
}
