import stringWidth from 'string-width'
import { NO_CHOICE, type GridDirection } from '../types'

export type GridLayout = {
    /** 0 when even one label does not fit the terminal. */
    columnCount: number
    columnWidth: number
}

export function displayWidth(label: string): number {
    return Math.max(0, stringWidth(label))
}

/**
 * Columns are as wide as the widest label plus one space. One terminal column
 * is kept free so the last cell never reaches the right margin, and leftover
 * width is spread evenly back over the columns.
 */
export function computeGridLayout(width: number, labels: readonly string[]): GridLayout {
    let columnWidth = 0
    for (const label of labels) {
        columnWidth = Math.max(columnWidth, displayWidth(label))
    }
    columnWidth += 1

    const usable = Number.isFinite(width) ? Math.floor(width) - 1 : 0
    if (usable <= 0) {
        return { columnCount: 0, columnWidth }
    }

    const columnCount = Math.floor(usable / columnWidth)
    if (columnCount > 0) {
        columnWidth += Math.floor((usable - columnWidth * columnCount) / columnCount)
    }
    return { columnCount, columnWidth }
}

export function gridRowCount(candidateCount: number, columnCount: number): number {
    if (candidateCount <= 0) return 0
    return Math.ceil(candidateCount / Math.max(1, columnCount))
}

/** `index mod count`, normalized into `[0, count)`. */
export function wrapIndex(index: number, count: number): number {
    return ((index % count) + count) % count
}

/**
 * Moves the highlighted cell through a row-major grid whose last row may be
 * short. Every result lies in `[0, candidateCount)`; an empty grid yields
 * {@link NO_CHOICE}.
 */
export function navigateGrid(
    index: number,
    columnCount: number,
    candidateCount: number,
    direction: GridDirection,
): number {
    if (candidateCount <= 0) return NO_CHOICE

    const columns = Math.max(1, Math.floor(columnCount))
    const matrixSize = gridRowCount(candidateCount, columns) * columns
    const current = wrapIndex(Math.floor(index), candidateCount)

    switch (direction) {
        case 'advance':
            return wrapIndex(current + 1, candidateCount)
        case 'retreat':
            return wrapIndex(current - 1, candidateCount)
        case 'row-start':
            return current - (current % columns)
        case 'row-end':
            return Math.min(current + columns - (current % columns) - 1, candidateCount - 1)
        case 'down': {
            let next = current + columns
            if (next >= matrixSize) {
                next -= matrixSize
            } else if (next >= candidateCount) {
                // missing cell in a short last row: wrap to the same column on top
                next += columns - matrixSize
            }
            return next
        }
        case 'up': {
            let next = current - columns
            if (next < 0) {
                next += matrixSize
                if (next >= candidateCount) {
                    next -= columns
                }
            }
            return next
        }
    }
}
