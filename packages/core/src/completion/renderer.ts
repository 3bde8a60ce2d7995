import { DEFAULT_HIGHLIGHT } from '../config/constants'
import type { Candidate } from '../types'
import { computeGridLayout, displayWidth, type GridLayout } from './grid_layout'

const ESC = '\x1b'
const CLEAR_TO_SCREEN_END = `${ESC}[J`
const RESET_STYLE = `${ESC}[0m`
const NEWLINE = '\r\n'

export type GridFrame = {
    candidates: readonly Candidate[]
    /** Highlighted cell, or -1 when none. */
    choiceIndex: number
    width: number
    cursorLineCount: number
    widthBeforeCursor: number
    /** SGR parameters for the highlighted cell, e.g. `30;47`. */
    highlight?: string
}

export type RenderedGrid = {
    output: string
    layout: GridLayout
    /** Screen rows written below the input, 0 when nothing was drawn. */
    rows: number
}

function cursorUp(count: number): string {
    return count > 0 ? `${ESC}[${count}A` : ''
}

function cursorRight(count: number): string {
    return count > 0 ? `${ESC}[${count}C` : ''
}

/** Returns to the input line's cursor column from column 0 of a lower row. */
function restoreCursor(rowsUp: number, widthBeforeCursor: number, width: number): string {
    const column = width > 0 ? Math.max(0, widthBeforeCursor) % width : 0
    return `${cursorUp(rowsUp)}\r${cursorRight(column)}`
}

/**
 * Draws the candidate block below the input and puts the cursor back where it
 * was. Pure: the same frame always yields the same bytes.
 */
export function renderCandidateGrid(frame: GridFrame): RenderedGrid {
    const labels = frame.candidates.map((candidate) => candidate.display)
    const layout = computeGridLayout(frame.width, labels)
    if (layout.columnCount === 0 || labels.length === 0) {
        return { output: '', layout, rows: 0 }
    }

    const lineCount = Math.max(1, frame.cursorLineCount)
    const highlight = `${ESC}[${frame.highlight ?? DEFAULT_HIGHLIGHT}m`

    let output = NEWLINE.repeat(lineCount) + CLEAR_TO_SCREEN_END
    let columnIndex = 0
    let lines = 1

    labels.forEach((label, index) => {
        const selected = index === frame.choiceIndex
        const padding = ' '.repeat(Math.max(0, layout.columnWidth - displayWidth(label)))
        output += selected ? `${highlight}${label}${padding}${RESET_STYLE}` : `${label}${padding}`

        columnIndex += 1
        if (columnIndex === layout.columnCount) {
            output += NEWLINE
            lines += 1
            columnIndex = 0
        }
    })

    output += restoreCursor(lineCount - 1 + lines, frame.widthBeforeCursor, frame.width)
    return { output, layout, rows: lines }
}

/** Erases everything below the wrapped input and restores the cursor. */
export function renderClear(cursorLineCount: number, widthBeforeCursor: number, width: number) {
    const lineCount = Math.max(1, cursorLineCount)
    return (
        NEWLINE.repeat(lineCount) +
        CLEAR_TO_SCREEN_END +
        restoreCursor(lineCount, widthBeforeCursor, width)
    )
}
