import stringWidth from 'string-width'
import {
    clampCursorToBoundary,
    isHighSurrogate,
    isLowSurrogate,
    type LineBuffer,
} from '@gridline/core'

export type EditorBuffer = {
    value: string
    cursor: number
}

export function nextCursorIndex(value: string, cursor: number): number {
    const safeCursor = clampCursorToBoundary(value, cursor)
    if (safeCursor >= value.length) return value.length

    const codePoint = value.codePointAt(safeCursor)
    if (codePoint === undefined) return Math.min(value.length, safeCursor + 1)
    return Math.min(value.length, safeCursor + (codePoint > 0xffff ? 2 : 1))
}

export function previousCursorIndex(value: string, cursor: number): number {
    const safeCursor = clampCursorToBoundary(value, cursor)
    if (safeCursor <= 0) return 0

    const previous = safeCursor - 1
    if (previous <= 0) return previous

    const currentCode = value.charCodeAt(previous)
    const beforeCode = value.charCodeAt(previous - 1)
    if (isLowSurrogate(currentCode) && isHighSurrogate(beforeCode)) {
        return previous - 1
    }

    return previous
}

function isWordChar(char: string): boolean {
    return /[\p{L}\p{N}_]/u.test(char)
}

export function insertAtCursor(value: string, cursor: number, input: string): EditorBuffer {
    const safeCursor = clampCursorToBoundary(value, cursor)
    if (!input) {
        return { value, cursor: safeCursor }
    }

    // Single-line buffer: pasted line breaks become spaces.
    const normalizedInput = input.replace(/\r\n?|\n/g, ' ')
    const nextValue = `${value.slice(0, safeCursor)}${normalizedInput}${value.slice(safeCursor)}`
    return { value: nextValue, cursor: safeCursor + normalizedInput.length }
}

export function backspaceAtCursor(value: string, cursor: number): EditorBuffer {
    const safeCursor = clampCursorToBoundary(value, cursor)
    if (safeCursor <= 0) return { value, cursor: safeCursor }

    const start = previousCursorIndex(value, safeCursor)
    const nextValue = `${value.slice(0, start)}${value.slice(safeCursor)}`
    return { value: nextValue, cursor: start }
}

export function deleteAtCursor(value: string, cursor: number): EditorBuffer {
    const safeCursor = clampCursorToBoundary(value, cursor)
    if (safeCursor >= value.length) return { value, cursor: safeCursor }

    const end = nextCursorIndex(value, safeCursor)
    const nextValue = `${value.slice(0, safeCursor)}${value.slice(end)}`
    return { value: nextValue, cursor: safeCursor }
}

export function deleteWordBackwardAtCursor(value: string, cursor: number): EditorBuffer {
    const safeCursor = clampCursorToBoundary(value, cursor)
    if (safeCursor <= 0) return { value, cursor: safeCursor }

    let start = safeCursor

    while (start > 0) {
        const previous = previousCursorIndex(value, start)
        const char = value.slice(previous, start)
        if (char.trim().length > 0) break
        start = previous
    }

    while (start > 0) {
        const previous = previousCursorIndex(value, start)
        const char = value.slice(previous, start)
        if (!isWordChar(char)) break
        start = previous
    }

    if (start === safeCursor) {
        start = previousCursorIndex(value, safeCursor)
    }

    const nextValue = `${value.slice(0, start)}${value.slice(safeCursor)}`
    return { value: nextValue, cursor: start }
}

/**
 * The line being edited, behind a prompt. Implements the engine's
 * {@link LineBuffer} so completion can splice into it.
 */
export class EditorLineBuffer implements LineBuffer {
    private value = ''
    private position = 0

    constructor(readonly prompt = '') {}

    get text(): string {
        return this.value
    }

    get cursor(): number {
        return this.position
    }

    set(value: string, cursor = value.length): void {
        this.value = value
        this.position = clampCursorToBoundary(value, cursor)
    }

    reset(): void {
        this.set('')
    }

    insert(text: string): void {
        this.apply(insertAtCursor(this.value, this.position, text))
    }

    /** Removes `count` string indices before the cursor. */
    deleteBackward(count: number): void {
        const start = clampCursorToBoundary(this.value, this.position - Math.max(0, count))
        this.apply({
            value: `${this.value.slice(0, start)}${this.value.slice(this.position)}`,
            cursor: start,
        })
    }

    backspace(): void {
        this.apply(backspaceAtCursor(this.value, this.position))
    }

    deleteForward(): void {
        this.apply(deleteAtCursor(this.value, this.position))
    }

    deleteWordBackward(): void {
        this.apply(deleteWordBackwardAtCursor(this.value, this.position))
    }

    deleteToStart(): void {
        this.apply({ value: this.value.slice(this.position), cursor: 0 })
    }

    deleteToEnd(): void {
        this.apply({ value: this.value.slice(0, this.position), cursor: this.position })
    }

    moveLeft(): void {
        this.position = previousCursorIndex(this.value, this.position)
    }

    moveRight(): void {
        this.position = nextCursorIndex(this.value, this.position)
    }

    moveToStart(): void {
        this.position = 0
    }

    moveToEnd(): void {
        this.position = this.value.length
    }

    widthBeforeCursor(): number {
        return stringWidth(`${this.prompt}${this.value.slice(0, this.position)}`)
    }

    totalWidth(): number {
        return stringWidth(`${this.prompt}${this.value}`)
    }

    /** Row of the cursor within the wrapped prompt and text, counting from 0. */
    cursorRow(width: number): number {
        if (width <= 0) return 0
        return Math.floor(this.widthBeforeCursor() / width)
    }

    cursorLineCount(width: number): number {
        if (width <= 0) return 1
        const lastRow = Math.floor(this.totalWidth() / width)
        return lastRow - this.cursorRow(width) + 1
    }

    private apply(next: EditorBuffer): void {
        this.value = next.value
        this.position = next.cursor
    }
}
