import { Logger } from '../utils/logger'
import {
    NO_CHOICE,
    isGridDirection,
    type Candidate,
    type CandidateSource,
    type Completer,
    type CompletionKey,
    type CompletionSnapshot,
    type EngineState,
    type GridDirection,
    type LineBuffer,
    type OutputSink,
} from '../types'
import { aggregateCandidates } from './aggregate'
import { navigateGrid } from './grid_layout'
import { renderCandidateGrid, renderClear } from './renderer'
import { toCandidateSource } from './source_adapter'

export type CompletionEngineOptions = {
    completer: Completer
    buffer: LineBuffer
    output: OutputSink
    /** Terminal columns; 0 disables completion until a width change. */
    width: number
    highlight?: string
}

const IDLE: EngineState = { mode: 'idle' }

/**
 * Modal completion: idle → listing → selecting.
 *
 * Every method runs to completion synchronously. `trigger` and `handleKey`
 * return whether the key was consumed; a key that is not consumed should be
 * handled by the line editor as usual.
 */
export class CompletionEngine {
    private readonly logger = new Logger(CompletionEngine.name)
    private readonly source: CandidateSource
    private readonly buffer: LineBuffer
    private readonly output: OutputSink
    private readonly highlight: string | undefined

    private current: EngineState = IDLE
    private width: number
    private columnCount = 0
    private drawn = false

    constructor(options: CompletionEngineOptions) {
        this.source = toCandidateSource(options.completer)
        this.buffer = options.buffer
        this.output = options.output
        this.highlight = options.highlight
        this.width = Math.max(0, Math.floor(options.width))
    }

    get state(): EngineState {
        return this.current
    }

    get choiceIndex(): number {
        return this.current.mode === 'selecting' ? this.current.choiceIndex : NO_CHOICE
    }

    get candidates(): readonly Candidate[] {
        return this.current.mode === 'idle' ? [] : this.current.candidates
    }

    /** Columns of the grid as last drawn. */
    get columns(): number {
        return this.columnCount
    }

    get terminalWidth(): number {
        return this.width
    }

    isActive(): boolean {
        return this.current.mode !== 'idle'
    }

    isSelecting(): boolean {
        return this.current.mode === 'selecting'
    }

    /** Stores the new width; it takes effect on the next redraw. */
    setWidth(width: number): void {
        this.width = Number.isFinite(width) ? Math.max(0, Math.floor(width)) : 0
    }

    trigger(): boolean {
        if (this.width === 0) return false

        const state = this.current
        if (state.mode === 'selecting' && this.isUnchanged(state.snapshot)) {
            return this.move('advance')
        }

        if (state.mode === 'listing' && this.isUnchanged(state.snapshot)) {
            this.current = {
                mode: 'selecting',
                snapshot: state.snapshot,
                candidates: state.candidates,
                choiceIndex: 0,
            }
            this.logger.debug(`selecting among ${state.candidates.length} candidates`)
            this.refresh()
            return true
        }

        return this.startSession()
    }

    handleKey(key: CompletionKey): boolean {
        if (key === 'trigger') return this.trigger()
        if (this.width === 0) return false

        const state = this.current
        if (state.mode === 'idle') return false

        if (state.mode === 'listing' || !this.isUnchanged(state.snapshot)) {
            this.exit()
            return false
        }

        if (isGridDirection(key)) {
            return this.move(key)
        }

        switch (key) {
            case 'accept': {
                const chosen = state.candidates[state.choiceIndex]
                this.exit()
                if (chosen) this.splice(state.snapshot, chosen)
                return true
            }
            case 'cancel':
                this.exit()
                return true
            case 'dismiss':
                this.current = {
                    mode: 'listing',
                    snapshot: state.snapshot,
                    candidates: state.candidates,
                }
                this.refresh()
                return false
            default:
                this.exit()
                return false
        }
    }

    /** Redraws the candidate block for the current state; a no-op when idle. */
    refresh(): void {
        const state = this.current
        if (state.mode === 'idle' || this.width === 0) return

        const frame = renderCandidateGrid({
            candidates: state.candidates,
            choiceIndex: state.mode === 'selecting' ? state.choiceIndex : NO_CHOICE,
            width: this.width,
            cursorLineCount: this.buffer.cursorLineCount(this.width),
            widthBeforeCursor: this.buffer.widthBeforeCursor(),
            highlight: this.highlight,
        })
        this.columnCount = frame.layout.columnCount
        if (!frame.output) return

        this.output.write(frame.output)
        this.drawn = true
    }

    /** Leaves completion, erasing the candidate block if one is on screen. */
    exit(): void {
        if (this.drawn && this.width > 0) {
            this.output.write(
                renderClear(
                    this.buffer.cursorLineCount(this.width),
                    this.buffer.widthBeforeCursor(),
                    this.width,
                ),
            )
        }
        if (this.current.mode !== 'idle') {
            this.logger.debug(`exit from ${this.current.mode}`)
        }
        this.drawn = false
        this.columnCount = 0
        this.current = IDLE
    }

    private startSession(): boolean {
        const snapshot: CompletionSnapshot = {
            line: this.buffer.text,
            cursor: this.buffer.cursor,
        }
        const candidates = this.source.fetch(snapshot.line, snapshot.cursor)
        this.exit()

        const [first] = candidates
        if (!first) {
            this.logger.debug('no candidates')
            return true
        }

        if (candidates.length === 1) {
            this.splice(snapshot, first)
            return true
        }

        const aggregated = aggregateCandidates(snapshot.line, candidates, snapshot.cursor)
        if (aggregated) {
            this.logger.debug(`completed common prefix of ${candidates.length} candidates`)
            this.splice(snapshot, aggregated)
            return true
        }

        this.current = { mode: 'listing', snapshot, candidates }
        this.logger.debug(`listing ${candidates.length} candidates`)
        this.refresh()
        return true
    }

    private move(direction: GridDirection): boolean {
        const state = this.current
        if (state.mode !== 'selecting') return false

        const choiceIndex = navigateGrid(
            state.choiceIndex,
            this.columnCount,
            state.candidates.length,
            direction,
        )
        this.current = { ...state, choiceIndex }
        this.refresh()
        return true
    }

    private isUnchanged(snapshot: CompletionSnapshot): boolean {
        return this.buffer.text === snapshot.line && this.buffer.cursor === snapshot.cursor
    }

    /**
     * Writes the candidate into the live line. When it keeps the snapshot's
     * text on both sides of the cursor only the new middle is inserted; when
     * it extends the whole line the remainder is appended at the end;
     * otherwise the text before the cursor is erased and the candidate written
     * verbatim (e.g. a source that normalizes case).
     */
    private splice(snapshot: CompletionSnapshot, candidate: Candidate): void {
        const { line, cursor } = snapshot
        const before = line.slice(0, cursor)
        const after = line.slice(cursor)
        const { newLine } = candidate

        if (
            newLine.length >= line.length &&
            newLine.startsWith(before) &&
            newLine.endsWith(after)
        ) {
            this.buffer.insert(newLine.slice(before.length, newLine.length - after.length))
            return
        }

        if (newLine.startsWith(line)) {
            this.buffer.moveToEnd()
            this.buffer.insert(newLine.slice(line.length))
            return
        }

        this.buffer.deleteBackward(before.length)
        this.buffer.insert(
            newLine.endsWith(after) ? newLine.slice(0, newLine.length - after.length) : newLine,
        )
    }
}
