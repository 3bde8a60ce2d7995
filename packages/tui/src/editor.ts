import {
    CompletionEngine,
    Logger,
    getErrorMessage,
    toCandidateSource,
    type Candidate,
    type CandidateCompleter,
    type Completer,
    type OutputSink,
} from '@gridline/core'
import { decodeKey, type EditAction, type KeyLike } from './keys'
import { EditorLineBuffer } from './line_buffer'

const ESC = '\x1b'

export type LineEditorOptions = {
    prompt: string
    completer: Completer
    output: OutputSink
    width: number
    highlight?: string
}

export type KeyResult =
    | { type: 'continue' }
    | { type: 'submit'; line: string }
    | { type: 'interrupt' }
    | { type: 'eof' }

const CONTINUE: KeyResult = { type: 'continue' }

/**
 * Single-line editor with grid completion. Completion keys go to the engine
 * first; whatever it does not consume edits the line.
 */
export class LineEditor {
    readonly buffer: EditorLineBuffer
    readonly engine: CompletionEngine

    private readonly logger = new Logger(LineEditor.name)
    private readonly output: OutputSink
    private width: number
    /** Cursor row within the input as last drawn. */
    private renderedCursorRow = 0

    constructor(options: LineEditorOptions) {
        this.buffer = new EditorLineBuffer(options.prompt)
        this.output = options.output
        this.width = Math.max(0, Math.floor(options.width))
        this.engine = new CompletionEngine({
            completer: this.guard(options.completer),
            buffer: this.buffer,
            output: options.output,
            width: this.width,
            highlight: options.highlight,
        })
    }

    get text(): string {
        return this.buffer.text
    }

    resize(width: number): void {
        this.width = Math.max(0, Math.floor(width))
        this.engine.setWidth(this.width)
    }

    handleKeypress(input: string | undefined, key: KeyLike = {}): KeyResult {
        const decoded = decodeKey(input, key)

        if (this.engine.handleKey(decoded.completion)) {
            if (!this.engine.isActive()) this.render()
            return CONTINUE
        }

        return this.applyEdit(decoded.edit)
    }

    /** Redraws the prompt and line in place, then the candidate block if one is shown. */
    render(): void {
        const width = this.width
        const cursorRow = this.buffer.cursorRow(width)
        const endRow = width > 0 ? Math.floor(this.buffer.totalWidth() / width) : 0
        const column = width > 0 ? this.buffer.widthBeforeCursor() % width : 0

        let out = this.renderedCursorRow > 0 ? `${ESC}[${this.renderedCursorRow}A` : ''
        out += `\r${ESC}[J${this.buffer.prompt}${this.buffer.text}`
        if (endRow > cursorRow) out += `${ESC}[${endRow - cursorRow}A`
        out += '\r'
        if (column > 0) out += `${ESC}[${column}C`

        this.output.write(out)
        this.renderedCursorRow = cursorRow
        if (this.engine.isActive()) this.engine.refresh()
    }

    private applyEdit(action: EditAction): KeyResult {
        switch (action.type) {
            case 'none':
                return CONTINUE
            case 'submit': {
                const line = this.buffer.text
                this.engine.exit()
                this.output.write('\r\n')
                this.buffer.reset()
                this.renderedCursorRow = 0
                return { type: 'submit', line }
            }
            case 'interrupt':
                this.engine.exit()
                this.output.write('\r\n')
                return { type: 'interrupt' }
            case 'eof':
                if (!this.buffer.text) {
                    this.engine.exit()
                    this.output.write('\r\n')
                    return { type: 'eof' }
                }
                this.buffer.deleteForward()
                break
            case 'insert':
                this.buffer.insert(action.text)
                break
            case 'backspace':
                this.buffer.backspace()
                break
            case 'delete':
                this.buffer.deleteForward()
                break
            case 'delete_word':
                this.buffer.deleteWordBackward()
                break
            case 'delete_to_start':
                this.buffer.deleteToStart()
                break
            case 'delete_to_end':
                this.buffer.deleteToEnd()
                break
            case 'left':
                this.buffer.moveLeft()
                break
            case 'right':
                this.buffer.moveRight()
                break
            case 'home':
                this.buffer.moveToStart()
                break
            case 'end':
                this.buffer.moveToEnd()
                break
        }
        this.render()
        return CONTINUE
    }

    /** A completer that throws is logged and treated as having no candidates. */
    private guard(completer: Completer): CandidateCompleter {
        const source = toCandidateSource(completer)
        return {
            candidates: (line: string, pos: number): Candidate[] => {
                try {
                    return source.fetch(line, pos)
                } catch (error) {
                    this.logger.warn(`completion source failed: ${getErrorMessage(error)}`)
                    return []
                }
            },
        }
    }
}
