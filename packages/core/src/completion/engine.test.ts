import assert from 'node:assert'
import { beforeEach, describe, test } from 'vitest'
import type { CandidateCompleter, Completer, EngineMode, LineBuffer, OutputSink } from '../types'
import { CompletionEngine } from './engine'

class MemoryBuffer implements LineBuffer {
    constructor(
        public text = '',
        public cursor = text.length,
        readonly prompt = '> ',
    ) {}

    insert(text: string): void {
        this.text = `${this.text.slice(0, this.cursor)}${text}${this.text.slice(this.cursor)}`
        this.cursor += text.length
    }

    deleteBackward(count: number): void {
        const start = Math.max(0, this.cursor - count)
        this.text = `${this.text.slice(0, start)}${this.text.slice(this.cursor)}`
        this.cursor = start
    }

    moveToEnd(): void {
        this.cursor = this.text.length
    }

    cursorLineCount(): number {
        return 1
    }

    widthBeforeCursor(): number {
        return this.prompt.length + this.cursor
    }
}

class MemoryOutput implements OutputSink {
    readonly chunks: string[] = []

    write(chunk: string): void {
        this.chunks.push(chunk)
    }
}

function wordCompleter(words: string[]): CandidateCompleter {
    return {
        candidates(line, pos) {
            const typed = line.slice(0, pos)
            const rest = line.slice(pos)
            return words
                .filter((word) => word.startsWith(typed))
                .map((word) => ({ newLine: `${word}${rest}`, display: word }))
        },
    }
}

const WORDS = ['go', 'git', 'git-shell', 'grep']

let buffer: MemoryBuffer
let output: MemoryOutput

/** Reads the mode without letting assertions narrow `engine.state` across calls. */
function modeOf(engine: CompletionEngine): EngineMode {
    return engine.state.mode
}

function createEngine(completer: Completer, width = 80): CompletionEngine {
    return new CompletionEngine({ completer, buffer, output, width })
}

beforeEach(() => {
    buffer = new MemoryBuffer('g')
    output = new MemoryOutput()
})

describe('CompletionEngine', () => {
    test('single candidate is spliced in without listing', () => {
        buffer = new MemoryBuffer('git-s')
        const engine = createEngine(wordCompleter(WORDS))

        assert.strictEqual(engine.trigger(), true)
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'git-shell')
        assert.strictEqual(buffer.cursor, 9)
        assert.deepStrictEqual(output.chunks, [])
    })

    test('no candidates exits quietly', () => {
        buffer = new MemoryBuffer('zz')
        const engine = createEngine(wordCompleter(WORDS))

        assert.strictEqual(engine.trigger(), true)
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'zz')
        assert.deepStrictEqual(output.chunks, [])
    })

    test('common extension is inserted without listing', () => {
        buffer = new MemoryBuffer('gi')
        const engine = createEngine(wordCompleter(['git', 'git-shell']))

        engine.trigger()
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'git')
        assert.deepStrictEqual(output.chunks, [])
    })

    test('divergent candidates are listed', () => {
        buffer = new MemoryBuffer('go')
        const engine = createEngine(wordCompleter(['good', 'going']))

        engine.trigger()
        assert.strictEqual(modeOf(engine), 'listing')
        assert.strictEqual(engine.choiceIndex, -1)
        assert.strictEqual(buffer.text, 'go')
        assert.strictEqual(output.chunks.length, 1)
    })

    test('list, select, advance and accept', () => {
        const engine = createEngine(wordCompleter(WORDS))

        engine.trigger()
        assert.strictEqual(modeOf(engine), 'listing')
        assert.deepStrictEqual(
            engine.candidates.map((candidate) => candidate.display),
            ['go', 'git', 'git-shell', 'grep'],
        )
        assert.strictEqual(
            output.chunks[0],
            '\r\n\x1b[J' +
                'go         git        git-shell  grep       ' +
                '\x1b[1A\r\x1b[3C',
        )

        engine.trigger()
        assert.strictEqual(modeOf(engine), 'selecting')
        assert.strictEqual(engine.choiceIndex, 0)

        assert.strictEqual(engine.handleKey('advance'), true)
        assert.strictEqual(engine.choiceIndex, 1)

        assert.strictEqual(engine.handleKey('accept'), true)
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(engine.choiceIndex, -1)
        assert.deepStrictEqual(engine.candidates, [])
        assert.strictEqual(buffer.text, 'git')
        assert.strictEqual(output.chunks[output.chunks.length - 1], '\r\n\x1b[J\x1b[1A\r\x1b[3C')
    })

    test('shared-prefix sources with no shared length list bare suffixes', () => {
        const engine = createEngine({
            complete: () => ({ suffixes: ['o', 'it', 'it-shell', 'rep'], sharedLength: 0 }),
        })

        engine.trigger()
        assert.deepStrictEqual(
            engine.candidates.map((candidate) => candidate.display),
            ['o', 'it', 'it-shell', 'rep'],
        )
        engine.trigger()
        engine.handleKey('advance')
        engine.handleKey('accept')
        assert.strictEqual(buffer.text, 'git')
    })

    test('shared-prefix labels include the typed text', () => {
        const engine = createEngine({
            complete: () => ({ suffixes: ['o', 'it', 'it-shell', 'rep'], sharedLength: 1 }),
        })

        engine.trigger()
        assert.deepStrictEqual(
            engine.candidates.map((candidate) => candidate.display),
            ['go', 'git', 'git-shell', 'grep'],
        )
        engine.trigger()
        assert.strictEqual(engine.choiceIndex, 0)
        engine.handleKey('advance')
        engine.handleKey('accept')
        assert.strictEqual(buffer.text, 'git')
        assert.strictEqual(modeOf(engine), 'idle')
    })

    test('trigger while selecting advances the choice', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        engine.trigger()

        assert.strictEqual(engine.trigger(), true)
        assert.strictEqual(engine.choiceIndex, 1)
        engine.handleKey('retreat')
        engine.handleKey('retreat')
        assert.strictEqual(engine.choiceIndex, 3)
    })

    test('changed line re-fetches instead of selecting', () => {
        const engine = createEngine(wordCompleter(['go', 'git', 'gist', 'grep']))
        engine.trigger()
        assert.strictEqual(engine.candidates.length, 4)

        buffer.insert('i')
        engine.trigger()
        assert.strictEqual(modeOf(engine), 'listing')
        assert.deepStrictEqual(
            engine.candidates.map((candidate) => candidate.newLine),
            ['git', 'gist'],
        )

        engine.trigger()
        assert.strictEqual(modeOf(engine), 'selecting')
        assert.strictEqual(engine.choiceIndex, 0)
    })

    test('changed line may complete directly and erases the old list', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        const drawn = output.chunks.length

        buffer.insert('r')
        engine.trigger()
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'grep')
        assert.deepStrictEqual(output.chunks.slice(drawn), ['\r\n\x1b[J\x1b[1A\r\x1b[4C'])
    })

    test('moving the cursor counts as a change', () => {
        buffer = new MemoryBuffer('g ', 1)
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        assert.strictEqual(modeOf(engine), 'listing')

        buffer.cursor = 2
        engine.trigger()
        assert.notStrictEqual(modeOf(engine), 'selecting')
    })

    test('cancel leaves the line untouched', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        engine.trigger()
        engine.handleKey('down')

        assert.strictEqual(engine.handleKey('cancel'), true)
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'g')
    })

    test('dismiss drops the highlight but keeps the list', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        engine.trigger()

        assert.strictEqual(engine.handleKey('dismiss'), false)
        assert.strictEqual(modeOf(engine), 'listing')
        assert.strictEqual(engine.choiceIndex, -1)
        assert.strictEqual(engine.candidates.length, 4)
        assert.strictEqual(output.chunks[output.chunks.length - 1], output.chunks[0])
    })

    test('unrecognized keys exit and pass through', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        engine.trigger()

        assert.strictEqual(engine.handleKey('unrecognized'), false)
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'g')
    })

    test('navigation keys while only listing exit and pass through', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()

        assert.strictEqual(engine.handleKey('advance'), false)
        assert.strictEqual(modeOf(engine), 'idle')
    })

    test('keys are ignored while idle', () => {
        const engine = createEngine(wordCompleter(WORDS))
        assert.strictEqual(engine.handleKey('accept'), false)
        assert.strictEqual(engine.handleKey('down'), false)
        assert.deepStrictEqual(output.chunks, [])
    })

    test('candidates that rewrite the typed text replace it', () => {
        buffer = new MemoryBuffer('g')
        const engine = createEngine({
            candidates: () => [
                { newLine: 'GIT', display: 'GIT' },
                { newLine: 'GO', display: 'GO' },
            ],
        })
        engine.trigger()
        engine.trigger()
        engine.handleKey('accept')

        assert.strictEqual(buffer.text, 'GIT')
        assert.strictEqual(buffer.cursor, 3)
    })

    test('a candidate extending the whole line appends after the cursor text', () => {
        buffer = new MemoryBuffer('ab', 1)
        const engine = createEngine({ candidates: () => [{ newLine: 'abX', display: 'abX' }] })

        engine.trigger()
        assert.strictEqual(buffer.text, 'abX')
        assert.strictEqual(buffer.cursor, 3)
    })

    test('accept after the line changed exits without splicing', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        engine.trigger()
        assert.strictEqual(modeOf(engine), 'selecting')

        engine.setWidth(0)
        buffer.insert('x')
        engine.setWidth(80)

        assert.strictEqual(engine.handleKey('accept'), false)
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'gx')
    })

    test('trigger after the line changed while selecting starts over', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        engine.trigger()

        engine.setWidth(0)
        buffer.insert('r')
        engine.setWidth(80)

        assert.strictEqual(engine.trigger(), true)
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'grep')
    })

    test('splices at a cursor inside the line', () => {
        buffer = new MemoryBuffer('gi --help', 2)
        const engine = createEngine({
            complete: () => ({ suffixes: ['t'], sharedLength: 2 }),
        })

        engine.trigger()
        assert.strictEqual(buffer.text, 'git --help')
        assert.strictEqual(buffer.cursor, 3)
    })

    test('grid navigation follows the drawn column count', () => {
        const engine = createEngine(wordCompleter(WORDS), 12)
        engine.trigger()
        engine.trigger()
        assert.strictEqual(engine.columns, 1)

        engine.handleKey('down')
        assert.strictEqual(engine.choiceIndex, 1)
        engine.handleKey('up')
        engine.handleKey('up')
        assert.strictEqual(engine.choiceIndex, 3)
    })

    test('redraw with unchanged state is byte-identical', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        engine.trigger()
        engine.handleKey('row-end')

        engine.refresh()
        engine.refresh()
        const [first, second] = output.chunks.slice(-2)
        assert.ok(first)
        assert.strictEqual(first, second)
    })

    test('zero width makes trigger a no-op', () => {
        const engine = createEngine(wordCompleter(WORDS), 0)

        assert.strictEqual(engine.trigger(), false)
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'g')
        assert.deepStrictEqual(output.chunks, [])
    })

    test('width changes are stored without redrawing', () => {
        const engine = createEngine(wordCompleter(WORDS))
        engine.trigger()
        engine.trigger()
        const drawn = output.chunks.length

        engine.setWidth(0)
        assert.strictEqual(output.chunks.length, drawn)
        assert.strictEqual(engine.handleKey('advance'), false)
        assert.strictEqual(engine.choiceIndex, 0)

        engine.setWidth(12)
        assert.strictEqual(output.chunks.length, drawn)
        assert.strictEqual(engine.handleKey('advance'), true)
        assert.strictEqual(engine.choiceIndex, 1)
        assert.strictEqual(engine.columns, 1)
    })

    test('labels wider than the terminal are not drawn but stay selectable', () => {
        buffer = new MemoryBuffer('l')
        const engine = createEngine(wordCompleter(['long-word-one', 'long-word-two']), 8)

        engine.trigger()
        assert.strictEqual(modeOf(engine), 'idle')
        assert.strictEqual(buffer.text, 'long-word-')

        engine.trigger()
        assert.strictEqual(modeOf(engine), 'listing')
        assert.deepStrictEqual(output.chunks, [])

        engine.trigger()
        engine.handleKey('down')
        assert.strictEqual(engine.choiceIndex, 1)
        engine.handleKey('accept')
        assert.strictEqual(buffer.text, 'long-word-two')
        assert.deepStrictEqual(output.chunks, [])
    })
})
