/** @file Shared types between completion sources, the engine and the line editor around it. */

/**
 * One proposed completion. `newLine` is the whole input line as it would read
 * once accepted; `display` is the label shown in the grid.
 */
export type Candidate = Readonly<{
    newLine: string
    display: string
}>

/** Line and cursor captured when a completion session starts. */
export type CompletionSnapshot = Readonly<{
    line: string
    cursor: number
}>

export type PrefixCompletion = {
    /** Text to insert at the cursor, one entry per candidate. */
    suffixes: string[]
    /** How many characters right before the cursor the suffixes all continue. */
    sharedLength: number
}

/**
 * Shared-prefix completion source.
 *
 * For the words `[go, git, git-shell, grep]`:
 *
 *     complete('g', 1)   => { suffixes: ['o', 'it', 'it-shell', 'rep'], sharedLength: 1 }
 *     complete('gi', 2)  => { suffixes: ['t', 't-shell'], sharedLength: 2 }
 *     complete('git', 3) => { suffixes: ['', '-shell'], sharedLength: 3 }
 */
export interface PrefixCompleter {
    complete(line: string, pos: number): PrefixCompletion
}

/**
 * Candidate-list completion source: returns full replacement lines.
 *
 *     candidates('run g', 5) => [{ newLine: 'run go', display: 'go' }, ...]
 */
export interface CandidateCompleter {
    candidates(line: string, pos: number): Candidate[]
}

export type Completer = PrefixCompleter | CandidateCompleter

/** Uniform contract the engine consumes, whatever shape the completer has. */
export interface CandidateSource {
    fetch(line: string, pos: number): Candidate[]
}

/**
 * The editable input line. Offsets and counts are string indices and always
 * fall on code point boundaries.
 */
export interface LineBuffer {
    readonly text: string
    readonly cursor: number
    insert(text: string): void
    deleteBackward(count: number): void
    /** Puts the cursor after the last character. */
    moveToEnd(): void
    /** Screen rows from the cursor's row through the last row of the wrapped input. */
    cursorLineCount(width: number): number
    /** Rendered cell width of the prompt plus everything typed before the cursor. */
    widthBeforeCursor(): number
}

export interface OutputSink {
    write(chunk: string): void
}

export const COMPLETION_KEY = {
    TRIGGER: 'trigger',
    ACCEPT: 'accept',
    CANCEL: 'cancel',
    ADVANCE: 'advance',
    RETREAT: 'retreat',
    ROW_START: 'row-start',
    ROW_END: 'row-end',
    UP: 'up',
    DOWN: 'down',
    DISMISS: 'dismiss',
    UNRECOGNIZED: 'unrecognized',
} as const

export type CompletionKey = (typeof COMPLETION_KEY)[keyof typeof COMPLETION_KEY]

export type GridDirection = Extract<
    CompletionKey,
    'advance' | 'retreat' | 'row-start' | 'row-end' | 'up' | 'down'
>

export const GRID_DIRECTIONS: readonly GridDirection[] = [
    'advance',
    'retreat',
    'row-start',
    'row-end',
    'up',
    'down',
]

export function isGridDirection(key: CompletionKey): key is GridDirection {
    return (GRID_DIRECTIONS as readonly CompletionKey[]).includes(key)
}

export type EngineState =
    | { mode: 'idle' }
    | {
          mode: 'listing'
          snapshot: CompletionSnapshot
          candidates: readonly Candidate[]
      }
    | {
          mode: 'selecting'
          snapshot: CompletionSnapshot
          candidates: readonly Candidate[]
          choiceIndex: number
      }

export type EngineMode = EngineState['mode']

/** Reported choice index whenever no cell is highlighted. */
export const NO_CHOICE = -1
