import type { CompletionKey } from '@gridline/core'

/** Shape of the `key` argument of Node's readline `keypress` event. */
export type KeyLike = {
    name?: string
    sequence?: string
    ctrl?: boolean
    meta?: boolean
    shift?: boolean
}

export type EditAction =
    | { type: 'none' }
    | { type: 'insert'; text: string }
    | { type: 'backspace' }
    | { type: 'delete' }
    | { type: 'delete_word' }
    | { type: 'delete_to_start' }
    | { type: 'delete_to_end' }
    | { type: 'left' }
    | { type: 'right' }
    | { type: 'home' }
    | { type: 'end' }
    | { type: 'submit' }
    | { type: 'interrupt' }
    | { type: 'eof' }

export type DecodedKey = {
    /** Meaning while completion is active. */
    completion: CompletionKey
    /** Meaning for the line editor when completion does not consume the key. */
    edit: EditAction
}

export type DeleteKind = 'none' | 'backspace' | 'delete'

const ASCII_BS = '\u0008'
const ASCII_DEL = '\u007f'
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/

const NONE: EditAction = { type: 'none' }

function decoded(completion: CompletionKey, edit: EditAction = NONE): DecodedKey {
    return { completion, edit }
}

export function resolveDeleteKind(input: string, key: KeyLike): DeleteKind {
    const isBackspaceChar = input === ASCII_BS || input === ASCII_DEL
    const isCtrlHBackspace = Boolean(key.ctrl) && input.toLowerCase() === 'h'

    if (key.name === 'backspace' || isBackspaceChar || isCtrlHBackspace) {
        return 'backspace'
    }

    if (key.name === 'delete') {
        return 'delete'
    }

    return 'none'
}

function decodeCtrl(name: string): DecodedKey | null {
    switch (name) {
        case 'a':
            return decoded('row-start', { type: 'home' })
        case 'e':
            return decoded('row-end', { type: 'end' })
        case 'b':
            return decoded('retreat', { type: 'left' })
        case 'f':
            return decoded('advance', { type: 'right' })
        case 'p':
            return decoded('up')
        case 'n':
            return decoded('down')
        case 'g':
            return decoded('cancel')
        case 'c':
            return decoded('cancel', { type: 'interrupt' })
        case 'd':
            return decoded('unrecognized', { type: 'eof' })
        case 'j':
            return decoded('accept', { type: 'submit' })
        case 'w':
            return decoded('unrecognized', { type: 'delete_word' })
        case 'u':
            return decoded('unrecognized', { type: 'delete_to_start' })
        case 'k':
            return decoded('unrecognized', { type: 'delete_to_end' })
        default:
            return null
    }
}

/** Maps one keypress to its completion key and its editing action. */
export function decodeKey(input: string | undefined, key: KeyLike = {}): DecodedKey {
    const text = input ?? key.sequence ?? ''

    const deleteKind = resolveDeleteKind(text, key)
    if (deleteKind === 'backspace') return decoded('dismiss', { type: 'backspace' })
    if (deleteKind === 'delete') return decoded('unrecognized', { type: 'delete' })

    if (key.ctrl && key.name) {
        const ctrl = decodeCtrl(key.name)
        if (ctrl) return ctrl
    }

    switch (key.name) {
        case 'tab':
            return key.shift ? decoded('retreat') : decoded('trigger')
        case 'return':
            return decoded('accept', { type: 'submit' })
        case 'enter':
            return decoded('accept', { type: 'submit' })
        case 'escape':
            return decoded('cancel')
        case 'right':
            return decoded('advance', { type: 'right' })
        case 'left':
            return decoded('retreat', { type: 'left' })
        case 'home':
            return decoded('row-start', { type: 'home' })
        case 'end':
            return decoded('row-end', { type: 'end' })
        case 'up':
            return decoded('up')
        case 'down':
            return decoded('down')
        default:
            break
    }

    if (!key.ctrl && !key.meta && text && !CONTROL_CHARS.test(text)) {
        return decoded('unrecognized', { type: 'insert', text })
    }

    return decoded('unrecognized')
}
