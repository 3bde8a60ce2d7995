import {
    TabCompleter,
    type CompletionConfig,
    type CompletionSourceName,
    type Completer,
} from '@gridline/core'
import { PathCompleter } from './path_completer'
import { WordCompleter } from './word_completer'

export { PathCompleter, type PathCompleterOptions } from './path_completer'
export { WordCompleter } from './word_completer'
export { tokenStart } from './tokens'

export type CompleterSettings = {
    source: CompletionSourceName
    words: readonly string[]
    showHidden: boolean
    cwd?: string
}

export function settingsFromConfig(config: CompletionConfig): CompleterSettings {
    return {
        source: config.source,
        words: config.words,
        showHidden: config.show_hidden,
    }
}

export function createCompleter(settings: CompleterSettings): Completer {
    switch (settings.source) {
        case 'path':
            return new PathCompleter({ cwd: settings.cwd, showHidden: settings.showHidden })
        case 'words':
            return new WordCompleter(settings.words)
        case 'tab':
            return new TabCompleter()
    }
}
