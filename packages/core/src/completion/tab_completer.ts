import type { PrefixCompletion, PrefixCompleter } from '../types'

/** Fallback source: the trigger key inserts a literal tab. */
export class TabCompleter implements PrefixCompleter {
    complete(): PrefixCompletion {
        return { suffixes: ['\t'], sharedLength: 0 }
    }
}
