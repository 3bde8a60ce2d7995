import assert from 'node:assert'
import { describe, test } from 'vitest'
import { DEFAULT_CONFIG, TabCompleter } from '@gridline/core'
import { PathCompleter, WordCompleter, createCompleter, settingsFromConfig } from './index'

describe('createCompleter', () => {
    test('builds the configured source', () => {
        const base = { words: ['go'], showHidden: false }
        assert.ok(createCompleter({ ...base, source: 'path' }) instanceof PathCompleter)
        assert.ok(createCompleter({ ...base, source: 'words' }) instanceof WordCompleter)
        assert.ok(createCompleter({ ...base, source: 'tab' }) instanceof TabCompleter)
    })

    test('reads settings from the completion config', () => {
        assert.deepStrictEqual(settingsFromConfig(DEFAULT_CONFIG.completion), {
            source: 'path',
            words: [],
            showHidden: false,
        })
    })
})
