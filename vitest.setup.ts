import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { configureLogging } from '@gridline/core'

if (!process.env.GRIDLINE_HOME) {
    process.env.GRIDLINE_HOME = mkdtempSync(join(tmpdir(), 'gridline-test-'))
}

configureLogging()
