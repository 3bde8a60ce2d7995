// CLI entry: a raw-mode line editor that echoes each submitted line.
import { emitKeypressEvents } from 'node:readline'
import { stdin as input, stdout as output } from 'node:process'
import {
    ConfigError,
    GRIDLINE_VERSION,
    Logger,
    configureLogging,
    getErrorMessage,
    loadGridlineConfig,
    type LoadedConfig,
} from '@gridline/core'
import { HELP_TEXT, parseArgs, type CliOptions } from './cli_args'
import { createCompleter, settingsFromConfig } from './completers'
import { LineEditor } from './editor'
import type { KeyLike } from './keys'

function resolveCompleter(loaded: LoadedConfig, options: CliOptions) {
    const settings = settingsFromConfig(loaded.config.completion)
    return createCompleter({
        ...settings,
        source: options.source ?? settings.source,
        words: options.words.length ? options.words : settings.words,
    })
}

function runEditor(loaded: LoadedConfig, options: CliOptions): Promise<number> {
    const logger = new Logger('Cli')
    const editor = new LineEditor({
        prompt: loaded.config.prompt,
        completer: resolveCompleter(loaded, options),
        highlight: loaded.config.highlight,
        width: output.columns ?? 0,
        output: {
            write: (chunk) => {
                output.write(chunk)
            },
        },
    })

    return new Promise((resolve) => {
        const onResize = () => {
            editor.resize(output.columns ?? 0)
        }

        const finish = (code: number) => {
            input.off('keypress', onKeypress)
            output.off('resize', onResize)
            input.setRawMode(false)
            input.pause()
            resolve(code)
        }

        const onKeypress = (chunk: string | undefined, key: KeyLike | undefined) => {
            const result = editor.handleKeypress(chunk, key ?? {})
            switch (result.type) {
                case 'submit':
                    logger.log(`submitted ${result.line.length} characters`)
                    output.write(`${result.line}\r\n`)
                    editor.render()
                    return
                case 'interrupt':
                    finish(130)
                    return
                case 'eof':
                    finish(0)
                    return
                case 'continue':
                    return
            }
        }

        emitKeypressEvents(input)
        input.setRawMode(true)
        input.resume()
        input.on('keypress', onKeypress)
        output.on('resize', onResize)
        logger.log(`editor started (width ${output.columns ?? 0})`)
        editor.render()
    })
}

async function main(argv: string[]): Promise<number> {
    const { options, errors } = parseArgs(argv)
    if (errors.length) {
        for (const error of errors) console.error(error)
        console.error(HELP_TEXT.trim())
        return 2
    }
    if (options.showHelp) {
        console.log(HELP_TEXT.trim())
        return 0
    }
    if (options.showVersion) {
        console.log(GRIDLINE_VERSION)
        return 0
    }

    let loaded: LoadedConfig
    try {
        loaded = await loadGridlineConfig()
        configureLogging({ filePath: loaded.config.debug_log })
    } catch (error) {
        const prefix = error instanceof ConfigError ? `config error (${error.code})` : 'error'
        console.error(`${prefix}: ${getErrorMessage(error)}`)
        return 1
    }

    if (!input.isTTY || !output.isTTY) {
        console.error('gridline needs an interactive terminal.')
        return 1
    }

    return runEditor(loaded, options)
}

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code
    })
    .catch((error: unknown) => {
        console.error(getErrorMessage(error))
        process.exitCode = 1
    })
