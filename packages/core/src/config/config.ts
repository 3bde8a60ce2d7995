/** @file Reads ~/.gridline/config.toml and resolves the paths it refers to. */
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { parse } from 'toml'
import { z } from 'zod'
import { ConfigError, getErrorMessage, isNotFoundError } from '../utils/errors'
import {
    COMPLETION_SOURCES,
    CONFIG_FILE_NAME,
    DEFAULT_COMPLETION_SOURCE,
    DEFAULT_HIGHLIGHT,
    DEFAULT_HOME_DIR,
    DEFAULT_PROMPT,
    GRIDLINE_HOME_ENV,
} from './constants'

const completionSchema = z
    .object({
        source: z.enum(COMPLETION_SOURCES).default(DEFAULT_COMPLETION_SOURCE),
        words: z.array(z.string().min(1, 'words must not be empty')).default([]),
        show_hidden: z.boolean().default(false),
    })
    .strict()

const configSchema = z
    .object({
        prompt: z.string().default(DEFAULT_PROMPT),
        highlight: z
            .string()
            .regex(/^\d{1,3}(;\d{1,3})*$/, 'highlight must be SGR parameters like "30;47"')
            .default(DEFAULT_HIGHLIGHT),
        debug_log: z.string().min(1).optional(),
        completion: completionSchema.default({}),
    })
    .strict()

export type GridlineConfig = z.infer<typeof configSchema>
export type CompletionConfig = GridlineConfig['completion']

export const DEFAULT_CONFIG: GridlineConfig = configSchema.parse({})

export type LoadedConfig = {
    config: GridlineConfig
    home: string
    configPath: string
    /** False when no config file exists and defaults are in use. */
    exists: boolean
}

export function expandHome(path: string): string {
    if (path === '~') return homedir()
    if (path.startsWith('~/')) {
        return join(homedir(), path.slice(2))
    }
    return path
}

export function resolveGridlineHome(env: NodeJS.ProcessEnv = process.env): string {
    const override = env[GRIDLINE_HOME_ENV]?.trim()
    if (override) return expandHome(override)
    return join(homedir(), DEFAULT_HOME_DIR)
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ')
}

/** Parses and validates config text; `source` only labels error messages. */
export function parseGridlineConfig(text: string, source = CONFIG_FILE_NAME): GridlineConfig {
    let raw: unknown
    try {
        raw = parse(text)
    } catch (error) {
        throw new ConfigError('INVALID_CONFIG', `${source}: ${getErrorMessage(error)}`)
    }

    const result = configSchema.safeParse(raw)
    if (!result.success) {
        throw new ConfigError('INVALID_CONFIG', `${source}: ${formatIssues(result.error)}`)
    }

    const config = result.data
    if (config.debug_log) {
        return { ...config, debug_log: expandHome(config.debug_log) }
    }
    return config
}

export async function loadGridlineConfig(
    env: NodeJS.ProcessEnv = process.env,
): Promise<LoadedConfig> {
    const home = resolveGridlineHome(env)
    const configPath = join(home, CONFIG_FILE_NAME)

    let text: string
    try {
        text = await readFile(configPath, 'utf8')
    } catch (error) {
        if (isNotFoundError(error)) {
            return { config: DEFAULT_CONFIG, home, configPath, exists: false }
        }
        throw new ConfigError(
            'READ_FAILED',
            `cannot read ${configPath}: ${getErrorMessage(error)}`,
        )
    }

    return { config: parseGridlineConfig(text, configPath), home, configPath, exists: true }
}
