export const GRIDLINE_VERSION = '0.1.0'

/** Environment variable overriding the config home (default `~/.gridline`). */
export const GRIDLINE_HOME_ENV = 'GRIDLINE_HOME'
export const DEFAULT_HOME_DIR = '.gridline'
export const CONFIG_FILE_NAME = 'config.toml'

export const DEFAULT_PROMPT = '> '
/** Black on white. */
export const DEFAULT_HIGHLIGHT = '30;47'

export const COMPLETION_SOURCES = ['path', 'words', 'tab'] as const
export type CompletionSourceName = (typeof COMPLETION_SOURCES)[number]
export const DEFAULT_COMPLETION_SOURCE: CompletionSourceName = 'path'
