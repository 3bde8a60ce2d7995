export { LineEditor, type KeyResult, type LineEditorOptions } from './editor'
export { EditorLineBuffer } from './line_buffer'
export { decodeKey, resolveDeleteKind, type DecodedKey, type EditAction, type KeyLike } from './keys'
export * from './completers'
export { HELP_TEXT, parseArgs, type CliOptions, type ParsedArgs } from './cli_args'
