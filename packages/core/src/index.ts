export * from './types'
export { CompletionEngine, type CompletionEngineOptions } from './completion/engine'
export { aggregateCandidates, commonPrefixLength } from './completion/aggregate'
export {
    computeGridLayout,
    displayWidth,
    gridRowCount,
    navigateGrid,
    wrapIndex,
    type GridLayout,
} from './completion/grid_layout'
export {
    renderCandidateGrid,
    renderClear,
    type GridFrame,
    type RenderedGrid,
} from './completion/renderer'
export {
    adaptPrefixCompleter,
    isCandidateCompleter,
    toCandidateSource,
} from './completion/source_adapter'
export { TabCompleter } from './completion/tab_completer'
export {
    DEFAULT_CONFIG,
    expandHome,
    loadGridlineConfig,
    parseGridlineConfig,
    resolveGridlineHome,
    type CompletionConfig,
    type GridlineConfig,
    type LoadedConfig,
} from './config/config'
export * from './config/constants'
export { ConfigError, getErrorMessage, isNotFoundError, type ConfigErrorCode } from './utils/errors'
export {
    configureLogging,
    DEFAULT_LOG_LEVELS,
    FileLogger,
    Logger,
    type LoggingOptions,
} from './utils/logger'
export { clampCursorToBoundary, isHighSurrogate, isLowSurrogate } from './utils/text'
