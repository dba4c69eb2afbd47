// src/index.ts

// Core classes
export { Sevenzip, ALLOWED_SWITCHES, DEFAULT_PRESETS } from './core/sevenzip.js';
export type { SevenzipConfig } from './core/sevenzip.js';

export {
    OptionContainer,
    SevenzipOptions,
    SEVENZIP_SCHEMA,
    METHOD_CHAIN_KEY,
    oneOf,
} from './core/options.js';
export type { CompressionLevel, OverwriteMode, PatternOptions } from './core/options.js';

export { PresetRegistry } from './core/presets.js';

export {
    ParameterSet,
    CompressionMethod,
    CompressionFilter,
    MethodChain,
    constructFiltered,
    FILTER_SORT_KEY,
    METHOD_SORT_KEY,
    LzmaMethod,
    Lzma2Method,
    PpmdMethod,
    BZip2Method,
    DeflateMethod,
    CopyMethod,
    DeltaFilter,
    BcjFilter,
    Bcj2Filter,
    ArmFilter,
    ArmtFilter,
    Ia64Filter,
    PpcFilter,
    SparcFilter,
} from './core/methods.js';
export type { LzmaParams, Lzma2Params, PpmdParams, Bcj2Params } from './core/methods.js';

// Collaborators
export { SystemLocator } from './system/locator.js';
export type { LocatorEnvironment } from './system/locator.js';
export { ProcessMonitor } from './system/processMonitor.js';
export type { ProcessInfo } from './system/processMonitor.js';

// Types
export * from './types/index.js';

// Utilities
export { Logger, logger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
export { askPassword } from './utils/prompt.js';
export type { PromptStreams } from './utils/prompt.js';
