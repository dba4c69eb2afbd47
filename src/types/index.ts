// src/types/index.ts

// Archive types
export { ValueKind, Operation } from './archive.types.js';

export type {
    AtomicValue,
    OptionValue,
    MappingPairs,
    OptionInput,
    OptionsInit,
    KeyRule,
    OptionSchema,
    ParamValue,
    ParameterKind,
    InvocationRequest,
    ProcessResult,
    LaunchOptions,
    ProcessHandle,
    ProcessLauncher,
    ExecutableLocator,
} from './archive.types.js';

// Error types
export {
    ArchiveErrorCode,
    ArchiveError,
    DomainError,
    TypeMismatchError,
    NotFoundError,
    MissingTargetError,
    ToolNotFoundError,
    exitCodeToErrorCode,
    createErrorFromExitCode,
    parseStderrForError,
} from './errors.types.js';
