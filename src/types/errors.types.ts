// src/types/errors.types.ts

//#region ERROR CODES

/** Error codes for option composition and 7-Zip invocations */
export enum ArchiveErrorCode {
    // Composition errors
    DOMAIN_ERROR = 'DOMAIN_ERROR',
    TYPE_MISMATCH = 'TYPE_MISMATCH',
    NOT_FOUND = 'NOT_FOUND',

    // Invocation errors
    MISSING_TARGET = 'MISSING_TARGET',
    TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
    SPAWN_FAILED = 'SPAWN_FAILED',

    // Archive errors reported by the tool
    ENCRYPTED_ARCHIVE = 'ENCRYPTED_ARCHIVE',
    CORRUPT_ARCHIVE = 'CORRUPT_ARCHIVE',
    FILE_NOT_FOUND = 'FILE_NOT_FOUND',
    DIRECTORY_NOT_FOUND = 'DIRECTORY_NOT_FOUND',

    // I/O errors
    PERMISSION_DENIED = 'PERMISSION_DENIED',
    DISK_FULL = 'DISK_FULL',
    FILE_IN_USE = 'FILE_IN_USE',

    // 7-Zip exit codes
    WARNING = 'WARNING',                       // Exit code 1
    FATAL_ERROR = 'FATAL_ERROR',               // Exit code 2
    COMMAND_LINE_ERROR = 'COMMAND_LINE_ERROR', // Exit code 7
    OUT_OF_MEMORY = 'OUT_OF_MEMORY',           // Exit code 8
    USER_ABORTED = 'USER_ABORTED',             // Exit code 255
}

//#endregion

//#region BASE ERROR

/** Base error class for composition and invocation failures */
export class ArchiveError extends Error {
    public readonly code: ArchiveErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(
        message: string,
        code: ArchiveErrorCode,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'ArchiveError';
        this.code = code;
        this.details = details;

        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, ArchiveError);
        }
    }
}

//#endregion

//#region SPECIFIC ERRORS

/** Thrown when a value falls outside the domain accepted for a key */
export class DomainError extends ArchiveError {
    constructor(key: string, value: unknown, reason: string) {
        super(
            `Invalid value for '${key}': ${formatValue(value)} (${reason})`,
            ArchiveErrorCode.DOMAIN_ERROR,
            { key, value, reason }
        );
        this.name = 'DomainError';
    }
}

/** Thrown when a value's shape disagrees with the kind declared for its key */
export class TypeMismatchError extends ArchiveError {
    constructor(key: string, expected: string, received: string) {
        super(
            `Value type for key '${key}' mismatch: expected ${expected}, got ${received}`,
            ArchiveErrorCode.TYPE_MISMATCH,
            { key, expected, received }
        );
        this.name = 'TypeMismatchError';
    }
}

/** Thrown when a preset name is not registered */
export class NotFoundError extends ArchiveError {
    constructor(name: string, available: readonly string[]) {
        super(
            `Unknown preset: '${name}'`,
            ArchiveErrorCode.NOT_FOUND,
            { name, available: [...available] }
        );
        this.name = 'NotFoundError';
    }
}

/** Thrown when neither the call nor the constructor supplied an archive path */
export class MissingTargetError extends ArchiveError {
    constructor(operation: string) {
        super(
            `Missing archive path for '${operation}' operation`,
            ArchiveErrorCode.MISSING_TARGET,
            { operation }
        );
        this.name = 'MissingTargetError';
    }
}

/** Thrown when the 7-Zip executable cannot be located */
export class ToolNotFoundError extends ArchiveError {
    constructor(executable?: string) {
        super(
            executable ? `7-Zip executable not found at: ${executable}` : '7-Zip executable not found',
            ArchiveErrorCode.TOOL_NOT_FOUND,
            { executable }
        );
        this.name = 'ToolNotFoundError';
    }
}

//#endregion

//#region UTILITIES

/** Known 7-Zip stderr patterns mapped to error codes and messages */
interface StderrPattern {
    pattern: RegExp;
    code: ArchiveErrorCode;
    message: string;
}

const STDERR_PATTERNS: StderrPattern[] = [
    // Corruption errors
    { pattern: /CRC Failed/i, code: ArchiveErrorCode.CORRUPT_ARCHIVE, message: 'CRC check failed - archive is corrupted' },
    { pattern: /Data Error/i, code: ArchiveErrorCode.CORRUPT_ARCHIVE, message: 'Data error - archive is corrupted' },
    { pattern: /Headers Error/i, code: ArchiveErrorCode.CORRUPT_ARCHIVE, message: 'Invalid archive headers - archive is corrupted' },
    { pattern: /Unexpected end of archive/i, code: ArchiveErrorCode.CORRUPT_ARCHIVE, message: 'Unexpected end of archive - file may be truncated' },
    { pattern: /Can not open the file as archive/i, code: ArchiveErrorCode.CORRUPT_ARCHIVE, message: 'Cannot open file as archive - invalid or corrupted' },
    { pattern: /Is not archive/i, code: ArchiveErrorCode.CORRUPT_ARCHIVE, message: 'File is not a valid archive' },

    // Permission errors
    { pattern: /Access is denied/i, code: ArchiveErrorCode.PERMISSION_DENIED, message: 'Access denied - permission error' },
    { pattern: /cannot access the file because it is being used/i, code: ArchiveErrorCode.FILE_IN_USE, message: 'File is in use by another process' },
    { pattern: /Sharing violation/i, code: ArchiveErrorCode.FILE_IN_USE, message: 'Sharing violation - file is locked' },

    // Disk errors
    { pattern: /There is not enough space on the disk/i, code: ArchiveErrorCode.DISK_FULL, message: 'Not enough disk space' },
    { pattern: /No space left on device/i, code: ArchiveErrorCode.DISK_FULL, message: 'No space left on device' },

    // File errors
    { pattern: /Cannot find the file/i, code: ArchiveErrorCode.FILE_NOT_FOUND, message: 'File not found' },
    { pattern: /The system cannot find the file/i, code: ArchiveErrorCode.FILE_NOT_FOUND, message: 'System cannot find the file' },
    { pattern: /The system cannot find the path/i, code: ArchiveErrorCode.DIRECTORY_NOT_FOUND, message: 'System cannot find the path' },

    // Encryption errors
    { pattern: /Wrong password/i, code: ArchiveErrorCode.ENCRYPTED_ARCHIVE, message: 'Wrong password for encrypted archive' },
    { pattern: /Enter password/i, code: ArchiveErrorCode.ENCRYPTED_ARCHIVE, message: 'Archive requires a password' },
];

/** Maps 7-Zip exit codes to ArchiveErrorCode */
export function exitCodeToErrorCode(exitCode: number): ArchiveErrorCode | null {
    switch (exitCode) {
        case 0:
            return null; // Success
        case 1:
            return ArchiveErrorCode.WARNING;
        case 2:
            return ArchiveErrorCode.FATAL_ERROR;
        case 7:
            return ArchiveErrorCode.COMMAND_LINE_ERROR;
        case 8:
            return ArchiveErrorCode.OUT_OF_MEMORY;
        case 255:
            return ArchiveErrorCode.USER_ABORTED;
        default:
            return ArchiveErrorCode.FATAL_ERROR;
    }
}

/** Default messages for the codes an exit status can map to */
const EXIT_MESSAGES: Partial<Record<ArchiveErrorCode, string>> = {
    [ArchiveErrorCode.WARNING]: 'Operation completed with warnings',
    [ArchiveErrorCode.FATAL_ERROR]: 'Fatal error occurred during operation',
    [ArchiveErrorCode.COMMAND_LINE_ERROR]: 'Invalid command line arguments',
    [ArchiveErrorCode.OUT_OF_MEMORY]: 'Out of memory',
    [ArchiveErrorCode.USER_ABORTED]: 'Operation was aborted',
};

/**
 * Parses stderr output for known 7-Zip error patterns.
 * Returns matched pattern or null if no match found.
 */
export function parseStderrForError(stderr: string): { code: ArchiveErrorCode; message: string } | null {
    for (const { pattern, code, message } of STDERR_PATTERNS) {
        if (pattern.test(stderr)) {
            return { code, message };
        }
    }
    return null;
}

/**
 * Creates an ArchiveError from a 7-Zip exit code and its stderr output.
 * Stderr is parsed first for specific error messages, then falls back to exit code.
 */
export function createErrorFromExitCode(
    exitCode: number,
    argv: readonly string[],
    stderr: string = ''
): ArchiveError {
    const stderrError = parseStderrForError(stderr);
    if (stderrError) {
        return new ArchiveError(
            stderrError.message,
            stderrError.code,
            { argv: [...argv], exitCode, stderr: stderr.trim() }
        );
    }

    const errorCode = exitCodeToErrorCode(exitCode) ?? ArchiveErrorCode.FATAL_ERROR;
    let message = EXIT_MESSAGES[errorCode] ?? 'Fatal error occurred during operation';

    // Short unmatched stderr is appended verbatim
    const stderrTrimmed = stderr.trim();
    if (stderrTrimmed && stderrTrimmed.length < 200) {
        message = `${message}: ${stderrTrimmed}`;
    }

    return new ArchiveError(
        message,
        errorCode,
        { argv: [...argv], exitCode, stderr: stderrTrimmed || undefined }
    );
}

function formatValue(value: unknown): string {
    return typeof value === 'string' ? `'${value}'` : String(value);
}

//#endregion
