// src/types/archive.types.ts
import type { ChildProcess } from 'child_process';
import type { ZodType } from 'zod';

//#region OPTION VALUES

/** Scalar option value, rendered verbatim after its switch */
export type AtomicValue = string | number;

/** Value as stored inside an option container */
export type OptionValue = AtomicValue | Set<string> | string[] | Map<string, AtomicValue>;

/** Key/value pairs accepted wherever a mapping value is */
export type MappingPairs = readonly (readonly [string, AtomicValue])[];

/** Value as accepted by set/merge; containers copy it before storing */
export type OptionInput =
    | AtomicValue
    | ReadonlySet<string>
    | readonly string[]
    | ReadonlyMap<string, AtomicValue>
    | MappingPairs;

/** Plain record form of an option container */
export type OptionsInit = Readonly<Record<string, OptionInput>>;

/** Merge behaviour of a key, fixed by the schema for the container's lifetime */
export enum ValueKind {
    ATOMIC = 'atomic',      // overwrite
    SET = 'set',            // union
    SEQUENCE = 'sequence',  // append
    MAPPING = 'mapping',    // update
}

/** Schema entry for one option key */
export interface KeyRule {
    kind: ValueKind;
    /** Accepted-value domain, checked on every atomic assignment */
    accept?: ZodType<AtomicValue>;
}

/** Per-key rules; keys without a rule are atomic and unrestricted */
export type OptionSchema = Readonly<Record<string, KeyRule>>;

//#endregion

//#region METHODS

/** Parameter value of a compression method or filter */
export type ParamValue = string | number;

/** Capability family of a parameter set */
export type ParameterKind = 'method' | 'filter';

//#endregion

//#region OPERATIONS

/** Operations the facade can run, keyed by their 7-Zip subcommand */
export enum Operation {
    ADD = 'add',
    LIST = 'list',
    EXTRACT = 'extract',
    EXTRACT_ALL = 'extractall',
    TEST = 'test',
}

/** Per-call arguments for an operation */
export interface InvocationRequest {
    /** Archive path, overrides the one bound at construction */
    archive?: string;
    /** Files or wildcards following the archive path */
    include?: readonly string[];
    /** Output directory for extract operations (defaults to '.') */
    output?: string;
    /** Raw extra arguments, passed through unvalidated */
    args?: readonly string[];
}

//#endregion

//#region COLLABORATORS

/** Captured outcome of a finished process */
export interface ProcessResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/** Options forwarded to the process launcher */
export interface LaunchOptions {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    /** Keep stdin attached to the terminal, needed for 7-Zip's own prompts */
    interactive?: boolean;
}

/** Handle returned for a launched process */
export interface ProcessHandle {
    readonly pid: number | undefined;
    readonly argv: readonly string[];
    readonly child: ChildProcess;
    /** Exit code, or null while the process is still running */
    exitCode(): number | null;
    /** Resolves on exit code 0, rejects with an ArchiveError otherwise */
    wait(): Promise<ProcessResult>;
}

/** Starts external processes on behalf of the facade */
export interface ProcessLauncher {
    launch(argv: readonly string[], options?: LaunchOptions): ProcessHandle;
    /** Runs to completion and returns captured stdout */
    run(argv: readonly string[]): string;
}

/** Finds the 7-Zip executables installed on this machine */
export interface ExecutableLocator {
    locatePrimary(): string | undefined;
    locateAuxiliary(primary: string, name: string): string | undefined;
    /** Resolves an explicit path or a bare command name */
    resolve(executable: string): string | undefined;
}

//#endregion
