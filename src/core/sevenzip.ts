// src/core/sevenzip.ts
import {
    type ExecutableLocator,
    type InvocationRequest,
    type ProcessHandle,
    type ProcessLauncher,
    Operation,
} from '../types/archive.types.js';
import { MissingTargetError, ToolNotFoundError } from '../types/errors.types.js';
import { SystemLocator } from '../system/locator.js';
import { ProcessMonitor } from '../system/processMonitor.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { type OptionContainer, SevenzipOptions } from './options.js';
import { PresetRegistry } from './presets.js';

//#region CONFIGURATION

/** Configuration for a Sevenzip job */
export interface SevenzipConfig {
    /** Default archive path; each call may override it */
    archive?: string;
    /** Preset names or containers, merged in order (defaults to ['store']) */
    presets?: readonly (string | OptionContainer)[];
    /** Raw extra arguments for every call, passed through unvalidated */
    args?: readonly string[];
    /** Prefer the GUI executables when present (defaults to true on Windows) */
    gui?: boolean;
    /** Keep stdin attached so 7-Zip can ask its own questions */
    interactive?: boolean;
    /** Explicit executable path or command name; located automatically otherwise */
    executablePath?: string;
    locator?: ExecutableLocator;
    launcher?: ProcessLauncher;
    registry?: PresetRegistry;
    logger?: Logger;
}

/** Switches each subcommand accepts; `m` admits the whole -m family */
export const ALLOWED_SWITCHES: Readonly<Record<Operation, ReadonlySet<string>>> = {
    [Operation.ADD]: new Set([
        'i', 'm', 'p', 'r', 'sdel', 'sfx', 'si', 'sni', 'sns',
        'so', 'spf', 'ssw', 'stl', 't', 'u', 'v', 'w', 'x',
    ]),
    // No -t here: a preset's archive type would stop 7-Zip from detecting the format
    [Operation.LIST]: new Set(['ai', 'an', 'ax', 'i', 'slt', 'sns', 'p', 'r', 'x']),
    [Operation.EXTRACT]: new Set([
        'ai', 'an', 'ao', 'ax', 'i', 'm', 'o', 'p', 'r',
        'si', 'sni', 'sns', 'so', 'spf', 't', 'x', 'y',
    ]),
    [Operation.EXTRACT_ALL]: new Set([
        'ai', 'an', 'ao', 'ax', 'i', 'm', 'o', 'p', 'r',
        'si', 'sni', 'sns', 'so', 'spf', 't', 'x', 'y',
    ]),
    [Operation.TEST]: new Set(['ai', 'an', 'ax', 'i', 'p', 'r', 'sns', 'x']),
};

const SUBCOMMANDS: Readonly<Record<Operation, string>> = {
    [Operation.ADD]: 'a',
    [Operation.LIST]: 'l',
    [Operation.EXTRACT]: 'e',
    [Operation.EXTRACT_ALL]: 'x',
    [Operation.TEST]: 't',
};

export const DEFAULT_PRESETS: readonly string[] = ['store'];
const OUTPUT_KEY = 'o';
const DEFAULT_OUTPUT = '.';

//#endregion

/**
 * Sevenzip: a set of options bound to the 7-Zip executable.
 * Not tied to one archive; the same job can run against many archive paths.
 */
export class Sevenzip {
    //#region PROPERTIES

    public readonly executable: string;
    public readonly executableGui: string | undefined;
    public readonly executableFm: string | undefined;
    public readonly archive: string | undefined;
    public readonly presets: readonly (string | OptionContainer)[];
    public readonly options: SevenzipOptions;
    public readonly args: readonly string[];
    public readonly gui: boolean;
    private readonly interactive: boolean;
    private readonly launcher: ProcessLauncher;
    private readonly logger: Logger;

    //#endregion

    //#region CONSTRUCTOR

    /**
     * Locates 7-Zip and merges the preset chain.
     * Throws ToolNotFoundError when no executable is found, NotFoundError for unknown presets.
     */
    constructor(config: SevenzipConfig = {}) {
        const locator = config.locator ?? new SystemLocator();
        const executable = config.executablePath
            ? locator.resolve(config.executablePath)
            : locator.locatePrimary();
        if (!executable) {
            throw new ToolNotFoundError(config.executablePath);
        }

        this.executable = executable;
        this.executableGui = locator.locateAuxiliary(executable, '7zG.exe');
        this.executableFm = locator.locateAuxiliary(executable, '7zFM.exe');
        this.archive = config.archive;
        this.presets = [...(config.presets ?? DEFAULT_PRESETS)];
        this.options = (config.registry ?? PresetRegistry.getInstance()).compose(this.presets);
        this.args = [...(config.args ?? [])];
        this.gui = config.gui ?? process.platform === 'win32';
        this.interactive = config.interactive ?? false;
        this.launcher = config.launcher ?? ProcessMonitor.getInstance();
        this.logger = config.logger ?? defaultLogger;
    }

    //#endregion

    //#region PUBLIC API

    /**
     * Adds files to an archive. The archive need not exist yet.
     */
    public add(include: readonly string[], request: Omit<InvocationRequest, 'include' | 'output'> = {}): ProcessHandle {
        return this.launch(this.buildArgs(Operation.ADD, { ...request, include }));
    }

    /**
     * Lists archive contents and returns 7-Zip's output as is.
     */
    public list(request: Omit<InvocationRequest, 'output'> = {}): string {
        const argv = this.buildArgs(Operation.LIST, request);
        this.logger.debug(`Running: ${argv.join(' ')}`);
        return this.launcher.run(argv);
    }

    /**
     * Extracts files into one directory, dropping their paths.
     */
    public extract(request: InvocationRequest = {}): ProcessHandle {
        return this.launch(this.buildArgs(Operation.EXTRACT, request));
    }

    /**
     * Extracts files with their full paths.
     */
    public extractAll(request: InvocationRequest = {}): ProcessHandle {
        return this.launch(this.buildArgs(Operation.EXTRACT_ALL, request));
    }

    public test(request: Omit<InvocationRequest, 'output'> = {}): ProcessHandle {
        return this.launch(this.buildArgs(Operation.TEST, request));
    }

    /**
     * Opens an archive in the 7-Zip file manager (Windows only).
     */
    public browse(archive?: string): ProcessHandle {
        if (!this.executableFm) {
            throw new ToolNotFoundError('7zFM.exe');
        }
        const argv = [this.executableFm, this.resolveArchive('browse', archive)];
        this.logger.debug(`Launching: ${argv.join(' ')}`);
        return this.launcher.launch(argv);
    }

    /**
     * Assembles the full argument vector for an operation:
     * executable, subcommand, filtered switches, extra args, `--`, archive, includes.
     */
    public buildArgs(operation: Operation, request: InvocationRequest = {}): string[] {
        const archive = this.resolveArchive(operation, request.archive);
        const extracting = operation === Operation.EXTRACT || operation === Operation.EXTRACT_ALL;
        const allowed = ALLOWED_SWITCHES[operation];

        const argv = [
            this.selectExecutable(operation),
            SUBCOMMANDS[operation],
            ...this.options.serialize(extracting ? without(allowed, OUTPUT_KEY) : allowed),
            ...this.args,
            ...(request.args ?? []),
        ];
        if (extracting) {
            argv.push(`-${OUTPUT_KEY}${this.resolveOutput(request.output)}`);
        }

        // Anything after '--' is a path, even if it starts with '-'
        argv.push('--', archive, ...(request.include ?? []));
        return argv;
    }

    //#endregion

    //#region INTERNAL

    private launch(argv: string[]): ProcessHandle {
        this.logger.debug(`Launching: ${argv.join(' ')}`);
        return this.launcher.launch(argv, { interactive: this.interactive });
    }

    private resolveArchive(operation: string, archive?: string): string {
        const resolved = archive ?? this.archive;
        if (resolved === undefined) {
            throw new MissingTargetError(operation);
        }
        return resolved;
    }

    /** Call argument, then the merged options' -o, then the current directory. */
    private resolveOutput(output?: string): string {
        if (output !== undefined) {
            return output;
        }
        const bound = this.options.get(OUTPUT_KEY);
        return typeof bound === 'string' || typeof bound === 'number' ? String(bound) : DEFAULT_OUTPUT;
    }

    /** Listing output is captured, so only the console executable will do. */
    private selectExecutable(operation: Operation): string {
        if (operation !== Operation.LIST && this.gui && this.executableGui) {
            return this.executableGui;
        }
        return this.executable;
    }

    //#endregion
}

function without(keys: ReadonlySet<string>, excluded: string): Set<string> {
    return new Set([...keys].filter(key => key !== excluded));
}
