// src/system/processMonitor.ts
import { spawn, spawnSync, type ChildProcess, type SpawnOptions } from 'child_process';
import path from 'path';

import type {
    LaunchOptions,
    ProcessHandle,
    ProcessLauncher,
    ProcessResult,
} from '../types/archive.types.js';
import {
    ArchiveError,
    ArchiveErrorCode,
    ToolNotFoundError,
    createErrorFromExitCode,
} from '../types/errors.types.js';

//#region TYPES

/** Row of the process registry */
export interface ProcessInfo {
    pid: number;
    name: string;
    /** Exit code, or null while running */
    status: number | null;
    command: string;
}

type Outcome =
    | { ok: true; result: ProcessResult }
    | { ok: false; error: ArchiveError };

interface Waiter {
    resolve: (result: ProcessResult) => void;
    reject: (error: ArchiveError) => void;
}

//#endregion

/** Exit status reported for a process ended by a signal */
const SIGNAL_EXIT_CODE = 255;
const RUN_MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Running child process with buffered stdio.
 * The outcome is recorded as soon as it is known, so `wait()` may be called late or never.
 */
class LaunchedProcess implements ProcessHandle {
    public readonly child: ChildProcess;
    public readonly argv: readonly string[];
    private stdoutBuffer: string = '';
    private stderrBuffer: string = '';
    private outcome: Outcome | null = null;
    private readonly waiters: Waiter[] = [];

    constructor(child: ChildProcess, argv: readonly string[]) {
        this.child = child;
        this.argv = argv;

        child.stdout?.on('data', (data: Buffer) => {
            this.stdoutBuffer += data.toString();
        });

        child.stderr?.on('data', (data: Buffer) => {
            this.stderrBuffer += data.toString();
        });

        child.on('error', (error: Error) => {
            this.settle({ ok: false, error: createSpawnError(error, argv) });
        });

        child.on('close', (code: number | null) => {
            const exitCode = code ?? SIGNAL_EXIT_CODE;
            if (exitCode === 0) {
                this.settle({
                    ok: true,
                    result: { exitCode, stdout: this.stdoutBuffer, stderr: this.stderrBuffer },
                });
            } else {
                this.settle({ ok: false, error: createErrorFromExitCode(exitCode, argv, this.stderrBuffer) });
            }
        });
    }

    public get pid(): number | undefined {
        return this.child.pid;
    }

    public exitCode(): number | null {
        return this.child.exitCode;
    }

    public wait(): Promise<ProcessResult> {
        return new Promise((resolve, reject) => {
            if (this.outcome) {
                deliver(this.outcome, { resolve, reject });
            } else {
                this.waiters.push({ resolve, reject });
            }
        });
    }

    /** First outcome wins; 'close' may follow an 'error' event. */
    private settle(outcome: Outcome): void {
        if (this.outcome) return;
        this.outcome = outcome;
        for (const waiter of this.waiters.splice(0)) {
            deliver(outcome, waiter);
        }
    }
}

/**
 * ProcessMonitor: launches 7-Zip (or any command) and keeps track of the
 * processes it started until they are tidied away or purged.
 */
export class ProcessMonitor implements ProcessLauncher {
    //#region PROPERTIES

    private static instance: ProcessMonitor | null = null;
    private readonly processes: Map<number, LaunchedProcess> = new Map();

    //#endregion

    //#region SINGLETON

    /**
     * Gets or creates the shared monitor. Its processes are terminated
     * when the Node.js process exits.
     */
    public static getInstance(): ProcessMonitor {
        if (!ProcessMonitor.instance) {
            const monitor = new ProcessMonitor();
            process.once('exit', () => monitor.purge());
            ProcessMonitor.instance = monitor;
        }
        return ProcessMonitor.instance;
    }

    //#endregion

    //#region PUBLIC API

    /**
     * Starts a process without waiting for it, with shell:false so that
     * arguments reach the program verbatim.
     */
    public launch(argv: readonly string[], options: LaunchOptions = {}): ProcessHandle {
        const [command, ...args] = splitCommand(argv);
        const spawnOptions: SpawnOptions = {
            shell: false,
            stdio: [options.interactive ? 'inherit' : 'ignore', 'pipe', 'pipe'],
            windowsHide: true,
            cwd: options.cwd,
            env: options.env,
        };

        const handle = new LaunchedProcess(spawn(command, args, spawnOptions), argv);
        if (handle.pid !== undefined) {
            this.processes.set(handle.pid, handle);
        }
        return handle;
    }

    /**
     * Runs to completion and returns stdout.
     * Throws an ArchiveError when the process cannot start or exits non-zero.
     */
    public run(argv: readonly string[]): string {
        const [command, ...args] = splitCommand(argv);
        const result = spawnSync(command, args, {
            shell: false,
            encoding: 'utf-8',
            windowsHide: true,
            maxBuffer: RUN_MAX_BUFFER,
        });

        if (result.error) {
            throw createSpawnError(result.error, argv);
        }
        const exitCode = result.status ?? SIGNAL_EXIT_CODE;
        if (exitCode !== 0) {
            throw createErrorFromExitCode(exitCode, argv, result.stderr);
        }
        return result.stdout;
    }

    public get(pid: number): ProcessHandle | undefined {
        return this.processes.get(pid);
    }

    public list(): ProcessInfo[] {
        return [...this.processes.entries()].map(([pid, handle]) => ({
            pid,
            name: path.basename(handle.argv[0] ?? ''),
            status: handle.exitCode(),
            command: handle.argv.join(' '),
        }));
    }

    /** Lists processes whose command line matches `pattern`. */
    public pgrep(pattern: RegExp): ProcessInfo[] {
        return this.list().filter(info => pattern.test(info.command));
    }

    /** Forgets every process that has exited. */
    public tidy(): void {
        for (const [pid, handle] of this.processes) {
            if (handle.exitCode() !== null) {
                this.processes.delete(pid);
            }
        }
    }

    /** Terminates every process still running. */
    public purge(): void {
        for (const handle of this.processes.values()) {
            if (handle.exitCode() === null && !handle.child.killed) {
                handle.child.kill('SIGTERM');
            }
        }
    }

    //#endregion
}

//#region INTERNAL

function splitCommand(argv: readonly string[]): [string, ...string[]] {
    const [command, ...args] = argv;
    if (!command) {
        throw new ArchiveError('Cannot launch an empty command line', ArchiveErrorCode.SPAWN_FAILED, { argv: [...argv] });
    }
    return [command, ...args];
}

function deliver(outcome: Outcome, waiter: Waiter): void {
    if (outcome.ok) {
        waiter.resolve(outcome.result);
    } else {
        waiter.reject(outcome.error);
    }
}

/**
 * Creates error for spawn failures.
 */
function createSpawnError(error: Error, argv: readonly string[]): ArchiveError {
    if (error.message.includes('ENOENT')) {
        return new ToolNotFoundError(argv[0]);
    }
    return new ArchiveError(
        `Failed to spawn ${argv[0]}: ${error.message}`,
        ArchiveErrorCode.SPAWN_FAILED,
        { argv: [...argv], originalError: error.message }
    );
}

//#endregion
