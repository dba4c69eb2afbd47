/**
 * Tests for the process monitor, with child_process mocked out.
 */
import { PassThrough } from 'stream';
import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('child_process', async importOriginal => {
    const actual = await importOriginal<typeof import('child_process')>();
    return {
        ...actual,
        spawn: vi.fn(),
        spawnSync: vi.fn(),
    };
});

import { ChildProcess, spawn, spawnSync } from 'child_process';
import { ProcessMonitor } from '../../../src/system/processMonitor.js';
import {
    ArchiveError,
    ArchiveErrorCode,
    ToolNotFoundError,
} from '../../../src/types/errors.types.js';

const ARGV = ['/usr/bin/7zz', 't', '--', 'a.7z'];

/** Child process stand-in whose events the test drives */
class FakeChild extends ChildProcess {
    public override readonly pid: number | undefined = undefined;
    public override exitCode: number | null = null;
    public readonly out = new PassThrough();
    public readonly err = new PassThrough();
    public readonly signals: (NodeJS.Signals | number | undefined)[] = [];

    constructor(pid: number | null = 101) {
        super();
        this.pid = pid ?? undefined;
        this.stdout = this.out;
        this.stderr = this.err;
    }

    public override kill(signal?: NodeJS.Signals | number): boolean {
        this.signals.push(signal);
        return true;
    }

    public finish(code: number | null, stdout = '', stderr = ''): void {
        if (stdout) this.out.emit('data', Buffer.from(stdout));
        if (stderr) this.err.emit('data', Buffer.from(stderr));
        this.exitCode = code;
        this.emit('close', code, code === null ? 'SIGKILL' : null);
    }
}

function syncResult(status: number | null, stdout: string, stderr = '', error?: Error) {
    return { pid: 7, output: [null, stdout, stderr], stdout, stderr, status, signal: null, error };
}

describe('ProcessMonitor', () => {
    let monitor: ProcessMonitor;
    let child: FakeChild;

    beforeEach(() => {
        vi.mocked(spawn).mockReset();
        vi.mocked(spawnSync).mockReset();
        monitor = new ProcessMonitor();
        child = new FakeChild();
        vi.mocked(spawn).mockReturnValue(child);
    });

    describe('launch', () => {
        it('should spawn without a shell and with piped output', () => {
            monitor.launch(ARGV);

            expect(spawn).toHaveBeenCalledWith('/usr/bin/7zz', ['t', '--', 'a.7z'], {
                shell: false,
                stdio: ['ignore', 'pipe', 'pipe'],
                windowsHide: true,
                cwd: undefined,
                env: undefined,
            });
        });

        it('should inherit stdin for interactive runs', () => {
            monitor.launch(ARGV, { interactive: true, cwd: '/work' });

            expect(spawn).toHaveBeenCalledWith('/usr/bin/7zz', ['t', '--', 'a.7z'], expect.objectContaining({
                stdio: ['inherit', 'pipe', 'pipe'],
                cwd: '/work',
            }));
        });

        it('should reject an empty command line', () => {
            expect(() => monitor.launch([])).toThrow(ArchiveError);
            expect(spawn).not.toHaveBeenCalled();
        });
    });

    describe('wait', () => {
        it('should resolve with buffered output on exit code 0', async () => {
            const handle = monitor.launch(ARGV);
            child.finish(0, 'Everything is Ok\n');

            await expect(handle.wait()).resolves.toEqual({
                exitCode: 0,
                stdout: 'Everything is Ok\n',
                stderr: '',
            });
        });

        it('should resolve waiters registered before exit', async () => {
            const handle = monitor.launch(ARGV);
            const pending = handle.wait();
            child.finish(0, 'done');

            await expect(pending).resolves.toMatchObject({ stdout: 'done' });
        });

        it('should map known stderr messages', async () => {
            const handle = monitor.launch(ARGV);
            child.finish(2, '', 'ERROR: Wrong password : a.txt\n');

            await expect(handle.wait()).rejects.toMatchObject({
                code: ArchiveErrorCode.ENCRYPTED_ARCHIVE,
                message: 'Wrong password for encrypted archive',
            });
        });

        it('should fall back to the exit code', async () => {
            const handle = monitor.launch(ARGV);
            child.finish(2);

            await expect(handle.wait()).rejects.toMatchObject({
                code: ArchiveErrorCode.FATAL_ERROR,
                message: 'Fatal error occurred during operation',
            });
        });

        it('should report a signal-terminated process as aborted', async () => {
            const handle = monitor.launch(ARGV);
            child.finish(null);

            await expect(handle.wait()).rejects.toMatchObject({
                code: ArchiveErrorCode.USER_ABORTED,
                details: { exitCode: 255 },
            });
        });

        it('should keep the first outcome when spawning fails', async () => {
            const handle = monitor.launch(ARGV);
            child.emit('error', new Error('spawn /usr/bin/7zz ENOENT'));
            child.finish(0);

            await expect(handle.wait()).rejects.toBeInstanceOf(ToolNotFoundError);
        });

        it('should report other spawn failures', async () => {
            const handle = monitor.launch(ARGV);
            child.emit('error', new Error('spawn EACCES'));

            await expect(handle.wait()).rejects.toMatchObject({
                code: ArchiveErrorCode.SPAWN_FAILED,
                message: 'Failed to spawn /usr/bin/7zz: spawn EACCES',
            });
        });
    });

    describe('run', () => {
        it('should return stdout on success', () => {
            vi.mocked(spawnSync).mockReturnValue(syncResult(0, 'listing'));

            expect(monitor.run(['/usr/bin/7zz', 'l', '--', 'a.7z'])).toBe('listing');
            expect(spawnSync).toHaveBeenCalledWith('/usr/bin/7zz', ['l', '--', 'a.7z'], expect.objectContaining({
                shell: false,
                encoding: 'utf-8',
            }));
        });

        it('should throw on a non-zero exit', () => {
            vi.mocked(spawnSync).mockReturnValue(syncResult(7, '', 'Unsupported command\n'));

            expect(() => monitor.run(ARGV)).toThrow('Invalid command line arguments: Unsupported command');
        });

        it('should throw when the executable is missing', () => {
            vi.mocked(spawnSync).mockReturnValue(syncResult(null, '', '', new Error('spawnSync 7zz ENOENT')));

            expect(() => monitor.run(['7zz', 'l'])).toThrow('7-Zip executable not found at: 7zz');
        });
    });

    describe('registry', () => {
        it('should track launched processes by pid', () => {
            const handle = monitor.launch(ARGV);

            expect(monitor.get(101)).toBe(handle);
            expect(monitor.list()).toEqual([
                { pid: 101, name: '7zz', status: null, command: '/usr/bin/7zz t -- a.7z' },
            ]);
            expect(monitor.pgrep(/a\.7z$/)).toHaveLength(1);
            expect(monitor.pgrep(/b\.7z$/)).toHaveLength(0);
        });

        it('should not register a process without a pid', () => {
            vi.mocked(spawn).mockReturnValue(new FakeChild(null));
            monitor.launch(ARGV);
            expect(monitor.list()).toEqual([]);
        });

        it('should tidy away finished processes', async () => {
            const handle = monitor.launch(ARGV);
            child.finish(0);
            await handle.wait();

            monitor.tidy();

            expect(monitor.list()).toEqual([]);
        });

        it('should terminate running processes on purge', () => {
            const running = child;
            const finished = new FakeChild(102);
            monitor.launch(ARGV);
            vi.mocked(spawn).mockReturnValue(finished);
            monitor.launch(ARGV);
            finished.finish(0);

            monitor.purge();

            expect(running.signals).toEqual(['SIGTERM']);
            expect(finished.signals).toEqual([]);
        });
    });
});
