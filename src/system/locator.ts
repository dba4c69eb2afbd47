// src/system/locator.ts
import { accessSync, constants, statSync } from 'fs';
import path from 'path';

import type { ExecutableLocator } from '../types/archive.types.js';

//#region TYPES

/** Machine facts the locator reads; injectable for tests */
export interface LocatorEnvironment {
    platform: NodeJS.Platform;
    env: NodeJS.ProcessEnv;
    isExecutable: (filePath: string) => boolean;
}

//#endregion

/** Official Linux builds first (7zz dynamic, 7zzs static), then p7zip names */
const POSIX_NAMES = ['7zz', '7zzs', '7z', '7za'];
const WINDOWS_NAMES = ['7z', '7zr'];
const WINDOWS_INSTALL_ROOTS = ['ProgramFiles', 'ProgramW6432', 'ProgramFiles(x86)'];

/**
 * SystemLocator: finds 7-Zip on PATH or in its default Windows install folder.
 */
export class SystemLocator implements ExecutableLocator {
    private readonly platform: NodeJS.Platform;
    private readonly env: NodeJS.ProcessEnv;
    private readonly isExecutable: (filePath: string) => boolean;

    constructor(environment: Partial<LocatorEnvironment> = {}) {
        this.platform = environment.platform ?? process.platform;
        this.env = environment.env ?? process.env;
        this.isExecutable = environment.isExecutable ?? (filePath => canExecute(filePath, this.platform));
    }

    //#region PUBLIC API

    public locatePrimary(): string | undefined {
        if (this.platform === 'win32') {
            for (const root of WINDOWS_INSTALL_ROOTS) {
                const base = this.env[root];
                if (!base) continue;
                const candidate = path.win32.join(base, '7-Zip', '7z.exe');
                if (this.isExecutable(candidate)) {
                    return candidate;
                }
            }
            return this.findFirst(WINDOWS_NAMES);
        }
        return this.findFirst(POSIX_NAMES);
    }

    /**
     * Finds a sibling executable such as 7zG.exe or 7zFM.exe.
     * Only the Windows distribution ships them.
     */
    public locateAuxiliary(primary: string, name: string): string | undefined {
        if (this.platform !== 'win32') {
            return undefined;
        }
        const candidate = path.win32.join(path.win32.dirname(primary), name);
        return this.isExecutable(candidate) ? candidate : undefined;
    }

    /** Checks an explicit path as is; searches PATH for a bare name. */
    public resolve(executable: string): string | undefined {
        if (/[\\/]/.test(executable)) {
            return this.isExecutable(executable) ? executable : undefined;
        }
        return this.which(executable);
    }

    public which(name: string): string | undefined {
        const pathApi = this.platform === 'win32' ? path.win32 : path.posix;
        const searchPath = this.env.PATH ?? this.env.Path ?? '';
        const directories = searchPath.split(pathApi.delimiter).filter(Boolean);

        for (const directory of directories) {
            for (const extension of this.extensionsFor(name)) {
                const candidate = pathApi.join(directory, `${name}${extension}`);
                if (this.isExecutable(candidate)) {
                    return candidate;
                }
            }
        }
        return undefined;
    }

    //#endregion

    //#region INTERNAL

    private findFirst(names: readonly string[]): string | undefined {
        for (const name of names) {
            const found = this.which(name);
            if (found) {
                return found;
            }
        }
        return undefined;
    }

    private extensionsFor(name: string): string[] {
        if (this.platform !== 'win32' || path.win32.extname(name)) {
            return [''];
        }
        const pathExt = this.env.PATHEXT ?? '.COM;.EXE;.BAT;.CMD';
        return pathExt.split(';').filter(Boolean).map(extension => extension.toLowerCase());
    }

    //#endregion
}

function canExecute(filePath: string, platform: NodeJS.Platform): boolean {
    try {
        accessSync(filePath, platform === 'win32' ? constants.F_OK : constants.X_OK);
        return statSync(filePath).isFile();
    } catch {
        return false;
    }
}
