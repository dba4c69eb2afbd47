// src/core/presets.ts
import { NotFoundError } from '../types/errors.types.js';
import { Lzma2Method } from './methods.js';
import { OptionContainer, SevenzipOptions } from './options.js';

//#region CATALOG

const DEFAULT_EXCLUDE = ['r!desktop.ini', 'r!thumbs.db*'];
const OBMOD_SPECIFIC = ['r!*.ini', 'r!*.esm', 'r!*.esp'];

/** 7z-format base tier: large pages, multithreading, default excludes */
function sevenZipTier(level: 1 | 3 | 5 | 7 | 9, solid?: string): SevenzipOptions {
    const options = new SevenzipOptions({
        t: '7z',
        slp: '',
        mx: level,
        mmt: 'on',
        x: new Set(DEFAULT_EXCLUDE),
    });
    if (solid) {
        options.solid(solid);
    }
    return options;
}

/** Builds every catalog entry. Called once per registry. */
function buildCatalog(): Map<string, SevenzipOptions> {
    return new Map<string, SevenzipOptions>([
        // Base presets
        ['store', new SevenzipOptions({ t: 'zip', mx: 0, mcu: 'on', x: new Set(DEFAULT_EXCLUDE) })],
        ['normal', new SevenzipOptions({ t: 'zip', mx: 5, mcu: 'on', x: new Set(DEFAULT_EXCLUDE) })],
        ['fastest', sevenZipTier(1)],
        ['fast', sevenZipTier(3)],
        ['normal-7z', sevenZipTier(5, '512m')],
        ['maximum', sevenZipTier(7, '1g')],
        ['ultra', sevenZipTier(9, '2g')],
        ['extreme', sevenZipTier(9).multithreading(2).methods(new Lzma2Method({ d: 29 }))],

        // Mix-ins, merged on top of a base preset
        ['.qs', new SevenzipOptions({ mqs: 'on' })],
        ['.e1g', new SevenzipOptions({ mqs: 'on', ms: 'e1g' })],
        ['.e2g', new SevenzipOptions({ mqs: 'on', ms: 'e2g' })],
        ['.e4g', new SevenzipOptions({ mqs: 'on', ms: 'e4g' })],
        ['.mt', new SevenzipOptions({ mmt: 'on' })],
        ['.mt2', new SevenzipOptions({ mmt: 2 })],
        ['.mt4', new SevenzipOptions({ mmt: 4 })],
        ['.mt8', new SevenzipOptions({ mmt: 8 })],

        // Two-pass packing of game plugin folders: plugins stored apart, unsolid
        ['obmod-pass1', new SevenzipOptions({
            t: '7z',
            slp: '',
            mx: 9,
            ms: '1g',
            x: new Set([...DEFAULT_EXCLUDE, ...OBMOD_SPECIFIC]),
        })],
        ['obmod-pass2', new SevenzipOptions({
            t: '7z',
            slp: '',
            mx: 9,
            ms: 'off',
            x: new Set(['r!*']),
            i: new Set(OBMOD_SPECIFIC),
        })],
    ]);
}

//#endregion

/**
 * PresetRegistry: process-wide catalog of named option bundles.
 * Built once; entries never leave the registry, callers get copies.
 */
export class PresetRegistry {
    //#region PROPERTIES

    private static instance: PresetRegistry | null = null;
    private readonly entries: ReadonlyMap<string, SevenzipOptions>;
    private readonly names: readonly string[];

    //#endregion

    //#region CONSTRUCTOR & SINGLETON

    constructor(entries: ReadonlyMap<string, SevenzipOptions> = buildCatalog()) {
        this.entries = new Map(
            [...entries].map(([name, options]): [string, SevenzipOptions] => [name, options.clone()])
        );
        this.names = Object.freeze([...this.entries.keys()].sort());
    }

    /**
     * Gets or creates the shared registry holding the built-in catalog.
     */
    public static getInstance(): PresetRegistry {
        if (!PresetRegistry.instance) {
            PresetRegistry.instance = new PresetRegistry();
        }
        return PresetRegistry.instance;
    }

    //#endregion

    //#region PUBLIC API

    public has(name: string): boolean {
        return this.entries.has(name);
    }

    /** Sorted names of every registered preset. */
    public listNames(): string[] {
        return [...this.names];
    }

    /**
     * Returns an independent copy of the named preset.
     * Throws NotFoundError for unknown names.
     */
    public resolve(name: string): SevenzipOptions {
        const entry = this.entries.get(name);
        if (!entry) {
            throw new NotFoundError(name, this.names);
        }
        return entry.clone();
    }

    /**
     * Resolves names and copies containers, then merges them in order:
     * later entries override atomics and extend sets, sequences and chains.
     */
    public compose(presets: Iterable<string | OptionContainer>): SevenzipOptions {
        const resolved = [...presets].map(preset => typeof preset === 'string' ? this.resolve(preset) : preset);
        return new SevenzipOptions().mergeAll(resolved);
    }

    //#endregion
}
