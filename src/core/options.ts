// src/core/options.ts
import { z, type ZodType } from 'zod';

import {
    type AtomicValue,
    type KeyRule,
    type MappingPairs,
    type OptionInput,
    type OptionSchema,
    type OptionValue,
    type OptionsInit,
    ValueKind,
} from '../types/archive.types.js';
import { DomainError, TypeMismatchError } from '../types/errors.types.js';
import { MethodChain, type ParameterSet } from './methods.js';

//#region CONSTANTS

/** Switch that governs the method chain; also admits every `-m<x>` key */
export const METHOD_CHAIN_KEY = 'm';

const ATOMIC_RULE: KeyRule = { kind: ValueKind.ATOMIC };

/** Accepted-value domain made of a few literal values */
export function oneOf(...accepted: AtomicValue[]): ZodType<AtomicValue> {
    return z.union([z.string(), z.number()])
        .refine(value => accepted.includes(value))
        .describe(`one of ${accepted.map(value => JSON.stringify(value)).join(', ')}`);
}

//#endregion

//#region VALUE HELPERS

function isAtomic(value: unknown): value is AtomicValue {
    return typeof value === 'string' || typeof value === 'number';
}

function isStringSet(value: unknown): value is ReadonlySet<string> {
    return value instanceof Set && [...value].every(item => typeof item === 'string');
}

function isStringArray(value: unknown): value is readonly string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isAtomicMap(value: unknown): value is ReadonlyMap<string, AtomicValue> {
    return value instanceof Map && [...value].every(([key, item]) => typeof key === 'string' && isAtomic(item));
}

function isPairs(value: unknown): value is MappingPairs {
    return Array.isArray(value) && value.every(
        item => Array.isArray(item) && item.length === 2 && typeof item[0] === 'string' && isAtomic(item[1])
    );
}

function describe(value: OptionInput): string {
    if (value instanceof Set) return 'set';
    if (value instanceof Map) return 'mapping';
    if (Array.isArray(value)) return 'sequence';
    return typeof value;
}

function cloneValue(value: OptionValue): OptionValue {
    if (value instanceof Set) return new Set(value);
    if (value instanceof Map) return new Map(value);
    if (Array.isArray(value)) return [...value];
    return value;
}

function isMethodSwitch(key: string): boolean {
    return key.length > 1 && key.startsWith(METHOD_CHAIN_KEY);
}

//#endregion

/**
 * Key/value store of 7-Zip switches plus a method chain.
 * Merge behaviour per key comes from the schema, never from the values seen.
 * Every mutation validates all of its input before storing any of it.
 */
export class OptionContainer {
    protected readonly schema: OptionSchema;
    private readonly values: Map<string, OptionValue> = new Map();
    private methodChain: MethodChain = new MethodChain();

    constructor(init?: OptionsInit, schema: OptionSchema = {}) {
        this.schema = schema;
        if (init) {
            this.merge(init);
        }
    }

    //#region ACCESSORS

    /** The chain itself, not a copy; appending to it changes this container. */
    public get chain(): MethodChain {
        return this.methodChain;
    }

    public get size(): number {
        return this.values.size;
    }

    public has(key: string): boolean {
        return this.values.has(key);
    }

    /** Independent copy of the stored value. */
    public get(key: string): OptionValue | undefined {
        const value = this.values.get(key);
        return value === undefined ? undefined : cloneValue(value);
    }

    public keys(): string[] {
        return [...this.values.keys()];
    }

    public entries(): [string, OptionValue][] {
        return [...this.values].map(([key, value]) => [key, cloneValue(value)]);
    }

    public ruleFor(key: string): KeyRule {
        return Object.hasOwn(this.schema, key) ? this.schema[key] : ATOMIC_RULE;
    }

    //#endregion

    //#region MUTATION

    /** Replaces the value of a key after checking its kind and domain. */
    public set(key: string, value: OptionInput): this {
        this.values.set(key, this.combine(key, undefined, value));
        return this;
    }

    public delete(key: string): boolean {
        return this.values.delete(key);
    }

    /**
     * Merges another container or plain record into this one.
     * Atomic keys are overwritten, sets joined, sequences extended and
     * mappings updated. The other container's chain is appended to ours.
     */
    public merge(other: OptionContainer | OptionsInit): this {
        const incoming: [string, OptionInput][] = other instanceof OptionContainer
            ? [...other.values]
            : Object.entries(other);

        const staged = new Map<string, OptionValue>();
        for (const [key, value] of incoming) {
            staged.set(key, this.combine(key, staged.get(key) ?? this.values.get(key), value));
        }

        for (const [key, value] of staged) {
            this.values.set(key, value);
        }
        if (other instanceof OptionContainer) {
            this.methodChain.append(...other.methodChain.clone());
        }
        return this;
    }

    /** Ordered merge of several containers; all or nothing. */
    public mergeAll(others: Iterable<OptionContainer | OptionsInit>): this {
        const draft = this.copyTo(new OptionContainer(undefined, this.schema));
        for (const other of others) {
            draft.merge(other);
        }

        this.values.clear();
        for (const [key, value] of draft.values) {
            this.values.set(key, value);
        }
        this.methodChain = draft.methodChain;
        return this;
    }

    /** Merged copy; this container is left untouched. */
    public union(other: OptionContainer | OptionsInit): OptionContainer {
        return this.clone().merge(other);
    }

    //#endregion

    //#region SERIALIZATION

    /**
     * Renders the switches, optionally restricted to `allowedKeys`.
     * Iterable values repeat the switch once per element.
     */
    public serialize(allowedKeys?: ReadonlySet<string>): string[] {
        const args: string[] = [];

        for (const [key, value] of this.values) {
            if (allowedKeys && !isKeyAllowed(key, allowedKeys)) continue;

            const flag = isMethodSwitch(key) ? `-${key}=` : `-${key}`;
            if (value instanceof Set || Array.isArray(value)) {
                for (const item of value) {
                    args.push(`${flag}${item}`);
                }
            } else if (value instanceof Map) {
                for (const [name, item] of value) {
                    args.push(`${flag}${name}=${item}`);
                }
            } else {
                args.push(`${flag}${value}`);
            }
        }

        if (!allowedKeys || allowedKeys.has(METHOD_CHAIN_KEY)) {
            args.push(...this.methodChain.serialize());
        }
        return args;
    }

    public toString(): string {
        return this.serialize().join(' ');
    }

    public equals(other: OptionContainer): boolean {
        const mine = this.serialize();
        const theirs = other.serialize();
        return mine.length === theirs.length && mine.every((arg, index) => arg === theirs[index]);
    }

    public clone(): OptionContainer {
        return this.copyTo(new OptionContainer(undefined, this.schema));
    }

    //#endregion

    //#region INTERNAL

    protected copyTo<T extends OptionContainer>(target: T): T {
        for (const [key, value] of this.values) {
            target.values.set(key, cloneValue(value));
        }
        target.methodChain = this.methodChain.clone();
        return target;
    }

    /** Computes the value a key would hold after taking `incoming`; stores nothing. */
    private combine(key: string, current: OptionValue | undefined, incoming: OptionInput): OptionValue {
        const rule = this.ruleFor(key);

        switch (rule.kind) {
            case ValueKind.SET: {
                if (!isStringSet(incoming)) {
                    throw new TypeMismatchError(key, 'set', describe(incoming));
                }
                const base = current instanceof Set ? current : new Set<string>();
                return new Set([...base, ...incoming]);
            }
            case ValueKind.SEQUENCE: {
                if (!isStringArray(incoming)) {
                    throw new TypeMismatchError(key, 'sequence', describe(incoming));
                }
                const base = Array.isArray(current) ? current : [];
                return [...base, ...incoming];
            }
            case ValueKind.MAPPING: {
                const pairs = isAtomicMap(incoming) ? [...incoming] : isPairs(incoming) ? incoming : undefined;
                if (!pairs) {
                    throw new TypeMismatchError(key, 'mapping', describe(incoming));
                }
                const base = current instanceof Map ? current : new Map<string, AtomicValue>();
                return new Map([...base, ...pairs]);
            }
            case ValueKind.ATOMIC: {
                if (!isAtomic(incoming)) {
                    throw new TypeMismatchError(key, 'atomic', describe(incoming));
                }
                if (rule.accept && !rule.accept.safeParse(incoming).success) {
                    throw new DomainError(key, incoming, rule.accept.description ?? 'outside the accepted domain');
                }
                return incoming;
            }
        }
    }

    //#endregion
}

function isKeyAllowed(key: string, allowedKeys: ReadonlySet<string>): boolean {
    return allowedKeys.has(key) || (isMethodSwitch(key) && allowedKeys.has(METHOD_CHAIN_KEY));
}

//#region 7-ZIP OPTIONS

const LEVELS = [0, 1, 3, 5, 7, 9] as const;
const ON_OFF = oneOf('on', 'off');

/** Switch rules of the 7-Zip command line */
export const SEVENZIP_SCHEMA: OptionSchema = {
    ai: { kind: ValueKind.SET },
    an: { kind: ValueKind.ATOMIC, accept: oneOf('') },
    ao: { kind: ValueKind.ATOMIC, accept: oneOf('a', 's', 'u', 't') },
    ax: { kind: ValueKind.SET },
    i: { kind: ValueKind.SET },
    mhc: { kind: ValueKind.ATOMIC, accept: ON_OFF },
    mhe: { kind: ValueKind.ATOMIC, accept: ON_OFF },
    mqs: { kind: ValueKind.ATOMIC, accept: ON_OFF },
    mx: { kind: ValueKind.ATOMIC, accept: oneOf(...LEVELS) },
    myx: { kind: ValueKind.ATOMIC, accept: oneOf(...LEVELS) },
    r: { kind: ValueKind.ATOMIC, accept: oneOf('', '-', '0') },
    slp: { kind: ValueKind.ATOMIC, accept: oneOf('', '-') },
    ssc: { kind: ValueKind.ATOMIC, accept: oneOf('', '-') },
    u: { kind: ValueKind.SET },
    v: { kind: ValueKind.SEQUENCE },
    x: { kind: ValueKind.SET },
    y: { kind: ValueKind.ATOMIC, accept: oneOf('') },
};

export type CompressionLevel = (typeof LEVELS)[number];
export type OverwriteMode = 'a' | 's' | 'u' | 't';

/** How an include/exclude pattern recurses and what it refers to */
export interface PatternOptions {
    /** 'r' recurse, 'r-' never, 'r0' wildcards only, '' use the global -r */
    recurseType?: 'r' | 'r-' | 'r0' | '';
    /** '!' wildcard or file name, '@' list file */
    fileRefType?: '!' | '@';
}

/**
 * Option container bound to the 7-Zip switch schema, with fluent setters
 * named after what each switch does.
 */
export class SevenzipOptions extends OptionContainer {
    constructor(init?: OptionsInit) {
        super(init, SEVENZIP_SCHEMA);
    }

    public override clone(): SevenzipOptions {
        return this.copyTo(new SevenzipOptions());
    }

    public override union(other: OptionContainer | OptionsInit): SevenzipOptions {
        return this.clone().merge(other);
    }

    //#region ARCHIVE

    /** Archive type: 7z, zip, gzip, bzip2, tar, xz, ... */
    public type(archiveType: string): this {
        return this.set('t', archiveType);
    }

    public password(value: string): this {
        return this.set('p', value);
    }

    /** Extraction target; a '*' is replaced by the archive name. */
    public output(directory: string): this {
        return this.set('o', directory);
    }

    public overwriteMode(mode: OverwriteMode): this {
        return this.set('ao', mode);
    }

    /** Suppresses 7-Zip's interactive queries. */
    public yes(enabled: boolean = true): this {
        if (enabled) {
            return this.set('y', '');
        }
        this.delete('y');
        return this;
    }

    public recurse(mode: '' | '-' | '0'): this {
        return this.set('r', mode);
    }

    public include(patterns: string | readonly string[], options: PatternOptions = {}): this {
        return this.merge({ i: toPatternSet(patterns, options) });
    }

    public exclude(patterns: string | readonly string[], options: PatternOptions = {}): this {
        return this.merge({ x: toPatternSet(patterns, options) });
    }

    /** Update action switch such as '-p0q3' or '!new.7z'; repeatable. */
    public updateMode(action: string): this {
        return this.merge({ u: new Set([action]) });
    }

    /** Splits into volumes of the given sizes, in order. */
    public volumes(...sizes: string[]): this {
        return this.merge({ v: sizes });
    }

    public largePages(enabled: boolean): this {
        return this.set('slp', enabled ? '' : '-');
    }

    public caseSensitive(enabled: boolean): this {
        return this.set('ssc', enabled ? '' : '-');
    }

    //#endregion

    //#region COMPRESSION

    /** Appends to the method chain; earlier entries apply first. */
    public methods(...items: ParameterSet[]): this {
        this.chain.append(...items);
        return this;
    }

    public level(value: CompressionLevel): this {
        return this.set('mx', value);
    }

    /** 0 none, 1+ WAV, 7+ executables, 9 all files. */
    public fileAnalysisLevel(value: CompressionLevel): this {
        return this.set('myx', value);
    }

    /** true/false for on/off, or a block spec such as 'e1g' or '512m'. */
    public solid(value: boolean | string): this {
        return this.set('ms', typeof value === 'boolean' ? onOff(value) : value);
    }

    public sortByType(enabled: boolean): this {
        return this.set('mqs', onOff(enabled));
    }

    /** true/false for the automatic executable filters, or one filter for every file. */
    public filter(value: boolean | ParameterSet): this {
        return this.set('mf', typeof value === 'boolean' ? onOff(value) : value.name);
    }

    public headerCompression(enabled: boolean): this {
        return this.set('mhc', onOff(enabled));
    }

    public headerEncryption(enabled: boolean): this {
        return this.set('mhe', onOff(enabled));
    }

    /** true/false for on/off, or a thread count. */
    public multithreading(value: boolean | number): this {
        return this.set('mmt', typeof value === 'boolean' ? onOff(value) : value);
    }

    //#endregion
}

function onOff(enabled: boolean): 'on' | 'off' {
    return enabled ? 'on' : 'off';
}

function toPatternSet(patterns: string | readonly string[], options: PatternOptions): Set<string> {
    const list = typeof patterns === 'string' ? [patterns] : patterns;
    const prefix = `${options.recurseType ?? 'r'}${options.fileRefType ?? '!'}`;
    return new Set(list.map(pattern => `${prefix}${pattern}`));
}

//#endregion
