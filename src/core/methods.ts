// src/core/methods.ts
import { z } from 'zod';

import type { ParamValue, ParameterKind } from '../types/archive.types.js';
import { DomainError } from '../types/errors.types.js';

//#region SCHEMAS

/** Filters sort ahead of methods */
export const FILTER_SORT_KEY = 0;
export const METHOD_SORT_KEY = 64;

/** Size as a power-of-two exponent, or a count with a b/k/m/g suffix */
const SizeSchema = z.union([
    z.number().int().min(0).max(31),
    z.string().regex(/^\d+[bkmg]?$/i, 'expected <number>[b|k|m|g]'),
]);

const intRange = (min: number, max: number) => z.number().int().min(min).max(max);

const LZMA_KEYS = ['a', 'd', 'mf', 'fb', 'mc', 'lc', 'lp', 'pb'] as const;
const LZMA2_KEYS = [...LZMA_KEYS, 'c'] as const;
const PPMD_KEYS = ['mem', 'o'] as const;
const BCJ2_KEYS = ['d'] as const;

export type LzmaParams = Partial<Record<(typeof LZMA_KEYS)[number], ParamValue>>;
export type Lzma2Params = Partial<Record<(typeof LZMA2_KEYS)[number], ParamValue>>;
export type PpmdParams = Partial<Record<(typeof PPMD_KEYS)[number], ParamValue>>;
export type Bcj2Params = Partial<Record<(typeof BCJ2_KEYS)[number], ParamValue>>;

//#endregion

//#region BASE

/**
 * A named compression method or filter with a fixed parameter domain.
 * Renders as one `-m{N}=Name:k=v...` switch once its chain position is known.
 */
export abstract class ParameterSet {
    public name: string;
    public abstract readonly kind: ParameterKind;
    public readonly allowedKeys: ReadonlySet<string>;
    private readonly values: Map<string, ParamValue> = new Map();

    protected constructor(
        name: string,
        allowedKeys: readonly string[],
        initial?: Readonly<Record<string, ParamValue | undefined>>
    ) {
        this.name = name;
        this.allowedKeys = new Set(allowedKeys);

        if (initial) {
            for (const [key, value] of Object.entries(initial)) {
                if (value !== undefined) {
                    this.set(key, value);
                }
            }
        }
    }

    public get sortKey(): number {
        return this.kind === 'filter' ? FILTER_SORT_KEY : METHOD_SORT_KEY;
    }

    public get(key: string): ParamValue | undefined {
        return this.values.get(key);
    }

    /** Assigns a parameter; keys outside the family's domain are rejected. */
    public set(key: string, value: ParamValue): this {
        if (!this.allowedKeys.has(key)) {
            throw new DomainError(key, value, `unallowed key for ${this.name}`);
        }
        this.values.set(key, value);
        return this;
    }

    public entries(): [string, ParamValue][] {
        return [...this.values.entries()];
    }

    public serialize(index: number): string {
        const params = [...this.values].map(([key, value]) => `${key}=${value}`);
        return `-m${index}=${[this.name, ...params].join(':')}`;
    }

    public clone(): ParameterSet {
        const copy = this.spawn();
        copy.name = this.name;
        for (const [key, value] of this.values) {
            copy.values.set(key, value);
        }
        return copy;
    }

    /** Validates against a setter's range before assigning. */
    protected assign(key: string, schema: z.ZodType<ParamValue>, value: ParamValue): this {
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            throw new DomainError(key, value, parsed.error.issues[0]?.message ?? 'invalid value');
        }
        return this.set(key, parsed.data);
    }

    /** Fresh, empty instance of the same family. */
    protected abstract spawn(): ParameterSet;
}

export abstract class CompressionMethod extends ParameterSet {
    public readonly kind = 'method';
}

export abstract class CompressionFilter extends ParameterSet {
    public readonly kind = 'filter';
}

/**
 * Builds a parameter set from an arbitrary mapping, silently dropping keys
 * outside the family's domain. Values of allowed keys must still be scalars.
 */
export function constructFiltered<T extends ParameterSet>(
    Family: new () => T,
    mapping: Readonly<Record<string, unknown>>
): T {
    const target = new Family();
    for (const [key, value] of Object.entries(mapping)) {
        if (!target.allowedKeys.has(key)) continue;
        if (typeof value !== 'string' && typeof value !== 'number') {
            throw new DomainError(key, value, 'expected a string or number');
        }
        target.set(key, value);
    }
    return target;
}

//#endregion

//#region METHODS

/** Setters shared by LZMA and LZMA2 */
abstract class LzmaFamily extends CompressionMethod {
    /** 0 = fast, 1 = normal. */
    public fastCompression(value: 0 | 1): this {
        return this.assign('a', z.union([z.literal(0), z.literal(1)]), value);
    }

    /**
     * Dictionary size. A bare number is an exponent (2^value bytes);
     * a string takes a b/k/m/g suffix, e.g. '64m'.
     */
    public dictSize(value: ParamValue): this {
        return this.assign('d', SizeSchema, value);
    }

    /** bt* trees compress better, hc4 runs faster. */
    public matchFinder(value: 'bt2' | 'bt3' | 'bt4' | 'hc4'): this {
        return this.assign('mf', z.enum(['bt2', 'bt3', 'bt4', 'hc4']), value);
    }

    public fastBytes(value: number): this {
        return this.assign('fb', intRange(5, 273), value);
    }

    /** 0 lets 7-Zip pick the default cycle count. */
    public matchFinderCycles(value: number): this {
        return this.assign('mc', intRange(0, 1_000_000_000), value);
    }

    public literalContextBits(value: number): this {
        return this.assign('lc', intRange(0, 8), value);
    }

    public literalPosBits(value: number): this {
        return this.assign('lp', intRange(0, 4), value);
    }

    public posBits(value: number): this {
        return this.assign('pb', intRange(0, 4), value);
    }
}

/** LZ-based algorithm */
export class LzmaMethod extends LzmaFamily {
    constructor(initial?: LzmaParams) {
        super('LZMA', LZMA_KEYS, initial);
    }

    protected spawn(): LzmaMethod {
        return new LzmaMethod();
    }
}

/** LZMA with chunked multithreading and stored incompressible blocks */
export class Lzma2Method extends LzmaFamily {
    constructor(initial?: Lzma2Params) {
        super('LZMA2', LZMA2_KEYS, initial);
    }

    public chunkSize(value: ParamValue): this {
        return this.assign('c', SizeSchema, value);
    }

    protected spawn(): Lzma2Method {
        return new Lzma2Method();
    }
}

/** PPMdH variant, strong on plain text */
export class PpmdMethod extends CompressionMethod {
    constructor(initial?: PpmdParams) {
        super('PPMd', PPMD_KEYS, initial);
    }

    public memorySize(value: ParamValue): this {
        return this.assign('mem', SizeSchema, value);
    }

    public modelOrder(value: number): this {
        return this.assign('o', intRange(2, 32), value);
    }

    protected spawn(): PpmdMethod {
        return new PpmdMethod();
    }
}

export class BZip2Method extends CompressionMethod {
    constructor() {
        super('BZip2', []);
    }

    protected spawn(): BZip2Method {
        return new BZip2Method();
    }
}

export class DeflateMethod extends CompressionMethod {
    constructor() {
        super('Deflate', []);
    }

    protected spawn(): DeflateMethod {
        return new DeflateMethod();
    }
}

/** No compression */
export class CopyMethod extends CompressionMethod {
    constructor() {
        super('Copy', []);
    }

    protected spawn(): CopyMethod {
        return new CopyMethod();
    }
}

//#endregion

//#region FILTERS

export class DeltaFilter extends CompressionFilter {
    constructor() {
        super('Delta:1', []);
    }

    /** Offset in bytes; 16-bit stereo WAV data compresses best with 4. */
    public deltaOffset(value: number): this {
        const parsed = intRange(1, 256).safeParse(value);
        if (!parsed.success) {
            throw new DomainError('offset', value, parsed.error.issues[0]?.message ?? 'invalid value');
        }
        this.name = `Delta:${parsed.data}`;
        return this;
    }

    protected spawn(): DeltaFilter {
        return new DeltaFilter();
    }
}

/** x86 branch converter */
export class BcjFilter extends CompressionFilter {
    constructor() {
        super('BCJ', []);
    }

    protected spawn(): BcjFilter {
        return new BcjFilter();
    }
}

/**
 * x86 branch converter, version 2. Splits into four streams; the call and
 * jump streams usually need a much smaller dictionary than the main one.
 */
export class Bcj2Filter extends CompressionFilter {
    constructor(initial?: Bcj2Params) {
        super('BCJ2', BCJ2_KEYS, initial);
    }

    public dictSize(value: ParamValue): this {
        return this.assign('d', SizeSchema, value);
    }

    protected spawn(): Bcj2Filter {
        return new Bcj2Filter();
    }
}

export class ArmFilter extends CompressionFilter {
    constructor() {
        super('ARM', []);
    }

    protected spawn(): ArmFilter {
        return new ArmFilter();
    }
}

export class ArmtFilter extends CompressionFilter {
    constructor() {
        super('ARMT', []);
    }

    protected spawn(): ArmtFilter {
        return new ArmtFilter();
    }
}

export class Ia64Filter extends CompressionFilter {
    constructor() {
        super('IA64', []);
    }

    protected spawn(): Ia64Filter {
        return new Ia64Filter();
    }
}

export class PpcFilter extends CompressionFilter {
    constructor() {
        super('PPC', []);
    }

    protected spawn(): PpcFilter {
        return new PpcFilter();
    }
}

export class SparcFilter extends CompressionFilter {
    constructor() {
        super('SPARC', []);
    }

    protected spawn(): SparcFilter {
        return new SparcFilter();
    }
}

//#endregion

//#region CHAIN

/**
 * Ordered, append-only list of methods and filters.
 * Position in the chain becomes the `{N}` of each `-m{N}=` switch.
 */
export class MethodChain implements Iterable<ParameterSet> {
    private readonly items: ParameterSet[] = [];

    constructor(items: Iterable<ParameterSet> = []) {
        this.items.push(...items);
    }

    public get length(): number {
        return this.items.length;
    }

    public at(index: number): ParameterSet | undefined {
        return this.items.at(index);
    }

    public append(...items: ParameterSet[]): this {
        this.items.push(...items);
        return this;
    }

    public serialize(): string[] {
        return this.items.map((item, index) => item.serialize(index));
    }

    public clone(): MethodChain {
        return new MethodChain(this.items.map(item => item.clone()));
    }

    /** Copy with filters moved ahead of methods, otherwise in insertion order. */
    public normalized(): MethodChain {
        const sorted = [...this.items].sort((a, b) => a.sortKey - b.sortKey);
        return new MethodChain(sorted.map(item => item.clone()));
    }

    public [Symbol.iterator](): Iterator<ParameterSet> {
        return this.items[Symbol.iterator]();
    }
}

//#endregion
