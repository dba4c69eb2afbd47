/**
 * Tests for option containers and the 7-Zip option schema.
 */
import { describe, it, expect } from 'vitest';
import { BcjFilter, CopyMethod, Lzma2Method, Bcj2Filter } from '../../../src/core/methods.js';
import { OptionContainer, SevenzipOptions, oneOf } from '../../../src/core/options.js';
import { ValueKind } from '../../../src/types/archive.types.js';
import { DomainError, TypeMismatchError } from '../../../src/types/errors.types.js';

describe('OptionContainer', () => {
    describe('merge', () => {
        it('should union the serializations of disjoint atomic keys', () => {
            const a = new OptionContainer({ t: '7z', p: 'test-secret' });
            const b = new OptionContainer({ mx: 9, y: '' });
            const expected = new Set([...a.serialize(), ...b.serialize()]);

            const merged = a.merge(b).serialize();

            expect(merged).toHaveLength(4);
            expect(new Set(merged)).toEqual(expected);
        });

        it('should overwrite atomic keys', () => {
            const options = new OptionContainer({ t: '7z' }).merge({ t: 'zip' });
            expect(options.get('t')).toBe('zip');
        });

        it('should union set keys in either order', () => {
            const forward = new SevenzipOptions()
                .merge({ x: new Set(['r!a']) })
                .merge({ x: new Set(['r!b']) });
            const backward = new SevenzipOptions()
                .merge({ x: new Set(['r!b']) })
                .merge({ x: new Set(['r!a']) });

            expect(forward.get('x')).toEqual(new Set(['r!a', 'r!b']));
            expect(backward.get('x')).toEqual(new Set(['r!a', 'r!b']));
        });

        it('should append sequence keys in merge order', () => {
            const schema = { v: { kind: ValueKind.SEQUENCE } };
            const forward = new OptionContainer(undefined, schema).merge({ v: ['x'] }).merge({ v: ['y'] });
            const backward = new OptionContainer(undefined, schema).merge({ v: ['y'] }).merge({ v: ['x'] });

            expect(forward.get('v')).toEqual(['x', 'y']);
            expect(backward.get('v')).toEqual(['y', 'x']);
        });

        it('should update mapping keys from maps or pairs', () => {
            const options = new OptionContainer(undefined, { e: { kind: ValueKind.MAPPING } })
                .merge({ e: new Map([['a', 1]]) })
                .merge({ e: [['b', 'x']] })
                .merge({ e: [['a', 2]] });

            expect(options.serialize()).toEqual(['-ea=2', '-eb=x']);
        });

        it('should reject a scalar for a set key and leave the container unchanged', () => {
            const options = new SevenzipOptions({ t: '7z', x: new Set(['r!a']) });

            expect(() => options.merge({ t: 'zip', x: 'r!b' })).toThrow(TypeMismatchError);
            expect(() => options.merge({ x: 'r!b' })).toThrow(
                "Value type for key 'x' mismatch: expected set, got string"
            );
            expect(options.serialize()).toEqual(['-t7z', '-xr!a']);
        });

        it('should reject a mapping value of the wrong shape', () => {
            const options = new OptionContainer(undefined, { e: { kind: ValueKind.MAPPING } });
            expect(() => options.set('e', 'a=1')).toThrow(
                "Value type for key 'e' mismatch: expected mapping, got string"
            );
        });

        it('should treat undeclared keys as atomic', () => {
            const options = new OptionContainer();
            expect(() => options.set('zz', new Set(['a']))).toThrow(
                "Value type for key 'zz' mismatch: expected atomic, got set"
            );
            expect(options.ruleFor('zz')).toEqual({ kind: ValueKind.ATOMIC });
        });

        it('should store nothing when a later key fails validation', () => {
            const options = new SevenzipOptions({ t: '7z' });

            expect(() => options.merge({ t: 'zip', mx: 4 })).toThrow(
                "Invalid value for 'mx': 4 (one of 0, 1, 3, 5, 7, 9)"
            );
            expect(options.get('t')).toBe('7z');
            expect(options.has('mx')).toBe(false);
        });

        it('should append the other container chain as a copy', () => {
            const a = new SevenzipOptions().methods(new Lzma2Method());
            const b = new SevenzipOptions().methods(new BcjFilter());

            a.merge(b);

            expect(a.serialize()).toEqual(['-m0=LZMA2', '-m1=BCJ']);
            expect(b.serialize()).toEqual(['-m0=BCJ']);
            expect(a.chain.at(1)).not.toBe(b.chain.at(0));
        });

        it('should leave the chain untouched when a container merge fails', () => {
            const other = new OptionContainer({ x: 'plain' });
            other.chain.append(new CopyMethod());
            const target = new SevenzipOptions();

            expect(() => target.merge(other)).toThrow(TypeMismatchError);
            expect(target.chain.length).toBe(0);
        });
    });

    describe('mergeAll', () => {
        it('should merge in order', () => {
            const options = new SevenzipOptions().mergeAll([{ mx: 5 }, { mx: 9 }, { t: '7z' }]);
            expect(options.serialize()).toEqual(['-mx=9', '-t7z']);
        });

        it('should apply nothing when any input fails', () => {
            const options = new SevenzipOptions({ t: '7z' });

            expect(() => options.mergeAll([{ mx: 9 }, { ao: 'o' }])).toThrow(DomainError);
            expect(options.serialize()).toEqual(['-t7z']);
        });
    });

    describe('union', () => {
        it('should return a merged copy and leave the receiver unchanged', () => {
            const base = new SevenzipOptions({ t: '7z' });
            const merged = base.union({ mx: 9 });

            expect(merged).toBeInstanceOf(SevenzipOptions);
            expect(merged.serialize()).toEqual(['-t7z', '-mx=9']);
            expect(base.serialize()).toEqual(['-t7z']);
        });
    });

    describe('accessors', () => {
        it('should hand out copies of stored values', () => {
            const options = new SevenzipOptions({ x: new Set(['r!a']) });
            const value = options.get('x');
            if (value instanceof Set) {
                value.add('r!b');
            }
            expect(options.get('x')).toEqual(new Set(['r!a']));
        });

        it('should report keys and size', () => {
            const options = new SevenzipOptions({ t: '7z', mx: 9 });
            expect(options.keys()).toEqual(['t', 'mx']);
            expect(options.size).toBe(2);
            expect(options.delete('t')).toBe(true);
            expect(options.keys()).toEqual(['mx']);
        });
    });

    describe('serialize', () => {
        it('should keep only allowed keys', () => {
            const options = new SevenzipOptions({ t: '7z', mx: 9 });
            expect(options.serialize(new Set(['t']))).toEqual(['-t7z']);
        });

        it('should admit the -m family and the chain when m is allowed', () => {
            const options = new SevenzipOptions({ t: '7z', mx: 9, mmt: 'on', p: 'test-secret' })
                .methods(new Lzma2Method());
            expect(options.serialize(new Set(['m']))).toEqual(['-mx=9', '-mmt=on', '-m0=LZMA2']);
        });

        it('should number the chain by position whenever other keys were set', () => {
            const options = new SevenzipOptions()
                .methods(new Lzma2Method({ d: 26 }))
                .type('7z')
                .methods(new Bcj2Filter());

            expect(options.serialize()).toEqual(['-t7z', '-m0=LZMA2:d=26', '-m1=BCJ2']);
        });

        it('should render one flag per set or sequence element', () => {
            const options = new SevenzipOptions().volumes('100m', '10m').include(['*.txt', '*.md']);
            expect(options.toString()).toBe('-v100m -v10m -ir!*.txt -ir!*.md');
        });
    });

    describe('clone and equals', () => {
        it('should clone deeply', () => {
            const original = new SevenzipOptions({ x: new Set(['r!a']) }).methods(new Lzma2Method());
            const copy = original.clone();
            copy.exclude('b');
            copy.chain.append(new BcjFilter());

            expect(original.serialize()).toEqual(['-xr!a', '-m0=LZMA2']);
            expect(copy.serialize()).toEqual(['-xr!a', '-xr!b', '-m0=LZMA2', '-m1=BCJ']);
        });

        it('should compare serialized arguments', () => {
            const a = new SevenzipOptions({ t: '7z', mx: 9 });
            expect(a.equals(new SevenzipOptions({ t: '7z', mx: 9 }))).toBe(true);
            expect(a.equals(new SevenzipOptions({ mx: 9, t: '7z' }))).toBe(false);
        });
    });
});

describe('oneOf', () => {
    it('should accept only the listed values', () => {
        const schema = oneOf('on', 'off', 0);
        expect(schema.safeParse('on').success).toBe(true);
        expect(schema.safeParse(0).success).toBe(true);
        expect(schema.safeParse('0').success).toBe(false);
        expect(schema.description).toBe('one of "on", "off", 0');
    });
});

describe('SevenzipOptions', () => {
    it('should render compression setters', () => {
        const options = new SevenzipOptions()
            .type('7z')
            .level(9)
            .solid(true)
            .multithreading(4)
            .filter(new BcjFilter())
            .headerEncryption(true)
            .password('test-secret');

        expect(options.serialize()).toEqual([
            '-t7z', '-mx=9', '-ms=on', '-mmt=4', '-mf=BCJ', '-mhe=on', '-ptest-secret',
        ]);
    });

    it('should render switch setters', () => {
        const options = new SevenzipOptions()
            .overwriteMode('s')
            .recurse('-')
            .largePages(false)
            .caseSensitive(true)
            .sortByType(false)
            .headerCompression(false)
            .fileAnalysisLevel(7)
            .output('out');

        expect(options.serialize()).toEqual([
            '-aos', '-r-', '-slp-', '-ssc', '-mqs=off', '-mhc=off', '-myx=7', '-oout',
        ]);
    });

    it('should toggle the yes switch', () => {
        const options = new SevenzipOptions().yes();
        expect(options.serialize()).toEqual(['-y']);
        expect(options.yes(false).serialize()).toEqual([]);
    });

    it('should prefix include and exclude patterns', () => {
        const options = new SevenzipOptions()
            .include('*.txt')
            .exclude(['*.tmp', '*.bak'], { recurseType: 'r-' })
            .exclude('list.txt', { recurseType: '', fileRefType: '@' });

        expect(options.serialize()).toEqual(['-ir!*.txt', '-xr-!*.tmp', '-xr-!*.bak', '-x@list.txt']);
    });

    it('should collect update modes as a set', () => {
        const options = new SevenzipOptions().updateMode('p1').updateMode('!new.7z').updateMode('p1');
        expect(options.serialize()).toEqual(['-up1', '-u!new.7z']);
    });

    it('should use on/off for boolean filter and multithreading values', () => {
        const options = new SevenzipOptions().filter(false).multithreading(true);
        expect(options.serialize()).toEqual(['-mf=off', '-mmt=on']);
    });

    it('should reject values outside a key domain', () => {
        const options = new SevenzipOptions();
        expect(() => options.set('ao', 'o')).toThrow("Invalid value for 'ao': 'o' (one of \"a\", \"s\", \"u\", \"t\")");
        expect(() => options.set('mhe', 'yes')).toThrow(DomainError);
        expect(() => options.set('y', '-')).toThrow(DomainError);
        expect(options.size).toBe(0);
    });
});
