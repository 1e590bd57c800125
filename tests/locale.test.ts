/**
 * Locale compilation, merging and lookup tests
 */

import { compileLocaleTree } from '../src/locale/compile.js';
import { mergeLocaleTrees } from '../src/locale/merge.js';
import { LocaleStore } from '../src/locale/store.js';
import type { LocaleTree } from '../src/types/index.js';
import { EN, FR } from './fixtures.js';

describe('compileLocaleTree', () => {
    test('turns mappings into conditional entries in authoring order', () => {
        const root = compileLocaleTree({
            '[n] > 1': 'many',
            '[n] == 1': 'one',
            default: 'none',
        });
        expect(root).toEqual({
            kind: 'conditional',
            branches: [
                { condition: '[n] > 1', entry: { kind: 'literal', template: 'many' } },
                { condition: '[n] == 1', entry: { kind: 'literal', template: 'one' } },
            ],
            defaultText: 'none',
        });
    });

    test('stringifies number and boolean leaves', () => {
        const root = compileLocaleTree({ answer: 42, flag: true, default: 0 });
        expect(root.branches.map(b => b.entry)).toEqual([
            { kind: 'literal', template: '42' },
            { kind: 'literal', template: 'true' },
        ]);
        expect(root.defaultText).toBe('0');
    });

    test('a mapping under default stays a branch', () => {
        const root = compileLocaleTree({ default: { title: 'Title' } });
        expect(root.defaultText).toBeUndefined();
        expect(root.branches.map(b => b.condition)).toEqual(['default']);
    });

    test('omits defaultText when there is no default', () => {
        expect('defaultText' in compileLocaleTree({ a: 'b' })).toBe(false);
    });
});

describe('mergeLocaleTrees', () => {
    test('merges nested mappings and replaces leaves', () => {
        const merged = mergeLocaleTrees(
            { a: { x: '1', y: '2' }, b: 'keep' },
            { a: { y: 'two', z: '3' } }
        );
        expect(merged).toEqual({ a: { x: '1', y: 'two', z: '3' }, b: 'keep' });
    });

    test('keeps base key order and appends new keys', () => {
        const merged = mergeLocaleTrees(
            { first: '1', second: '2' },
            { third: '3', first: 'one' }
        );
        expect(Object.keys(merged)).toEqual(['first', 'second', 'third']);
    });

    test('a leaf can replace a mapping and the other way round', () => {
        expect(mergeLocaleTrees({ a: { x: '1' } }, { a: 'flat' })).toEqual({ a: 'flat' });
        expect(mergeLocaleTrees({ a: 'flat' }, { a: { x: '1' } })).toEqual({ a: { x: '1' } });
    });

    test('does not modify its inputs', () => {
        const base: LocaleTree = { a: { x: '1' } };
        const incoming: LocaleTree = { a: { y: '2' } };
        const merged = mergeLocaleTrees(base, incoming);

        expect(base).toEqual({ a: { x: '1' } });
        expect(incoming).toEqual({ a: { y: '2' } });
        expect(merged.a).not.toBe(incoming.a);
    });

    test('starts from an empty tree without a base', () => {
        expect(mergeLocaleTrees(undefined, { a: 'b' })).toEqual({ a: 'b' });
    });

    test('ignores __proto__ keys', () => {
        const incoming = JSON.parse('{"__proto__": {"polluted": "yes"}, "ok": "fine"}');
        const merged = mergeLocaleTrees(undefined, incoming);
        expect(merged).toEqual({ ok: 'fine' });
        expect(Object.prototype.hasOwnProperty.call({}, 'polluted')).toBe(false);
        expect(merged.polluted).toBeUndefined();
    });
});

describe('LocaleStore', () => {
    let store: LocaleStore;

    beforeEach(() => {
        store = new LocaleStore();
        store.update('en', EN);
    });

    test('looks up dotted keys', () => {
        expect(store.lookup('en', 'greeting')).toEqual({ kind: 'literal', template: 'Hello [name]' });
        expect(store.lookup('en', 'cart.items')).toMatchObject({ kind: 'conditional' });
    });

    test('walks through condition keys by exact text', () => {
        expect(store.lookup('en', 'cart.items.[count] == 1'))
            .toEqual({ kind: 'literal', template: 'One item in your cart' });
    });

    test('addresses a default with a trailing default segment', () => {
        expect(store.lookup('en', 'age.default')).toEqual({ kind: 'literal', template: 'Ask a parent' });
    });

    test('returns undefined for missing keys and locales', () => {
        expect(store.lookup('en', 'nope')).toBeUndefined();
        expect(store.lookup('en', 'greeting.more')).toBeUndefined();
        expect(store.lookup('en', 'cart.default')).toBeUndefined();
        expect(store.lookup('de', 'greeting')).toBeUndefined();
    });

    test('a new locale starts from the seed locale', () => {
        store.update('fr', { greeting: 'Bonjour [name]' }, 'en');

        expect(store.lookup('fr', 'greeting')).toEqual({ kind: 'literal', template: 'Bonjour [name]' });
        expect(store.lookup('fr', 'age.default')).toEqual({ kind: 'literal', template: 'Ask a parent' });
        // The seed itself is untouched
        expect(store.lookup('en', 'greeting')).toEqual({ kind: 'literal', template: 'Hello [name]' });
    });

    test('an existing locale merges instead of reseeding', () => {
        store.update('fr', FR);
        store.update('fr', { extra: 'En plus' }, 'en');

        expect(store.lookup('fr', 'extra')).toEqual({ kind: 'literal', template: 'En plus' });
        expect(store.lookup('fr', 'age')).toBeUndefined();
    });

    test('preserves branch order through merges', () => {
        store.update('en', { cart: { items: { '[count] == 1': 'Exactly one item' } } });

        const entry = store.lookup('en', 'cart.items');
        expect(entry?.kind === 'conditional' && entry.branches.map(b => b.condition))
            .toEqual(['[count] == 0', '[count] == 1', '[count] > 1']);
        expect(store.lookup('en', 'cart.items.[count] == 1'))
            .toEqual({ kind: 'literal', template: 'Exactly one item' });
    });

    test('lists locales in load order', () => {
        store.update('fr', FR);
        expect(store.list()).toEqual(['en', 'fr']);
        expect(store.has('fr')).toBe(true);
        expect(store.has('de')).toBe(false);
    });
});
