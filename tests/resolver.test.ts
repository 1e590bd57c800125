/**
 * Decision-list resolution tests
 */

import { resolveEntry } from '../src/translation/resolver.js';
import type { ResolveContext } from '../src/translation/resolver.js';
import type { TranslationEntry } from '../src/types/index.js';
import { evaluate } from '../src/evaluator/index.js';
import { renderCondition, formatTemplate } from '../src/translation/placeholders.js';

const literal = (template: string): TranslationEntry => ({ kind: 'literal', template });

/** Context whose conditions are looked up in a table instead of evaluated */
function tableContext(truth: Record<string, boolean>): ResolveContext & { asked: string[] } {
    const asked: string[] = [];
    return {
        asked,
        renderAndEvaluate: (condition) => {
            asked.push(condition);
            return truth[condition] ?? false;
        },
        format: (template) => `<${template}>`,
    };
}

describe('resolveEntry', () => {
    const plural: TranslationEntry = {
        kind: 'conditional',
        branches: [
            { condition: 'count>1', entry: literal('many') },
            { condition: 'count==1', entry: literal('one') },
        ],
        defaultText: 'none',
    };

    test('formats a literal entry', () => {
        expect(resolveEntry(literal('hi'), tableContext({}))).toBe('<hi>');
    });

    test('takes the first matching branch', () => {
        const context = tableContext({ 'count>1': false, 'count==1': true });
        expect(resolveEntry(plural, context)).toBe('<one>');
        expect(context.asked).toEqual(['count>1', 'count==1']);
    });

    test('stops asking after the first match', () => {
        const context = tableContext({ 'count>1': true, 'count==1': true });
        expect(resolveEntry(plural, context)).toBe('<many>');
        expect(context.asked).toEqual(['count>1']);
    });

    test('falls back to the default when nothing matches', () => {
        expect(resolveEntry(plural, tableContext({}))).toBe('<none>');
    });

    test('returns empty text with no match and no default', () => {
        const entry: TranslationEntry = {
            kind: 'conditional',
            branches: [{ condition: 'x', entry: literal('x') }],
        };
        expect(resolveEntry(entry, tableContext({}))).toBe('');
    });

    test('nested entries inherit the enclosing default', () => {
        const entry: TranslationEntry = {
            kind: 'conditional',
            branches: [{
                condition: 'outer',
                entry: { kind: 'conditional', branches: [{ condition: 'inner', entry: literal('deep') }] },
            }],
            defaultText: 'outer default',
        };
        expect(resolveEntry(entry, tableContext({ outer: true }))).toBe('<outer default>');
    });

    test('a nested default overrides the inherited one', () => {
        const entry: TranslationEntry = {
            kind: 'conditional',
            branches: [{
                condition: 'outer',
                entry: {
                    kind: 'conditional',
                    branches: [{ condition: 'inner', entry: literal('deep') }],
                    defaultText: 'inner default',
                },
            }],
            defaultText: 'outer default',
        };
        expect(resolveEntry(entry, tableContext({ outer: true }))).toBe('<inner default>');
        expect(resolveEntry(entry, tableContext({ outer: true, inner: true }))).toBe('<deep>');
        expect(resolveEntry(entry, tableContext({}))).toBe('<outer default>');
    });

    test('uses an explicit inherited default', () => {
        const entry: TranslationEntry = { kind: 'conditional', branches: [] };
        expect(resolveEntry(entry, tableContext({}), 'from caller')).toBe('<from caller>');
    });

    test('works with rendered conditions and real evaluation', () => {
        const entry: TranslationEntry = {
            kind: 'conditional',
            branches: [
                { condition: '[count] > 1', entry: literal('[count] files') },
                { condition: '[count] == 1', entry: literal('one file') },
            ],
            defaultText: 'no files',
        };
        const contextFor = (count: number): ResolveContext => ({
            renderAndEvaluate: condition => evaluate(renderCondition(condition, { count })),
            format: template => formatTemplate(template, { count }),
        });

        expect(resolveEntry(entry, contextFor(1))).toBe('one file');
        expect(resolveEntry(entry, contextFor(7))).toBe('7 files');
        expect(resolveEntry(entry, contextFor(0))).toBe('no files');
    });
});
