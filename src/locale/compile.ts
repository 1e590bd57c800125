/**
 * Compile raw locale data into translation entries.
 *
 * Whether a node is literal or conditional is decided here, once per load,
 * instead of on every resolution.
 */

import type { ConditionalBranch, ConditionalEntry, LocaleTree, TranslationEntry } from '../types/index.js';
import { isLocaleTree } from './schema.js';

export const DEFAULT_KEY = 'default';

/**
 * Every mapping becomes a conditional entry whose branches are its keys in
 * authoring order. A text-valued `default` key becomes the entry's default
 * instead of a branch.
 */
export function compileLocaleTree(tree: LocaleTree): ConditionalEntry {
    const branches: ConditionalBranch[] = [];
    let defaultText: string | undefined;

    for (const [condition, value] of Object.entries(tree)) {
        if (condition === DEFAULT_KEY && !isLocaleTree(value)) {
            defaultText = String(value);
            continue;
        }
        branches.push({ condition, entry: compileValue(value) });
    }

    return defaultText === undefined
        ? { kind: 'conditional', branches }
        : { kind: 'conditional', branches, defaultText };
}

function compileValue(value: LocaleTree[string]): TranslationEntry {
    return isLocaleTree(value)
        ? compileLocaleTree(value)
        : { kind: 'literal', template: String(value) };
}
