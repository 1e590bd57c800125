/**
 * Locale Store
 *
 * Holds the raw tree of every loaded locale (for later merges) next to its
 * compiled entry tree (for lookups). Writes happen only through `update`.
 */

import type { ConditionalBranch, ConditionalEntry, LocaleTree, TranslationEntry } from '../types/index.js';
import { compileLocaleTree, DEFAULT_KEY } from './compile.js';
import { mergeLocaleTrees } from './merge.js';

interface StoredLocale {
    tree: LocaleTree;
    root: ConditionalEntry;
}

export class LocaleStore {
    private locales = new Map<string, StoredLocale>();

    has(locale: string): boolean {
        return this.locales.has(locale);
    }

    list(): string[] {
        return [...this.locales.keys()];
    }

    /**
     * Merge `data` into `locale`. A locale seen for the first time starts
     * from a copy of `seedLocale`'s tree, when that one is loaded.
     */
    update(locale: string, data: LocaleTree, seedLocale?: string): void {
        const base = this.locales.get(locale)
            ?? (seedLocale !== undefined ? this.locales.get(seedLocale) : undefined);
        const tree = mergeLocaleTrees(base?.tree, data);
        this.locales.set(locale, { tree, root: compileLocaleTree(tree) });
    }

    /**
     * Entry at a dot-separated key, e.g. `cart.items`. A trailing `default`
     * segment addresses the default text of a conditional entry.
     */
    lookup(locale: string, dottedKey: string): TranslationEntry | undefined {
        const stored = this.locales.get(locale);
        if (!stored) {
            return undefined;
        }

        let current: TranslationEntry = stored.root;
        for (const segment of dottedKey.split('.')) {
            if (current.kind !== 'conditional') {
                return undefined;
            }

            const branch: ConditionalBranch | undefined = current.branches.find(b => b.condition === segment);
            if (branch) {
                current = branch.entry;
            } else if (segment === DEFAULT_KEY && current.defaultText !== undefined) {
                current = { kind: 'literal', template: current.defaultText };
            } else {
                return undefined;
            }
        }

        return current;
    }
}
