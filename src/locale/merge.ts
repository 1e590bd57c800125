import type { LocaleTree } from '../types/index.js';
import { isLocaleTree } from './schema.js';

/**
 * Deep-merge `incoming` over `base` into a new tree. Mappings merge
 * recursively; anything else from `incoming` replaces what `base` had.
 * Keys keep `base` order, new keys follow in `incoming` order.
 */
export function mergeLocaleTrees(base: LocaleTree | undefined, incoming: LocaleTree): LocaleTree {
    const result: LocaleTree = { ...base };

    for (const [key, value] of Object.entries(incoming)) {
        if (key === '__proto__') continue;

        const existing = result[key];
        result[key] = isLocaleTree(value)
            ? mergeLocaleTrees(isLocaleTree(existing) ? existing : undefined, value)
            : value;
    }

    return result;
}
