/**
 * Translation Resolver
 *
 * Walks a translation entry as a first-match decision list. A conditional
 * entry's own default overrides the one inherited from its ancestors.
 */

import type { TranslationEntry } from '../types/index.js';

export interface ResolveContext {
    /** Render parameters into the condition and evaluate it */
    renderAndEvaluate(condition: string): boolean;
    /** Substitute parameters into the final text */
    format(template: string): string;
}

export function resolveEntry(
    entry: TranslationEntry,
    context: ResolveContext,
    inheritedDefault?: string
): string {
    if (entry.kind === 'literal') {
        return context.format(entry.template);
    }

    const effectiveDefault = entry.defaultText ?? inheritedDefault;

    for (const branch of entry.branches) {
        if (context.renderAndEvaluate(branch.condition)) {
            return resolveEntry(branch.entry, context, effectiveDefault);
        }
    }

    return effectiveDefault !== undefined ? context.format(effectiveDefault) : '';
}
