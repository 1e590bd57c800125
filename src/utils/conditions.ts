/**
 * Helpers for inspecting locale data from the command line
 */

import type { Expression, LocaleTree, ParameterValue } from '../types/index.js';
import { isLocaleTree } from '../locale/schema.js';
import { DEFAULT_KEY } from '../locale/compile.js';
import { parse } from '../parser/index.js';
import { placeholderNames, renderCondition } from '../translation/placeholders.js';

export interface ConditionKey {
    /** Dot path of the mapping that holds the condition */
    path: string;
    condition: string;
}

/**
 * Command-line values are text; recover booleans and numbers
 */
export function parseParamValue(raw: string): ParameterValue {
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    if (raw.trim() !== '' && Number.isFinite(Number(raw))) return Number(raw);
    return raw;
}

/**
 * Keys that carry comparison or boolean syntax; plain namespace keys do not
 */
export function looksLikeCondition(key: string): boolean {
    return /[<>=!'"()\[\]]|\b(and|or|true|false)\b/.test(key);
}

/**
 * Condition keys of a tree with their dot paths, in authoring order
 */
export function collectConditions(tree: LocaleTree, prefix: string[] = []): ConditionKey[] {
    const found: ConditionKey[] = [];
    for (const [key, value] of Object.entries(tree)) {
        if (key !== DEFAULT_KEY && looksLikeCondition(key)) {
            found.push({ path: prefix.join('.'), condition: key });
        }
        if (isLocaleTree(value)) {
            found.push(...collectConditions(value, [...prefix, key]));
        }
    }
    return found;
}


/**
 * Parse a condition template with every placeholder bound to `0`.
 * Throws PARSE_ERROR when the template cannot become a valid condition.
 */
export function parseConditionTemplate(condition: string): Expression {
    const sample = Object.fromEntries(placeholderNames(condition).map(name => [name, 0]));
    return parse(renderCondition(condition, sample));
}
