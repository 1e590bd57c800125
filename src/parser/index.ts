import type { Expression } from '../types/index.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';

/**
 * Parse a condition string into an immutable Expression.
 * Throws an I18nException with code PARSE_ERROR on text outside the grammar.
 */
export function parse(input: string): Expression {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens, input);
    return deepFreeze({ source: input, body: parser.parse() });
}

function deepFreeze<T extends object>(value: T): T {
    const children: unknown[] = Object.values(value);
    for (const child of children) {
        if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}
