/**
 * Expression Cache
 *
 * Bounded memo of parsed conditions keyed by their exact source text.
 * Unparsable text is remembered too, so a bad condition is parsed once.
 */

import type { Expression } from '../types/index.js';
import { DEFAULTS } from '../types/options.js';
import { createConfigError } from '../types/errors.js';
import { parse } from '../parser/index.js';

export type ParseFunction = (text: string) => Expression;

const INVALID = Symbol('invalid');

type MemoEntry = Expression | typeof INVALID;

export class ExpressionCache {
    private entries = new Map<string, MemoEntry>();
    private readonly capacity: number;
    private readonly parseFn: ParseFunction;

    constructor(capacity: number = DEFAULTS.expressionCacheSize, parseFn: ParseFunction = parse) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw createConfigError('Expression cache size must be a positive integer', { capacity });
        }
        this.capacity = capacity;
        this.parseFn = parseFn;
    }

    /**
     * Parsed expression for `text`, or undefined when the text does not parse.
     */
    lookup(text: string): Expression | undefined {
        let entry = this.entries.get(text);
        if (entry === undefined) {
            entry = this.parseOrInvalid(text);
            this.store(text, entry);
        }
        return entry === INVALID ? undefined : entry;
    }

    has(text: string): boolean {
        return this.entries.has(text);
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }

    private parseOrInvalid(text: string): MemoEntry {
        try {
            return this.parseFn(text);
        } catch {
            return INVALID;
        }
    }

    private store(text: string, entry: MemoEntry): void {
        if (this.entries.size >= this.capacity) {
            // Map iteration order is insertion order: the first key is the oldest
            const oldest = this.entries.keys().next();
            if (!oldest.done) {
                this.entries.delete(oldest.value);
            }
        }
        this.entries.set(text, entry);
    }
}
