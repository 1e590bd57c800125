/**
 * Translation Types
 */

/**
 * A runtime parameter value supplied by the caller
 */
export type ParameterValue = string | number | boolean;

/**
 * Parameters for one resolution call. Iteration order is significant:
 * it is part of the cache key.
 */
export type ParameterSet = Readonly<Record<string, ParameterValue>>;

/**
 * Raw locale data as authored in a file or passed in by value.
 */
export type LocaleLeaf = string | number | boolean;

export interface LocaleTree {
    [key: string]: LocaleLeaf | LocaleTree;
}

export interface LiteralEntry {
    readonly kind: 'literal';
    readonly template: string;
}

export interface ConditionalBranch {
    /** Condition template, e.g. `[count] > 1` */
    readonly condition: string;
    readonly entry: TranslationEntry;
}

export interface ConditionalEntry {
    readonly kind: 'conditional';
    /** Authoring order; first matching branch wins */
    readonly branches: readonly ConditionalBranch[];
    readonly defaultText?: string;
}

export type TranslationEntry = LiteralEntry | ConditionalEntry;

/**
 * Sink for diagnostics. `console` satisfies it.
 */
export interface Logger {
    warn(message: string, ...meta: unknown[]): void;
    debug?(message: string, ...meta: unknown[]): void;
}
