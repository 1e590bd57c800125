import type { Logger, LocaleTree } from './translation.js';

export interface TranslatorOptions {
    /** Locale used when `get` is called without one */
    defaultLocale: string;
    /** Initial data for the default locale */
    locales?: LocaleTree;
    /** Maximum number of resolved strings kept in the translation cache */
    cacheMaxSize?: number;
    /** Maximum number of parsed conditions kept in the expression memo */
    expressionCacheSize?: number;
    /** Maximum number of locale files read and parsed at once by `loadMany` */
    loadConcurrency?: number;
    logger?: Logger;
}

export interface CreateTranslatorOptions extends Omit<TranslatorOptions, 'locales'> {
    /** Initial data for the default locale: a tree, or a path to a JSON/YAML file */
    locales?: LocaleTree | string;
}

export interface LoadManyOptions {
    concurrency?: number;
}

export interface LocaleFileSpec {
    path: string;
    locale: string;
}

export const DEFAULTS = {
    cacheMaxSize: 2048,
    expressionCacheSize: 512,
    loadConcurrency: 4,
} as const;
