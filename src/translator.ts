/**
 * Translator
 *
 * Resolves translation keys to text for a locale and a set of parameters.
 * Owns the locale store, the condition parse memo and the translation
 * cache; all three live and die with the instance.
 */

import type {
    CreateTranslatorOptions,
    LoadManyOptions,
    LocaleFileSpec,
    LocaleTree,
    Logger,
    ParameterSet,
    TranslatorOptions,
} from './types/index.js';
import {
    createKeyNotFoundError,
    createLocaleNotFoundError,
} from './types/errors.js';
import { resolveOptions, validateLocaleId } from './config.js';
import { ExpressionCache, ExpressionEvaluator } from './evaluator/index.js';
import { LocaleStore } from './locale/store.js';
import { loadLocaleFile, loadLocaleFiles, validateLocaleTree } from './locale/loader.js';
import { TranslationCache } from './translation/cache.js';
import { resolveEntry } from './translation/resolver.js';
import { formatTemplate, renderCondition } from './translation/placeholders.js';

export class Translator {
    private _defaultLocale: string;
    private readonly store = new LocaleStore();
    private readonly cache: TranslationCache;
    private readonly evaluator: ExpressionEvaluator;
    private readonly logger: Logger;
    private readonly loadConcurrency: number;

    constructor(options: TranslatorOptions) {
        const resolved = resolveOptions(options);

        this._defaultLocale = resolved.defaultLocale;
        this.logger = resolved.logger;
        this.loadConcurrency = resolved.loadConcurrency;
        this.cache = new TranslationCache(resolved.cacheMaxSize, resolved.logger);
        this.evaluator = new ExpressionEvaluator(new ExpressionCache(resolved.expressionCacheSize));

        if (resolved.locales) {
            this.loadFromValue(resolved.locales, resolved.defaultLocale);
        }
    }

    get defaultLocale(): string {
        return this._defaultLocale;
    }

    set defaultLocale(locale: string) {
        this._defaultLocale = validateLocaleId(locale);
    }

    get locales(): string[] {
        return this.store.list();
    }

    /**
     * Resolve `key` for `locale` (default locale when omitted). Never throws:
     * on a missing locale or key a warning is logged and `key` is returned.
     */
    get(key: string, locale?: string, params?: ParameterSet): string {
        const target = locale || this._defaultLocale;
        return this.cache.getOrCompute(key, target, params, () => this.translate(key, target, params));
    }

    /**
     * Evaluate condition text with this translator's parse memo
     */
    evaluate(condition: string): boolean {
        return this.evaluator.evaluate(condition);
    }

    loadFromValue(data: LocaleTree, locale: string): void {
        this.updateLocale(validateLocaleId(locale), validateLocaleTree(data));
    }

    async loadFromFile(filePath: string, locale: string): Promise<void> {
        const id = validateLocaleId(locale);
        const tree = await loadLocaleFile(filePath);
        this.updateLocale(id, tree);
    }

    /**
     * Read and parse files concurrently, then merge them one by one in input
     * order. If any file fails, none is merged.
     */
    async loadMany(files: readonly LocaleFileSpec[], options?: LoadManyOptions): Promise<void> {
        const validated = files.map(file => ({ ...file, locale: validateLocaleId(file.locale) }));
        const loaded = await loadLocaleFiles(validated, options?.concurrency ?? this.loadConcurrency);
        for (const { locale, tree } of loaded) {
            this.updateLocale(locale, tree);
        }
    }

    /** Number of cached resolved strings */
    get cacheSize(): number {
        return this.cache.size;
    }

    clearCache(): void {
        this.cache.clear();
    }

    private translate(key: string, locale: string, params: ParameterSet | undefined): string {
        if (!this.store.has(locale)) {
            throw createLocaleNotFoundError(locale);
        }

        const entry = this.store.lookup(locale, key);
        if (entry === undefined) {
            throw createKeyNotFoundError(key, locale);
        }

        return resolveEntry(entry, {
            renderAndEvaluate: condition => this.evaluator.evaluate(renderCondition(condition, params)),
            format: template => formatTemplate(template, params),
        });
    }

    private updateLocale(locale: string, data: LocaleTree): void {
        this.store.update(locale, data, this._defaultLocale);
        const removed = this.cache.invalidateLocale(locale);
        this.logger.debug?.(`Loaded locale '${locale}', invalidated ${removed} cached translations`);
    }
}

/**
 * Create a translator. `locales` may also be a path to a JSON, YAML or TOML file,
 * loaded as the default locale before the translator is returned.
 */
export async function createTranslator(options: CreateTranslatorOptions): Promise<Translator> {
    const { locales, ...rest } = options;
    if (typeof locales !== 'string') {
        return new Translator({ ...rest, locales });
    }

    const translator = new Translator(rest);
    await translator.loadFromFile(locales, translator.defaultLocale);
    return translator;
}
