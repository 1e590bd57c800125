/**
 * Translation Cache
 *
 * Bounded memo of resolved strings keyed by (key, locale, parameters).
 * Parameters are keyed in the order the caller supplied them, so
 * `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }` are different entries.
 *
 * All operations are synchronous; on Node's event loop no caller can see
 * a bulk eviction half-applied.
 */

import type { Logger, ParameterSet, ParameterValue } from '../types/index.js';
import { DEFAULTS } from '../types/options.js';
import { createConfigError, describeError } from '../types/errors.js';

interface CachedTranslation {
    locale: string;
    value: string;
}

export class TranslationCache {
    private entries = new Map<string, CachedTranslation>();
    readonly capacity: number;
    private readonly logger: Logger;

    constructor(capacity: number = DEFAULTS.cacheMaxSize, logger: Logger = console) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw createConfigError('cacheMaxSize must be a positive integer', { cacheMaxSize: capacity });
        }
        this.capacity = capacity;
        this.logger = logger;
    }

    /**
     * Return the cached string, or compute, store and return it.
     * If `compute` throws, nothing is stored, a warning is logged and the
     * translation key itself is returned.
     */
    getOrCompute(
        translationKey: string,
        locale: string,
        params: ParameterSet | undefined,
        compute: () => string
    ): string {
        const cacheKey = TranslationCache.keyOf(translationKey, locale, params);
        const hit = this.entries.get(cacheKey);
        if (hit !== undefined) {
            return hit.value;
        }

        let value: string;
        try {
            value = compute();
        } catch (error) {
            this.logger.warn(
                `Error: the key '${translationKey}' is not defined in locales - ${describeError(error)}`
            );
            return translationKey;
        }

        if (this.entries.size >= this.capacity) {
            this.evictOldest();
        }
        this.entries.set(cacheKey, { locale, value });
        return value;
    }

    has(translationKey: string, locale: string, params?: ParameterSet): boolean {
        return this.entries.has(TranslationCache.keyOf(translationKey, locale, params));
    }

    /**
     * Drop every entry resolved for `locale`. Returns how many were removed.
     */
    invalidateLocale(locale: string): number {
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (entry.locale === locale) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }

    /**
     * Evict the oldest quarter of capacity at once (a single entry for
     * capacities of 4 or less).
     */
    private evictOldest(): void {
        let limit = this.capacity > 4 ? Math.floor(this.capacity / 4) : 1;
        for (const key of this.entries.keys()) {
            if (limit-- <= 0) break;
            this.entries.delete(key);
        }
    }

    private static keyOf(translationKey: string, locale: string, params: ParameterSet | undefined): string {
        // Typed pairs keep 1, '1' and true apart, and NaN apart from Infinity
        const pairs = Object.entries(params ?? {}).map(
            ([name, value]: [string, ParameterValue]) => [name, typeof value, String(value)]
        );
        return JSON.stringify([translationKey, locale, pairs]);
    }
}
