/**
 * Translator option validation
 */

import { z } from 'zod';
import type { Logger, TranslatorOptions } from './types/index.js';
import { DEFAULTS } from './types/options.js';
import { createConfigError } from './types/errors.js';
import { LocaleTreeSchema } from './locale/schema.js';

const positiveInt = z.number().int().positive();

export const LocaleIdSchema = z.string().trim().min(1, 'Locale must be a non-empty string');

export const TranslatorOptionsSchema = z.object({
    defaultLocale: LocaleIdSchema,
    locales: LocaleTreeSchema.optional(),
    cacheMaxSize: positiveInt.default(DEFAULTS.cacheMaxSize),
    expressionCacheSize: positiveInt.default(DEFAULTS.expressionCacheSize),
    loadConcurrency: positiveInt.default(DEFAULTS.loadConcurrency),
});

export type ResolvedTranslatorOptions = z.infer<typeof TranslatorOptionsSchema> & { logger: Logger };

/**
 * Validate options and fill in defaults. Throws CONFIG_ERROR.
 */
export function resolveOptions(options: TranslatorOptions): ResolvedTranslatorOptions {
    const { logger, ...rest } = options;
    const result = TranslatorOptionsSchema.safeParse(rest);
    if (!result.success) {
        throw createConfigError(
            `Invalid translator options: ${formatIssues(result.error)}`,
            { issues: result.error.issues }
        );
    }
    return { ...result.data, logger: logger ?? console };
}

export function validateLocaleId(locale: string): string {
    const result = LocaleIdSchema.safeParse(locale);
    if (!result.success) {
        throw createConfigError(`Invalid locale: ${formatIssues(result.error)}`, { locale });
    }
    return result.data;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
