import { z } from 'zod';
import type { LocaleTree } from '../types/index.js';

export const LocaleLeafSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Nested mapping of keys to text (numbers and booleans are accepted and
 * stringified when compiled) or further mappings.
 */
export const LocaleTreeSchema: z.ZodType<LocaleTree> = z.lazy(() =>
    z.record(z.union([LocaleLeafSchema, LocaleTreeSchema]))
);

export function isLocaleTree(value: unknown): value is LocaleTree {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
