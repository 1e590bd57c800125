/**
 * Locale file loading
 *
 * Reads JSON, YAML or TOML files into validated locale trees. Loading touches no
 * shared state; callers merge the returned trees themselves.
 */

import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { parse as parseToml } from '@iarna/toml';
import type { LocaleFileSpec, LocaleTree } from '../types/index.js';
import { createLoadError, describeError } from '../types/errors.js';
import { parallelLimit } from '../utils/concurrency.js';
import { LocaleTreeSchema } from './schema.js';

export type LocaleFormat = 'json' | 'yaml' | 'toml';

const FORMATS: Record<string, LocaleFormat> = {
    '.json': 'json',
    '.yaml': 'yaml',
    '.yml': 'yaml',
    '.toml': 'toml',
};

export interface LoadedLocale {
    locale: string;
    tree: LocaleTree;
}

export function detectFormat(filePath: string): LocaleFormat {
    const suffix = path.extname(filePath).toLowerCase();
    const format = FORMATS[suffix];
    if (format === undefined) {
        throw createLoadError(
            `Unsupported file format: ${suffix || '(none)'}. Supported formats: .json, .yaml, .yml, .toml`,
            { path: filePath }
        );
    }
    return format;
}

/**
 * Parse file contents and validate the resulting tree
 */
export function parseLocaleSource(source: string, format: LocaleFormat, origin: string = '<inline>'): LocaleTree {
    let data: unknown;
    try {
        data = parseByFormat(source, format);
    } catch (error) {
        throw createLoadError(`Failed to parse ${origin}: ${describeError(error)}`, { path: origin });
    }

    return validateLocaleTree(data, origin);
}

/**
 * Check that `data` has the shape of a locale tree. Throws LOAD_ERROR.
 */
export function validateLocaleTree(data: unknown, origin: string = '<inline>'): LocaleTree {
    const result = LocaleTreeSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw createLoadError(`Validation failed for ${origin}: ${issues}`, { path: origin });
    }
    return result.data;
}

export async function loadLocaleFile(filePath: string): Promise<LocaleTree> {
    const format = detectFormat(filePath);

    let source: string;
    try {
        source = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        if (isNotFound(error)) {
            throw createLoadError(`Locale file not found: ${filePath}`, { path: filePath });
        }
        throw createLoadError(`Failed to read ${filePath}: ${describeError(error)}`, { path: filePath });
    }

    return parseLocaleSource(source, format, filePath);
}

/**
 * Load several files with bounded concurrency. Results are in input order.
 * Rejects with the first failing file's error once every task has settled.
 */
export async function loadLocaleFiles(
    files: readonly LocaleFileSpec[],
    concurrency: number
): Promise<LoadedLocale[]> {
    return parallelLimit(
        files,
        async ({ path: filePath, locale }) => ({ locale, tree: await loadLocaleFile(filePath) }),
        concurrency
    );
}

function parseByFormat(source: string, format: LocaleFormat): unknown {
    switch (format) {
        case 'json':
            return JSON.parse(source);
        case 'yaml':
            return yaml.load(source);
        case 'toml':
            return parseToml(source);
    }
}

function isNotFound(error: unknown): boolean {
    // fs errors may come from another realm, so check the shape
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
