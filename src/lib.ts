/**
 * Library Entry Point
 *
 * Exports the core functionality for use in other projects. Nothing here
 * touches the command line.
 */

// Translator
export { Translator, createTranslator } from './translator.js';

// Conditions
export { parse, Tokenizer, Parser } from './parser/index.js';
export { expressionToString } from './utils/ast/printer.js';
export {
    ExpressionCache,
    ExpressionEvaluator,
    defaultEvaluator,
    evaluate,
    evaluateParsed,
    compareValues,
} from './evaluator/index.js';
export type { LiteralValue, ParseFunction } from './evaluator/index.js';

// Resolution and caching
export { resolveEntry } from './translation/resolver.js';
export type { ResolveContext } from './translation/resolver.js';
export { TranslationCache } from './translation/cache.js';
export { formatTemplate, placeholderNames, renderCondition, toLiteral } from './translation/placeholders.js';

// Locale data
export { LocaleStore } from './locale/store.js';
export { compileLocaleTree } from './locale/compile.js';
export { mergeLocaleTrees } from './locale/merge.js';
export {
    detectFormat,
    loadLocaleFile,
    loadLocaleFiles,
    parseLocaleSource,
    validateLocaleTree,
} from './locale/loader.js';
export type { LoadedLocale, LocaleFormat } from './locale/loader.js';
export { LocaleTreeSchema } from './locale/schema.js';

// Types and Interfaces
export * from './types/index.js';
