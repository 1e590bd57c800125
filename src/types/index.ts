/**
 * Shared type definitions
 */

// Re-export error types
export {
    I18nException,
    getSuggestion,
    createParseError,
    createEvaluationError,
    createLocaleNotFoundError,
    createKeyNotFoundError,
    createConfigError,
    createLoadError,
    serializeI18nError,
    describeError,
} from './errors.js';

export type {
    I18nErrorCode,
    ErrorSpan,
    I18nError,
} from './errors.js';

// Re-export AST types
export type {
    ComparisonOperator,
    BooleanOperator,
    SignOperator,
    BoolLiteralNode,
    NumLiteralNode,
    TextLiteralNode,
    UnaryOpNode,
    CompareNode,
    BoolOpNode,
    OperandNode,
    ExpressionNode,
    ExpressionNodeType,
    Expression,
} from './ast.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export translation types
export type {
    ParameterValue,
    ParameterSet,
    LocaleLeaf,
    LocaleTree,
    LiteralEntry,
    ConditionalBranch,
    ConditionalEntry,
    TranslationEntry,
    Logger,
} from './translation.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    TranslatorOptions,
    CreateTranslatorOptions,
    LoadManyOptions,
    LocaleFileSpec,
} from './options.js';
