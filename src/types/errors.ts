/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for translation operations
 */
export type I18nErrorCode =
  | 'PARSE_ERROR'       // Condition text outside the supported grammar
  | 'EVALUATION_ERROR'  // Operator/type mismatch while evaluating a condition
  | 'LOOKUP_ERROR'      // Missing locale or missing key
  | 'CONFIG_ERROR'      // Invalid construction options
  | 'LOAD_ERROR';       // Locale file missing, unsupported or malformed

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface I18nError {
  code: I18nErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending condition or key
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping I18nError for throw/catch patterns
 */
export class I18nException extends Error {
  public readonly error: I18nError;

  constructor(error: I18nError) {
    super(error.message);
    this.name = 'I18nException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, I18nException);
    }
  }

  get code(): I18nErrorCode {
    return this.error.code;
  }

  toJSON(): I18nError {
    return this.error;
  }
}

/**
 * Common condition mistakes and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /&&/,
      suggestion: "Use 'and' instead of '&&'"
    },
    {
      pattern: /\|\|/,
      suggestion: "Use 'or' instead of '||'"
    },
    {
      pattern: /(^|[^=!<>])=($|[^=])/,
      suggestion: "Use '==' for equality, '=' is not an operator"
    },
    {
      pattern: /(==|!=|<=|>=|<|>|\band|\bor)\s*$/,
      suggestion: 'Incomplete expression - missing right operand'
    },
    {
      pattern: /(^|\s)[+-]\s*$/,
      suggestion: "Incomplete number - missing digits after the sign"
    },
    {
      pattern: /\bnot\b|!(?!=)/,
      suggestion: "Negation is not supported - invert the comparison instead (e.g. '!=' or '<=')"
    },
    {
      pattern: /\bTrue\b|\bFalse\b/,
      suggestion: "Use lowercase 'true' and 'false'"
    },
    {
      pattern: /\[[A-Za-z_][\w]*\]/,
      suggestion: 'Unsubstituted placeholder - pass a value for every [name] in the condition'
    },
    {
      pattern: /\b[A-Za-z_]\w*\b/,
      suggestion: "Names are not allowed - only literals, comparisons, 'and' and 'or'"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number
): I18nException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new I18nException({
    code: 'PARSE_ERROR',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

/**
 * Create an evaluation error (operator applied to incompatible operands)
 */
export function createEvaluationError(
  message: string,
  details?: Record<string, unknown>
): I18nException {
  return new I18nException({
    code: 'EVALUATION_ERROR',
    message,
    details,
  });
}

/**
 * Create a lookup error for a locale that was never loaded
 */
export function createLocaleNotFoundError(locale: string): I18nException {
  return new I18nException({
    code: 'LOOKUP_ERROR',
    message: `Locale '${locale}' not found in locales`,
    suggestion: 'Load the locale with loadFromValue, loadFromFile or loadMany first',
    details: { locale },
  });
}

/**
 * Create a lookup error for a key missing from a loaded locale
 */
export function createKeyNotFoundError(key: string, locale: string): I18nException {
  return new I18nException({
    code: 'LOOKUP_ERROR',
    message: `Translation key '${key}' not found in locale '${locale}'`,
    context: key,
    details: { key, locale },
  });
}

/**
 * Create a configuration error
 */
export function createConfigError(
  message: string,
  details?: Record<string, unknown>
): I18nException {
  return new I18nException({
    code: 'CONFIG_ERROR',
    message,
    details,
  });
}

/**
 * Create a locale loading error
 */
export function createLoadError(
  message: string,
  details?: Record<string, unknown>
): I18nException {
  return new I18nException({
    code: 'LOAD_ERROR',
    message,
    details,
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize an I18nError for JSON output
 */
export function serializeI18nError(error: I18nError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Describe any thrown value for diagnostics
 */
export function describeError(error: unknown): string {
  if (error instanceof I18nException) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
