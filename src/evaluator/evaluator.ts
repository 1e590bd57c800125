/**
 * Condition Evaluator
 *
 * Evaluates a parsed condition to a boolean. Operands are literals only, so
 * evaluation reads no outside state. Type mismatches raise EVALUATION_ERROR
 * internally; the public entry points turn every failure into `false`.
 */

import type {
    BoolOpNode,
    CompareNode,
    ComparisonOperator,
    Expression,
    ExpressionNode,
    OperandNode,
} from '../types/index.js';
import { createEvaluationError } from '../types/errors.js';
import { ExpressionCache } from './cache.js';

/** Value of a literal operand after applying any sign */
export type LiteralValue = boolean | number | string;

/**
 * Evaluator bound to a parse memo. One instance per translator.
 */
export class ExpressionEvaluator {
    readonly cache: ExpressionCache;

    constructor(cache: ExpressionCache = new ExpressionCache()) {
        this.cache = cache;
    }

    /**
     * Evaluate condition text. Never throws: unparsable or ill-typed
     * conditions evaluate to false.
     */
    evaluate(text: string): boolean {
        const expression = this.cache.lookup(text);
        if (expression === undefined) {
            return false;
        }
        return evaluateParsed(expression);
    }
}

/** Evaluator behind the free `evaluate`, with a memo of default size */
export const defaultEvaluator = new ExpressionEvaluator();

/**
 * Evaluate condition text through the shared memo. Never throws.
 */
export function evaluate(text: string): boolean {
    return defaultEvaluator.evaluate(text);
}

/**
 * Evaluate an already parsed expression. Never throws.
 */
export function evaluateParsed(expression: Expression): boolean {
    try {
        return evaluateCondition(expression.body);
    } catch {
        return false;
    }
}

/**
 * Evaluate a node at condition level. Throws EVALUATION_ERROR when the node
 * is not boolean-valued.
 */
export function evaluateCondition(node: ExpressionNode): boolean {
    switch (node.type) {
        case 'bool':
            return node.value;
        case 'compare':
            return evaluateCompare(node);
        case 'boolop':
            return evaluateBoolOp(node);
        case 'number':
        case 'text':
        case 'unary':
            throw createEvaluationError(`A ${describeNode(node)} is not a condition`, { node: node.type });
    }
}

function evaluateBoolOp(node: BoolOpNode): boolean {
    // Every operand is evaluated so a failing operand fails the whole expression
    const results = node.operands.map(evaluateCondition);
    return node.operator === 'and'
        ? results.every(Boolean)
        : results.some(Boolean);
}

function evaluateCompare(node: CompareNode): boolean {
    let left = evaluateOperand(node.left);

    for (let i = 0; i < node.operators.length; i++) {
        const right = evaluateOperand(node.comparators[i]);
        if (!compareValues(node.operators[i], left, right)) {
            return false;
        }
        left = right;
    }

    return true;
}

/**
 * Value of a literal operand
 */
export function evaluateOperand(node: OperandNode): LiteralValue {
    switch (node.type) {
        case 'bool':
        case 'number':
        case 'text':
            return node.value;
        case 'unary': {
            const value = evaluateOperand(node.operand);
            if (typeof value !== 'number') {
                throw createEvaluationError(`Cannot apply '${node.operator}' to ${typeof value}`);
            }
            return node.operator === '-' ? -value : value;
        }
    }
}

/**
 * Apply one comparison. Booleans and numbers compare as numbers, text
 * compares only with text; anything else is an EVALUATION_ERROR, including
 * `==` and `!=`.
 */
export function compareValues(
    operator: ComparisonOperator,
    left: LiteralValue,
    right: LiteralValue
): boolean {
    if (typeof left === 'string' && typeof right === 'string') {
        return applyOperator(operator, left < right ? -1 : left > right ? 1 : 0);
    }

    if (typeof left !== 'string' && typeof right !== 'string') {
        const l = Number(left);
        const r = Number(right);
        return applyOperator(operator, l < r ? -1 : l > r ? 1 : 0);
    }

    throw createEvaluationError(
        `Cannot compare ${typeof left} with ${typeof right} using '${operator}'`,
        { operator, left, right }
    );
}

/** `order` is negative, zero or positive as left is below, equal to or above right */
function applyOperator(operator: ComparisonOperator, order: number): boolean {
    switch (operator) {
        case '==': return order === 0;
        case '!=': return order !== 0;
        case '<': return order < 0;
        case '<=': return order <= 0;
        case '>': return order > 0;
        case '>=': return order >= 0;
    }
}

function describeNode(node: ExpressionNode): string {
    switch (node.type) {
        case 'number':
        case 'unary':
            return 'number';
        case 'text':
            return 'text literal';
        default:
            return node.type;
    }
}
