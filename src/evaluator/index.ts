export { ExpressionCache } from './cache.js';
export type { ParseFunction } from './cache.js';
export {
    ExpressionEvaluator,
    defaultEvaluator,
    evaluate,
    evaluateParsed,
    evaluateCondition,
    evaluateOperand,
    compareValues,
} from './evaluator.js';
export type { LiteralValue } from './evaluator.js';
