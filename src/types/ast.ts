/**
 * Abstract Syntax Tree (AST) Types for Condition Expressions
 *
 * Closed set of node kinds. Operands are literals only; there are no
 * names, calls or member access.
 */

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type BooleanOperator = 'and' | 'or';

export type SignOperator = '+' | '-';

export interface BoolLiteralNode {
    readonly type: 'bool';
    readonly value: boolean;
}

export interface NumLiteralNode {
    readonly type: 'number';
    readonly value: number;
    /** 'int' for plain digit runs, 'float' when a fraction or exponent is present */
    readonly kind: 'int' | 'float';
}

export interface TextLiteralNode {
    readonly type: 'text';
    readonly value: string;
}

export interface UnaryOpNode {
    readonly type: 'unary';
    readonly operator: SignOperator;
    readonly operand: NumLiteralNode | UnaryOpNode;
}

export interface CompareNode {
    readonly type: 'compare';
    readonly left: OperandNode;
    /** Chained comparisons: `a < b <= c` has two operators and two comparators */
    readonly operators: readonly ComparisonOperator[];
    readonly comparators: readonly OperandNode[];
}

export interface BoolOpNode {
    readonly type: 'boolop';
    readonly operator: BooleanOperator;
    readonly operands: readonly ExpressionNode[];
}

export type OperandNode =
    | BoolLiteralNode
    | NumLiteralNode
    | TextLiteralNode
    | UnaryOpNode;

export type ExpressionNode =
    | BoolLiteralNode
    | NumLiteralNode
    | TextLiteralNode
    | UnaryOpNode
    | CompareNode
    | BoolOpNode;

export type ExpressionNodeType = ExpressionNode['type'];

/**
 * A parsed condition. Two expressions are the same expression when their
 * source text is identical.
 */
export interface Expression {
    readonly source: string;
    readonly body: ExpressionNode;
}
