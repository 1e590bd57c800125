import type { ExpressionNode, OperandNode } from '../../types/index.js';

/**
 * Pretty-print a condition AST back to source text.
 * Boolean operations are parenthesized so the output re-parses to the same tree.
 */
export function expressionToString(node: ExpressionNode): string {
    switch (node.type) {
        case 'bool':
        case 'number':
        case 'text':
        case 'unary':
            return operandToString(node);
        case 'compare': {
            let out = operandToString(node.left);
            node.operators.forEach((op, i) => {
                out += ` ${op} ${operandToString(node.comparators[i])}`;
            });
            return out;
        }
        case 'boolop':
            return `(${node.operands.map(expressionToString).join(` ${node.operator} `)})`;
    }
}

function operandToString(node: OperandNode): string {
    switch (node.type) {
        case 'bool':
            return node.value ? 'true' : 'false';
        case 'number':
            return node.kind === 'float' && Number.isInteger(node.value)
                ? node.value.toFixed(1)
                : String(node.value);
        case 'text':
            return `'${node.value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
        case 'unary':
            return `${node.operator}${operandToString(node.operand)}`;
    }
}
