import type { Token, TokenType } from '../types/parser.js';
import type {
    ComparisonOperator,
    ExpressionNode,
    NumLiteralNode,
    OperandNode,
    UnaryOpNode,
} from '../types/ast.js';
import { createParseError } from '../types/errors.js';

/**
 * Parser for condition expressions
 *
 * Grammar (EBNF-ish):
 *   condition   = disjunction EOF
 *   disjunction = conjunction ('or' conjunction)*
 *   conjunction = primary ('and' primary)*
 *   primary     = '(' disjunction ')' (CMP operand)* | comparison
 *   comparison  = operand (CMP operand)*
 *   operand     = BOOLEAN | STRING | signed | '(' operand ')'
 *   signed      = ('+' | '-') signed | '(' signed ')' | NUMBER
 *
 * A parenthesized group continues as a comparison only when it holds a
 * single operand, so `(1) < 2` parses and `(1 < 2) == true` does not.
 */
export class Parser {
    private tokens: Token[];
    private pos: number = 0;
    // Keep original input for error reporting
    private input: string;

    constructor(tokens: Token[], input: string = '') {
        this.tokens = tokens;
        this.input = input;
    }

    parse(): ExpressionNode {
        const result = this.parseDisjunction();
        if (this.current().type !== 'EOF') {
            throw this.error(`Unexpected token '${this.current().value}'`);
        }
        return result;
    }

    private current(): Token {
        return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: this.input.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private expect(type: TokenType): Token {
        if (this.current().type !== type) {
            throw this.error(`Expected ${type} but got ${this.describe(this.current())}`);
        }
        return this.advance();
    }

    private parseDisjunction(): ExpressionNode {
        const operands = [this.parseConjunction()];

        while (this.current().type === 'OR') {
            this.advance();
            operands.push(this.parseConjunction());
        }

        return operands.length === 1 ? operands[0] : { type: 'boolop', operator: 'or', operands };
    }

    private parseConjunction(): ExpressionNode {
        const operands = [this.parsePrimary()];

        while (this.current().type === 'AND') {
            this.advance();
            operands.push(this.parsePrimary());
        }

        return operands.length === 1 ? operands[0] : { type: 'boolop', operator: 'and', operands };
    }

    private parsePrimary(): ExpressionNode {
        if (this.current().type === 'LPAREN') {
            this.advance();
            const inner = this.parseDisjunction();
            this.expect('RPAREN');
            return isOperand(inner) ? this.parseComparison(inner) : inner;
        }

        return this.parseComparison(this.parseOperand());
    }

    private parseComparison(left: OperandNode): ExpressionNode {
        const operators: ComparisonOperator[] = [];
        const comparators: OperandNode[] = [];

        while (this.current().type === 'COMPARE') {
            operators.push(toComparisonOperator(this.advance().value));
            comparators.push(this.parseOperand());
        }

        if (operators.length === 0) {
            return left;
        }
        return { type: 'compare', left, operators, comparators };
    }

    private parseOperand(): OperandNode {
        const token = this.current();
        switch (token.type) {
            case 'BOOLEAN':
                this.advance();
                return { type: 'bool', value: token.value === 'true' };
            case 'STRING':
                this.advance();
                return { type: 'text', value: token.value };
            case 'SIGN':
            case 'NUMBER':
                return this.parseSigned();
            case 'LPAREN': {
                this.advance();
                const inner = this.parseOperand();
                this.expect('RPAREN');
                return inner;
            }
            default:
                throw this.error(`Expected a literal but got ${this.describe(token)}`);
        }
    }

    private parseSigned(): NumLiteralNode | UnaryOpNode {
        const token = this.current();

        if (token.type === 'SIGN') {
            this.advance();
            const operand = this.parseSigned();
            return { type: 'unary', operator: token.value === '-' ? '-' : '+', operand };
        }

        if (token.type === 'LPAREN') {
            this.advance();
            const inner = this.parseSigned();
            this.expect('RPAREN');
            return inner;
        }

        if (token.type === 'NUMBER') {
            const isFloat = /[.eE]/.test(token.value);
            const value = Number(token.value);
            // Integers compare exactly; ones a double cannot hold are rejected
            if (!isFloat && !Number.isSafeInteger(value)) {
                throw this.error(`Integer literal out of range: ${token.value}`);
            }
            this.advance();
            return { type: 'number', value, kind: isFloat ? 'float' : 'int' };
        }

        throw this.error(`Sign must be followed by a number, got ${this.describe(token)}`);
    }

    private describe(token: Token): string {
        return token.type === 'EOF' ? 'end of input' : `'${token.value}'`;
    }

    private error(message: string) {
        return createParseError(message, this.input, this.current().position);
    }
}

function isOperand(node: ExpressionNode): node is OperandNode {
    return node.type === 'bool' || node.type === 'number' || node.type === 'text' || node.type === 'unary';
}

function toComparisonOperator(value: string): ComparisonOperator {
    switch (value) {
        case '==':
        case '!=':
        case '<':
        case '<=':
        case '>':
        case '>=':
            return value;
        default:
            throw new Error(`Unknown comparison operator '${value}'`);
    }
}
