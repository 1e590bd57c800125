import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

const ESCAPES: Record<string, string> = {
    '\\': '\\',
    "'": "'",
    '"': '"',
    n: '\n',
    t: '\t',
    r: '\r',
};

const KEYWORDS: Record<string, TokenType> = {
    true: 'BOOLEAN',
    false: 'BOOLEAN',
    and: 'AND',
    or: 'OR',
};

/**
 * Tokenizer for condition expressions
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            // Two-character operators first so '<=' is not read as '<' '='
            if (this.match('==') || this.match('!=') || this.match('<=') || this.match('>=')) {
                this.addToken('COMPARE', this.input.slice(this.pos - 2, this.pos), this.pos - 2);
                continue;
            }

            switch (char) {
                case '<':
                case '>': this.addToken('COMPARE', char, this.pos); this.pos++; continue;
                case '+':
                case '-': this.addToken('SIGN', char, this.pos); this.pos++; continue;
                case '(': this.addToken('LPAREN', '(', this.pos); this.pos++; continue;
                case ')': this.addToken('RPAREN', ')', this.pos); this.pos++; continue;
                case "'":
                case '"': this.readString(char); continue;
            }

            if (/[0-9]/.test(char) || (char === '.' && /[0-9]/.test(this.peekChar(1)))) {
                this.readNumber();
                continue;
            }

            if (/[A-Za-z_]/.test(char)) {
                this.readWord();
                continue;
            }

            throw createParseError(`Unexpected character '${char}'`, this.input, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private readNumber(): void {
        const start = this.pos;
        const rest = this.input.slice(start);
        const match = /^(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?/.exec(rest);
        if (!match) {
            throw createParseError('Malformed number', this.input, start);
        }
        this.pos += match[0].length;

        // `1abc`, `1_000`, `1.2.3` are not numbers of this grammar
        if (/[A-Za-z0-9_.]/.test(this.peekChar(0))) {
            throw createParseError(
                `Malformed number '${rest.slice(0, match[0].length + 1)}'`,
                this.input,
                start
            );
        }
        this.addToken('NUMBER', match[0], start);
    }

    private readWord(): void {
        const start = this.pos;
        while (this.pos < this.input.length && /[A-Za-z0-9_]/.test(this.input[this.pos])) {
            this.pos++;
        }
        const word = this.input.slice(start, this.pos);
        const type = KEYWORDS[word];
        if (type === undefined) {
            throw createParseError(`Unexpected name '${word}'`, this.input, start);
        }
        this.addToken(type, word, start);
    }

    private readString(quote: string): void {
        const start = this.pos;
        this.pos++;
        let value = '';

        while (this.pos < this.input.length) {
            const char = this.input[this.pos];
            if (char === quote) {
                this.pos++;
                this.addToken('STRING', value, start);
                return;
            }
            if (char === '\\') {
                const escaped = ESCAPES[this.peekChar(1)];
                if (escaped === undefined) {
                    throw createParseError(`Unknown escape '\\${this.peekChar(1)}'`, this.input, this.pos);
                }
                value += escaped;
                this.pos += 2;
                continue;
            }
            value += char;
            this.pos++;
        }

        throw createParseError('Unterminated string literal', this.input, start);
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private peekChar(offset: number): string {
        return this.input.charAt(this.pos + offset);
    }

    private match(str: string): boolean {
        if (this.input.slice(this.pos, this.pos + str.length) === str) {
            this.pos += str.length;
            return true;
        }
        return false;
    }

    private addToken(type: TokenType, value: string, position: number): void {
        this.tokens.push({ type, value, position });
    }
}
