/**
 * Parser Types
 */

export type TokenType =
    | 'BOOLEAN'       // true, false
    | 'NUMBER'        // 1, 2.5, .5, 1e3
    | 'STRING'        // 'text', "text"
    | 'AND'           // and
    | 'OR'            // or
    | 'COMPARE'       // == != < <= > >=
    | 'SIGN'          // + -
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'EOF';

export interface Token {
    type: TokenType;
    /** Raw source text for operators and numbers, decoded content for strings */
    value: string;
    position: number;
}
