import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { tokenize } from "../lexer/Lexer";
import { ParseError } from "../utils/Error";
import {
    BinaryOperator,
    DEFAULT_MAX_DEPTH,
    Expression,
    ParserOptions,
    Span,
} from "./types";

const BINARY_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
    [TokenType.PlusOp]: "Add",
    [TokenType.MinusOp]: "Sub",
    [TokenType.MultiplyOp]: "Mul",
    [TokenType.DivideOp]: "Div",
};

/**
 * Recursive-descent parser for a single arithmetic expression.
 *
 * expression := term (('+' | '-') term)*
 * term       := factor (('*' | '/') factor)*
 * factor     := '-' factor | primary
 * primary    := NUMBER | '(' expression ')'
 */
export class Parser {
    private tokens: Token[];
    private current: number = 0;
    private depth: number = 0;
    private maxDepth: number;

    constructor(tokens: Token[], options: ParserOptions = {}) {
        const last = tokens[tokens.length - 1];
        if (last === undefined || last.type !== TokenType.EOF) {
            throw new Error("Token stream must end with an EOF token");
        }
        this.tokens = tokens;
        this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    }

    public parse(): Expression {
        const expr = this.expression();
        if (!this.isAtEnd()) {
            throw this.error(this.peek(), "end of input");
        }
        return expr;
    }

    private expression(): Expression {
        const start = this.peek().position;
        let left = this.term();

        while (this.match(TokenType.PlusOp, TokenType.MinusOp)) {
            const op = this.operatorOf(this.previous());
            const right = this.term();
            left = {
                type: "BinaryOp",
                op,
                left,
                right,
                span: this.spanFrom(start),
            };
        }

        return left;
    }

    private term(): Expression {
        const start = this.peek().position;
        let left = this.factor();

        while (this.match(TokenType.MultiplyOp, TokenType.DivideOp)) {
            const op = this.operatorOf(this.previous());
            const right = this.factor();
            left = {
                type: "BinaryOp",
                op,
                left,
                right,
                span: this.spanFrom(start),
            };
        }

        return left;
    }

    private factor(): Expression {
        if (this.match(TokenType.MinusOp)) {
            const operator = this.previous();
            this.enter(operator);
            const operand = this.factor();
            this.depth--;
            return {
                type: "UnaryMinus",
                operand,
                span: this.spanFrom(operator.position),
            };
        }
        return this.primary();
    }

    private primary(): Expression {
        const token = this.peek();

        if (token.type === TokenType.NumberLiteral) {
            this.advance();
            return {
                type: "NumberLiteral",
                value: token.value,
                span: this.spanFrom(token.position),
            };
        }

        if (this.match(TokenType.LParen)) {
            this.enter(token);
            const expr = this.expression();
            this.consume(TokenType.RParen, "')'");
            this.depth--;
            // Groups leave no node behind; the inner node covers the parentheses
            return { ...expr, span: this.spanFrom(token.position) };
        }

        throw this.error(token, "number or '('");
    }

    private enter(token: Token) {
        this.depth++;
        if (this.depth > this.maxDepth) {
            throw this.error(
                token,
                `at most ${this.maxDepth} nested operators or groups`,
            );
        }
    }

    private operatorOf(token: Token): BinaryOperator {
        const op = BINARY_OPERATORS[token.type];
        if (op === undefined) {
            throw this.error(token, "an operator");
        }
        return op;
    }

    private spanFrom(start: number): Span {
        const last = this.previous();
        return { start, end: last.position + last.lexeme.length };
    }

    private match(...types: TokenType[]): boolean {
        if (this.check(...types)) {
            this.advance();
            return true;
        }
        return false;
    }

    private consume(type: TokenType, expected: string): Token {
        if (this.check(type)) return this.advance();
        throw this.error(this.peek(), expected);
    }

    private check(...types: TokenType[]): boolean {
        return types.includes(this.peek().type);
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    private error(token: Token, expected: string): ParseError {
        return new ParseError(
            expected,
            token.type === TokenType.EOF ? null : token.lexeme,
            token.position,
        );
    }
}

export function parse(source: string, options: ParserOptions = {}): Expression {
    return new Parser(tokenize(source), options).parse();
}
