import { Token } from "./Token";
import { TokenType } from "./TokenType";
import { LexError } from "../utils/Error";

const SYMBOLS: Record<string, Exclude<TokenType, TokenType.NumberLiteral>> = {
    "+": TokenType.PlusOp,
    "-": TokenType.MinusOp,
    "*": TokenType.MultiplyOp,
    "/": TokenType.DivideOp,
    "(": TokenType.LParen,
    ")": TokenType.RParen,
};

export class Lexer {
    private input: string;
    private position: number = 0;

    constructor(input: string) {
        this.input = input;
    }

    public tokenize(): Token[] {
        const tokens: Token[] = [];

        while (this.position < this.input.length) {
            const char = this.currentChar();

            if (this.isWhitespace(char)) {
                this.advance();
                continue;
            }

            const symbol = SYMBOLS[char];
            if (symbol !== undefined) {
                tokens.push({
                    type: symbol,
                    lexeme: char,
                    position: this.position,
                });
                this.advance();
                continue;
            }

            if (this.isDigit(char)) {
                tokens.push(this.readNumber());
                continue;
            }

            throw new LexError(this.codePointAt(this.position), this.position);
        }

        tokens.push({ type: TokenType.EOF, lexeme: "", position: this.position });
        return tokens;
    }

    private advance() {
        this.position++;
    }

    private currentChar(): string {
        return this.input[this.position];
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    // Reports astral characters whole instead of as a lone surrogate
    private codePointAt(position: number): string {
        const code = this.input.codePointAt(position);
        return code === undefined ? "" : String.fromCodePoint(code);
    }

    private isWhitespace(char: string): boolean {
        return /\s/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    private readNumber(): Token {
        const start = this.position;

        while (
            this.position < this.input.length &&
            this.isDigit(this.currentChar())
        ) {
            this.advance();
        }

        if (this.currentChar() === "." && this.isDigit(this.peekChar())) {
            this.advance(); // consume dot

            while (
                this.position < this.input.length &&
                this.isDigit(this.currentChar())
            ) {
                this.advance();
            }
        }

        const lexeme = this.input.slice(start, this.position);
        return {
            type: TokenType.NumberLiteral,
            lexeme,
            value: parseFloat(lexeme),
            position: start,
        };
    }
}

export function tokenize(source: string): Token[] {
    return new Lexer(source).tokenize();
}
