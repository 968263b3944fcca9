import { TokenType } from "./TokenType";

interface BaseToken {
    readonly lexeme: string;
    /** 0-based offset of the first character in the source */
    readonly position: number;
}

export interface NumberToken extends BaseToken {
    readonly type: TokenType.NumberLiteral;
    readonly value: number;
}

export interface SymbolToken extends BaseToken {
    readonly type: Exclude<TokenType, TokenType.NumberLiteral>;
}

export type Token = NumberToken | SymbolToken;
