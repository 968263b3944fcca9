/** Half-open range of source offsets, `end` exclusive */
export interface Span {
    start: number;
    end: number;
}

export type BinaryOperator = "Add" | "Sub" | "Mul" | "Div";

export interface NumberLiteral {
    type: "NumberLiteral";
    value: number;
    span?: Span;
}

export interface UnaryMinus {
    type: "UnaryMinus";
    operand: Expression;
    span?: Span;
}

export interface BinaryOp {
    type: "BinaryOp";
    op: BinaryOperator;
    left: Expression;
    right: Expression;
    span?: Span;
}

export type Expression = NumberLiteral | UnaryMinus | BinaryOp;

export interface ParserOptions {
    /** Maximum nesting of unary minus and parenthesized groups */
    maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 1000;
