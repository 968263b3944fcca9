import {
    evaluate,
    tryEvaluate,
    DivisionByZeroError,
    LexError,
    ParseError,
} from "../src";

describe("evaluate", () => {
    test("precedence", () => {
        expect(evaluate("2 + 3 * 4")).toBe(14);
    });

    test("left associativity", () => {
        expect(evaluate("10 - 2 - 3")).toBe(5);
    });

    test("parentheses override precedence", () => {
        expect(evaluate("(2 + 3) * 4")).toBe(20);
    });

    test("unary negation composes", () => {
        expect(evaluate("--5")).toBe(5);
        expect(evaluate("-5 + 3")).toBe(-2);
    });

    test("multi-line input", () => {
        expect(evaluate("(1 +\n 2)\n * 3")).toBe(9);
    });

    test("each stage reports its own error kind", () => {
        expect(() => evaluate("2 @ 3")).toThrow(LexError);
        expect(() => evaluate("2 + ")).toThrow(ParseError);
        expect(() => evaluate("1 / 0")).toThrow(DivisionByZeroError);
    });

    test("lexing fails before parsing", () => {
        // "(" is unclosed, but the lexer sees "@" first
        expect(() => evaluate("(1 @")).toThrow(LexError);
    });

    test("parser options are forwarded", () => {
        expect(() => evaluate("--1", { maxDepth: 1 })).toThrow(ParseError);
    });
});

describe("tryEvaluate", () => {
    test("success", () => {
        expect(tryEvaluate("6 * 7")).toEqual({ ok: true, value: 42 });
    });

    test("lex error", () => {
        const result = tryEvaluate("2 @ 3");
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe("LexError");
            expect(result.error.position).toBe(2);
        }
    });

    test("parse error", () => {
        const result = tryEvaluate("2 + ");
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe("ParseError");
            expect(result.error.position).toBe(4);
        }
    });

    test("division by zero", () => {
        const result = tryEvaluate("1 / 0");
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe("DivisionByZero");
            expect(result.error.position).toBe(4);
        }
    });

    test("repeated calls agree", () => {
        const input = "3.3 * (2 - -1.5) / 7";
        expect(tryEvaluate(input)).toEqual(tryEvaluate(input));
    });
});
