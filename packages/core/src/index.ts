import { parse } from "./parser/Parser";
import { ParserOptions } from "./parser/types";
import { Evaluator } from "./interpreter/Evaluator";
import { isReckonError, ReckonError } from "./utils/Error";

export { Lexer, tokenize } from "./lexer/Lexer";
export { TokenType } from "./lexer/TokenType";
export * from "./lexer/Token";
export { Parser, parse } from "./parser/Parser";
export * from "./parser/types";
export { Evaluator } from "./interpreter/Evaluator";
export * from "./utils/Error";
export { renderError, locate } from "./utils/err";
export type { RenderOptions, SourceLocation } from "./utils/err";
export { printExpression, expressionsEqual, OPERATOR_SYMBOLS } from "./utils/ast";

export type EvaluationResult =
    | { ok: true; value: number }
    | { ok: false; error: ReckonError };

/**
 * Tokenizes, parses and evaluates `source`.
 * Throws a {@link ReckonError} subclass when the input is malformed or
 * divides by zero.
 */
export function evaluate(source: string, options: ParserOptions = {}): number {
    const ast = parse(source, options);
    return new Evaluator().evaluate(ast);
}

export function tryEvaluate(
    source: string,
    options: ParserOptions = {},
): EvaluationResult {
    try {
        return { ok: true, value: evaluate(source, options) };
    } catch (e) {
        if (isReckonError(e)) return { ok: false, error: e };
        throw e;
    }
}
