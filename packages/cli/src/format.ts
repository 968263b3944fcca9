import { Token, TokenType } from "@reckon/core";

/**
 * Formats a result, optionally rounded to `precision` significant digits.
 * Trailing zeros left by rounding are dropped.
 */
export function formatNumber(value: number, precision?: number): string {
    if (precision === undefined || !Number.isFinite(value)) {
        return String(value);
    }
    return String(parseFloat(value.toPrecision(precision)));
}

export function formatToken(token: Token): string {
    if (token.type === TokenType.EOF) return `${token.type} @${token.position}`;
    return `${token.type} '${token.lexeme}' @${token.position}`;
}
