export type ErrorKind = "LexError" | "ParseError" | "DivisionByZero";

/**
 * Base class for every failure the pipeline reports.
 *
 * `position` is a 0-based offset into the evaluated source; errors raised on
 * hand-built ASTs without spans have none.
 */
export abstract class ReckonError extends Error {
    public abstract readonly kind: ErrorKind;
    public rawMessage: string;
    public position?: number;
    public length: number;
    public hint?: string;

    constructor(message: string, position?: number, length = 1, hint?: string) {
        super(message);
        this.name = new.target.name;
        this.rawMessage = message;
        this.position = position;
        this.length = length;
        this.hint = hint;
    }
}

export class LexError extends ReckonError {
    public readonly kind = "LexError";
    public char: string;

    constructor(char: string, position: number) {
        super(
            `Unexpected character '${char}'`,
            position,
            1,
            "Expressions may only contain numbers, whitespace and + - * / ( )",
        );
        this.char = char;
    }
}

export class ParseError extends ReckonError {
    public readonly kind = "ParseError";
    public expected: string;
    public found: string;

    constructor(expected: string, found: string | null, position: number) {
        const shown = found === null ? "end of input" : `'${found}'`;
        super(
            `Expected ${expected}, found ${shown}`,
            position,
            found === null ? 1 : Math.max(1, found.length),
        );
        this.expected = expected;
        this.found = found ?? "end of input";
    }
}

export class DivisionByZeroError extends ReckonError {
    public readonly kind = "DivisionByZero";

    constructor(position?: number, length = 1) {
        super("Division by zero", position, length, "The divisor evaluated to 0");
    }
}

export function isReckonError(e: unknown): e is ReckonError {
    return e instanceof ReckonError;
}
