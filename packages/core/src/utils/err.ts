import chalk, { Chalk } from "chalk";
import { ReckonError } from "./Error";

export interface SourceLocation {
    line: number;
    col: number;
}

export interface RenderOptions {
    /** Defaults to the shared chalk instance, which follows terminal support */
    chalk?: Chalk;
}

/**
 * Converts a 0-based offset into a 1-indexed line and column.
 */
export function locate(source: string, position: number): SourceLocation {
    let line = 1;
    let lineStart = 0;
    const end = Math.min(position, source.length);
    for (let i = 0; i < end; i++) {
        if (source[i] === "\n") {
            line++;
            lineStart = i + 1;
        }
    }
    return { line, col: position - lineStart + 1 };
}

/**
 * Formats an error as a code frame pointing at the offending location.
 *
 * Format:
 * Error: [Message]
 *   --> line [line]:[col]
 *   |
 * 1 | 2 @ 3
 *   |   ^
 *   |
 *   = [Hint]
 */
export function renderError(
    error: ReckonError,
    source: string,
    options: RenderOptions = {},
): string {
    const c = options.chalk ?? chalk;
    const errorHeader = `${c.red.bold("Error:")} ${c.bold(error.rawMessage)}`;

    if (error.position === undefined) {
        const output = [errorHeader];
        if (error.hint) output.push(`${c.blue("=")} ${error.hint}`);
        return output.join("\n");
    }

    const loc = locate(source, error.position);
    const lineContent = (source.split("\n")[loc.line - 1] ?? "").replace(
        /\r$/,
        "",
    );

    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);

    const locationLine = `${c.blue(padding)} ${c.blue("-->")} line ${loc.line}:${loc.col}`;
    const pipeLine = `${c.blue(padding)} ${c.blue("|")}`;
    const codeLine = `${c.blue(lineNumStr)} ${c.blue("|")} ${lineContent}`;

    const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
    const pointer = c.red.bold("^".repeat(Math.max(1, error.length)));
    const pointerLine = `${c.blue(padding)} ${c.blue("|")} ${pointerSpace}${pointer}`;

    const output = [
        errorHeader,
        locationLine,
        pipeLine,
        codeLine,
        pointerLine,
        pipeLine,
    ];

    if (error.hint) {
        output.push(`${c.blue(padding)} ${c.blue("=")} ${error.hint}`);
    }

    return output.join("\n");
}
