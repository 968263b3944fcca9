import {
    Evaluator,
    isReckonError,
    Parser,
    printExpression,
    renderError,
    tokenize,
} from "@reckon/core";
import { Settings } from "../config";
import { formatNumber, formatToken } from "../format";

export type EvalReport =
    | { ok: true; lines: string[] }
    | { ok: false; lines: string[]; error: string };

/**
 * Runs one source text through the pipeline, collecting the optional stage
 * dumps and the formatted result or rendered error.
 */
export function runSource(
    source: string,
    settings: Pick<Settings, "tokens" | "ast" | "precision" | "maxDepth" | "chalk">,
): EvalReport {
    const c = settings.chalk;
    const lines: string[] = [];

    try {
        const tokens = tokenize(source);
        if (settings.tokens) {
            lines.push(...tokens.map((t) => c.gray(formatToken(t))));
        }

        const ast = new Parser(tokens, { maxDepth: settings.maxDepth }).parse();
        if (settings.ast) {
            lines.push(c.gray(printExpression(ast)));
        }

        const value = new Evaluator().evaluate(ast);
        lines.push(formatNumber(value, settings.precision));
        return { ok: true, lines };
    } catch (e) {
        if (!isReckonError(e)) throw e;
        return {
            ok: false,
            lines,
            error: renderError(e, source, { chalk: c }),
        };
    }
}

/**
 * Prints a report; returns the process exit code.
 */
export function printReport(report: EvalReport): number {
    for (const line of report.lines) console.log(line);
    if (!report.ok) {
        console.error(report.error);
        return 1;
    }
    return 0;
}

export function evalCommand(
    expression: string | undefined,
    settings: Settings,
): number {
    if (expression === undefined) {
        console.log(
            settings.chalk.yellow(
                "No expression provided. Use 'reckon <expression>', 'reckon file <path>' or 'reckon repl'.",
            ),
        );
        return 1;
    }
    return printReport(runSource(expression, settings));
}
