import chalk from "chalk";
import { tryEvaluate } from "../src";
import { DivisionByZeroError, ReckonError } from "../src/utils/Error";
import { locate, renderError } from "../src/utils/err";

const plain = new chalk.Instance({ level: 0 });

function failure(source: string): ReckonError {
    const result = tryEvaluate(source);
    if (result.ok) throw new Error(`Expected "${source}" to fail`);
    return result.error;
}

function render(source: string): string[] {
    return renderError(failure(source), source, { chalk: plain }).split("\n");
}

describe("Error rendering", () => {
    test("locate converts offsets to lines and columns", () => {
        expect(locate("ab\ncd", 0)).toEqual({ line: 1, col: 1 });
        expect(locate("ab\ncd", 4)).toEqual({ line: 2, col: 2 });
        expect(locate("abc", 3)).toEqual({ line: 1, col: 4 });
    });

    test("lex error with hint", () => {
        expect(render("2 @ 3")).toEqual([
            "Error: Unexpected character '@'",
            "  --> line 1:3",
            "  |",
            "1 | 2 @ 3",
            "  |   ^",
            "  |",
            "  = Expressions may only contain numbers, whitespace and + - * / ( )",
        ]);
    });

    test("parse error at end of input", () => {
        expect(render("2 + ")).toEqual([
            "Error: Expected number or '(', found end of input",
            "  --> line 1:5",
            "  |",
            "1 | 2 + ",
            "  |     ^",
            "  |",
        ]);
    });

    test("points into the right line of multi-line input", () => {
        expect(render("1 +\n(2 *\n)")).toEqual([
            "Error: Expected number or '(', found ')'",
            "  --> line 3:1",
            "  |",
            "3 | )",
            "  | ^",
            "  |",
        ]);
    });

    test("underlines the whole divisor", () => {
        expect(render("10 / (5 - 5)")).toEqual([
            "Error: Division by zero",
            "  --> line 1:6",
            "  |",
            "1 | 10 / (5 - 5)",
            "  | " + " ".repeat(5) + "^".repeat(7),
            "  |",
            "  = The divisor evaluated to 0",
        ]);
    });

    test("pads the gutter for wide line numbers", () => {
        const lines = render("\n".repeat(9) + "@");
        expect(lines.slice(1, 5)).toEqual([
            "   --> line 10:1",
            "   |",
            "10 | @",
            "   | ^",
        ]);
    });

    test("errors without a position render only the header", () => {
        const output = renderError(new DivisionByZeroError(), "", {
            chalk: plain,
        });
        expect(output).toBe(
            "Error: Division by zero\n= The divisor evaluated to 0",
        );
    });

    test("error names follow their class", () => {
        expect(failure("2 @ 3").name).toBe("LexError");
        expect(failure("(").name).toBe("ParseError");
        expect(failure("1 / 0").name).toBe("DivisionByZeroError");
    });
});
