#!/usr/bin/env node
import yargs, { Argv } from "yargs";
import { hideBin } from "yargs/helpers";
import { chalkFor } from "./config";
import { evalCommand } from "./commands/eval";
import { fileCommand } from "./commands/file";
import { startRepl } from "./commands/repl";
import { reportFailure, runCommand } from "./run";

function withEvalOptions<T>(yargs: Argv<T>) {
    return yargs
        .option("tokens", {
            describe: "Print the token stream before the result",
            type: "boolean",
            default: false,
        })
        .option("ast", {
            describe: "Print the syntax tree as an S-expression",
            type: "boolean",
            default: false,
        })
        .option("precision", {
            describe: "Significant digits of the printed result",
            type: "number",
        });
}

const args = hideBin(process.argv);

yargs(args)
    .scriptName("reckon")
    .usage("$0 <cmd> [args]")
    .option("config", {
        describe: "Path to a reckon.yml configuration file",
        type: "string",
    })
    .option("color", {
        describe: "Colour output (use --no-color to disable)",
        type: "boolean",
    })
    .command(
        "$0 [expression]",
        "Evaluate an arithmetic expression",
        (yargs) =>
            withEvalOptions(yargs).positional("expression", {
                describe: "Expression to evaluate",
                type: "string",
            }),
        async (argv) => {
            process.exitCode = await runCommand(argv, (settings) =>
                evalCommand(argv.expression, settings),
            );
        },
    )
    .command(
        "file <path>",
        "Evaluate the expression stored in a file",
        (yargs) =>
            withEvalOptions(yargs).positional("path", {
                describe: "File containing one expression",
                type: "string",
                demandOption: true,
            }),
        async (argv) => {
            process.exitCode = await runCommand(argv, (settings) =>
                fileCommand(argv.path, settings),
            );
        },
    )
    .command(
        "repl",
        "Evaluate expressions interactively, one per line",
        (yargs) => withEvalOptions(yargs),
        async (argv) => {
            process.exitCode = await runCommand(argv, async (settings) => {
                await startRepl({ settings });
                return 0;
            });
        },
    )
    .example("$0 '2 + 3 * 4'", "Prints 14")
    .example("$0 --ast -- '-5 + 3'", "Expressions starting with '-' follow --")
    .strict()
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        const color = !args.includes("--no-color") && !args.includes("--color=false");
        reportFailure(e, chalkFor(color));
        process.exitCode = 1;
    });
