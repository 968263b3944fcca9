import { createInterface } from "node:readline";
import { Settings } from "../config";
import { runSource } from "./eval";

export interface ReplOptions {
    settings: Settings;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    /** Receives every result or rendered error; defaults to writing to `output` */
    print?: (text: string) => void;
}

/**
 * Reads one expression per line until `.exit` or end of input. Each line is
 * evaluated on its own and errors never end the session.
 */
export function startRepl(options: ReplOptions): Promise<void> {
    const { settings } = options;
    const input = options.input ?? process.stdin;
    const output = options.output ?? process.stdout;
    const print = options.print ?? ((text: string) => output.write(text + "\n"));

    const rl = createInterface({ input, output });
    rl.setPrompt(settings.prompt);

    return new Promise((resolve) => {
        rl.on("line", (line) => {
            const text = line.trim();
            if (text === ".exit") {
                rl.close();
                return;
            }

            if (text !== "") {
                try {
                    const report = runSource(text, settings);
                    for (const l of report.lines) print(l);
                    if (!report.ok) print(report.error);
                } catch (e) {
                    print(
                        settings.chalk.red(
                            `Error: ${e instanceof Error ? e.message : String(e)}`,
                        ),
                    );
                }
            }
            rl.prompt();
        });
        rl.on("close", () => resolve());
        rl.prompt();
    });
}
