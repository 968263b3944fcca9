import { readFile } from "node:fs/promises";
import * as nodePath from "node:path";
import { Settings } from "../config";
import { printReport, runSource } from "./eval";

/**
 * Evaluates a whole file as one expression; newlines count as whitespace.
 */
export async function fileCommand(
    path: string,
    settings: Settings,
): Promise<number> {
    const filePath = nodePath.resolve(path);
    let source: string;
    try {
        source = await readFile(filePath, "utf-8");
    } catch (e) {
        console.error(
            settings.chalk.red(`Error reading ${filePath}: `),
            e instanceof Error ? e.message : String(e),
        );
        return 1;
    }
    return printReport(runSource(source, settings));
}
