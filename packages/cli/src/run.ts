import { Chalk } from "chalk";
import {
    chalkFor,
    ConfigError,
    EvalFlags,
    GlobalArgs,
    loadConfig,
    resolveSettings,
    Settings,
} from "./config";

export type CommandArgs = GlobalArgs & Partial<EvalFlags>;

export async function settingsFor(argv: CommandArgs): Promise<Settings> {
    const config = await loadConfig(argv.config);
    return resolveSettings(argv, config);
}

/**
 * Writes a failure that escaped a command to stderr.
 */
export function reportFailure(e: unknown, c: Chalk): void {
    if (e instanceof ConfigError) {
        console.error(c.red(`Configuration error: ${e.message}`));
    } else {
        console.error(c.red("Error: "), e instanceof Error ? e.message : String(e));
    }
}

/**
 * Resolves settings and runs a command, returning its exit code. Failures are
 * reported in the colour mode chosen on the command line, or in the
 * configured one once the configuration has loaded.
 */
export async function runCommand(
    argv: CommandArgs,
    action: (settings: Settings) => number | Promise<number>,
    load: (argv: CommandArgs) => Promise<Settings> = settingsFor,
): Promise<number> {
    let c = chalkFor(argv.color ?? true);
    try {
        const settings = await load(argv);
        c = settings.chalk;
        return await action(settings);
    } catch (e) {
        reportFailure(e, c);
        return 1;
    }
}
