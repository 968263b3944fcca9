import chalk, { Chalk } from "chalk";
import * as yaml from "js-yaml";
import { DEFAULT_MAX_DEPTH } from "@reckon/core";
import { readFile } from "node:fs/promises";
import * as nodePath from "node:path";

export const DEFAULT_CONFIG_FILE = "reckon.yml";
export const DEFAULT_PROMPT = "> ";
export const MAX_PRECISION = 21;
/** `maxDepth` may lower the parser's nesting limit but not raise it past what the stack holds */
export const MAX_DEPTH = DEFAULT_MAX_DEPTH;

export interface ReckonConfig {
    precision?: number;
    color?: boolean;
    prompt?: string;
    maxDepth?: number;
}

/** Options every command accepts */
export interface GlobalArgs {
    config?: string;
    color?: boolean;
}

export interface EvalFlags {
    tokens: boolean;
    ast: boolean;
    precision?: number;
}

export interface Settings extends EvalFlags {
    prompt: string;
    maxDepth?: number;
    chalk: Chalk;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

function expectInteger(
    source: string,
    key: string,
    value: unknown,
    min: number,
    max: number,
): number {
    if (
        typeof value !== "number" ||
        !Number.isInteger(value) ||
        value < min ||
        value > max
    ) {
        throw new ConfigError(
            `${source}: '${key}' must be an integer between ${min} and ${max}`,
        );
    }
    return value;
}

export function parseConfig(content: string, file: string): ReckonConfig {
    let raw: unknown;
    try {
        raw = yaml.load(content, { filename: file });
    } catch (e) {
        if (e instanceof yaml.YAMLException) {
            throw new ConfigError(`${file}: ${e.message}`);
        }
        throw e;
    }

    if (raw === undefined || raw === null) return {};
    if (typeof raw !== "object" || Array.isArray(raw)) {
        throw new ConfigError(`${file}: expected a mapping at the top level`);
    }

    const config: ReckonConfig = {};
    const entries: [string, unknown][] = Object.entries(raw);
    for (const [key, value] of entries) {
        switch (key) {
            case "precision":
                config.precision = expectInteger(file, key, value, 1, MAX_PRECISION);
                break;
            case "maxDepth":
                config.maxDepth = expectInteger(file, key, value, 1, MAX_DEPTH);
                break;
            case "color":
                if (typeof value !== "boolean") {
                    throw new ConfigError(`${file}: 'color' must be true or false`);
                }
                config.color = value;
                break;
            case "prompt":
                if (typeof value !== "string") {
                    throw new ConfigError(`${file}: 'prompt' must be a string`);
                }
                config.prompt = value;
                break;
            default:
                throw new ConfigError(`${file}: unknown key '${key}'`);
        }
    }

    return config;
}

// fs errors may come from another realm, so check the shape rather than the class
export function isMissingFile(e: unknown): boolean {
    return (
        typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT"
    );
}

/**
 * Reads the configuration file. A missing default file yields an empty
 * configuration; a missing file named explicitly is an error.
 */
export async function loadConfig(
    file?: string,
    cwd: string = process.cwd(),
): Promise<ReckonConfig> {
    const configPath = nodePath.resolve(cwd, file ?? DEFAULT_CONFIG_FILE);

    let content: string;
    try {
        content = await readFile(configPath, "utf-8");
    } catch (e) {
        if (isMissingFile(e)) {
            if (file === undefined) return {};
            throw new ConfigError(`Config file not found: ${configPath}`);
        }
        throw e;
    }

    return parseConfig(content, configPath);
}

export function chalkFor(color: boolean): Chalk {
    return color ? chalk : new chalk.Instance({ level: 0 });
}

/**
 * Merges command-line flags over the configuration file.
 */
export function resolveSettings(
    args: GlobalArgs & Partial<EvalFlags>,
    config: ReckonConfig,
): Settings {
    const precision = args.precision ?? config.precision;
    if (precision !== undefined) {
        expectInteger("--precision", "precision", precision, 1, MAX_PRECISION);
    }

    const color = args.color ?? config.color ?? true;

    return {
        tokens: args.tokens ?? false,
        ast: args.ast ?? false,
        precision,
        prompt: config.prompt ?? DEFAULT_PROMPT,
        maxDepth: config.maxDepth,
        chalk: chalkFor(color),
    };
}
