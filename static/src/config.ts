import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_MAX_DEPTH } from "./guard";

/**
 * Obfuscated JSON keys for struct fields. Fields are picked by struct name,
 * either every field (`encryptAll`) or the ones listed in `fields`, less the
 * ones in `excluded`.
 */
export const fieldKeySchema = z.object({
    enable: z.boolean().default(false),
    salt: z.string().min(1).default("struct-json"),
    encryptAll: z.boolean().default(false),
    fields: z.record(z.string(), z.array(z.string())).default({}),
    excluded: z.record(z.string(), z.array(z.string())).default({}),
}).strict();

export type FieldKeyConfig = z.infer<typeof fieldKeySchema>;

export const configSchema = z.object({
    maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
    /** Per-type enable flags. Types not listed are enabled. */
    converters: z.record(z.string(), z.boolean()).default({}),
    fieldKeys: fieldKeySchema.default({}),
}).strict();

export type ConverterConfig = z.infer<typeof configSchema>;
export type ConverterConfigInput = z.input<typeof configSchema>;

function formatIssue(issue: z.ZodIssue): string {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
}

/**
 * Validates converter settings and fills in defaults.
 *
 * @example
 * ```ts
 * loadConfig({ converters: { Node: false } });
 * // { maxDepth: 64, logLevel: "warn", converters: { Node: false }, fieldKeys: { enable: false, ... } }
 * ```
 */
export function loadConfig(input: unknown = {}): ConverterConfig {
    const parsed = configSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigError("Invalid converter configuration", parsed.error.issues.map(formatIssue));
    }
    return parsed.data;
}

export function isEnabled(config: ConverterConfig, typeName: string): boolean {
    return config.converters[typeName] ?? true;
}

/** Reads and validates a JSON configuration file. */
export async function readConfigFile(path: string): Promise<ConverterConfig> {
    const text = await readFile(path, "utf8");
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (e) {
        throw new ConfigError(`Failed to parse ${path}`, [e instanceof Error ? e.message : String(e)]);
    }
    return loadConfig(raw);
}
