import { createHash } from "node:crypto";
import { writeFile } from "node:fs/promises";
import type { FieldKeyConfig } from "./config";
import { ConfigError } from "./errors";
import { type Logger, silentLogger } from "./logger";
import { type StructType, type Type, TypeKind } from "./struct";

/** Chooses the member key a struct field is written under. */
export interface FieldKeys {
    keyFor(type: StructType, field: string): string;
}

/** Every field is written under its own name. */
export const plainKeys: FieldKeys = {
    keyFor: (_type, field) => field,
};

/** Saved form of a key map, keyed by struct name. */
export interface FieldKeyDocument {
    /** field name -> key */
    fields: Record<string, Record<string, string>>;
    /** key -> field name */
    names: Record<string, Record<string, string>>;
}

const BASE32 = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";
const KEY_PATTERN = /^[A-Z][A-Z0-9]{3}$/;
const SUFFIX_COUNT = BASE32.length * BASE32.length;

/** First two base32 digits of the MD5 digest of `text`. */
function shortHash(text: string): string {
    const digest = createHash("md5").update(text).digest();
    const bits = (digest[0] << 8) | digest[1];
    return BASE32[(bits >> 11) & 31] + BASE32[(bits >> 6) & 31];
}

function prefixFor(structName: string): string {
    return structName.replace(/[^A-Za-z0-9]/g, "").slice(0, 2).toUpperCase().padEnd(2, "X");
}

/**
 * Four-character keys for selected struct fields: two characters from the
 * struct name, then two from a salted hash of the field. Keys are unique
 * across every struct the map has seen. Fields that aren't selected keep
 * their names.
 *
 * @example
 * ```ts
 * const keys = new FieldKeyMap(loadConfig({ fieldKeys: { enable: true, encryptAll: true } }).fieldKeys);
 * keys.assign("Point", Point);
 * keys.keyFor(Point, "x"); // "PO" followed by two hash characters
 * ```
 */
export class FieldKeyMap implements FieldKeys {
    readonly config: FieldKeyConfig;
    readonly logger: Logger;
    #keys = new Map<StructType, Map<string, string>>();
    #names = new Map<StructType, string>();
    #used = new Set<string>();

    constructor(config: FieldKeyConfig, logger: Logger = silentLogger) {
        this.config = config;
        this.logger = logger;
    }

    shouldEncrypt(structName: string, field: string): boolean {
        if (!this.config.enable) return false;
        if (this.config.excluded[structName]?.includes(field)) return false;
        if (this.config.encryptAll) return true;
        return this.config.fields[structName]?.includes(field) ?? false;
    }

    /**
     * Generates keys for the fields of a struct registered as `name`. A
     * struct seen before under another name keeps its first keys.
     */
    assign(name: string, type: Type): void {
        if (type.kind !== TypeKind.NestedAggregate || this.#keys.has(type)) return;

        for (const listed of this.config.enable ? this.config.fields[name] ?? [] : []) {
            if (!type.field(listed)) {
                this.logger.warn("Field key configured for unknown field", { type: name, field: listed });
            }
        }

        const keys = new Map<string, string>();
        const taken = new Set(type.fields.map(f => f.name));
        for (const field of type.fields) {
            // Bitfield groups keep their names, back references are never written
            if (field.type.kind === TypeKind.BitfieldGroup || field.type.kind === TypeKind.BackReference) continue;
            if (!this.shouldEncrypt(name, field.name)) continue;
            const key = this.generate(name, field.name, taken);
            keys.set(field.name, key);
            taken.add(key);
            this.logger.debug("Field key assigned", { type: name, field: field.name, key });
        }
        this.#keys.set(type, keys);
        this.#names.set(type, name);
    }

    keyFor(type: StructType, field: string): string {
        return this.#keys.get(type)?.get(field) ?? field;
    }

    private generate(structName: string, field: string, taken: ReadonlySet<string>): string {
        const prefix = prefixFor(structName);
        let key = prefix + shortHash(`${this.config.salt}:${structName}:${field}`);
        for (let attempt = 0; this.#used.has(key) || taken.has(key); ++attempt) {
            if (attempt >= SUFFIX_COUNT) {
                throw new ConfigError(`No free field key left for prefix ${prefix}`, [`${structName}.${field}`]);
            }
            key = prefix + shortHash(key);
        }
        if (!KEY_PATTERN.test(key)) {
            throw new ConfigError(`Invalid field key ${key}`, [`${structName}.${field}`]);
        }
        this.#used.add(key);
        return key;
    }

    toJSON(): FieldKeyDocument {
        const document: FieldKeyDocument = { fields: {}, names: {} };
        for (const [type, keys] of this.#keys) {
            const name = this.#names.get(type);
            if (name === undefined || keys.size === 0) continue;
            const names: Record<string, string> = {};
            for (const [field, key] of keys) {
                names[key] = field;
            }
            document.fields[name] = Object.fromEntries(keys);
            document.names[name] = names;
        }
        return document;
    }
}

/** Writes the key map as JSON, for readers that need the original names. */
export async function saveFieldMap(path: string, keys: FieldKeyMap): Promise<void> {
    await writeFile(path, `${JSON.stringify(keys.toJSON(), null, 2)}\n`, "utf8");
}
