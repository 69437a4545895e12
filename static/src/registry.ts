import { type ConverterConfig, isEnabled, loadConfig } from "./config";
import { type Allocator, OverlayDeserializer } from "./deserialize";
import { ConfigError, ConvertError, type ConvertResult, ConvertStatus, failure } from "./errors";
import type { Value } from "./instance";
import { FieldKeyMap } from "./keys";
import { createLogger, type Logger } from "./logger";
import { DiffingSerializer } from "./serialize";
import { componentTypes, type Type, TypeKind } from "./struct";
import { jsonTree, type JsonValue } from "./tree";

/**
 * JSON entry points for one registered type.
 */
export class TypeConverter {
    readonly name: string;
    readonly type: Type;
    #serializer: DiffingSerializer<JsonValue>;
    #deserializer: OverlayDeserializer<JsonValue>;

    constructor(name: string, type: Type, serializer: DiffingSerializer<JsonValue>, deserializer: OverlayDeserializer<JsonValue>) {
        this.name = name;
        this.type = type;
        this.#serializer = serializer;
        this.#deserializer = deserializer;
    }

    toTree(instance: Value | undefined, baseline?: Value | null): JsonValue | undefined {
        return this.#serializer.serialize(this.type, instance, baseline);
    }

    fromTree(node: JsonValue | undefined, baseline: Value | null | undefined, out: Value | null | undefined): ConvertResult<Value> {
        return this.#deserializer.deserialize(this.type, node, baseline, out);
    }

    decode(node: JsonValue | undefined, baseline?: Value | null): ConvertResult<Value> {
        return this.#deserializer.decode(this.type, node, baseline);
    }

    arrayToTree(values: readonly Value[] | undefined, baseline?: readonly Value[] | null, n?: number): JsonValue | undefined {
        return this.#serializer.serializeArray(this.type, values, baseline, n);
    }

    arrayFromTree(
        node: JsonValue | undefined,
        baseline: readonly Value[] | null | undefined,
        out: Value[] | null | undefined,
        n?: number,
    ): ConvertResult<Value[]> {
        return this.#deserializer.deserializeArray(this.type, node, baseline, out, n);
    }

    /** Serializes to JSON text; `undefined` when nothing could be encoded. */
    stringify(instance: Value | undefined, baseline?: Value | null, space?: number): string | undefined {
        const node = this.toTree(instance, baseline);
        return node === undefined ? undefined : JSON.stringify(node, null, space);
    }

    /** Parses JSON text and decodes it over `baseline`. Malformed text is a ParseError. */
    parse(text: string, baseline?: Value | null): ConvertResult<Value> {
        let node: JsonValue;
        try {
            node = JSON.parse(text);
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            return failure(new ConvertError(ConvertStatus.ParseError, `invalid JSON: ${reason}`));
        }
        return this.decode(node, baseline);
    }
}

export interface RegistryOptions {
    config?: ConverterConfig;
    logger?: Logger;
    allocator?: Allocator;
}

/**
 * Named types with per-type enable flags. A composite type may only be
 * enabled when every registered type it is built from is enabled too.
 */
export class ConverterRegistry {
    readonly config: ConverterConfig;
    readonly logger: Logger;
    #types = new Map<string, Type>();
    #enabled = new Map<string, boolean>();
    #keys: FieldKeyMap;
    #serializer: DiffingSerializer<JsonValue>;
    #deserializer: OverlayDeserializer<JsonValue>;

    constructor(options: RegistryOptions = {}) {
        this.config = options.config ?? loadConfig();
        this.logger = options.logger ?? createLogger(this.config.logLevel);
        this.#keys = new FieldKeyMap(this.config.fieldKeys, this.logger);
        this.#serializer = new DiffingSerializer({
            tree: jsonTree,
            maxDepth: this.config.maxDepth,
            logger: this.logger,
            keys: this.#keys,
        });
        this.#deserializer = new OverlayDeserializer({
            tree: jsonTree,
            maxDepth: this.config.maxDepth,
            logger: this.logger,
            allocator: options.allocator,
            keys: this.#keys,
        });
    }

    /**
     * Registers `type` under `name`. The enable flag defaults to the
     * configuration's entry for `name`.
     */
    register(name: string, type: Type, enabled: boolean = isEnabled(this.config, name)): this {
        if (this.#types.has(name)) {
            throw new ConfigError(`Type ${name} is already registered`);
        }
        this.#types.set(name, type);
        this.#enabled.set(name, enabled);
        this.#keys.assign(name, type);
        return this;
    }

    /** Member keys assigned to the registered structs. */
    get fieldKeys(): FieldKeyMap {
        return this.#keys;
    }

    has(name: string): boolean {
        return this.#types.has(name);
    }

    isEnabled(name: string): boolean {
        return this.#enabled.get(name) ?? false;
    }

    names(): string[] {
        return [...this.#types.keys()];
    }

    /**
     * Names of the registered types that `name` is built from, looking
     * through anonymous arrays, pointers and unions. Back references don't
     * count since they are never converted.
     */
    dependencies(name: string): string[] {
        const root = this.#types.get(name);
        if (!root) return [];
        const byType = new Map<Type, string>();
        for (const [registered, type] of this.#types) {
            // Aliases share a descriptor; the first name wins
            if (!byType.has(type)) byType.set(type, registered);
        }

        const found = new Set<string>();
        const seen = new Set<Type>([root]);
        const pending = componentTypes(root);
        while (pending.length > 0) {
            const type = pending.pop();
            if (type === undefined || seen.has(type)) continue;
            seen.add(type);
            if (type.kind === TypeKind.BackReference) continue;
            const registered = byType.get(type);
            if (registered !== undefined && registered !== name) {
                found.add(registered);
                continue;
            }
            pending.push(...componentTypes(type));
        }
        return [...found];
    }

    /**
     * Checks that no enabled type depends on a disabled one. Every violation
     * is reported in a single ConfigError.
     */
    validate(): void {
        const issues: string[] = [];
        for (const name of this.#types.keys()) {
            if (!this.isEnabled(name)) continue;
            for (const dependency of this.dependencies(name)) {
                if (!this.isEnabled(dependency)) {
                    issues.push(`${name} requires ${dependency}, which is disabled`);
                }
            }
        }
        if (issues.length > 0) {
            this.logger.error("Converter dependency check failed", { issues });
            throw new ConfigError("Converter dependencies not satisfied", issues);
        }
    }

    converter(name: string): TypeConverter {
        const type = this.#types.get(name);
        if (!type) {
            throw new ConfigError(`Unknown type ${name}`);
        }
        if (!this.isEnabled(name)) {
            throw new ConfigError(`Converter for ${name} is disabled`);
        }
        return new TypeConverter(name, type, this.#serializer, this.#deserializer);
    }
}

/**
 * Registers every named type, applying the configuration's enable flags, and
 * validates the dependencies between them.
 */
export function createRegistry(
    types: Record<string, Type> | Map<string, Type>,
    config: ConverterConfig = loadConfig(),
    logger?: Logger,
): ConverterRegistry {
    const registry = new ConverterRegistry({ config, logger });
    const entries = types instanceof Map ? [...types.entries()] : Object.entries(types);
    for (const [name, type] of entries) {
        registry.register(name, type);
    }
    registry.validate();
    return registry;
}
