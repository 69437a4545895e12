import { readFile } from "node:fs/promises";
import { z } from "zod";
import { SchemaError } from "./errors";
import {
    makeArrayType,
    makeBackRef,
    makeBitfield,
    makePointer,
    makeStruct,
    makeText,
    makeUnion,
    type Type,
    TYPE_REGISTRY,
    TypeKind,
} from "./struct";

const fieldSchema = z.object({
    name: z.string().min(1),
    type: z.string().min(1),
});

const typeDefinitionSchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("struct"), fields: z.array(fieldSchema).min(1) }),
    z.object({ kind: z.literal("array"), of: z.string().min(1), length: z.number().int().positive() }),
    z.object({ kind: z.literal("pointer"), to: z.string().min(1) }),
    z.object({ kind: z.literal("union"), alternatives: z.array(fieldSchema).min(1) }),
    z.object({
        kind: z.literal("bitfield"),
        storage: z.enum(["u8", "u16", "u32"]),
        members: z.array(z.object({ name: z.string().min(1), bits: z.number().int().min(1).max(32) })).min(1),
    }),
    z.object({ kind: z.literal("text"), capacity: z.number().int().positive() }),
    z.object({ kind: z.literal("backref"), to: z.string().min(1), inverseOf: z.string().min(1) }),
    z.object({ kind: z.literal("alias"), of: z.string().min(1) }),
]);

export const schemaDocumentSchema = z.object({
    types: z.record(z.string().min(1), typeDefinitionSchema),
});

export type TypeDefinition = z.infer<typeof typeDefinitionSchema>;
export type SchemaDocument = z.infer<typeof schemaDocumentSchema>;

/**
 * Turns validated definitions into descriptors. Types are built on first
 * use; pointers and back references defer to a thunk so they may refer to a
 * type that is still being built.
 */
class SchemaResolver {
    #definitions: Record<string, TypeDefinition>;
    #built = new Map<string, Type>();
    #building: string[] = [];

    constructor(definitions: Record<string, TypeDefinition>) {
        this.#definitions = definitions;
    }

    resolve(name: string, from?: string): Type {
        const built = this.#built.get(name);
        if (built) return built;

        const definition = this.#definitions[name];
        if (!definition) {
            const primitive = TYPE_REGISTRY[name];
            if (primitive) return primitive;
            throw new SchemaError(`Unknown type reference ${name}`, from);
        }
        if (this.#building.includes(name)) {
            const cycle = [...this.#building.slice(this.#building.indexOf(name)), name];
            throw new SchemaError(`Type contains itself by value: ${cycle.join(" -> ")}`, name);
        }

        this.#building.push(name);
        try {
            const type = this.build(name, definition);
            this.#built.set(name, type);
            return type;
        } finally {
            this.#building.pop();
        }
    }

    private build(name: string, definition: TypeDefinition): Type {
        const options = { name };
        // Lazy references start from an empty build stack
        const later = (target: string) => () => this.resolve(target, name);
        try {
            switch (definition.kind) {
            case "struct":
                return makeStruct(definition.fields.map(f => ({ name: f.name, type: this.resolve(f.type, name) })), options);
            case "array":
                return makeArrayType(this.resolve(definition.of, name), definition.length, options);
            case "pointer":
                return makePointer(later(definition.to), options);
            case "union":
                return makeUnion(definition.alternatives.map(f => ({ name: f.name, type: this.resolve(f.type, name) })), options);
            case "bitfield":
                return makeBitfield(TYPE_REGISTRY[definition.storage], definition.members, options);
            case "text":
                return makeText(definition.capacity, options);
            case "backref":
                return makeBackRef(later(definition.to), definition.inverseOf, options);
            case "alias":
                return this.resolve(definition.of, name);
            }
        } catch (e) {
            if (e instanceof SchemaError) throw e;
            throw new SchemaError(e instanceof Error ? e.message : String(e), name);
        }
    }

    /** Forces every deferred reference so unknown names fail at load time. */
    check(type: Type, name: string): void {
        try {
            if (type.kind === TypeKind.OwnedPointer) {
                void type.pointee;
            } else if (type.kind === TypeKind.BackReference && type.target.kind !== TypeKind.NestedAggregate) {
                throw new SchemaError(`Back reference must target a struct, got ${type.target.name}`, name);
            }
        } catch (e) {
            if (e instanceof SchemaError) throw e;
            throw new SchemaError(e instanceof Error ? e.message : String(e), name);
        }
    }
}

function formatIssue(issue: z.ZodIssue): string {
    return `${issue.path.join(".") || "<root>"}: ${issue.message}`;
}

/**
 * Validates a schema document and builds a descriptor for every declared
 * type, keyed by name.
 *
 * @example
 * ```ts
 * const types = loadSchema({
 *   types: {
 *     Node: { kind: "struct", fields: [
 *       { name: "value", type: "i32" },
 *       { name: "next", type: "NodePtr" },
 *     ] },
 *     NodePtr: { kind: "pointer", to: "Node" },
 *   },
 * });
 * ```
 */
export function loadSchema(input: unknown): Map<string, Type> {
    const parsed = schemaDocumentSchema.safeParse(input);
    if (!parsed.success) {
        throw new SchemaError(`Invalid schema document:\n  ${parsed.error.issues.map(formatIssue).join("\n  ")}`);
    }

    const resolver = new SchemaResolver(parsed.data.types);
    const types = new Map<string, Type>();
    for (const name of Object.keys(parsed.data.types)) {
        types.set(name, resolver.resolve(name));
    }
    // Struct fields hold the same descriptors, so checking each named
    // type covers every reference in the document
    for (const [name, type] of types) {
        resolver.check(type, name);
    }
    return types;
}

/** Reads a schema document from a JSON file and loads it. */
export async function readSchemaFile(path: string): Promise<Map<string, Type>> {
    const text = await readFile(path, "utf8");
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (e) {
        throw new SchemaError(`Failed to parse ${path}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return loadSchema(raw);
}
