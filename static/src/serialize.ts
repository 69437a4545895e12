import { elementPath, encodeArray } from "./array";
import { DEFAULT_MAX_DEPTH, VisitGuard } from "./guard";
import {
    bitfieldMember,
    expectArray,
    expectObject,
    expectUnion,
    readField,
    scalarEquals,
    textContent,
    type Value,
    valuesEqual,
} from "./instance";
import { type FieldKeys, plainKeys } from "./keys";
import { type Logger, silentLogger } from "./logger";
import {
    type BitfieldType,
    isObjectShaped,
    PrimitiveKind,
    type ScalarType,
    type StructType,
    type Type,
    TypeKind,
    type UnionType,
} from "./struct";
import { jsonTree, type JsonValue, type ValueTree } from "./tree";

export interface SerializerOptions<N> {
    tree: ValueTree<N>;
    /**
     * Longest owned-pointer chain followed, 64 when omitted. Pointees past
     * it are left out of the output with a warning, so a longer acyclic
     * chain reads back shorter; raise the limit for such data.
     */
    maxDepth?: number;
    logger?: Logger;
    /** Member keys for struct fields; field names when omitted */
    keys?: FieldKeys;
}

/** Nothing differs from the baseline, so nothing is emitted. */
const UNCHANGED = Symbol("unchanged");

/**
 * An encoded node, UNCHANGED, or `undefined` when the tree adapter failed to
 * build a node. A failed subtree contributes nothing to its parent.
 */
type Encoded<N> = N | typeof UNCHANGED | undefined;

function joinPath(path: string, name: string): string {
    return path ? `${path}.${name}` : name;
}

/** Follows pointers down to the type that is actually encoded. */
function encodedShape(type: Type): Type {
    let current = type;
    while (current.kind === TypeKind.OwnedPointer) {
        current = current.pointee;
    }
    return current;
}

/**
 * Serializes instances into a value tree, emitting only what differs from a
 * baseline instance of the same type.
 *
 * @example
 * ```ts
 * const serializer = new DiffingSerializer({ tree: jsonTree });
 * serializer.serialize(Point, { x: 5, y: 5 }, { x: 5, y: 0 }); // { y: 5 }
 * ```
 */
export class DiffingSerializer<N> {
    readonly tree: ValueTree<N>;
    readonly maxDepth: number;
    readonly logger: Logger;
    readonly keys: FieldKeys;

    constructor(options: SerializerOptions<N>) {
        this.tree = options.tree;
        this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
        this.logger = options.logger ?? silentLogger;
        this.keys = options.keys ?? plainKeys;
    }

    /**
     * Serializes `instance` against `baseline`. Without a baseline every
     * present field is emitted. Returns `undefined` for a missing instance,
     * or when the top-level node could not be built. An aggregate equal to
     * its baseline serializes to an empty object.
     */
    serialize(type: Type, instance: Value | undefined, baseline?: Value | null): N | undefined {
        if (instance === undefined || instance === null) return undefined;
        const walk = new SerializeWalk(this, new VisitGuard(this.maxDepth));
        const encoded = walk.encode(type, instance, baseline ?? undefined, "");
        if (encoded !== UNCHANGED) return encoded;
        return isObjectShaped(encodedShape(type)) ? this.tree.createObject() : undefined;
    }

    /**
     * Serializes the first `n` elements of `values`, each against the
     * matching baseline element. An element equal to its baseline is kept in
     * place as an empty object (aggregates) or its full value (scalars).
     */
    serializeArray(elementType: Type, values: readonly Value[] | undefined, baseline?: readonly Value[] | null, n?: number): N | undefined {
        if (!values) return undefined;
        const count = n ?? values.length;
        if (baseline && baseline.length < count) {
            throw new RangeError(`Baseline array has ${baseline.length} elements, expected ${count}`);
        }
        const walk = new SerializeWalk(this, new VisitGuard(this.maxDepth));
        return encodeArray(this.tree, values, baseline ?? undefined, count,
            (i, value, base) => walk.element(elementType, value, base, elementPath("", i)));
    }
}

/** State of one top-level serialization. */
class SerializeWalk<N> {
    readonly tree: ValueTree<N>;
    readonly logger: Logger;
    readonly keys: FieldKeys;
    readonly guard: VisitGuard;

    constructor(serializer: DiffingSerializer<N>, guard: VisitGuard) {
        this.tree = serializer.tree;
        this.logger = serializer.logger;
        this.keys = serializer.keys;
        this.guard = guard;
    }

    encode(type: Type, value: Value, baseline: Value | undefined, path: string): Encoded<N> {
        switch (type.kind) {
        case TypeKind.Scalar:
            if (baseline !== undefined && scalarEquals(type, value, baseline)) return UNCHANGED;
            return this.scalar(type, value, path);
        case TypeKind.FixedArray: {
            const values = expectArray(type, value);
            if (baseline !== undefined && valuesEqual(type, values, baseline)) return UNCHANGED;
            // Once anything differs the whole array is written out, each
            // element in full, since JSON arrays can't express sparse updates
            return encodeArray(this.tree, values, undefined, type.length,
                (i, item) => this.element(type.elementType, item, undefined, elementPath(path, i)));
        }
        case TypeKind.NestedAggregate:
            return this.struct(type, value, baseline, path);
        case TypeKind.OwnedPointer:
            return this.pointer(type.pointee, value, baseline, path);
        case TypeKind.TaggedUnion:
            return this.union(type, value, baseline, path);
        case TypeKind.BitfieldGroup:
            return this.bitfield(type, value, baseline, path);
        case TypeKind.BackReference:
            return UNCHANGED;
        }
    }

    /**
     * Encodes an array element. Array positions can't be omitted, so an
     * unchanged element is still written and a null pointer becomes `null`.
     */
    element(type: Type, value: Value, baseline: Value | undefined, path: string): N | undefined {
        if (type.kind === TypeKind.OwnedPointer && value === null) {
            return this.created(this.tree.createNull(), path);
        }
        const encoded = this.encode(type, value, baseline, path);
        if (encoded !== UNCHANGED) return encoded;
        if (isObjectShaped(encodedShape(type))) {
            return this.created(this.tree.createObject(), path);
        }
        const full = this.encode(type, value, undefined, path);
        return full === UNCHANGED ? this.created(this.tree.createNull(), path) : full;
    }

    private created(node: N | undefined, path: string): N | undefined {
        if (node === undefined) {
            this.logger.warn("Could not create value tree node", { path });
        }
        return node;
    }

    private scalar(type: ScalarType, value: Value, path: string): N | undefined {
        if (type.primitive === PrimitiveKind.Text) {
            if (typeof value !== "string") {
                throw new TypeError(`Expected string for ${type.name} at ${path || "<root>"}`);
            }
            return this.created(this.tree.createString(textContent(value)), path);
        }
        if (type.primitive === PrimitiveKind.Boolean) {
            if (typeof value !== "boolean") {
                throw new TypeError(`Expected boolean for ${type.name} at ${path || "<root>"}`);
            }
            return this.created(this.tree.createBool(value), path);
        }
        if (typeof value !== "number") {
            throw new TypeError(`Expected number for ${type.name} at ${path || "<root>"}`);
        }
        return this.created(this.tree.createNumber(value), path);
    }

    private struct(type: StructType, value: Value, baseline: Value | undefined, path: string): Encoded<N> {
        const instance = expectObject(type, value);
        const base = baseline === undefined ? undefined : expectObject(type, baseline);
        this.guard.mark(instance);
        const node = this.created(this.tree.createObject(), path);
        if (node === undefined) return undefined;

        let emitted = 0;
        for (const field of type.fields) {
            if (field.type.kind === TypeKind.BackReference) continue;
            const fieldValue = readField(instance, field);
            const fieldBase = base === undefined ? undefined : readField(base, field);
            const fieldPath = joinPath(path, field.name);
            let child: Encoded<N>;
            if (field.comparison === "identity") {
                if (fieldBase !== undefined && valuesEqual(field.type, fieldValue, fieldBase)) continue;
                child = this.encode(field.type, fieldValue, undefined, fieldPath);
            } else {
                child = this.encode(field.type, fieldValue, fieldBase, fieldPath);
            }
            if (child === UNCHANGED || child === undefined) continue;
            this.tree.setMember(node, this.keys.keyFor(type, field.name), child);
            emitted++;
        }
        return base !== undefined && emitted === 0 ? UNCHANGED : node;
    }

    private pointer(pointee: Type, value: Value, baseline: Value | undefined, path: string): Encoded<N> {
        // A null pointer is omitted whatever the baseline holds
        if (value === null) return UNCHANGED;
        const verdict = this.guard.check(value);
        if (verdict === "cycle") {
            this.logger.debug("Pointer cycle cut during serialization", { path });
            return UNCHANGED;
        }
        if (verdict === "depth") {
            this.logger.warn("Maximum pointer depth reached during serialization", { path, maxDepth: this.guard.maxDepth });
            return UNCHANGED;
        }
        const base = baseline === undefined || baseline === null ? undefined : baseline;
        return this.guard.descend(() => this.encode(pointee, value, base, path));
    }

    private union(type: UnionType, value: Value, baseline: Value | undefined, path: string): Encoded<N> {
        const union = expectUnion(type, value);
        const alternative = type.alternative(union.tag);
        if (!alternative) {
            throw new TypeError(`Unknown alternative ${union.tag} in ${type.name} at ${path || "<root>"}`);
        }
        const base = baseline === undefined ? undefined : expectUnion(type, baseline);
        const payloadBase = base !== undefined && base.tag === union.tag ? base.value : undefined;
        const payloadPath = joinPath(path, union.tag);

        let payload = this.encode(alternative.type, union.value, payloadBase, payloadPath);
        if (payload === UNCHANGED) {
            if (payloadBase !== undefined) return UNCHANGED;
            // Only a null pointer payload gets here; keep the tag visible
            payload = this.created(this.tree.createNull(), payloadPath);
        }
        if (payload === undefined) return undefined;

        const node = this.created(this.tree.createObject(), path);
        if (node === undefined) return undefined;
        this.tree.setMember(node, union.tag, payload);
        return node;
    }

    private bitfield(type: BitfieldType, value: Value, baseline: Value | undefined, path: string): Encoded<N> {
        const node = this.created(this.tree.createObject(), path);
        if (node === undefined) return undefined;
        let emitted = 0;
        for (const member of type.members) {
            // Compare bit ranges one member at a time, never the whole word
            const memberValue = bitfieldMember(type, value, member.name);
            if (baseline !== undefined && bitfieldMember(type, baseline, member.name) === memberValue) continue;
            const child = this.created(this.tree.createNumber(memberValue), joinPath(path, member.name));
            if (child === undefined) continue;
            this.tree.setMember(node, member.name, child);
            emitted++;
        }
        return baseline !== undefined && emitted === 0 ? UNCHANGED : node;
    }
}

const defaultSerializer = new DiffingSerializer<JsonValue>({ tree: jsonTree });

/**
 * Serializes `instance` to plain JSON, emitting only the fields that differ
 * from `baseline`.
 */
export function toTree(type: Type, instance: Value | undefined, baseline?: Value | null): JsonValue | undefined {
    return defaultSerializer.serialize(type, instance, baseline);
}
