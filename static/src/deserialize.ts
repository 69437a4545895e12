import { decodeArray, elementPath } from "./array";
import { bitmask } from "./bits/bits";
import { ConvertError, type ConvertResult, ConvertStatus, failure, success } from "./errors";
import { DEFAULT_MAX_DEPTH, VisitGuard } from "./guard";
import {
    bitfieldMember,
    type BitfieldRecord,
    cloneValue,
    defaultValue,
    expectArray,
    expectObject,
    expectUnion,
    isObjectValue,
    isUnionValue,
    type ObjectValue,
    packBitfield,
    readField,
    textContent,
    type UnionValue,
    type Value,
} from "./instance";
import { type FieldKeys, plainKeys } from "./keys";
import { type Logger, silentLogger } from "./logger";
import {
    type BitfieldType,
    type FieldDefinition,
    integerRange,
    PrimitiveKind,
    type ScalarType,
    type StructType,
    type Type,
    TypeKind,
    type UnionType,
} from "./struct";
import { jsonTree, type JsonValue, NodeKind, type ValueTree } from "./tree";

/**
 * Supplies storage for owned pointees created while decoding. Returning
 * `undefined` signals that the allocation failed.
 */
export interface Allocator {
    allocate(type: Type): Value | undefined;
}

/** Allocates zeroed instances. */
export const defaultAllocator: Allocator = {
    allocate: (type: Type) => defaultValue(type),
};

export interface DeserializerOptions<N> {
    tree: ValueTree<N>;
    maxDepth?: number;
    logger?: Logger;
    allocator?: Allocator;
    /** Member keys for struct fields; field names when omitted */
    keys?: FieldKeys;
}

function joinPath(path: string, name: string): string {
    return path ? `${path}.${name}` : name;
}

/** Keeps at most `limit` code points, so a surrogate pair is never split. */
function truncateText(text: string, limit: number): string {
    if (text.length <= limit) return text;
    return Array.from(text).slice(0, limit).join("");
}

/**
 * Rebuilds instances from a value tree by overlaying the fields present in
 * the tree onto a baseline.
 *
 * @example
 * ```ts
 * const deserializer = new OverlayDeserializer({ tree: jsonTree });
 * const out = { x: 0, y: 0 };
 * deserializer.deserialize(Point, { y: 5 }, { x: 5, y: 0 }, out);
 * // out is now { x: 5, y: 5 }
 * ```
 */
export class OverlayDeserializer<N> {
    readonly tree: ValueTree<N>;
    readonly maxDepth: number;
    readonly logger: Logger;
    readonly allocator: Allocator;
    readonly keys: FieldKeys;

    constructor(options: DeserializerOptions<N>) {
        this.tree = options.tree;
        this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
        this.logger = options.logger ?? silentLogger;
        this.allocator = options.allocator ?? defaultAllocator;
        this.keys = options.keys ?? plainKeys;
    }

    /**
     * Decodes `node` into `out`. Aggregates are updated in place, so the
     * caller's object is also the returned value; scalars are returned.
     *
     * When decoding fails the first error is returned and `out` may already
     * hold some decoded fields. Nothing is rolled back.
     *
     * For a pointer type `out` may be `null`; the pointee is then allocated
     * and the result holds it.
     */
    deserialize(type: Type, node: N | undefined, baseline: Value | null | undefined, out: Value | null | undefined): ConvertResult<Value> {
        if (node === undefined) {
            return failure(new ConvertError(ConvertStatus.InvalidParam, "missing value tree"));
        }
        if (out === undefined || (out === null && type.kind !== TypeKind.OwnedPointer)) {
            return failure(new ConvertError(ConvertStatus.InvalidParam, "missing output instance"));
        }
        const walk = new DeserializeWalk(this, new VisitGuard(this.maxDepth));
        return this.run(() => walk.decode(type, node, baseline ?? undefined, out, ""));
    }

    /**
     * Decodes `node` into a freshly zeroed instance of `type`.
     */
    decode(type: Type, node: N | undefined, baseline?: Value | null): ConvertResult<Value> {
        return this.deserialize(type, node, baseline, defaultValue(type));
    }

    /**
     * Decodes an array node into the first `n` slots of `out`, following the
     * truncate and refill rules of {@link decodeArray}.
     */
    deserializeArray(
        elementType: Type,
        node: N | undefined,
        baseline: readonly Value[] | null | undefined,
        out: Value[] | null | undefined,
        n?: number,
    ): ConvertResult<Value[]> {
        if (node === undefined) {
            return failure(new ConvertError(ConvertStatus.InvalidParam, "missing value tree"));
        }
        if (!out) {
            return failure(new ConvertError(ConvertStatus.InvalidParam, "missing output array"));
        }
        const count = n ?? out.length;
        if (baseline && baseline.length < count) {
            return failure(new ConvertError(ConvertStatus.InvalidParam,
                `baseline array has ${baseline.length} elements, expected ${count}`));
        }
        const walk = new DeserializeWalk(this, new VisitGuard(this.maxDepth));
        return this.run(() => walk.array(elementType, node, baseline ?? undefined, out, count, ""));
    }

    private run<T>(decode: () => T): ConvertResult<T> {
        try {
            return success(decode());
        } catch (e) {
            if (!(e instanceof ConvertError)) throw e;
            this.logger.debug("Decode failed", { status: ConvertStatus[e.status], path: e.path, reason: e.message });
            return failure(e);
        }
    }
}

/** State of one top-level deserialization. */
class DeserializeWalk<N> {
    readonly tree: ValueTree<N>;
    readonly logger: Logger;
    readonly allocator: Allocator;
    readonly keys: FieldKeys;
    readonly guard: VisitGuard;

    constructor(deserializer: OverlayDeserializer<N>, guard: VisitGuard) {
        this.tree = deserializer.tree;
        this.logger = deserializer.logger;
        this.allocator = deserializer.allocator;
        this.keys = deserializer.keys;
        this.guard = guard;
    }

    decode(type: Type, node: N, baseline: Value | undefined, current: Value, path: string): Value {
        switch (type.kind) {
        case TypeKind.Scalar:
            return this.scalar(type, node, path);
        case TypeKind.FixedArray: {
            const target = Array.isArray(current) ? current : expectArray(type, defaultValue(type));
            const base = baseline === undefined ? undefined : expectArray(type, baseline);
            return this.array(type.elementType, node, base, target, type.length, path);
        }
        case TypeKind.NestedAggregate:
            return this.struct(type, node, baseline, current, path);
        case TypeKind.OwnedPointer:
            return this.pointer(type.pointee, node, baseline, current, path);
        case TypeKind.TaggedUnion:
            return this.union(type, node, baseline, current, path);
        case TypeKind.BitfieldGroup:
            return this.bitfield(type, node, baseline, current, path);
        case TypeKind.BackReference:
            return current;
        }
    }

    array(elementType: Type, node: N, baseline: readonly Value[] | undefined, target: Value[], n: number, path: string): Value[] {
        return decodeArray(this.tree, node, baseline, target, n,
            (i, item, base, current) => this.decode(elementType, item, base, current, elementPath(path, i)),
            (value, i) => this.copy(elementType, value, elementPath(path, i)),
            path);
    }

    private expectKind(node: N, kind: NodeKind, path: string): void {
        const actual = this.tree.kindOf(node);
        if (actual !== kind) {
            throw new ConvertError(ConvertStatus.ParseError,
                `expected ${NodeKind[kind].toLowerCase()} node, got ${NodeKind[actual].toLowerCase()}`, path);
        }
    }

    private scalar(type: ScalarType, node: N, path: string): Value {
        if (type.primitive === PrimitiveKind.Text) {
            this.expectKind(node, NodeKind.String, path);
            // Leave room for the terminator
            return truncateText(textContent(this.tree.stringValue(node)), type.capacity - 1);
        }
        if (type.primitive === PrimitiveKind.Boolean) {
            this.expectKind(node, NodeKind.Bool, path);
            return this.tree.boolValue(node);
        }
        this.expectKind(node, NodeKind.Number, path);
        const value = this.tree.numberValue(node);
        if (!Number.isFinite(value)) {
            throw new ConvertError(ConvertStatus.ParseError, `non-finite value for ${type.name}`, path);
        }
        if (type.primitive === PrimitiveKind.Float32) return Math.fround(value);
        if (type.primitive === PrimitiveKind.Float64) return value;

        const range = integerRange(type.primitive);
        const truncated = Math.trunc(value) || 0;
        if (range && (truncated < range[0] || truncated > range[1])) {
            throw new ConvertError(ConvertStatus.ParseError,
                `value ${value} out of range for ${PrimitiveKind[type.primitive]}`, path);
        }
        return truncated;
    }

    private struct(type: StructType, node: N, baseline: Value | undefined, current: Value, path: string): ObjectValue {
        this.expectKind(node, NodeKind.Object, path);
        const target = isObjectValue(current) ? current : expectObject(type, defaultValue(type));
        this.guard.mark(target);

        const base = baseline === undefined ? undefined : expectObject(type, baseline);
        if (base !== undefined && base !== target) {
            // Wholesale copy first: every field absent from the tree keeps
            // the baseline value. Back references into the baseline are
            // redirected onto the target.
            const memo = new Map<ObjectValue, ObjectValue>([[base, target]]);
            for (const field of type.fields) {
                target[field.name] = this.copy(field.type, readField(base, field), joinPath(path, field.name), memo);
            }
        }

        for (const field of type.fields) {
            if (field.type.kind === TypeKind.BackReference) continue;
            const child = this.tree.getMember(node, this.keys.keyFor(type, field.name));
            if (child === undefined) continue;
            const fieldBase = base === undefined ? undefined : readField(base, field);
            target[field.name] = this.decode(field.type, child, fieldBase, readField(target, field), joinPath(path, field.name));
            if (field.type.kind === TypeKind.OwnedPointer) {
                this.relink(type, field, target);
            }
        }
        return target;
    }

    /** Points the pointee's back references for `field` at its owner. */
    private relink(ownerType: StructType, field: FieldDefinition, owner: ObjectValue): void {
        if (field.type.kind !== TypeKind.OwnedPointer) return;
        const pointeeType = field.type.pointee;
        const pointee = owner[field.name];
        if (pointeeType.kind !== TypeKind.NestedAggregate || !isObjectValue(pointee)) return;
        for (const candidate of pointeeType.fields) {
            const ref = candidate.type;
            if (ref.kind === TypeKind.BackReference && ref.inverseOf === field.name && ref.target === ownerType) {
                pointee[candidate.name] = owner;
            }
        }
    }

    private pointer(pointee: Type, node: N, baseline: Value | undefined, current: Value, path: string): Value {
        // An explicit null reads the same as an omitted key
        if (this.tree.kindOf(node) === NodeKind.Null) return current;

        const verdict = this.guard.check(current);
        if (verdict === "cycle") {
            this.logger.debug("Pointee already decoded in this walk, keeping it as is", { path });
            return current;
        }
        if (verdict === "depth") {
            throw new ConvertError(ConvertStatus.ParseError,
                `maximum pointer depth ${this.guard.maxDepth} exceeded`, path);
        }

        const target = current === null ? this.allocate(pointee, path) : current;
        // A non-null baseline pointee seeds the new one before the overlay
        const base = baseline === undefined || baseline === null ? undefined : baseline;
        return this.guard.descend(() => this.decode(pointee, node, base, target, path));
    }

    private allocate(type: Type, path: string): Value {
        const allocated = this.allocator.allocate(type);
        if (allocated === undefined) {
            throw new ConvertError(ConvertStatus.AllocationError, `could not allocate ${type.name}`, path);
        }
        return allocated;
    }

    /** Copies a baseline value, taking every owned pointee from the allocator. */
    private copy(type: Type, value: Value, path: string, memo?: Map<ObjectValue, ObjectValue>): Value {
        return cloneValue(type, value, memo, pointee => this.allocate(pointee, path));
    }

    private union(type: UnionType, node: N, baseline: Value | undefined, current: Value, path: string): UnionValue {
        this.expectKind(node, NodeKind.Object, path);
        const target = isUnionValue(current) ? current : expectUnion(type, defaultValue(type));

        const base = baseline === undefined ? undefined : expectUnion(type, baseline);
        if (base !== undefined && base !== target) {
            const alternative = type.alternative(base.tag);
            if (!alternative) {
                throw new TypeError(`Unknown alternative ${base.tag} in ${type.name}`);
            }
            target.tag = base.tag;
            target.value = this.copy(alternative.type, base.value, joinPath(path, alternative.name));
        }

        const present = this.tree.memberNames(node).flatMap(name => {
            const alternative = type.alternative(name);
            return alternative ? [alternative] : [];
        });
        if (present.length > 1) {
            throw new ConvertError(ConvertStatus.ParseError,
                `union ${type.name} names several alternatives: ${present.map(a => a.name).join(", ")}`, path);
        }
        if (present.length === 0) return target;

        const alternative = present[0];
        const child = this.tree.getMember(node, alternative.name);
        if (child === undefined) return target;
        const payloadBase = base !== undefined && base.tag === alternative.name ? base.value : undefined;
        const payloadCurrent = target.tag === alternative.name ? target.value : defaultValue(alternative.type);
        target.value = this.decode(alternative.type, child, payloadBase, payloadCurrent, joinPath(path, alternative.name));
        target.tag = alternative.name;
        return target;
    }

    private bitfield(type: BitfieldType, node: N, baseline: Value | undefined, current: Value, path: string): Value {
        this.expectKind(node, NodeKind.Object, path);
        const source = baseline ?? current;
        const values: BitfieldRecord = {};
        for (const member of type.members) {
            values[member.name] = bitfieldMember(type, source, member.name);
        }

        // Each member is decoded on its own, so the order members appear in
        // the tree can't change the result
        for (const member of type.members) {
            const memberPath = joinPath(path, member.name);
            const child = this.tree.getMember(node, member.name);
            if (child === undefined) continue;
            this.expectKind(child, NodeKind.Number, memberPath);
            const value = this.tree.numberValue(child);
            if (!Number.isInteger(value) || value < 0 || value > bitmask(member.bits)) {
                throw new ConvertError(ConvertStatus.ParseError,
                    `value ${value} does not fit in ${member.bits} bits`, memberPath);
            }
            values[member.name] = value;
        }

        if (typeof current === "number") {
            // Bits outside every member keep their current contents
            return packBitfield(type, values, typeof source === "number" ? source : current);
        }
        if (isObjectValue(current)) {
            Object.assign(current, values);
            return current;
        }
        return values;
    }
}

const defaultDeserializer = new OverlayDeserializer<JsonValue>({ tree: jsonTree });

/**
 * Decodes plain JSON into a new instance of `type`, overlaid on `baseline`.
 */
export function fromTree(type: Type, node: JsonValue | undefined, baseline?: Value | null): ConvertResult<Value> {
    return defaultDeserializer.decode(type, node, baseline);
}

/**
 * Decodes plain JSON into the caller-supplied `out` instance.
 */
export function decodeInto(type: Type, node: JsonValue | undefined, baseline: Value | null | undefined, out: Value | null | undefined): ConvertResult<Value> {
    return defaultDeserializer.deserialize(type, node, baseline, out);
}
