import { extractBits, insertBits } from "./bits/bits";
import {
    type BitfieldType,
    type FieldDefinition,
    PrimitiveKind,
    type ScalarType,
    type StructType,
    type Type,
    TypeKind,
} from "./struct";

/**
 * In-memory instances are plain values:
 * - numeric scalars are numbers, Boolean is a boolean, text is a string
 * - fixed arrays are JS arrays of exactly `length` elements
 * - structs are plain objects keyed by field name
 * - owned pointers hold `null` or the pointee value
 * - unions are `{ tag, value }`
 * - bitfields are either a record of member values or the packed word
 */
export type ScalarValue = number | boolean | string;

export type Value = ScalarValue | null | Value[] | ObjectValue;

export interface ObjectValue {
    [key: string]: Value;
}

export type UnionValue = { tag: string; value: Value };

export type BitfieldRecord = { [member: string]: number };

export function isObjectValue(value: Value | undefined): value is ObjectValue {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isUnionValue(value: Value | undefined): value is UnionValue {
    return isObjectValue(value) && typeof value.tag === "string" && value.value !== undefined;
}

function shapeOf(value: Value | undefined): string {
    if (value === null) return "null";
    if (Array.isArray(value)) return "array";
    return typeof value;
}

/** Narrows an instance to an array, throwing when its shape is wrong. */
export function expectArray(type: Type, value: Value): Value[] {
    if (!Array.isArray(value)) {
        throw new TypeError(`Expected array instance for ${type.name}, got ${shapeOf(value)}`);
    }
    return value;
}

/** Narrows an instance to a struct object, throwing when its shape is wrong. */
export function expectObject(type: Type, value: Value): ObjectValue {
    if (!isObjectValue(value)) {
        throw new TypeError(`Expected object instance for ${type.name}, got ${shapeOf(value)}`);
    }
    return value;
}

export function expectUnion(type: Type, value: Value): UnionValue {
    if (!isUnionValue(value)) {
        throw new TypeError(`Expected { tag, value } instance for ${type.name}, got ${shapeOf(value)}`);
    }
    return value;
}

/**
 * Reads a field from a struct instance. A missing key reads as the field's
 * zero value.
 */
export function readField(instance: ObjectValue, field: FieldDefinition): Value {
    const value = instance[field.name];
    return value === undefined ? defaultValue(field.type) : value;
}

/** Characters of a text buffer up to the first terminator. */
export function textContent(value: string): string {
    const end = value.indexOf("\0");
    return end === -1 ? value : value.slice(0, end);
}

/**
 * Returns the zero instance of a type, the value a freshly zeroed allocation
 * of that type would hold. Pointers are null; unions select their first
 * alternative.
 */
export function defaultValue(type: Type): Value {
    switch (type.kind) {
    case TypeKind.Scalar:
        if (type.primitive === PrimitiveKind.Text) return "";
        if (type.primitive === PrimitiveKind.Boolean) return false;
        return 0;
    case TypeKind.FixedArray:
        return Array.from({ length: type.length }, () => defaultValue(type.elementType));
    case TypeKind.NestedAggregate: {
        const instance: ObjectValue = {};
        for (const field of type.fields) {
            instance[field.name] = defaultValue(field.type);
        }
        return instance;
    }
    case TypeKind.OwnedPointer:
    case TypeKind.BackReference:
        return null;
    case TypeKind.TaggedUnion: {
        const first = type.alternatives[0];
        const union: UnionValue = { tag: first.name, value: defaultValue(first.type) };
        return union;
    }
    case TypeKind.BitfieldGroup: {
        const record: BitfieldRecord = {};
        for (const member of type.members) {
            record[member.name] = 0;
        }
        return record;
    }
    }
}

/**
 * Reads one bitfield member from either representation. Missing members of
 * a record read as zero.
 */
export function bitfieldMember(type: BitfieldType, value: Value, name: string): number {
    const member = type.member(name);
    if (!member) {
        throw new Error(`Member ${name} not found in ${type.name}`);
    }
    if (typeof value === "number") {
        return extractBits(value, member.offset, member.bits);
    }
    const record = expectObject(type, value);
    const memberValue = record[name];
    return typeof memberValue === "number" ? memberValue : 0;
}

/** Splits a packed storage word into its member values. */
export function unpackBitfield(type: BitfieldType, word: number): BitfieldRecord {
    const record: BitfieldRecord = {};
    for (const member of type.members) {
        record[member.name] = extractBits(word, member.offset, member.bits);
    }
    return record;
}

/**
 * Packs member values into a storage word. Bits not covered by any member
 * are taken from `base`.
 */
export function packBitfield(type: BitfieldType, value: Value, base: number = 0): number {
    if (typeof value === "number") {
        return value >>> 0;
    }
    let word = base >>> 0;
    for (const member of type.members) {
        word = insertBits(word, member.offset, member.bits, bitfieldMember(type, value, member.name));
    }
    return word;
}

export function scalarEquals(type: ScalarType, a: Value, b: Value): boolean {
    if (type.primitive === PrimitiveKind.Text) {
        return typeof a === "string" && typeof b === "string" && textContent(a) === textContent(b);
    }
    return Object.is(a, b);
}

/**
 * Storage for a copied owned pointee. The returned instance is filled in
 * place when it is a struct object.
 */
export type PointeeAllocation = (pointee: Type) => Value;

/**
 * Deep-copies an instance. Owned pointees are copied so the copy owns its
 * own substructures; back references are redirected into the copy when they
 * point at something copied in the same call. With `allocate`, every
 * pointee the copy creates is requested from it first.
 */
export function cloneValue(
    type: Type,
    value: Value,
    memo: Map<ObjectValue, ObjectValue> = new Map(),
    allocate?: PointeeAllocation,
): Value {
    switch (type.kind) {
    case TypeKind.Scalar:
    case TypeKind.BackReference:
        return value;
    case TypeKind.FixedArray:
        return expectArray(type, value).map(item => cloneValue(type.elementType, item, memo, allocate));
    case TypeKind.NestedAggregate:
        return cloneStruct(type, expectObject(type, value), memo, allocate);
    case TypeKind.OwnedPointer:
        if (value === null) return null;
        return allocate ? clonePointee(type.pointee, value, memo, allocate) : cloneValue(type.pointee, value, memo);
    case TypeKind.TaggedUnion: {
        const union = expectUnion(type, value);
        const alternative = type.alternative(union.tag);
        if (!alternative) {
            throw new TypeError(`Unknown alternative ${union.tag} in ${type.name}`);
        }
        const copy: UnionValue = { tag: union.tag, value: cloneValue(alternative.type, union.value, memo, allocate) };
        return copy;
    }
    case TypeKind.BitfieldGroup:
        if (typeof value === "number") return value;
        return Object.fromEntries(type.members.map(m => [m.name, bitfieldMember(type, value, m.name)]));
    }
}

function clonePointee(pointee: Type, value: Value, memo: Map<ObjectValue, ObjectValue>, allocate: PointeeAllocation): Value {
    if (isObjectValue(value)) {
        const seen = memo.get(value);
        if (seen) return seen;
    }
    const storage = allocate(pointee);
    if (pointee.kind === TypeKind.NestedAggregate && isObjectValue(storage)) {
        return cloneStruct(pointee, expectObject(pointee, value), memo, allocate, storage);
    }
    return cloneValue(pointee, value, memo, allocate);
}

function cloneStruct(
    type: StructType,
    source: ObjectValue,
    memo: Map<ObjectValue, ObjectValue>,
    allocate?: PointeeAllocation,
    copy: ObjectValue = {},
): ObjectValue {
    const seen = memo.get(source);
    if (seen) return seen;
    memo.set(source, copy);
    const backRefs: FieldDefinition[] = [];
    for (const field of type.fields) {
        if (field.type.kind === TypeKind.BackReference) {
            backRefs.push(field);
            continue;
        }
        copy[field.name] = cloneValue(field.type, readField(source, field), memo, allocate);
    }
    // Owned fields first, so targets inside this struct are already copied
    for (const field of backRefs) {
        const target = readField(source, field);
        copy[field.name] = isObjectValue(target) ? memo.get(target) ?? target : null;
    }
    return copy;
}

/**
 * Field-by-field equality. Back references are ignored; cyclic owned chains
 * compare equal when they revisit a pair already under comparison.
 */
export function valuesEqual(type: Type, a: Value, b: Value, active: Map<object, Set<object>> = new Map()): boolean {
    switch (type.kind) {
    case TypeKind.Scalar:
        return scalarEquals(type, a, b);
    case TypeKind.BackReference:
        return true;
    case TypeKind.FixedArray: {
        const left = expectArray(type, a);
        const right = expectArray(type, b);
        if (left.length !== right.length) return false;
        return left.every((item, i) => valuesEqual(type.elementType, item, right[i], active));
    }
    case TypeKind.NestedAggregate: {
        const left = expectObject(type, a);
        const right = expectObject(type, b);
        if (left === right) return true;
        let partners = active.get(left);
        if (partners?.has(right)) return true;
        if (!partners) {
            partners = new Set();
            active.set(left, partners);
        }
        partners.add(right);
        return type.fields.every(field =>
            valuesEqual(field.type, readField(left, field), readField(right, field), active));
    }
    case TypeKind.OwnedPointer:
        if (a === null || b === null) return a === b;
        return valuesEqual(type.pointee, a, b, active);
    case TypeKind.TaggedUnion: {
        const left = expectUnion(type, a);
        const right = expectUnion(type, b);
        if (left.tag !== right.tag) return false;
        const alternative = type.alternative(left.tag);
        if (!alternative) {
            throw new TypeError(`Unknown alternative ${left.tag} in ${type.name}`);
        }
        return valuesEqual(alternative.type, left.value, right.value, active);
    }
    case TypeKind.BitfieldGroup:
        return type.members.every(m => bitfieldMember(type, a, m.name) === bitfieldMember(type, b, m.name));
    }
}
