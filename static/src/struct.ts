/**
 * Enum representing the different shapes a convertible type can take.
 */
export enum TypeKind {
    Scalar,
    FixedArray,
    NestedAggregate,
    OwnedPointer,
    TaggedUnion,
    BitfieldGroup,
    BackReference,
}

/**
 * Enum representing different kinds of primitive types.
 */
export enum PrimitiveKind {
    Int8,
    Uint8,
    Int16,
    Uint16,
    Int32,
    Uint32,
    Int64,
    Uint64,
    Float32,
    Float64,
    Boolean,
    /** Fixed-capacity, terminator-ended character buffer */
    Text,
}

/**
 * Base interface for all type descriptors. Descriptors are immutable once
 * created and can be shared by any number of conversions.
 */
export interface BaseType {
    readonly kind: TypeKind;
    /**
     * Name used in diagnostics and for registry lookup. Anonymous types get a
     * name derived from their shape, e.g. `i32[4]` or `*Node`.
     */
    readonly name: string;
}

/**
 * Represents a basic numeric or boolean type like Int32 or Float64. These
 * are the building blocks for more complex types and have no internal
 * structure.
 */
export interface PrimitiveType extends BaseType {
    readonly kind: TypeKind.Scalar;
    readonly primitive: Exclude<PrimitiveKind, PrimitiveKind.Text>;
    /** Storage size in bytes, used to bound bitfield groups */
    readonly size: number;
}

/**
 * A fixed-capacity text buffer. The capacity includes the terminator, so a
 * `char[32]` holds at most 31 characters.
 */
export interface TextType extends BaseType {
    readonly kind: TypeKind.Scalar;
    readonly primitive: PrimitiveKind.Text;
    readonly capacity: number;
}

export type ScalarType = PrimitiveType | TextType;

/**
 * Represents an array type with a fixed number of elements of the same type.
 *
 * @example
 * ```ts
 * const Components = makeArrayType(TYPE_REGISTRY.f32, 3);
 * console.log(Components.length); // 3
 * console.log(Components.elementType === TYPE_REGISTRY.f32); // true
 * ```
 */
export interface ArrayType extends BaseType {
    readonly kind: TypeKind.FixedArray;
    readonly elementType: Type;
    readonly length: number;
}

/**
 * How a field is compared against its baseline when diffing. Scalars and
 * arrays compare by value; everything else recurses and diffs its parts.
 */
export type FieldComparison = "identity" | "structural";

/**
 * Defines a field in a struct type or an alternative in a union type.
 */
export type FieldDefinition = {
    /** The name of the field */
    readonly name: string;
    /** The type of the field */
    readonly type: Type;
    readonly comparison: FieldComparison;
};

/**
 * Input accepted by {@link makeStruct} and {@link makeUnion}. The comparison
 * mode is derived from the field type.
 */
export type FieldInput = {
    readonly name: string;
    readonly type: Type;
};

/**
 * Represents a struct type with named fields, kept in declaration order.
 *
 * @example
 * ```ts
 * const Point = makeStruct([
 *   { name: 'x', type: TYPE_REGISTRY.i32 },
 *   { name: 'y', type: TYPE_REGISTRY.i32 }
 * ], { name: "Point" });
 * console.log(Point.fields.map(f => f.name)); // ["x", "y"]
 * console.log(Point.field("y")?.comparison); // "identity"
 * ```
 */
export interface StructType extends BaseType {
    readonly kind: TypeKind.NestedAggregate;
    readonly fields: readonly FieldDefinition[];
    /** Looks a field up by name */
    field(name: string): FieldDefinition | undefined;
}

/**
 * A pointer that exclusively owns its pointee. The pointee is resolved
 * lazily so that a struct can point at itself.
 *
 * @example
 * ```ts
 * const Node: StructType = makeStruct([
 *   { name: 'value', type: TYPE_REGISTRY.i32 },
 *   { name: 'next', type: makePointer(() => Node) },
 * ], { name: "Node" });
 * ```
 */
export interface PointerType extends BaseType {
    readonly kind: TypeKind.OwnedPointer;
    readonly pointee: Type;
}

/**
 * A union whose instances carry an explicit tag naming the active
 * alternative.
 */
export interface UnionType extends BaseType {
    readonly kind: TypeKind.TaggedUnion;
    readonly alternatives: readonly FieldDefinition[];
    alternative(name: string): FieldDefinition | undefined;
}

export type BitfieldMember = {
    readonly name: string;
    readonly bits: number;
    /** Offset of the lowest bit of this member inside the storage word */
    readonly offset: number;
};

/**
 * A group of named bit ranges packed into one unsigned storage word. Members
 * are laid out from the least significant bit upwards.
 */
export interface BitfieldType extends BaseType {
    readonly kind: TypeKind.BitfieldGroup;
    readonly storage: PrimitiveType;
    readonly members: readonly BitfieldMember[];
    member(name: string): BitfieldMember | undefined;
}

/**
 * A non-owning link back to a struct that owns the current one through the
 * pointer field named by `inverseOf`. Back references are never serialized;
 * decoding re-links them from the owning side.
 */
export interface BackRefType extends BaseType {
    readonly kind: TypeKind.BackReference;
    readonly target: Type;
    readonly inverseOf: string;
}

export type Type =
    | PrimitiveType
    | TextType
    | ArrayType
    | StructType
    | PointerType
    | UnionType
    | BitfieldType
    | BackRefType;

/**
 * Options for creating a new type.
 */
export interface TypeOptions {
    /** Optional name for diagnostics and registry lookup */
    name?: string;
}

/** A type, or a thunk producing one for forward and self references. */
export type TypeRef = Type | (() => Type);

function resolveRef(ref: TypeRef): Type {
    return typeof ref === "function" ? ref() : ref;
}

const PRIMITIVE_SIZES: Record<PrimitiveType["primitive"], number> = {
    [PrimitiveKind.Int8]: 1,
    [PrimitiveKind.Uint8]: 1,
    [PrimitiveKind.Int16]: 2,
    [PrimitiveKind.Uint16]: 2,
    [PrimitiveKind.Int32]: 4,
    [PrimitiveKind.Uint32]: 4,
    [PrimitiveKind.Int64]: 8,
    [PrimitiveKind.Uint64]: 8,
    [PrimitiveKind.Float32]: 4,
    [PrimitiveKind.Float64]: 8,
    [PrimitiveKind.Boolean]: 1,
};

const INTEGER_RANGES: Partial<Record<PrimitiveKind, readonly [number, number]>> = {
    [PrimitiveKind.Int8]: [-128, 127],
    [PrimitiveKind.Uint8]: [0, 255],
    [PrimitiveKind.Int16]: [-32768, 32767],
    [PrimitiveKind.Uint16]: [0, 65535],
    [PrimitiveKind.Int32]: [-2147483648, 2147483647],
    [PrimitiveKind.Uint32]: [0, 4294967295],
    // 64-bit values are carried as JS numbers, so only the safe range survives
    [PrimitiveKind.Int64]: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
    [PrimitiveKind.Uint64]: [0, Number.MAX_SAFE_INTEGER],
};

/**
 * Returns the inclusive `[min, max]` range of an integer primitive, or
 * `undefined` for floating point and boolean kinds.
 */
export function integerRange(primitive: PrimitiveKind): readonly [number, number] | undefined {
    return INTEGER_RANGES[primitive];
}

/**
 * Creates a new primitive type. The type will be registered in
 * TYPE_REGISTRY if a name is provided.
 *
 * @example
 * ```ts
 * const Int32 = makePrimitive(PrimitiveKind.Int32, { name: "i32" });
 * console.log(Int32.size); // 4
 * console.log(TYPE_REGISTRY.i32 === Int32); // true
 * ```
 */
export function makePrimitive(primitive: PrimitiveType["primitive"], options?: TypeOptions): PrimitiveType {
    const primitiveType: PrimitiveType = {
        kind: TypeKind.Scalar,
        name: options?.name ?? PrimitiveKind[primitive],
        primitive,
        size: PRIMITIVE_SIZES[primitive],
    };
    Object.freeze(primitiveType);

    if (options?.name) {
        TYPE_REGISTRY[options.name] = primitiveType;
    }

    return primitiveType;
}

/**
 * Creates a fixed-capacity text type, the equivalent of `char[capacity]`.
 */
export function makeText(capacity: number, options?: TypeOptions): TextType {
    if (!Number.isInteger(capacity) || capacity < 1) {
        throw new Error(`Text capacity must be a positive integer, got ${capacity}`);
    }
    const textType: TextType = {
        kind: TypeKind.Scalar,
        name: options?.name ?? `char[${capacity}]`,
        primitive: PrimitiveKind.Text,
        capacity,
    };
    return Object.freeze(textType);
}

/**
 * Registry of the built-in primitive types, keyed by their short names
 * (`i8` … `u64`, `f32`, `f64`, `bool`).
 */
export const TYPE_REGISTRY: { [key: string]: PrimitiveType } = {};

/**
 * Populates TYPE_REGISTRY with all basic primitive types.
 */
function initializeTypeRegistry() {
    // Signed integers
    makePrimitive(PrimitiveKind.Int8, { name: "i8" });
    makePrimitive(PrimitiveKind.Int16, { name: "i16" });
    makePrimitive(PrimitiveKind.Int32, { name: "i32" });
    makePrimitive(PrimitiveKind.Int64, { name: "i64" });

    // Unsigned integers
    makePrimitive(PrimitiveKind.Uint8, { name: "u8" });
    makePrimitive(PrimitiveKind.Uint16, { name: "u16" });
    makePrimitive(PrimitiveKind.Uint32, { name: "u32" });
    makePrimitive(PrimitiveKind.Uint64, { name: "u64" });

    // Floating point
    makePrimitive(PrimitiveKind.Float32, { name: "f32" });
    makePrimitive(PrimitiveKind.Float64, { name: "f64" });

    // Boolean
    makePrimitive(PrimitiveKind.Boolean, { name: "bool" });
}

initializeTypeRegistry();

/**
 * Creates a new array type with the specified element type and length.
 *
 * @example
 * ```ts
 * const Matrix = makeArrayType(makeArrayType(TYPE_REGISTRY.f32, 4), 4);
 * console.log(Matrix.name); // "f32[4][4]"
 * ```
 */
export function makeArrayType(elementType: Type, n: number, options?: TypeOptions): ArrayType {
    if (!Number.isInteger(n) || n < 0) {
        throw new Error(`Array length must be a non-negative integer, got ${n}`);
    }
    if (elementType.kind === TypeKind.BackReference) {
        throw new Error("Array elements cannot be back references");
    }
    const arrayType: ArrayType = {
        kind: TypeKind.FixedArray,
        name: options?.name ?? `${elementType.name}[${n}]`,
        elementType,
        length: n,
    };
    return Object.freeze(arrayType);
}

/** Shorthand for {@link makeArrayType} without options. */
export function arrayOf(elementType: Type, n: number): ArrayType {
    return makeArrayType(elementType, n);
}

function comparisonFor(type: Type): FieldComparison {
    return type.kind === TypeKind.Scalar || type.kind === TypeKind.FixedArray ? "identity" : "structural";
}

// Instances and JSON objects are plain objects, where this key would set
// the prototype instead of a member
function checkMemberName(name: string): void {
    if (!name) {
        throw new Error("Field name cannot be empty");
    }
    if (name === "__proto__") {
        throw new Error("Field name __proto__ is reserved");
    }
}

function makeFieldList(fields: readonly FieldInput[], owner: string): FieldDefinition[] {
    const seen = new Set<string>();
    return fields.map(field => {
        checkMemberName(field.name);
        if (seen.has(field.name)) {
            throw new Error(`Duplicate field ${field.name} in ${owner}`);
        }
        seen.add(field.name);
        const definition: FieldDefinition = { name: field.name, type: field.type, comparison: comparisonFor(field.type) };
        return Object.freeze(definition);
    });
}

/**
 * Creates a new struct type with the specified fields.
 *
 * @example
 * ```ts
 * const Point = makeStruct([
 *   { name: 'x', type: TYPE_REGISTRY.i32 },
 *   { name: 'y', type: TYPE_REGISTRY.i32 }
 * ], { name: "Point" });
 * const Line = makeStruct([
 *   { name: 'start', type: Point },
 *   { name: 'end', type: Point }
 * ]);
 * console.log(Line.field("start")?.comparison); // "structural"
 * ```
 */
export function makeStruct(fields: readonly FieldInput[], options?: TypeOptions): StructType {
    if (options?.name === "") {
        throw new Error("Struct name cannot be empty");
    }
    const name = options?.name ?? `struct{${fields.map(f => f.name).join(",")}}`;
    const list = Object.freeze(makeFieldList(fields, name));
    const byName = new Map(list.map(f => [f.name, f]));

    const structType: StructType = {
        kind: TypeKind.NestedAggregate,
        name,
        fields: list,
        field: (fieldName: string) => byName.get(fieldName),
    };
    return Object.freeze(structType);
}

/**
 * Creates an owning pointer type. Pass a thunk when the pointee is declared
 * later or is the struct being declared.
 */
export function makePointer(pointee: TypeRef, options?: TypeOptions): PointerType {
    let resolved: Type | undefined;
    const resolve = (): Type => {
        if (!resolved) {
            const target = resolveRef(pointee);
            if (target.kind === TypeKind.BackReference) {
                throw new Error("Pointers to back references are not supported");
            }
            resolved = target;
        }
        return resolved;
    };
    const pointer: PointerType = {
        kind: TypeKind.OwnedPointer,
        get name(): string {
            return options?.name ?? `*${resolve().name}`;
        },
        get pointee(): Type {
            return resolve();
        },
    };
    return Object.freeze(pointer);
}

/**
 * Creates a new union type. Instances are `{ tag, value }` pairs where `tag`
 * names one of the alternatives.
 *
 * @example
 * ```ts
 * const DataValue = makeUnion([
 *   { name: 'as_int', type: TYPE_REGISTRY.i32 },
 *   { name: 'as_float', type: TYPE_REGISTRY.f32 }
 * ], { name: "DataValue" });
 * const v = { tag: "as_float", value: 1.5 };
 * ```
 */
export function makeUnion(alternatives: readonly FieldInput[], options?: TypeOptions): UnionType {
    if (options?.name === "") {
        throw new Error("Union name cannot be empty");
    }
    if (alternatives.length === 0) {
        throw new Error("Union must have at least one alternative");
    }
    const name = options?.name ?? `union{${alternatives.map(f => f.name).join(",")}}`;
    const list = Object.freeze(makeFieldList(alternatives, name));
    for (const alternative of list) {
        if (alternative.type.kind === TypeKind.BackReference) {
            throw new Error(`Union alternative ${alternative.name} cannot be a back reference`);
        }
    }
    const byName = new Map(list.map(f => [f.name, f]));

    const unionType: UnionType = {
        kind: TypeKind.TaggedUnion,
        name,
        alternatives: list,
        alternative: (altName: string) => byName.get(altName),
    };
    return Object.freeze(unionType);
}

const BITFIELD_STORAGE = new Set<PrimitiveKind>([
    PrimitiveKind.Uint8,
    PrimitiveKind.Uint16,
    PrimitiveKind.Uint32,
]);

/**
 * Creates a bitfield group packed into an unsigned storage word.
 *
 * @example
 * ```ts
 * const Flags = makeBitfield(TYPE_REGISTRY.u32, [
 *   { name: 'flag1', bits: 1 },
 *   { name: 'flag2', bits: 1 },
 *   { name: 'value', bits: 6 },
 * ]);
 * console.log(Flags.member("value")?.offset); // 2
 * ```
 */
export function makeBitfield(
    storage: PrimitiveType,
    members: readonly { name: string; bits: number }[],
    options?: TypeOptions,
): BitfieldType {
    if (!BITFIELD_STORAGE.has(storage.primitive)) {
        throw new Error(`Bitfield storage must be u8, u16 or u32, got ${storage.name}`);
    }
    const seen = new Set<string>();
    let offset = 0;
    const list = members.map(m => {
        checkMemberName(m.name);
        if (seen.has(m.name)) {
            throw new Error(`Duplicate bitfield member ${m.name}`);
        }
        if (!Number.isInteger(m.bits) || m.bits < 1) {
            throw new Error(`Bitfield member ${m.name} must be at least 1 bit wide`);
        }
        seen.add(m.name);
        const member: BitfieldMember = { name: m.name, bits: m.bits, offset };
        offset += m.bits;
        return Object.freeze(member);
    });
    if (offset > storage.size * 8) {
        throw new Error(`Bitfield members need ${offset} bits but ${storage.name} holds ${storage.size * 8}`);
    }
    const byName = new Map(list.map(m => [m.name, m]));

    const bitfieldType: BitfieldType = {
        kind: TypeKind.BitfieldGroup,
        name: options?.name ?? `bitfield{${list.map(m => `${m.name}:${m.bits}`).join(",")}}`,
        storage,
        members: Object.freeze(list),
        member: (memberName: string) => byName.get(memberName),
    };
    return Object.freeze(bitfieldType);
}

/**
 * Creates a non-owning back reference to the struct that owns the current
 * one through its `inverseOf` pointer field.
 *
 * @example
 * ```ts
 * const Node: StructType = makeStruct([
 *   { name: 'value', type: TYPE_REGISTRY.i32 },
 *   { name: 'next', type: makePointer(() => Node) },
 *   { name: 'prev', type: makeBackRef(() => Node, "next") },
 * ], { name: "Node" });
 * ```
 */
export function makeBackRef(target: TypeRef, inverseOf: string, options?: TypeOptions): BackRefType {
    if (!inverseOf) {
        throw new Error("Back reference must name the owning pointer field");
    }
    const backRef: BackRefType = {
        kind: TypeKind.BackReference,
        inverseOf,
        get name(): string {
            return options?.name ?? `&${resolveRef(target).name}`;
        },
        get target(): Type {
            return resolveRef(target);
        },
    };
    return Object.freeze(backRef);
}

/**
 * Returns the types a descriptor is directly built from, resolving pointer
 * and back-reference thunks.
 */
export function componentTypes(type: Type): Type[] {
    switch (type.kind) {
    case TypeKind.FixedArray: return [type.elementType];
    case TypeKind.NestedAggregate: return type.fields.map(f => f.type);
    case TypeKind.OwnedPointer: return [type.pointee];
    case TypeKind.TaggedUnion: return type.alternatives.map(f => f.type);
    case TypeKind.BitfieldGroup: return [type.storage];
    case TypeKind.BackReference: return [type.target];
    case TypeKind.Scalar: return [];
    }
}

/** Whether a type encodes to a JSON object node. */
export function isObjectShaped(type: Type): boolean {
    return type.kind === TypeKind.NestedAggregate ||
        type.kind === TypeKind.TaggedUnion ||
        type.kind === TypeKind.BitfieldGroup;
}
