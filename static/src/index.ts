export {
    TypeKind,
    PrimitiveKind,
    TYPE_REGISTRY,
    makePrimitive,
    makeText,
    makeArrayType,
    arrayOf,
    makeStruct,
    makePointer,
    makeUnion,
    makeBitfield,
    makeBackRef,
    componentTypes,
    integerRange,
} from "./struct";
export type {
    Type,
    TypeRef,
    TypeOptions,
    ScalarType,
    PrimitiveType,
    TextType,
    ArrayType,
    StructType,
    PointerType,
    UnionType,
    BitfieldType,
    BitfieldMember,
    BackRefType,
    FieldDefinition,
    FieldInput,
} from "./struct";

export {
    defaultValue,
    cloneValue,
    valuesEqual,
    packBitfield,
    unpackBitfield,
    bitfieldMember,
} from "./instance";
export type { Value, ObjectValue, UnionValue, BitfieldRecord, ScalarValue, PointeeAllocation } from "./instance";

export { extractBits, insertBits } from "./bits/bits";
export { NodeKind, JsonValueTree, jsonTree } from "./tree";
export type { ValueTree, JsonValue, JsonObject } from "./tree";

export { DiffingSerializer, toTree } from "./serialize";
export type { SerializerOptions } from "./serialize";
export { OverlayDeserializer, defaultAllocator, fromTree, decodeInto } from "./deserialize";
export type { Allocator, DeserializerOptions } from "./deserialize";
export { VisitGuard, DEFAULT_MAX_DEPTH } from "./guard";

export { ConvertStatus, ConvertError, ConfigError, SchemaError } from "./errors";
export type { ConvertResult, FailureStatus } from "./errors";

export { ConverterRegistry, TypeConverter, createRegistry } from "./registry";
export type { RegistryOptions } from "./registry";
export { loadConfig, readConfigFile, configSchema, fieldKeySchema } from "./config";
export type { ConverterConfig, ConverterConfigInput, FieldKeyConfig } from "./config";
export { FieldKeyMap, plainKeys, saveFieldMap } from "./keys";
export type { FieldKeys, FieldKeyDocument } from "./keys";
export { loadSchema, readSchemaFile } from "./schema";
export type { SchemaDocument, TypeDefinition } from "./schema";
export { createLogger, silentLogger } from "./logger";
export type { Logger, LogLevel, LogMeta } from "./logger";
