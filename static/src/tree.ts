/**
 * Value tree boundary. The serializer and deserializer only talk to JSON
 * through {@link ValueTree}, so any JSON-like node representation can be
 * plugged in.
 */

export enum NodeKind {
    Object,
    Array,
    Number,
    String,
    Bool,
    Null,
}

/**
 * Read/write access to a JSON-like tree whose nodes have type `N`. Node
 * constructors return `undefined` when the node cannot be created.
 */
export interface ValueTree<N> {
    kindOf(node: N): NodeKind;

    createObject(): N | undefined;
    createArray(): N | undefined;
    createNumber(value: number): N | undefined;
    createString(value: string): N | undefined;
    createBool(value: boolean): N | undefined;
    createNull(): N | undefined;

    /** Returns the named member of an object node, if present. */
    getMember(object: N, name: string): N | undefined;
    setMember(object: N, name: string, value: N): void;
    memberNames(object: N): string[];

    getItem(array: N, index: number): N | undefined;
    appendItem(array: N, value: N): void;
    length(array: N): number;

    numberValue(node: N): number;
    stringValue(node: N): string;
    boolValue(node: N): boolean;
}

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

function isJsonObject(node: JsonValue): node is JsonObject {
    return typeof node === "object" && node !== null && !Array.isArray(node);
}

/**
 * {@link ValueTree} over plain JSON values, as produced by `JSON.parse` and
 * consumed by `JSON.stringify`.
 */
export class JsonValueTree implements ValueTree<JsonValue> {
    kindOf(node: JsonValue): NodeKind {
        if (node === null) return NodeKind.Null;
        if (Array.isArray(node)) return NodeKind.Array;
        switch (typeof node) {
        case "number": return NodeKind.Number;
        case "string": return NodeKind.String;
        case "boolean": return NodeKind.Bool;
        default: return NodeKind.Object;
        }
    }

    createObject(): JsonValue {
        return {};
    }

    createArray(): JsonValue {
        return [];
    }

    createNumber(value: number): JsonValue | undefined {
        // JSON has no representation for NaN or the infinities
        return Number.isFinite(value) ? value : undefined;
    }

    createString(value: string): JsonValue {
        return value;
    }

    createBool(value: boolean): JsonValue {
        return value;
    }

    createNull(): JsonValue {
        return null;
    }

    getMember(object: JsonValue, name: string): JsonValue | undefined {
        if (!isJsonObject(object) || !Object.prototype.hasOwnProperty.call(object, name)) {
            return undefined;
        }
        return object[name];
    }

    setMember(object: JsonValue, name: string, value: JsonValue): void {
        if (!isJsonObject(object)) {
            throw new Error(`Cannot set member ${name} on a non-object node`);
        }
        object[name] = value;
    }

    memberNames(object: JsonValue): string[] {
        return isJsonObject(object) ? Object.keys(object) : [];
    }

    getItem(array: JsonValue, index: number): JsonValue | undefined {
        if (!Array.isArray(array) || index < 0 || index >= array.length) {
            return undefined;
        }
        return array[index];
    }

    appendItem(array: JsonValue, value: JsonValue): void {
        if (!Array.isArray(array)) {
            throw new Error("Cannot append to a non-array node");
        }
        array.push(value);
    }

    length(array: JsonValue): number {
        return Array.isArray(array) ? array.length : 0;
    }

    numberValue(node: JsonValue): number {
        if (typeof node !== "number") throw new Error("Node is not a number");
        return node;
    }

    stringValue(node: JsonValue): string {
        if (typeof node !== "string") throw new Error("Node is not a string");
        return node;
    }

    boolValue(node: JsonValue): boolean {
        if (typeof node !== "boolean") throw new Error("Node is not a bool");
        return node;
    }
}

export const jsonTree = new JsonValueTree();
