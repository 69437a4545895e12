import { describe, test, expect, vi } from 'vitest';
import { fromTree } from "../../../static/src/deserialize";
import { ConvertStatus } from "../../../static/src/errors";
import { defaultValue, expectObject } from "../../../static/src/instance";
import type { Logger } from "../../../static/src/logger";
import { DiffingSerializer, toTree } from "../../../static/src/serialize";
import { makePointer, TYPE_REGISTRY } from "../../../static/src/struct";
import { jsonTree, type JsonValue, JsonValueTree } from "../../../static/src/tree";
import { BitFields, chain, ComplexData, DataValue, Label, Node, Point } from "./fixtures";

function recordingLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('DiffingSerializer', () => {
    describe('structs', () => {
        test('only changed fields are emitted', () => {
            expect(toTree(Point, { x: 5, y: 5 }, { x: 5, y: 0 })).toEqual({ y: 5 });
        });

        test('without a baseline every field is emitted', () => {
            expect(toTree(Point, { x: 5, y: 5 })).toEqual({ x: 5, y: 5 });
        });

        test('equal to baseline serializes to an empty object', () => {
            expect(toTree(Point, { x: 1, y: 2 }, { x: 1, y: 2 })).toEqual({});
        });

        test('missing instance', () => {
            expect(toTree(Point, undefined)).toBeUndefined();
            expect(toTree(Point, null)).toBeUndefined();
        });

        test('nested diff', () => {
            const baseline = defaultValue(ComplexData);
            const instance = expectObject(ComplexData, defaultValue(ComplexData));
            instance.name = "sensor";
            instance.position = { x: 1, y: 0 };
            expect(toTree(ComplexData, instance, baseline)).toEqual({ name: "sensor", position: { x: 1 } });
        });

        test('a changed array is written in full', () => {
            const baseline = defaultValue(ComplexData);
            const instance = expectObject(ComplexData, defaultValue(ComplexData));
            instance.values = [1, 0, 0];
            expect(toTree(ComplexData, instance, baseline)).toEqual({ values: [1, 0, 0] });
        });

        test('serialization leaves its inputs alone', () => {
            const instance = { x: 5, y: 5 };
            const baseline = { x: 5, y: 0 };
            toTree(Point, instance, baseline);
            expect(instance).toEqual({ x: 5, y: 5 });
            expect(baseline).toEqual({ x: 5, y: 0 });
        });
    });

    describe('scalars', () => {
        test('text is written up to the terminator', () => {
            expect(toTree(Label, { text: "hi\0junk", on: true })).toEqual({ text: "hi", on: true });
            expect(toTree(Label, { text: "hi\0junk", on: true }, { text: "hi\0more", on: true })).toEqual({});
        });

        test('wrong JS type is a programming error', () => {
            expect(() => toTree(Point, { x: "a", y: 0 })).toThrow("Expected number for i32 at x");
        });
    });

    describe('bitfields', () => {
        test('members are compared one at a time', () => {
            expect(toTree(BitFields, 21, 0)).toEqual({ flag1: 1, value: 5 });
        });

        test('packed word without a baseline', () => {
            expect(toTree(BitFields, 21)).toEqual({ flag1: 1, flag2: 0, value: 5, reserved: 0 });
        });
    });

    describe('unions', () => {
        test('the active alternative is a single key', () => {
            expect(toTree(DataValue, { tag: "as_float", value: 1.5 }, { tag: "as_int", value: 0 })).toEqual({ as_float: 1.5 });
        });

        test('same alternative with a new payload', () => {
            expect(toTree(DataValue, { tag: "as_int", value: 7 }, { tag: "as_int", value: 0 })).toEqual({ as_int: 7 });
        });

        test('unchanged union', () => {
            expect(toTree(DataValue, { tag: "as_int", value: 7 }, { tag: "as_int", value: 7 })).toEqual({});
        });

        test('unknown alternative', () => {
            expect(() => toTree(DataValue, { tag: "as_bool", value: true })).toThrow("Unknown alternative as_bool in DataValue at <root>");
        });
    });

    describe('pointers', () => {
        test('owned chain', () => {
            const [first] = chain(1, 2);
            expect(toTree(Node, first)).toEqual({ value: 1, next: { value: 2 } });
        });

        test('two node ring terminates', () => {
            const [first, second] = chain(1, 2);
            second.next = first;
            expect(toTree(Node, first)).toEqual({ value: 1, next: { value: 2 } });
        });

        test('pointee diffs against the baseline pointee', () => {
            const [first, second] = chain(1, 2);
            const [baseline] = chain(1, 2);
            second.value = 3;
            expect(toTree(Node, first, baseline)).toEqual({ next: { value: 3 } });
        });

        test('null pointer is omitted whatever the baseline holds', () => {
            const [baseline] = chain(1, 2);
            expect(toTree(Node, { value: 1, next: null, prev: null }, baseline)).toEqual({});
        });

        test('depth limit cuts the branch and warns', () => {
            const logger = recordingLogger();
            const serializer = new DiffingSerializer({ tree: jsonTree, maxDepth: 1, logger });
            const [first] = chain(1, 2, 3);
            expect(serializer.serialize(Node, first)).toEqual({ value: 1, next: { value: 2 } });
            expect(logger.warn).toHaveBeenCalledWith("Maximum pointer depth reached during serialization", { path: "next.next", maxDepth: 1 });
        });

        test('the default depth limit shortens a longer chain', () => {
            const logger = recordingLogger();
            const serializer = new DiffingSerializer({ tree: jsonTree, logger });
            const values = Array.from({ length: 66 }, (_, i) => i + 1);
            const [first] = chain(...values);
            const decoded = fromTree(Node, serializer.serialize(Node, first));
            if (decoded.status !== ConvertStatus.Success) throw decoded.error;

            let node = expectObject(Node, decoded.value);
            const kept = [node.value];
            while (node.next !== null) {
                node = expectObject(Node, node.next);
                kept.push(node.value);
            }
            expect(kept).toEqual(values.slice(0, 65));
            expect(logger.warn).toHaveBeenCalledTimes(1);
        });

        test('cycle is logged at debug', () => {
            const logger = recordingLogger();
            const serializer = new DiffingSerializer({ tree: jsonTree, logger });
            const [first, second] = chain(1, 2);
            second.next = first;
            serializer.serialize(Node, first);
            expect(logger.debug).toHaveBeenCalledWith("Pointer cycle cut during serialization", { path: "next.next" });
        });
    });

    describe('serializeArray', () => {
        const serializer = new DiffingSerializer({ tree: jsonTree });

        test('unchanged aggregate elements keep their position', () => {
            expect(serializer.serializeArray(Point, [{ x: 1, y: 2 }, { x: 3, y: 4 }], [{ x: 1, y: 2 }, { x: 0, y: 0 }]))
                .toEqual([{}, { x: 3, y: 4 }]);
        });

        test('unchanged scalar elements are written in full', () => {
            expect(serializer.serializeArray(TYPE_REGISTRY.i32, [1, 2, 3], [1, 0, 3])).toEqual([1, 2, 3]);
        });

        test('null pointers become null', () => {
            expect(serializer.serializeArray(makePointer(Point), [null, { x: 1, y: 2 }])).toEqual([null, { x: 1, y: 2 }]);
        });

        test('only the first n elements', () => {
            expect(serializer.serializeArray(TYPE_REGISTRY.i32, [1, 2, 3], undefined, 2)).toEqual([1, 2]);
        });

        test('short baseline', () => {
            expect(() => serializer.serializeArray(TYPE_REGISTRY.i32, [1, 2, 3], [1])).toThrow(RangeError);
        });
    });

    test('a node the tree cannot build is dropped', () => {
        class FlakyTree extends JsonValueTree {
            createNumber(value: number): JsonValue | undefined {
                return value === 13 ? undefined : super.createNumber(value);
            }
        }
        const logger = recordingLogger();
        const serializer = new DiffingSerializer({ tree: new FlakyTree(), logger });
        expect(serializer.serialize(Point, { x: 13, y: 2 })).toEqual({ y: 2 });
        expect(logger.warn).toHaveBeenCalledWith("Could not create value tree node", { path: "x" });
    });
});
