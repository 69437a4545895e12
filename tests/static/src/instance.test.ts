import { describe, test, expect, vi } from 'vitest';
import {
    bitfieldMember,
    cloneValue,
    defaultValue,
    expectObject,
    type ObjectValue,
    packBitfield,
    readField,
    textContent,
    unpackBitfield,
    valuesEqual,
} from "../../../static/src/instance";
import { makeBitfield, makeText, type Type, TYPE_REGISTRY } from "../../../static/src/struct";
import { BitFields, chain, ComplexData, Node, Point } from "./fixtures";

describe('instances', () => {
    describe('defaultValue', () => {
        test('zeroes every field', () => {
            expect(defaultValue(ComplexData)).toEqual({
                id: 0,
                name: "",
                position: { x: 0, y: 0 },
                values: [0, 0, 0],
                flags: { flag1: 0, flag2: 0, value: 0, reserved: 0 },
                data: { tag: "as_int", value: 0 },
            });
        });

        test('pointers and back references start null', () => {
            expect(defaultValue(Node)).toEqual({ value: 0, next: null, prev: null });
        });
    });

    describe('bitfields', () => {
        test('pack and unpack', () => {
            expect(packBitfield(BitFields, { flag1: 1, flag2: 0, value: 5, reserved: 0 })).toBe(21);
            expect(unpackBitfield(BitFields, 21)).toEqual({ flag1: 1, flag2: 0, value: 5, reserved: 0 });
        });

        test('bits outside the members come from base', () => {
            const Low = makeBitfield(TYPE_REGISTRY.u8, [{ name: 'a', bits: 2 }]);
            expect(packBitfield(Low, { a: 3 }, 0xf0)).toBe(0xf3);
        });

        test('member from either representation', () => {
            expect(bitfieldMember(BitFields, 21, "value")).toBe(5);
            expect(bitfieldMember(BitFields, { flag1: 1 }, "value")).toBe(0);
            expect(() => bitfieldMember(BitFields, 21, "nope")).toThrow("Member nope not found in BitFields");
        });
    });

    test('text stops at the terminator', () => {
        expect(textContent("ab\0cd")).toBe("ab");
        expect(textContent("abcd")).toBe("abcd");
    });

    test('missing field reads as zero', () => {
        expect(readField({}, Point.fields[0])).toBe(0);
    });

    test('shape mismatch', () => {
        expect(() => expectObject(Point, 5)).toThrow("Expected object instance for Point, got number");
    });

    describe('cloneValue', () => {
        test('copies owned pointees and remaps back references', () => {
            const [first, second] = chain(1, 2);
            second.next = first;
            first.prev = second;

            const copy = expectObject(Node, cloneValue(Node, first));
            const copyNext = expectObject(Node, copy.next);
            expect(copy).not.toBe(first);
            expect(copyNext).not.toBe(second);
            expect(copyNext.value).toBe(2);
            expect(copyNext.next).toBe(copy);
            expect(copyNext.prev).toBe(copy);
            expect(copy.prev).toBe(copyNext);
        });

        test('back references outside the copy are kept', () => {
            const [first, second] = chain(1, 2);
            const copy = expectObject(Node, cloneValue(Node, second));
            expect(copy.prev).toBe(first);
        });

        test('pointees are filled into the storage the hook hands out', () => {
            const [first, second] = chain(1, 2);
            second.next = first;
            const storage: ObjectValue[] = [];
            const allocate = vi.fn((type: Type) => {
                const slot = expectObject(type, defaultValue(type));
                storage.push(slot);
                return slot;
            });

            const copy = expectObject(Node, cloneValue(Node, first, new Map(), allocate));
            expect(allocate).toHaveBeenCalledTimes(1);
            expect(allocate).toHaveBeenCalledWith(Node);
            expect(copy.next).toBe(storage[0]);
            expect(storage[0].value).toBe(2);
            expect(storage[0].next).toBe(copy);
        });
    });

    describe('valuesEqual', () => {
        test('terminates on rings', () => {
            const [first, second] = chain(1, 2);
            second.next = first;
            const copy = expectObject(Node, cloneValue(Node, first));
            expect(valuesEqual(Node, first, copy)).toBe(true);

            expect(valuesEqual(Node, first, { value: 1, next: { value: 3, next: null, prev: null }, prev: null })).toBe(false);
        });

        test('text compares up to the terminator', () => {
            expect(valuesEqual(makeText(8), "ab\0x", "ab")).toBe(true);
        });

        test('bitfields compare member by member', () => {
            expect(valuesEqual(BitFields, 21, { flag1: 1, flag2: 0, value: 5, reserved: 0 })).toBe(true);
            expect(valuesEqual(BitFields, 21, { flag1: 1, flag2: 1, value: 5, reserved: 0 })).toBe(false);
        });

        test('null pointers', () => {
            expect(valuesEqual(Node, { value: 1, next: null, prev: null }, { value: 1, next: null, prev: null })).toBe(true);
            expect(valuesEqual(Node, { value: 1, next: null, prev: null }, chain(1, 2)[0])).toBe(false);
        });
    });
});
