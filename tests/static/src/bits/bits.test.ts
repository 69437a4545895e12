import { describe, test, expect } from 'vitest';
import { bitmask, extractBits, insertBits } from "../../../../static/src/bits/bits";

describe('bits', () => {
    test('bitmask', () => {
        expect(bitmask(0)).toBe(0);
        expect(bitmask(6)).toBe(63);
        expect(bitmask(31)).toBe(2147483647);
        expect(bitmask(32)).toBe(4294967295);
        expect(() => bitmask(33)).toThrow(RangeError);
    });

    test('extract ranges of a word', () => {
        const word = 0b11110101;
        expect(extractBits(word, 0, 1)).toBe(1);
        expect(extractBits(word, 1, 1)).toBe(0);
        expect(extractBits(word, 2, 6)).toBe(61);
    });

    test('extract the top bit as unsigned', () => {
        expect(extractBits(0x80000000, 31, 1)).toBe(1);
        expect(extractBits(0xffffffff, 0, 32)).toBe(4294967295);
    });

    test('insert leaves other bits alone', () => {
        expect(insertBits(0, 2, 6, 61)).toBe(244);
        expect(insertBits(0xffffffff, 8, 24, 0)).toBe(255);
        expect(insertBits(0, 31, 1, 1)).toBe(2147483648);
    });

    test('out of range', () => {
        expect(() => insertBits(0, 0, 1, 2)).toThrow("Value 2 does not fit in 1 bits");
        expect(() => extractBits(0, 30, 4)).toThrow("Bit range 30+4 exceeds a 32-bit word");
    });
});
