/** Bit‑mask with the lowest *n* bits set. */
export function bitmask(n: number): number {
    if (n > 32) throw new RangeError(`Cannot create bitmask with >32 bits (asked for ${n})`);
    if (n == 32) return 0xffffffff;
    return ((1 << n) >>> 0) - 1;
}

/** Read the *bits*-wide unsigned range starting at bit *offset* of *word*. */
export function extractBits(word: number, offset: number, bits: number): number {
    if (offset + bits > 32) {
        throw new RangeError(`Bit range ${offset}+${bits} exceeds a 32-bit word`);
    }
    return ((word >>> offset) & bitmask(bits)) >>> 0;
}

/**
 * Return *word* with the *bits*-wide range at *offset* replaced by *value*.
 * Bits outside the range are left as they were.
 */
export function insertBits(word: number, offset: number, bits: number, value: number): number {
    if (offset + bits > 32) {
        throw new RangeError(`Bit range ${offset}+${bits} exceeds a 32-bit word`);
    }
    const mask = bitmask(bits);
    if (value < 0 || value > mask) {
        throw new RangeError(`Value ${value} does not fit in ${bits} bits`);
    }
    const cleared = word & ~(mask << offset);
    return (cleared | (value << offset)) >>> 0;
}

