import { ConvertError, ConvertStatus } from "./errors";
import type { Value } from "./instance";
import { NodeKind, type ValueTree } from "./tree";

/** Encodes one element; `undefined` means the element node could not be built. */
export type ElementEncoder<N> = (index: number, value: Value, baseline: Value | undefined) => N | undefined;

/** Decodes one element node over the element currently held at `index`. */
export type ElementDecoder<N> = (index: number, node: N, baseline: Value | undefined, current: Value) => Value;

export function elementPath(path: string, index: number): string {
    return `${path}[${index}]`;
}

/**
 * Builds an array node from exactly `n` element encodings. If any element
 * can't be built the whole array is dropped rather than returned with a gap,
 * since a gap would shift every later index.
 */
export function encodeArray<N>(
    tree: ValueTree<N>,
    values: readonly Value[],
    baseline: readonly Value[] | undefined,
    n: number,
    encodeElement: ElementEncoder<N>,
): N | undefined {
    if (values.length < n) {
        throw new RangeError(`Array instance has ${values.length} elements, expected ${n}`);
    }
    const array = tree.createArray();
    if (array === undefined) return undefined;
    for (let i = 0; i < n; ++i) {
        const item = encodeElement(i, values[i], baseline?.[i]);
        if (item === undefined) return undefined;
        tree.appendItem(array, item);
    }
    return array;
}

/**
 * Overlays an array node onto `target`, which holds `n` elements.
 *
 * Only `min(length, n)` elements are decoded; extra tree elements are
 * dropped without error. When the tree is shorter than `n` and a baseline is
 * given, the remaining slots are refilled from the baseline; without a
 * baseline they keep whatever they held.
 */
export function decodeArray<N>(
    tree: ValueTree<N>,
    node: N,
    baseline: readonly Value[] | undefined,
    target: Value[],
    n: number,
    decodeElement: ElementDecoder<N>,
    copyElement: (value: Value, index: number) => Value,
    path: string,
): Value[] {
    const kind = tree.kindOf(node);
    if (kind !== NodeKind.Array) {
        throw new ConvertError(ConvertStatus.ParseError, `expected array node, got ${NodeKind[kind].toLowerCase()}`, path);
    }
    const provided = tree.length(node);
    const copyCount = Math.min(provided, n);
    for (let i = 0; i < copyCount; ++i) {
        const item = tree.getItem(node, i);
        if (item === undefined) continue;
        target[i] = decodeElement(i, item, baseline?.[i], target[i]);
    }
    if (baseline && provided < n) {
        for (let i = provided; i < n; ++i) {
            target[i] = copyElement(baseline[i], i);
        }
    }
    return target;
}
