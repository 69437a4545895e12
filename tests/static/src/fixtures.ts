import {
    arrayOf,
    makeBackRef,
    makeBitfield,
    makePointer,
    makeStruct,
    makeText,
    makeUnion,
    type StructType,
    TYPE_REGISTRY,
} from "../../../static/src/struct";

export const Point = makeStruct([
    { name: 'x', type: TYPE_REGISTRY.i32 },
    { name: 'y', type: TYPE_REGISTRY.i32 },
], { name: "Point" });

export const Vector = makeStruct([
    { name: 'x', type: TYPE_REGISTRY.f32 },
    { name: 'y', type: TYPE_REGISTRY.f32 },
    { name: 'z', type: TYPE_REGISTRY.f32 },
], { name: "Vector" });

export const Node: StructType = makeStruct([
    { name: 'value', type: TYPE_REGISTRY.i32 },
    { name: 'next', type: makePointer(() => Node, { name: "NodePtr" }) },
    { name: 'prev', type: makeBackRef(() => Node, "next") },
], { name: "Node" });

export const BitFields = makeBitfield(TYPE_REGISTRY.u32, [
    { name: 'flag1', bits: 1 },
    { name: 'flag2', bits: 1 },
    { name: 'value', bits: 6 },
    { name: 'reserved', bits: 24 },
], { name: "BitFields" });

export const DataValue = makeUnion([
    { name: 'as_int', type: TYPE_REGISTRY.i32 },
    { name: 'as_float', type: TYPE_REGISTRY.f32 },
    { name: 'as_text', type: makeText(16) },
], { name: "DataValue" });

export const Shape = makeUnion([
    { name: 'point', type: Point },
    { name: 'scalar', type: TYPE_REGISTRY.i32 },
], { name: "Shape" });

export const ComplexData = makeStruct([
    { name: 'id', type: TYPE_REGISTRY.u32 },
    { name: 'name', type: makeText(32) },
    { name: 'position', type: Point },
    { name: 'values', type: arrayOf(TYPE_REGISTRY.f64, 3) },
    { name: 'flags', type: BitFields },
    { name: 'data', type: DataValue },
], { name: "ComplexData" });

export const Polygon = makeStruct([
    { name: 'count', type: TYPE_REGISTRY.u8 },
    { name: 'points', type: arrayOf(Point, 4) },
], { name: "Polygon" });

export const Triple = makeStruct([
    { name: 'a', type: makePointer(Point) },
    { name: 'b', type: makePointer(Point) },
    { name: 'c', type: makePointer(Point) },
], { name: "Triple" });

export const Label = makeStruct([
    { name: 'text', type: makeText(4) },
    { name: 'on', type: TYPE_REGISTRY.bool },
], { name: "Label" });

/** Links `values` into a singly owned chain and sets each back reference. */
export function chain(...values: number[]) {
    type NodeValue = { value: number; next: NodeValue | null; prev: NodeValue | null };
    const nodes: NodeValue[] = values.map(value => ({ value, next: null, prev: null }));
    for (let i = 0; i + 1 < nodes.length; ++i) {
        nodes[i].next = nodes[i + 1];
        nodes[i + 1].prev = nodes[i];
    }
    return nodes;
}
