import { describe, test, expect, vi } from 'vitest';
import { loadConfig } from "../../../static/src/config";
import { ConfigError, ConvertStatus } from "../../../static/src/errors";
import { silentLogger } from "../../../static/src/logger";
import { loadSchema } from "../../../static/src/schema";
import { ConverterRegistry, createRegistry } from "../../../static/src/registry";
import { makeStruct, makeUnion, TYPE_REGISTRY } from "../../../static/src/struct";
import { Node, Point, Polygon } from "./fixtures";

describe('ConverterRegistry', () => {
    test('converters for every registered type', () => {
        const registry = createRegistry({ Point, Polygon }, loadConfig(), silentLogger);
        expect(registry.names()).toEqual(["Point", "Polygon"]);
        expect(registry.converter("Polygon").type).toBe(Polygon);
        expect(registry.converter("Point").toTree({ x: 5, y: 5 }, { x: 5, y: 0 })).toEqual({ y: 5 });
    });

    test('dependencies look through anonymous types', () => {
        const Wrapper = makeStruct([
            { name: 'choice', type: makeUnion([{ name: 'p', type: Point }, { name: 'n', type: TYPE_REGISTRY.i32 }]) },
        ]);
        const registry = createRegistry({ Point, Polygon, Node, Wrapper }, loadConfig(), silentLogger);
        expect(registry.dependencies("Polygon")).toEqual(["Point"]);
        expect(registry.dependencies("Wrapper")).toEqual(["Point"]);
        expect(registry.dependencies("Node")).toEqual([]);
        expect(registry.dependencies("Nope")).toEqual([]);
    });

    test('an enabled type needs its dependencies enabled', () => {
        const logger = { ...silentLogger, error: vi.fn() };
        let caught: unknown;
        try {
            createRegistry({ Point, Polygon }, loadConfig({ converters: { Point: false } }), logger);
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(ConfigError);
        if (!(caught instanceof ConfigError)) return;
        expect(caught.issues).toEqual(["Polygon requires Point, which is disabled"]);
        expect(logger.error).toHaveBeenCalledWith("Converter dependency check failed", {
            issues: ["Polygon requires Point, which is disabled"],
        });
    });

    test('disabling both is fine', () => {
        const registry = createRegistry({ Point, Polygon }, loadConfig({ converters: { Point: false, Polygon: false } }), silentLogger);
        expect(registry.isEnabled("Polygon")).toBe(false);
        expect(() => registry.converter("Point")).toThrow("Converter for Point is disabled");
    });

    test('unknown type', () => {
        const registry = createRegistry({ Point }, loadConfig(), silentLogger);
        expect(() => registry.converter("Nope")).toThrow("Unknown type Nope");
    });

    test('names are registered once', () => {
        const registry = new ConverterRegistry({ logger: silentLogger });
        registry.register("Point", Point);
        expect(() => registry.register("Point", Point)).toThrow("Type Point is already registered");
    });

    test('accepts a map of types', () => {
        const registry = createRegistry(new Map([["Point", Point]]), loadConfig(), silentLogger);
        expect(registry.has("Point")).toBe(true);
    });

    describe('TypeConverter', () => {
        const registry = createRegistry({ Point, Node }, loadConfig({ maxDepth: 1 }), silentLogger);

        test('stringify and parse', () => {
            const point = registry.converter("Point");
            expect(point.stringify({ x: 5, y: 5 }, { x: 5, y: 0 })).toBe('{"y":5}');
            expect(point.parse('{"y":5}', { x: 5, y: 0 })).toEqual({ status: ConvertStatus.Success, value: { x: 5, y: 5 } });
        });

        test('malformed JSON text', () => {
            const result = registry.converter("Point").parse("{bad");
            expect(result.status).toBe(ConvertStatus.ParseError);
            if (result.status === ConvertStatus.Success) return;
            expect(result.error.message.startsWith("invalid JSON: ")).toBe(true);
        });

        test('fromTree fills the caller instance', () => {
            const out = { x: 0, y: 0 };
            registry.converter("Point").fromTree({ x: 3 }, null, out);
            expect(out).toEqual({ x: 3, y: 0 });
        });

        test('arrays', () => {
            const point = registry.converter("Point");
            expect(point.arrayToTree([{ x: 1, y: 2 }, { x: 3, y: 4 }], [{ x: 1, y: 2 }, { x: 0, y: 0 }]))
                .toEqual([{}, { x: 3, y: 4 }]);
            const out = [{ x: 0, y: 0 }, { x: 0, y: 0 }];
            expect(point.arrayFromTree([{ x: 7 }], null, out)).toEqual({
                status: ConvertStatus.Success,
                value: [{ x: 7, y: 0 }, { x: 0, y: 0 }],
            });
        });

        test('a pointer type declared in a schema', () => {
            const types = loadSchema({
                types: {
                    Node: { kind: "struct", fields: [{ name: "value", type: "i32" }, { name: "next", type: "NodePtr" }] },
                    NodePtr: { kind: "pointer", to: "Node" },
                },
            });
            const nodePtr = createRegistry(types, loadConfig(), silentLogger).converter("NodePtr");
            expect(nodePtr.parse('{"value":1,"next":{"value":2}}')).toEqual({
                status: ConvertStatus.Success,
                value: { value: 1, next: { value: 2, next: null } },
            });
            expect(nodePtr.decode(null)).toEqual({ status: ConvertStatus.Success, value: null });
        });

        test('configured depth limit applies', () => {
            const result = registry.converter("Node").decode({ value: 1, next: { value: 2, next: { value: 3 } } });
            expect(result.status).toBe(ConvertStatus.ParseError);
        });
    });
});
