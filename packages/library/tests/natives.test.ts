import {
    NativeHandle,
    StructInstance,
    createStd,
    fromNative,
    intValue,
    nativeKindOf,
    unify,
} from "../src";
import { math } from "../src/packages/math";
import { str } from "../src/packages/str";

describe("fromNative", () => {
    test("accepts a value of the declared kind", () => {
        expect(fromNative("int", 5n)).toEqual(intValue(5));
        expect(fromNative("float", 1.5)).toEqual({ type: "float", value: 1.5 });
        expect(fromNative("unit", null)).toEqual({ type: "unit", value: null });
    });

    test("wraps host integers to 64 bits", () => {
        expect(fromNative("int", 2n ** 63n)).toEqual({ type: "int", value: -(2n ** 63n) });
    });

    test("never coerces", () => {
        expect(fromNative("int", 1.0)).toBeUndefined();
        expect(fromNative("float", 1n)).toBeUndefined();
        expect(fromNative("string", true)).toBeUndefined();
        expect(fromNative("unit", 0n)).toBeUndefined();
    });

    test("nativeKindOf", () => {
        expect(nativeKindOf(null)).toBe("unit");
        expect(nativeKindOf("x")).toBe("string");
        expect(nativeKindOf(new NativeHandle("file", {}))).toBe("handle");
    });
});

describe("unify", () => {
    test("primitives", () => {
        expect(unify(intValue(-3))).toBe("-3");
        expect(unify({ type: "float", value: 2 })).toBe("2.0");
        expect(unify({ type: "float", value: 0.25 })).toBe("0.25");
        expect(unify({ type: "bool", value: false })).toBe("false");
        expect(unify({ type: "unit", value: null })).toBe("()");
        expect(unify({ type: "handle", value: new NativeHandle("file", 3) })).toBe(
            "<handle file>",
        );
    });

    test("structs print their short name and fields", () => {
        const inner = new StructInstance({ name: "root::Inner", fields: ["n"] }, [intValue(1)]);
        const outer = new StructInstance({ name: "root::geo::Outer", fields: ["a", "inner"] }, [
            { type: "string", value: "hi" },
            { type: "struct", value: inner },
        ]);
        expect(outer.get("a")).toEqual({ type: "string", value: "hi" });
        expect(outer.get("missing")).toBeUndefined();
        expect(unify({ type: "struct", value: outer })).toBe(
            "Outer { a: hi, inner: Inner { n: 1 } }",
        );
    });
});

describe("standard natives", () => {
    test("println writes a line to the stream", () => {
        const written: string[] = [];
        const std = createStd({ write: (chunk: string) => written.push(chunk) });
        expect(std.println("hello")).toBeNull();
        std.print("a");
        std.printi(7n);
        expect(written).toEqual(["hello\n", "a", "7\n"]);
    });

    test("math", () => {
        expect(math.sqrt(16)).toBe(4);
        expect(math.pow(2, 10)).toBe(1024);
        expect(math.floor(-1.5)).toBe(-2n);
        expect(math.toInt(-2.7)).toBe(-2n);
    });

    test("float to int conversions stay within 64 bits", () => {
        expect(math.toInt(-(2 ** 63))).toBe(-(2n ** 63n));
        expect(() => math.toInt(2 ** 63)).toThrow(RangeError);
        expect(() => math.floor(1e30)).toThrow("1e+30 does not fit in a 64-bit int");
        expect(() => math.toInt(Number.NaN)).toThrow("NaN does not fit in a 64-bit int");
    });

    test("str", () => {
        expect(str.len("abc")).toBe(3n);
        expect(str.charAt("abc", 1n)).toBe("b");
        expect(str.charAt("abc", 9n)).toBe("");
        expect(str.fromInt(-12n)).toBe("-12");
    });

    test("argument kinds are checked", () => {
        expect(() => str.len(1n)).toThrow("Expected string argument, got int");
    });
});
