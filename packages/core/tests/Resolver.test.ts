import { NativeRegistry, native } from "@pgscript/library";
import { ResolveError } from "../src/utils/Error";
import { ForStatement, VarStatement } from "../src/parser/statements";
import { catchError, resolveSource } from "./helpers";

function resolveError(source: string): ResolveError {
    return catchError(ResolveError, () => resolveSource(source));
}

describe("Resolver", () => {
    test("qualify functions, containers and methods from root", () => {
        const resolved = resolveSource(`
            mod: geo {
                cont: Vec2 { x: float; y: float; }
                impl: Vec2 { fn: sum() ~ float { return x + y; } }
                fn: origin() ~ Vec2 { return Vec2 { x: 0.0, y: 0.0 }; }
            }
            fn: main() ~ int { return 0; }
        `);
        expect(resolved.functions.map((f) => f.name)).toEqual([
            "root::geo::origin",
            "root::main",
            "root::geo::Vec2::sum",
        ]);
        expect(resolved.containers.map((c) => c.name)).toEqual(["root::geo::Vec2"]);
        expect(resolved.layouts.get("root::geo::Vec2")).toEqual({
            name: "root::geo::Vec2",
            fields: ["x", "y"],
        });
    });

    test("undefined identifier names the symbol and its position", () => {
        const error = resolveError("fn: main() ~ int { return y; }");
        expect(error.kind).toBe("UnknownSymbol");
        expect(error.symbol).toBe("y");
        expect(error.loc).toMatchObject({ line: 1, col: 27 });
        expect(error.rawMessage).toBe("Cannot find 'y' in this scope");
    });

    test("forward references within a module", () => {
        const resolved = resolveSource(`
            fn: main() ~ int { return later(); }
            fn: later() ~ int { return 1; }
        `);
        const [call] = [...resolved.calls.values()];
        expect(call).toEqual({ kind: "function", name: "root::later" });
    });

    test("duplicate definition in one module", () => {
        const error = resolveError("fn: a() { } cont: a { }");
        expect(error.kind).toBe("DuplicateDefinition");
        expect(error.symbol).toBe("a");
    });

    test("import alias may not shadow a name in the same module", () => {
        const error = resolveError(`
            fn: helper() { }
            mod: util { fn: work() { } }
            import util::work = helper;
        `);
        expect(error.kind).toBe("DuplicateDefinition");
        expect(error.symbol).toBe("helper");
    });

    test("import cycle", () => {
        const error = resolveError("import b = a; import a = b;");
        expect(error.kind).toBe("ImportCycle");
    });

    test("unresolvable import path", () => {
        const error = resolveError("mod: geo { } import geo::missing;");
        expect(error.kind).toBe("UnknownSymbol");
        expect(error.symbol).toBe("geo::missing");
    });

    test("imports resolve through enclosing modules and other aliases", () => {
        const resolved = resolveSource(`
            mod: util { fn: triple(x: int) ~ int { return x * 3; } }
            import util::triple = t;
            mod: app {
                import t = again;
                fn: run() ~ int { return again(2); }
            }
        `);
        const [call] = [...resolved.calls.values()];
        expect(call).toEqual({ kind: "function", name: "root::util::triple" });
    });

    test("imports of natives", () => {
        const resolved = resolveSource(`
            import math::sqrt = root2;
            fn: main() ~ float { return root2(2.0); }
        `);
        const [call] = [...resolved.calls.values()];
        expect(call).toMatchObject({ kind: "native", name: "math::sqrt" });
    });

    test("script symbols win over natives of the same name", () => {
        const natives = new NativeRegistry().register(
            "helper",
            native(() => 1n, { params: [], returnType: "int" }),
        );
        const resolved = resolveSource(
            `
            fn: helper() ~ int { return 2; }
            fn: main() ~ int { return helper(); }
        `,
            natives,
        );
        const [call] = [...resolved.calls.values()];
        expect(call).toEqual({ kind: "function", name: "root::helper" });
    });

    test("initializer must match the declared type", () => {
        const error = resolveError("fn: main() { var x: int = 1.5; }");
        expect(error.kind).toBe("TypeMismatch");
        expect(error.rawMessage).toBe(
            "Type mismatch in variable 'x': expected 'int', found 'float'",
        );
    });

    test("argument count and types are checked", () => {
        const source = "fn: add(a: int, b: int) ~ int { return a + b; }";
        expect(resolveError(`${source} fn: main() ~ int { return add(1); }`).rawMessage).toBe(
            "'root::add' expects 2 argument(s), found 1",
        );
        expect(resolveError(`${source} fn: main() ~ int { return add(1, "2"); }`).kind).toBe(
            "TypeMismatch",
        );
    });

    test("return must match the declared return type", () => {
        expect(resolveError("fn: f() ~ int { return true; }").kind).toBe("TypeMismatch");
        expect(resolveError("fn: f() { return 1; }").kind).toBe("TypeMismatch");
        expect(resolveError("fn: f() ~ int { return; }").kind).toBe("TypeMismatch");
    });

    test("operators need compatible operands", () => {
        expect(resolveError("fn: f() { var x: int = 1 + 2.0; }").rawMessage).toBe(
            "Operator '+' cannot be applied to 'int' and 'float'",
        );
        expect(resolveError('fn: f() { var x: bool = "a" < "b"; }').kind).toBe("TypeMismatch");
        expect(resolveError("fn: f() { var x: int = -true; }").kind).toBe("TypeMismatch");
        expect(() =>
            resolveSource('fn: f() { var s: string = "a" + "b"; var e: bool = s == "ab"; }'),
        ).not.toThrow();
    });

    test("conditions must be bool", () => {
        expect(resolveError("fn: f() { if 1 { } }").kind).toBe("TypeMismatch");
        expect(resolveError("fn: f() { while 1.0 { } }").kind).toBe("TypeMismatch");
    });

    test("field access and struct literals check field names", () => {
        const cont = "cont: P { a: int; b: int; }";
        expect(resolveError(`${cont} fn: f(p: P) ~ int { return p.c; }`).kind).toBe(
            "UnknownSymbol",
        );
        expect(resolveError(`${cont} fn: f() { var p: P = P { a: 1, c: 2 }; }`).kind).toBe(
            "UnknownSymbol",
        );
        expect(resolveError(`${cont} fn: f() { var p: P = P { a: 1, a: 2 }; }`).kind).toBe(
            "DuplicateDefinition",
        );
        expect(resolveError(`${cont} fn: f() { var p: P = P { a: 1 }; }`).rawMessage).toBe(
            "Missing field(s) 'b' in 'root::P'",
        );
        expect(resolveError("fn: f(x: int) ~ int { return x.a; }").kind).toBe("TypeMismatch");
    });

    test("method resolution", () => {
        const cont = "cont: P { a: int; } impl: P { fn: get() ~ int { return a; } }";
        const resolved = resolveSource(`${cont} fn: f(p: P) ~ int { return p.get(); }`);
        const method = resolved.functions.find((fn) => fn.name === "root::P::get");
        expect(method?.params).toEqual([
            { name: "self", type: { kind: "named", container: "root::P" } },
        ]);
        expect([...resolved.bindings.values()]).toContainEqual({ kind: "selfField", index: 0 });

        expect(resolveError(`${cont} fn: f(p: P) ~ int { return p.put(); }`).kind).toBe(
            "UnknownSymbol",
        );
        expect(resolveError(`${cont} impl: P { fn: get() ~ int { return 0; } }`).kind).toBe(
            "DuplicateDefinition",
        );
        expect(resolveError("fn: f(x: int) ~ int { return x.get(); }").kind).toBe(
            "TypeMismatch",
        );
    });

    test("functions are not values", () => {
        const error = resolveError("fn: g() { } fn: f() { var x: int = g; }");
        expect(error.kind).toBe("TypeMismatch");
        expect(error.rawMessage).toBe("function 'root::g' cannot be used as a value");
    });

    test("locals are not callable", () => {
        const error = resolveError("fn: f(g: int) { g(); }");
        expect(error.kind).toBe("TypeMismatch");
    });

    test("shadowed names bind distinct slots", () => {
        const resolved = resolveSource(`
            fn: f(n: int) ~ int {
                var x: int = 1;
                { var x: int = 2; }
                return x;
            }
        `);
        expect(resolved.functions[0].slotCount).toBe(3);
        const slots = [...resolved.declarations.entries()].map(
            ([decl, slot]: [VarStatement, number]) => [decl.name, slot],
        );
        expect(slots).toEqual([
            ["x", 1],
            ["x", 2],
        ]);
        const returned = [...resolved.bindings.values()];
        expect(returned).toEqual([{ kind: "local", slot: 1 }]);
    });

    test("redeclaring a name in the same scope is a duplicate", () => {
        expect(resolveError("fn: f() { var x: int = 1; var x: int = 2; }").kind).toBe(
            "DuplicateDefinition",
        );
        expect(resolveError("fn: f(x: int) { var x: int = 2; }").kind).toBe(
            "DuplicateDefinition",
        );
    });

    test("for loops take a variable and two hidden slots", () => {
        const resolved = resolveSource("fn: f() { for i in 3 { var y: int = i; } }");
        const [slots] = [...resolved.loops.entries()].map(
            ([loop, value]: [ForStatement, unknown]) => [loop.variable, value],
        );
        expect(slots).toEqual(["i", { variable: 0, counter: 1, limit: 2 }]);
        expect(resolved.functions[0].slotCount).toBe(4);
    });

    test("for loops need an int bound", () => {
        expect(resolveError("fn: f() { for i in 2.0 { } }").kind).toBe("TypeMismatch");
    });

    test("unknown type names", () => {
        const error = resolveError("fn: f(p: Missing) { }");
        expect(error.kind).toBe("UnknownSymbol");
        expect(error.symbol).toBe("Missing");
    });

    test("diagnostic renders the offending line", () => {
        const error = resolveError("fn: main() ~ int {\n    return nope;\n}");
        expect(error.loc).toMatchObject({ line: 2, col: 12 });
        expect(error.message).toContain("    return nope;");
    });
});
