import {
    NativeRegistry,
    NativeValue,
    Value,
    createStdRegistry,
    intValue,
    native,
} from "@pgscript/library";
import { VirtualMachine } from "../src/vm/VirtualMachine";
import { StepState, VmOptions } from "../src/vm/Options";
import { RuntimeError } from "../src/utils/Error";
import { catchError, collectOutput, compileSource } from "./helpers";

interface Execution {
    value: Value;
    vm: VirtualMachine;
}

function execute(
    source: string,
    entry: string = "root::main",
    options: VmOptions = {},
    args: Value[] = [],
    natives: NativeRegistry = createStdRegistry(),
): Execution {
    const vm = new VirtualMachine(compileSource(source, natives), natives, options);
    return { value: vm.execute(entry, args), vm };
}

function fault(source: string, options: VmOptions = {}): RuntimeError {
    return catchError(RuntimeError, () => execute(source, "root::main", options));
}

describe("VirtualMachine", () => {
    describe("arithmetic", () => {
        test("precedence and grouping", () => {
            expect(execute("fn: main() ~ int { return (2 + 3) * 4; }").value).toEqual(
                intValue(20),
            );
            expect(execute("fn: main() ~ int { return 2 + 3 * 4; }").value).toEqual(
                intValue(14),
            );
        });

        test("integers wrap at 64 bits", () => {
            const { value } = execute(`
                fn: main() ~ int {
                    var max: int = 9223372036854775807;
                    return max + 1;
                }
            `);
            expect(value).toEqual({ type: "int", value: -9223372036854775808n });
        });

        test("integer division truncates toward zero", () => {
            expect(execute("fn: main() ~ int { return -7 / 2; }").value).toEqual(
                intValue(-3),
            );
        });

        test("float arithmetic", () => {
            expect(execute("fn: main() ~ float { return 1.5 * 2.0 - 0.5; }").value).toEqual({
                type: "float",
                value: 2.5,
            });
        });

        test("integer division by zero", () => {
            const error = fault(`fn: main() ~ int {
    var zero: int = 0;
    return 10 / zero;
}`);
            expect(error.kind).toBe("DivisionByZero");
            expect(error.rawMessage).toBe("Integer division by zero");
            expect(error.chunk).toBe("root::main");
            expect(error.loc).toMatchObject({ line: 3 });
        });

        test("float division by zero", () => {
            const error = fault("fn: main() ~ float { return 1.0 / 0.0; }");
            expect(error.kind).toBe("DivisionByZero");
            expect(error.rawMessage).toBe("Float division by zero");
        });

        test("string concatenation", () => {
            const { out, text } = collectOutput();
            execute(
                'import std::println; fn: main() { println("pg" + "s"); }',
                "root::main",
                {},
                [],
                createStdRegistry(out),
            );
            expect(text()).toBe("pgs\n");
        });
    });

    describe("functions", () => {
        test("recursion with host-supplied arguments", () => {
            const { value } = execute(
                `fn: fib(n: int) ~ int {
                    if n < 2 { return n; }
                    return fib(n - 1) + fib(n - 2);
                }`,
                "root::fib",
                {},
                [intValue(10)],
            );
            expect(value).toEqual(intValue(55));
        });

        test("aliases, relative and absolute paths reach the same function", () => {
            const source = `
                mod: util {
                    fn: triple(x: int) ~ int { return x * 3; }
                }
                import util::triple = t;
                fn: a() ~ int { return t(7); }
                fn: b() ~ int { return util::triple(7); }
                fn: c() ~ int { return root::util::triple(7); }
            `;
            for (const entry of ["root::a", "root::b", "root::c"]) {
                expect(execute(source, entry).value).toEqual(intValue(21));
            }

            const { chunks } = compileSource(source);
            const code = (name: string) => chunks.get(name)?.code;
            expect(code("root::a")).toEqual([
                { op: "PushConst", index: 0 },
                { op: "Call", target: "root::util::triple", argc: 1 },
                { op: "Return" },
            ]);
            expect(code("root::b")).toEqual(code("root::a"));
            expect(code("root::c")).toEqual(code("root::a"));
        });

        test("else if chains", () => {
            const source = `
                fn: sign(n: int) ~ int {
                    if n < 0 { return -1; } else if n == 0 { return 0; } else { return 1; }
                }
            `;
            const sign = (n: number) => execute(source, "root::sign", {}, [intValue(n)]).value;
            expect(sign(-5)).toEqual(intValue(-1));
            expect(sign(0)).toEqual(intValue(0));
            expect(sign(8)).toEqual(intValue(1));
        });

        test("inner declarations shadow outer ones", () => {
            const { value } = execute(`
                fn: main() ~ int {
                    var x: int = 1;
                    if true { var x: int = 10; x = x + 1; }
                    return x;
                }
            `);
            expect(value).toEqual(intValue(1));
        });

        test("call depth is bounded", () => {
            const error = fault(
                `fn: down(n: int) ~ int { return down(n + 1); }
                 fn: main() ~ int { return down(0); }`,
                { maxFrames: 64 },
            );
            expect(error.kind).toBe("StackOverflow");
            expect(error.rawMessage).toBe("Call depth exceeded 64 frames");
            expect(error.chunk).toBe("root::down");
        });

        test("unknown entry point", () => {
            const error = catchError(RuntimeError, () =>
                execute("fn: main() { }", "root::missing"),
            );
            expect(error.kind).toBe("UndefinedFunction");
            expect(error.loc).toBeUndefined();
        });

        test("entry arity is checked", () => {
            const error = catchError(RuntimeError, () =>
                execute("fn: main(n: int) { }", "root::main"),
            );
            expect(error.kind).toBe("TypeMismatch");
        });
    });

    describe("loops", () => {
        test("while that never runs", () => {
            const { value } = execute(`
                fn: main() ~ int {
                    var count: int = 0;
                    while false { count = count + 1; }
                    return count;
                }
            `);
            expect(value).toEqual(intValue(0));
        });

        test("counted while", () => {
            const { value } = execute(`
                fn: main() ~ int {
                    var i: int = 0;
                    var sum: int = 0;
                    while i < 5 { sum = sum + i; i = i + 1; }
                    return sum;
                }
            `);
            expect(value).toEqual(intValue(10));
        });

        test("for over a range", () => {
            const sum = (n: number) =>
                execute(
                    `fn: main(n: int) ~ int {
                        var sum: int = 0;
                        for i in n { sum = sum + i; }
                        return sum;
                    }`,
                    "root::main",
                    {},
                    [intValue(n)],
                ).value;
            expect(sum(5)).toEqual(intValue(10));
            expect(sum(0)).toEqual(intValue(0));
            expect(sum(-3)).toEqual(intValue(0));
        });

        test("continue in a for loop still advances the counter", () => {
            const { value } = execute(`
                fn: main() ~ int {
                    var sum: int = 0;
                    for i in 6 {
                        if i / 2 * 2 == i { continue; }
                        sum = sum + i;
                    }
                    return sum;
                }
            `);
            expect(value).toEqual(intValue(9));
        });

        test("loop until break", () => {
            const { value } = execute(`
                fn: main() ~ int {
                    var n: int = 0;
                    loop {
                        n = n + 1;
                        if n == 4 { break; }
                    }
                    return n;
                }
            `);
            expect(value).toEqual(intValue(4));
        });

        test("printing from a loop", () => {
            const { out, text } = collectOutput();
            execute(
                "import std::printi; fn: main() { for i in 3 { printi(i); } }",
                "root::main",
                {},
                [],
                createStdRegistry(out),
            );
            expect(text()).toBe("0\n1\n2\n");
        });
    });

    describe("structs", () => {
        test("structs are shared by reference and freed at the end", () => {
            const { value, vm } = execute(`
                cont: Counter { n: int; }
                fn: bump(c: Counter) { c.n = c.n + 1; }
                fn: main() ~ int {
                    var a: Counter = Counter { n: 1 };
                    var b: Counter = a;
                    bump(b);
                    b.n = b.n + 10;
                    return a.n;
                }
            `);
            expect(value).toEqual(intValue(12));
            expect(vm.liveStructs).toBe(0);
        });

        test("nested structs are released together", () => {
            const { vm } = execute(`
                cont: Inner { n: int; }
                cont: Outer { inner: Inner; }
                fn: main() ~ int {
                    var o: Outer = Outer { inner: Inner { n: 3 } };
                    o.inner = Inner { n: 4 };
                    return o.inner.n;
                }
            `);
            expect(vm.liveStructs).toBe(0);
        });

        test("a returned struct stays alive", () => {
            const { value, vm } = execute(`
                cont: P { n: int; }
                fn: main() ~ P { return P { n: 2 }; }
            `);
            if (value.type !== "struct") throw new Error(`expected a struct, got ${value.type}`);
            expect(value.value.get("n")).toEqual(intValue(2));
            expect(vm.liveStructs).toBe(1);
        });

        test("a fault releases the structs the run still held", () => {
            const natives = createStdRegistry();
            const vm = new VirtualMachine(
                compileSource(
                    `cont: P { n: int; }
                     fn: main(d: int) ~ int {
                         var p: P = P { n: 1 };
                         return p.n / d;
                     }`,
                    natives,
                ),
                natives,
            );

            const error = catchError(RuntimeError, () => vm.execute("root::main", [intValue(0)]));
            expect(error.kind).toBe("DivisionByZero");
            expect(vm.liveStructs).toBe(0);

            expect(vm.execute("root::main", [intValue(1)])).toEqual(intValue(1));
            expect(vm.liveStructs).toBe(0);
        });

        test("equality compares identity", () => {
            const { value } = execute(`
                cont: P { n: int; }
                fn: main() ~ int {
                    var a: P = P { n: 1 };
                    var b: P = a;
                    var c: P = P { n: 1 };
                    if a == b { if a != c { return 1; } }
                    return 0;
                }
            `);
            expect(value).toEqual(intValue(1));
        });

        test("methods read and assign fields of self", () => {
            const { value } = execute(`
                cont: Counter { n: int; }
                impl: Counter {
                    fn: add(k: int) ~ int { n = n + k; return n; }
                }
                fn: main() ~ int {
                    var c: Counter = Counter { n: 5 };
                    c.add(2);
                    return c.add(3);
                }
            `);
            expect(value).toEqual(intValue(10));
        });

        test("methods call natives and can be called by path", () => {
            const source = `
                import math::sqrt;
                cont: Vec2 { x: float; y: float; }
                impl: Vec2 {
                    fn: length() ~ float { return sqrt(x * x + y * y); }
                }
                fn: viaMethod() ~ float {
                    var v: Vec2 = Vec2 { x: 3.0, y: 4.0 };
                    return v.length();
                }
                fn: viaPath() ~ float {
                    var v: Vec2 = Vec2 { x: 3.0, y: 4.0 };
                    return root::Vec2::length(v);
                }
            `;
            expect(execute(source, "root::viaMethod").value).toEqual({ type: "float", value: 5 });
            expect(execute(source, "root::viaPath").value).toEqual({ type: "float", value: 5 });
        });
    });

    describe("interruption", () => {
        test("instruction budget", () => {
            const natives = createStdRegistry();
            const vm = new VirtualMachine(
                compileSource("fn: main() { loop { } }", natives),
                natives,
                { maxInstructions: 100 },
            );
            const error = catchError(RuntimeError, () => vm.execute("root::main"));
            expect(error.kind).toBe("Interrupted");
            expect(vm.instructionCount).toBe(100);
        });

        test("step hook can stop execution", () => {
            const onStep = jest.fn((state: StepState) => state.steps < 10);
            const error = fault("fn: main() { loop { } }", { onStep });
            expect(error.kind).toBe("Interrupted");
            expect(onStep).toHaveBeenCalledTimes(11);
            expect(onStep).toHaveBeenNthCalledWith(1, {
                chunk: "root::main",
                ip: 0,
                instruction: { op: "Jump", target: 0 },
                steps: 0,
                stackDepth: 0,
                frameDepth: 1,
            });
        });
    });

    describe("natives", () => {
        const source = "import host::ping; fn: main() ~ int { return ping(1); }";
        const declared = new NativeRegistry().register(
            "host::ping",
            native(() => 1n, {
                params: [{ name: "value", type: "int" }],
                returnType: "int",
            }),
        );

        function callWith(
            impl: (...args: NativeValue[]) => NativeValue,
            params: { name: string; type: "int" | "string" }[],
        ): RuntimeError {
            const runtime = new NativeRegistry().register(
                "host::ping",
                native(impl, { params, returnType: "int" }),
            );
            const vm = new VirtualMachine(compileSource(source, declared), runtime);
            return catchError(RuntimeError, () => vm.execute("root::main"));
        }

        test("arguments reach the host and results come back", () => {
            const impl = jest.fn((value: NativeValue) =>
                typeof value === "bigint" ? value * 2n : 0n,
            );
            const runtime = new NativeRegistry().register(
                "host::ping",
                native(impl, { params: [{ name: "value", type: "int" }], returnType: "int" }),
            );
            const vm = new VirtualMachine(compileSource(source, declared), runtime);
            expect(vm.execute("root::main")).toEqual(intValue(2));
            expect(impl).toHaveBeenCalledWith(1n);
        });

        test("arity mismatch is caught before the call", () => {
            const impl = jest.fn(() => 0n);
            const error = callWith(impl, [
                { name: "a", type: "int" },
                { name: "b", type: "int" },
            ]);
            expect(error.kind).toBe("NativeArityMismatch");
            expect(impl).not.toHaveBeenCalled();
        });

        test("argument kind mismatch is caught before the call", () => {
            const impl = jest.fn(() => 0n);
            const error = callWith(impl, [{ name: "value", type: "string" }]);
            expect(error.kind).toBe("TypeMismatch");
            expect(impl).not.toHaveBeenCalled();
        });

        test("host exceptions become failures", () => {
            const error = callWith(
                () => {
                    throw new Error("boom");
                },
                [{ name: "value", type: "int" }],
            );
            expect(error.kind).toBe("NativeFailure");
            expect(error.rawMessage).toBe("'host::ping' failed: boom");
        });

        test("float to int conversion out of range", () => {
            const error = fault(
                "import math::toInt; fn: main() ~ int { return toInt(1000000000000000000000.0); }",
            );
            expect(error.kind).toBe("NativeFailure");
            expect(error.rawMessage).toBe("'math::toInt' failed: 1e+21 does not fit in a 64-bit int");
        });

        test("results of the wrong kind are rejected", () => {
            const error = callWith(() => "nope", [{ name: "value", type: "int" }]);
            expect(error.kind).toBe("TypeMismatch");
            expect(error.rawMessage).toBe("'host::ping' returned string, declared int");
        });
    });
});
