import {
    NativeRegistry,
    NativeValue,
    UNIT,
    Value,
    fromNative,
    nativeKindOf,
    toNative,
} from "@pgscript/library";
import { BytecodeProgram, Chunk, Constant } from "../compiler/Chunk";
import { Instruction } from "../compiler/Instruction";
import { BinaryOperator, UnaryOperator } from "../parser/expressions";
import { RuntimeError, RuntimeErrorKind } from "../utils/Error";
import { Frame } from "./Frame";
import { Heap } from "./Heap";
import { DEFAULT_VM_OPTIONS, VmOptions } from "./Options";

/**
 * Stack machine running compiled chunks. One instance owns its stacks;
 * the program it runs is shared and never modified.
 */
export class VirtualMachine {
    private stack: Value[] = [];
    private frames: Frame[] = [];
    private heap = new Heap();
    private steps: number = 0;
    private options: Required<Omit<VmOptions, "onStep">> & Pick<VmOptions, "onStep">;

    constructor(
        private program: BytecodeProgram,
        private natives: NativeRegistry,
        options: VmOptions = {},
    ) {
        this.options = { ...DEFAULT_VM_OPTIONS, ...options };
    }

    public get liveStructs(): number {
        return this.heap.liveStructs;
    }

    /** Instructions executed by the last `execute` */
    public get instructionCount(): number {
        return this.steps;
    }

    public execute(entry: string, args: Value[] = []): Value {
        this.stack = [];
        this.frames = [];
        this.steps = 0;

        const chunk = this.program.chunks.get(entry);
        if (!chunk) {
            throw this.fault("UndefinedFunction", `No function named '${entry}'`);
        }
        if (args.length !== chunk.arity) {
            throw this.fault(
                "TypeMismatch",
                `'${entry}' expects ${chunk.arity} argument(s), got ${args.length}`,
            );
        }
        try {
            for (const arg of args) {
                this.push(arg);
                this.heap.retain(arg);
            }
            this.enter(chunk);
            return this.run();
        } catch (e) {
            this.unwind();
            throw e;
        }
    }

    /** Drop every value a faulted run left on the stack */
    private unwind() {
        for (const value of this.stack.splice(0)) {
            this.heap.release(value);
        }
        this.frames = [];
    }

    private run(): Value {
        for (;;) {
            const frame = this.currentFrame();
            const ip = frame.ip;
            const instruction = frame.chunk.code[ip];
            if (!instruction) {
                throw new Error(`'${frame.chunk.name}' ran past its last instruction`);
            }
            frame.ip++;
            this.beforeStep(frame.chunk, ip, instruction);

            switch (instruction.op) {
                case "PushConst":
                    this.push(this.constant(frame.chunk, instruction.index));
                    break;
                case "Pop":
                    this.heap.release(this.pop());
                    break;
                case "Dup": {
                    const top = this.peek();
                    this.heap.retain(top);
                    this.push(top);
                    break;
                }
                case "LoadLocal": {
                    const value = this.stack[frame.base + instruction.slot];
                    this.heap.retain(value);
                    this.push(value);
                    break;
                }
                case "StoreLocal": {
                    const value = this.peek();
                    const index = frame.base + instruction.slot;
                    this.heap.retain(value);
                    this.heap.release(this.stack[index]);
                    this.stack[index] = value;
                    break;
                }
                case "LoadField": {
                    const target = this.pop();
                    if (target.type !== "struct") {
                        throw this.fault(
                            "TypeMismatch",
                            `Cannot read field '${instruction.name}' of ${target.type}`,
                        );
                    }
                    const value = target.value.fields[instruction.index];
                    if (value === undefined) {
                        this.heap.release(target);
                        throw this.fault(
                            "UndefinedField",
                            `'${target.value.layout.name}' has no field '${instruction.name}'`,
                        );
                    }
                    this.heap.retain(value);
                    this.heap.release(target);
                    this.push(value);
                    break;
                }
                case "StoreField": {
                    const value = this.pop();
                    const target = this.pop();
                    if (target.type !== "struct") {
                        this.heap.release(value);
                        throw this.fault(
                            "TypeMismatch",
                            `Cannot assign field '${instruction.name}' of ${target.type}`,
                        );
                    }
                    const { fields, layout } = target.value;
                    const old = fields[instruction.index];
                    if (old === undefined) {
                        this.heap.release(value);
                        this.heap.release(target);
                        throw this.fault(
                            "UndefinedField",
                            `'${layout.name}' has no field '${instruction.name}'`,
                        );
                    }
                    this.heap.retain(value);
                    fields[instruction.index] = value;
                    this.heap.release(old);
                    this.heap.release(target);
                    this.push(value);
                    break;
                }
                case "NewStruct": {
                    const constant = frame.chunk.constants[instruction.index];
                    if (constant?.type !== "layout") {
                        throw new Error(`Constant ${instruction.index} is not a struct layout`);
                    }
                    const fields = this.stack.splice(this.stack.length - instruction.count);
                    const instance = this.heap.allocate(constant.value, fields);
                    this.push({ type: "struct", value: instance });
                    break;
                }
                case "Binary": {
                    const right = this.pop();
                    const left = this.pop();
                    let result: Value;
                    try {
                        result = this.binary(instruction.operator, left, right);
                    } finally {
                        this.heap.release(left);
                        this.heap.release(right);
                    }
                    this.push(result);
                    break;
                }
                case "Unary":
                    this.push(this.unary(instruction.operator, this.pop()));
                    break;
                case "Jump":
                    frame.ip = instruction.target;
                    break;
                case "JumpIfFalse": {
                    const condition = this.pop();
                    if (condition.type !== "bool") {
                        throw this.fault("TypeMismatch", `Condition must be bool, got ${condition.type}`);
                    }
                    if (!condition.value) frame.ip = instruction.target;
                    break;
                }
                case "Call":
                    this.call(instruction.target, instruction.argc);
                    break;
                case "CallNative":
                    this.callNative(instruction.name, instruction.argc);
                    break;
                case "Return": {
                    const result = this.pop();
                    for (const value of this.stack.splice(frame.base)) {
                        this.heap.release(value);
                    }
                    this.frames.pop();
                    if (this.frames.length === 0) return result;
                    this.push(result);
                    break;
                }
            }
        }
    }

    private beforeStep(chunk: Chunk, ip: number, instruction: Instruction) {
        const { onStep, maxInstructions } = this.options;
        if (this.steps >= maxInstructions) {
            throw this.fault("Interrupted", `Instruction budget of ${maxInstructions} exhausted`);
        }
        if (onStep) {
            const proceed = onStep({
                chunk: chunk.name,
                ip,
                instruction,
                steps: this.steps,
                stackDepth: this.stack.length,
                frameDepth: this.frames.length,
            });
            if (proceed === false) {
                throw this.fault("Interrupted", "Execution interrupted by host");
            }
        }
        this.steps++;
    }

    private enter(chunk: Chunk) {
        if (this.frames.length >= this.options.maxFrames) {
            throw this.fault(
                "StackOverflow",
                `Call depth exceeded ${this.options.maxFrames} frames`,
            );
        }
        const base = this.stack.length - chunk.arity;
        this.frames.push({ chunk, ip: 0, base, stackHeight: base });
        for (let slot = chunk.arity; slot < chunk.slotCount; slot++) {
            this.push(UNIT);
        }
    }

    private call(target: string, argc: number) {
        const chunk = this.program.chunks.get(target);
        if (!chunk) {
            throw this.fault("UndefinedFunction", `No function named '${target}'`);
        }
        if (chunk.arity !== argc) {
            throw this.fault(
                "TypeMismatch",
                `'${target}' expects ${chunk.arity} argument(s), got ${argc}`,
            );
        }
        this.enter(chunk);
    }

    private callNative(name: string, argc: number) {
        const fn = this.natives.get(name);
        if (!fn) {
            throw this.fault("UndefinedFunction", `No native function named '${name}'`);
        }
        const { params, returnType } = fn.signature;
        if (params.length !== argc) {
            throw this.fault(
                "NativeArityMismatch",
                `'${name}' takes ${params.length} argument(s), got ${argc}`,
            );
        }

        const args = this.stack.slice(this.stack.length - argc);
        args.forEach((arg, index) => {
            if (arg.type !== params[index].type) {
                throw this.fault(
                    "TypeMismatch",
                    `Argument '${params[index].name}' of '${name}' must be ${params[index].type}, got ${arg.type}`,
                );
            }
        });

        let raw: NativeValue;
        try {
            raw = fn(...args.map(toNative));
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw this.fault("NativeFailure", `'${name}' failed: ${reason}`);
        }

        const result = fromNative(returnType, raw);
        if (!result) {
            throw this.fault(
                "TypeMismatch",
                `'${name}' returned ${nativeKindOf(raw)}, declared ${returnType}`,
            );
        }

        this.heap.retain(result);
        for (const arg of this.stack.splice(this.stack.length - argc)) {
            this.heap.release(arg);
        }
        this.push(result);
    }

    private binary(operator: BinaryOperator, left: Value, right: Value): Value {
        if (operator === "==" || operator === "!=") {
            if (left.type !== right.type) {
                throw this.fault("TypeMismatch", `Cannot compare ${left.type} with ${right.type}`);
            }
            const equal = left.value === right.value;
            return { type: "bool", value: operator === "==" ? equal : !equal };
        }

        if (left.type === "int" && right.type === "int") {
            const a = left.value;
            const b = right.value;
            switch (operator) {
                case "+":
                    return { type: "int", value: BigInt.asIntN(64, a + b) };
                case "-":
                    return { type: "int", value: BigInt.asIntN(64, a - b) };
                case "*":
                    return { type: "int", value: BigInt.asIntN(64, a * b) };
                case "/":
                    if (b === 0n) throw this.fault("DivisionByZero", "Integer division by zero");
                    return { type: "int", value: BigInt.asIntN(64, a / b) };
                default:
                    return { type: "bool", value: compare(operator, a, b) };
            }
        }

        if (left.type === "float" && right.type === "float") {
            const a = left.value;
            const b = right.value;
            switch (operator) {
                case "+":
                    return { type: "float", value: a + b };
                case "-":
                    return { type: "float", value: a - b };
                case "*":
                    return { type: "float", value: a * b };
                case "/":
                    if (b === 0) throw this.fault("DivisionByZero", "Float division by zero");
                    return { type: "float", value: a / b };
                default:
                    return { type: "bool", value: compare(operator, a, b) };
            }
        }

        if (operator === "+" && left.type === "string" && right.type === "string") {
            return { type: "string", value: left.value + right.value };
        }

        throw this.fault(
            "TypeMismatch",
            `Operator '${operator}' cannot be applied to ${left.type} and ${right.type}`,
        );
    }

    private unary(operator: UnaryOperator, operand: Value): Value {
        if (operator === "-" && operand.type === "int") {
            return { type: "int", value: BigInt.asIntN(64, -operand.value) };
        }
        if (operator === "-" && operand.type === "float") {
            return { type: "float", value: -operand.value };
        }
        if (operator === "!" && operand.type === "bool") {
            return { type: "bool", value: !operand.value };
        }
        throw this.fault(
            "TypeMismatch",
            `Operator '${operator}' cannot be applied to ${operand.type}`,
        );
    }

    private constant(chunk: Chunk, index: number): Value {
        const constant: Constant | undefined = chunk.constants[index];
        if (!constant || constant.type === "layout") {
            throw new Error(`Constant ${index} of '${chunk.name}' is not a value`);
        }
        return constant;
    }

    private push(value: Value) {
        if (this.stack.length >= this.options.maxStackSize) {
            throw this.fault(
                "StackOverflow",
                `Operand stack exceeded ${this.options.maxStackSize} values`,
            );
        }
        this.stack.push(value);
    }

    private pop(): Value {
        const value = this.stack.pop();
        if (!value) throw new Error("Operand stack underflow");
        return value;
    }

    private peek(): Value {
        const value = this.stack[this.stack.length - 1];
        if (!value) throw new Error("Operand stack is empty");
        return value;
    }

    private currentFrame(): Frame {
        const frame = this.frames[this.frames.length - 1];
        if (!frame) throw new Error("No active frame");
        return frame;
    }

    private fault(kind: RuntimeErrorKind, message: string): RuntimeError {
        const frame = this.frames[this.frames.length - 1];
        if (!frame) return new RuntimeError(kind, message, undefined, this.program.source);
        // ip has already moved past the faulting instruction
        const ip = Math.max(0, frame.ip - 1);
        return new RuntimeError(
            kind,
            message,
            frame.chunk.locations[ip],
            this.program.source,
            frame.chunk.name,
        );
    }
}

function compare(
    operator: BinaryOperator,
    a: bigint | number,
    b: bigint | number,
): boolean {
    switch (operator) {
        case "<":
            return a < b;
        case "<=":
            return a <= b;
        case ">":
            return a > b;
        case ">=":
            return a >= b;
        default:
            throw new Error(`'${operator}' is not a comparison`);
    }
}
