import { SourceLocation } from "../parser/types";
import { Expression, Identifier } from "../parser/expressions";
import {
    BlockStatement,
    ForStatement,
    IfStatement,
    Statement,
} from "../parser/statements";
import { ResolvedFunction, ResolvedProgram } from "../resolver/types";
import { CompileError, CompileErrorKind } from "../utils/Error";
import { typeToString } from "../utils/typesystem";
import { BytecodeProgram, Chunk, Constant, constantKey } from "./Chunk";
import { Instruction } from "./Instruction";

interface LoopContext {
    breaks: number[];
    continues: number[];
}

/**
 * Lowers every resolved function into its own chunk.
 */
export class Compiler {
    constructor(private resolved: ResolvedProgram) {}

    public compile(): BytecodeProgram {
        const chunks: Map<string, Chunk> = new Map();
        for (const fn of this.resolved.functions) {
            chunks.set(fn.name, new FunctionCompiler(this.resolved, fn).compile());
        }
        return { chunks, source: this.resolved.source };
    }
}

class FunctionCompiler {
    private code: Instruction[] = [];
    private constants: Constant[] = [];
    private constantIndex: Map<string, number> = new Map();
    private locations: SourceLocation[] = [];
    private loops: LoopContext[] = [];

    constructor(
        private resolved: ResolvedProgram,
        private fn: ResolvedFunction,
    ) {}

    public compile(): Chunk {
        const { decl } = this.fn;
        const fallsThrough = this.block(decl.body);

        if (fallsThrough) {
            if (this.fn.returnType.kind !== "unit") {
                throw this.error(
                    "MissingReturn",
                    `Function '${this.fn.name}' must return '${typeToString(this.fn.returnType)}' on every path`,
                    decl.loc,
                );
            }
            this.pushUnit(decl.body.loc);
            this.emit({ op: "Return" }, decl.body.loc);
        }

        return {
            name: this.fn.name,
            arity: this.fn.params.length,
            slotCount: this.fn.slotCount,
            code: this.code,
            constants: this.constants,
            locations: this.locations,
        };
    }

    private emit(instruction: Instruction, loc: SourceLocation): number {
        this.code.push(instruction);
        this.locations.push(loc);
        return this.code.length - 1;
    }

    private constant(constant: Constant): number {
        const key = constantKey(constant);
        const existing = this.constantIndex.get(key);
        if (existing !== undefined) return existing;
        this.constants.push(constant);
        this.constantIndex.set(key, this.constants.length - 1);
        return this.constants.length - 1;
    }

    private patch(at: number, target: number = this.code.length) {
        const instruction = this.code[at];
        if (instruction.op === "Jump" || instruction.op === "JumpIfFalse") {
            instruction.target = target;
        }
    }

    // Statements; each returns whether control can fall off its end

    private block(block: BlockStatement): boolean {
        let fallsThrough = true;
        let diverged: Statement | undefined;

        for (const statement of block.statements) {
            if (diverged) {
                throw this.error(
                    "UnreachableCode",
                    "Unreachable statement after a loop that never breaks",
                    statement.loc,
                );
            }
            // once a statement cannot fall through, nothing after it can
            const reaches = this.statement(statement);
            fallsThrough = fallsThrough && reaches;
            if (!reaches && statement.kind === "LoopStatement") {
                diverged = statement;
            }
        }
        return fallsThrough;
    }

    private statement(stmt: Statement): boolean {
        switch (stmt.kind) {
            case "VarStatement": {
                const slot = this.lookup(this.resolved.declarations, stmt, stmt.loc);
                this.expression(stmt.value);
                this.emit({ op: "StoreLocal", slot }, stmt.loc);
                this.emit({ op: "Pop" }, stmt.loc);
                return true;
            }
            case "ReturnStatement":
                if (stmt.value) {
                    this.expression(stmt.value);
                } else {
                    this.pushUnit(stmt.loc);
                }
                this.emit({ op: "Return" }, stmt.loc);
                return false;
            case "IfStatement":
                return this.ifStatement(stmt);
            case "WhileStatement": {
                const start = this.code.length;
                this.expression(stmt.condition);
                const exit = this.emit({ op: "JumpIfFalse", target: -1 }, stmt.condition.loc);
                const loop = this.enterLoop();
                this.block(stmt.body);
                this.emit({ op: "Jump", target: start }, stmt.loc);
                this.patch(exit);
                this.exitLoop(loop, start);
                return true;
            }
            case "LoopStatement": {
                const start = this.code.length;
                const loop = this.enterLoop();
                this.block(stmt.body);
                this.emit({ op: "Jump", target: start }, stmt.loc);
                this.exitLoop(loop, start);
                return loop.breaks.length > 0;
            }
            case "ForStatement":
                this.forStatement(stmt);
                return true;
            case "BreakStatement":
            case "ContinueStatement": {
                const loop = this.loops[this.loops.length - 1];
                const keyword = stmt.kind === "BreakStatement" ? "break" : "continue";
                if (!loop) {
                    throw this.error(
                        "InvalidControlFlow",
                        `'${keyword}' outside of a loop`,
                        stmt.loc,
                    );
                }
                const jump = this.emit({ op: "Jump", target: -1 }, stmt.loc);
                (keyword === "break" ? loop.breaks : loop.continues).push(jump);
                return false;
            }
            case "ExpressionStatement":
                this.expression(stmt.expression);
                this.emit({ op: "Pop" }, stmt.loc);
                return true;
            case "BlockStatement":
                return this.block(stmt);
        }
    }

    private ifStatement(stmt: IfStatement): boolean {
        this.expression(stmt.condition);
        const toElse = this.emit({ op: "JumpIfFalse", target: -1 }, stmt.condition.loc);
        const thenFalls = this.block(stmt.thenBranch);

        if (!stmt.elseBranch) {
            this.patch(toElse);
            return true;
        }

        const toEnd = this.emit({ op: "Jump", target: -1 }, stmt.loc);
        this.patch(toElse);
        const elseFalls = this.block(stmt.elseBranch);
        this.patch(toEnd);
        return thenFalls || elseFalls;
    }

    private forStatement(stmt: ForStatement) {
        // limit = n; counter = 0; while counter < limit { i = counter; body; counter = counter + 1 }
        const slots = this.lookup(this.resolved.loops, stmt, stmt.loc);
        const loc = stmt.loc;

        this.expression(stmt.iterable);
        this.emit({ op: "StoreLocal", slot: slots.limit }, loc);
        this.emit({ op: "Pop" }, loc);
        this.emit({ op: "PushConst", index: this.constant({ type: "int", value: 0n }) }, loc);
        this.emit({ op: "StoreLocal", slot: slots.counter }, loc);
        this.emit({ op: "Pop" }, loc);

        const start = this.code.length;
        this.emit({ op: "LoadLocal", slot: slots.counter }, loc);
        this.emit({ op: "LoadLocal", slot: slots.limit }, loc);
        this.emit({ op: "Binary", operator: "<" }, loc);
        const exit = this.emit({ op: "JumpIfFalse", target: -1 }, loc);
        this.emit({ op: "LoadLocal", slot: slots.counter }, loc);
        this.emit({ op: "StoreLocal", slot: slots.variable }, loc);
        this.emit({ op: "Pop" }, loc);

        const loop = this.enterLoop();
        this.block(stmt.body);

        const step = this.code.length;
        this.emit({ op: "LoadLocal", slot: slots.counter }, loc);
        this.emit({ op: "PushConst", index: this.constant({ type: "int", value: 1n }) }, loc);
        this.emit({ op: "Binary", operator: "+" }, loc);
        this.emit({ op: "StoreLocal", slot: slots.counter }, loc);
        this.emit({ op: "Pop" }, loc);
        this.emit({ op: "Jump", target: start }, loc);
        this.patch(exit);
        this.exitLoop(loop, step);
    }

    private enterLoop(): LoopContext {
        const loop: LoopContext = { breaks: [], continues: [] };
        this.loops.push(loop);
        return loop;
    }

    private exitLoop(loop: LoopContext, continueTarget: number) {
        this.loops.pop();
        for (const jump of loop.breaks) this.patch(jump);
        for (const jump of loop.continues) this.patch(jump, continueTarget);
    }

    // Expressions

    private expression(expr: Expression) {
        const { loc } = expr;
        switch (expr.type) {
            case "IntLiteral":
                this.emit({ op: "PushConst", index: this.constant({ type: "int", value: expr.value }) }, loc);
                return;
            case "FloatLiteral":
                this.emit({ op: "PushConst", index: this.constant({ type: "float", value: expr.value }) }, loc);
                return;
            case "StringLiteral":
                this.emit({ op: "PushConst", index: this.constant({ type: "string", value: expr.value }) }, loc);
                return;
            case "BoolLiteral":
                this.emit({ op: "PushConst", index: this.constant({ type: "bool", value: expr.value }) }, loc);
                return;
            case "Identifier":
                this.load(expr);
                return;
            case "BinaryExpression":
                this.expression(expr.left);
                this.expression(expr.right);
                this.emit({ op: "Binary", operator: expr.operator }, loc);
                return;
            case "UnaryExpression":
                this.expression(expr.operand);
                this.emit({ op: "Unary", operator: expr.operator }, loc);
                return;
            case "CallExpression": {
                const target = this.lookup(this.resolved.calls, expr, loc);
                for (const arg of expr.arguments) this.expression(arg);
                const argc = expr.arguments.length;
                this.emit(
                    target.kind === "native"
                        ? { op: "CallNative", name: target.name, argc }
                        : { op: "Call", target: target.name, argc },
                    loc,
                );
                return;
            }
            case "MethodCallExpression": {
                const target = this.lookup(this.resolved.calls, expr, loc);
                this.expression(expr.receiver);
                for (const arg of expr.arguments) this.expression(arg);
                this.emit({ op: "Call", target: target.name, argc: expr.arguments.length + 1 }, loc);
                return;
            }
            case "MemberExpression": {
                const index = this.lookup(this.resolved.fields, expr, loc);
                this.expression(expr.object);
                this.emit({ op: "LoadField", index, name: expr.property }, loc);
                return;
            }
            case "AssignmentExpression": {
                const { target } = expr;
                if (target.type === "MemberExpression") {
                    const index = this.lookup(this.resolved.fields, target, target.loc);
                    this.expression(target.object);
                    this.expression(expr.value);
                    this.emit({ op: "StoreField", index, name: target.property }, loc);
                    return;
                }
                const binding = this.lookup(this.resolved.bindings, target, target.loc);
                if (binding.kind === "local") {
                    this.expression(expr.value);
                    this.emit({ op: "StoreLocal", slot: binding.slot }, loc);
                } else {
                    this.emit({ op: "LoadLocal", slot: 0 }, loc);
                    this.expression(expr.value);
                    this.emit({ op: "StoreField", index: binding.index, name: target.path[0] }, loc);
                }
                return;
            }
            case "StructLiteral": {
                const construction = this.lookup(this.resolved.structs, expr, loc);
                for (const value of construction.values) this.expression(value);
                const layout = this.constant({ type: "layout", value: construction.layout });
                this.emit({ op: "NewStruct", index: layout, count: construction.values.length }, loc);
                return;
            }
        }
    }

    private load(expr: Identifier) {
        const binding = this.lookup(this.resolved.bindings, expr, expr.loc);
        if (binding.kind === "local") {
            this.emit({ op: "LoadLocal", slot: binding.slot }, expr.loc);
            return;
        }
        this.emit({ op: "LoadLocal", slot: 0 }, expr.loc);
        this.emit({ op: "LoadField", index: binding.index, name: expr.path[0] }, expr.loc);
    }

    private pushUnit(loc: SourceLocation) {
        this.emit({ op: "PushConst", index: this.constant({ type: "unit", value: null }) }, loc);
    }

    /**
     * Read a resolver annotation. A miss means the program never went
     * through the resolver, which is a bug in the caller.
     */
    private lookup<K, V>(table: Map<K, V>, key: K, loc: SourceLocation): V {
        const value = table.get(key);
        if (value === undefined) {
            throw new Error(
                `Unresolved node at line ${loc.line}:${loc.col} in '${this.fn.name}'`,
            );
        }
        return value;
    }

    private error(
        kind: CompileErrorKind,
        message: string,
        loc: SourceLocation,
    ): CompileError {
        return new CompileError(kind, message, loc, this.resolved.source);
    }
}

export function compile(resolved: ResolvedProgram): BytecodeProgram {
    return new Compiler(resolved).compile();
}
