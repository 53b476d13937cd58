import { NativeRegistry, Value } from "@pgscript/library";
import { Lexer } from "./lexer/Lexer";
import { Parser } from "./parser/Parser";
import { Resolver } from "./resolver/Resolver";
import { Compiler } from "./compiler/Compiler";
import { BytecodeProgram } from "./compiler/Chunk";
import { VirtualMachine } from "./vm/VirtualMachine";
import { VmOptions } from "./vm/Options";
import { ROOT_MODULE } from "./resolver/ModuleTree";
import { PgsError, isPgsError } from "./utils/Error";
import { Result, err, ok } from "./utils/Result";

export { Lexer, tokenize } from "./lexer/Lexer";
export { TokenType } from "./lexer/TokenType";
export type { Token } from "./lexer/Token";
export { Parser, parse, parseSource } from "./parser/Parser";
export * from "./parser/types";
export * from "./parser/statements";
export * from "./parser/expressions";
export * from "./parser/declarations";
export { Resolver, resolve } from "./resolver/Resolver";
export type { ResolverOptions } from "./resolver/Resolver";
export * from "./resolver/types";
export { ModuleNode, ROOT_MODULE } from "./resolver/ModuleTree";
export { Compiler } from "./compiler/Compiler";
export * from "./compiler/Chunk";
export * from "./compiler/Instruction";
export { disassemble, disassembleChunk } from "./compiler/disassemble";
export { VirtualMachine } from "./vm/VirtualMachine";
export * from "./vm/Options";
export type { Frame } from "./vm/Frame";
export * from "./utils/Error";
export * from "./utils/Result";
export * from "./utils/typesystem";

export type CompiledProgram = BytecodeProgram;

export interface CompileOptions {
    /** Natives the script may call; only their signatures are consulted */
    natives?: NativeRegistry;
}

/**
 * Run every stage up to bytecode. Pipeline errors come back as values;
 * anything else is a bug and is rethrown.
 */
export function compile(
    source: string,
    options: CompileOptions = {},
): Result<CompiledProgram, PgsError> {
    try {
        const tokens = new Lexer(source).tokenize();
        const ast = new Parser(tokens, source).parse();
        const resolved = new Resolver({
            natives: options.natives,
            source,
        }).resolve(ast);
        return ok(new Compiler(resolved).compile());
    } catch (e) {
        if (isPgsError(e)) return err(e);
        throw e;
    }
}

/**
 * Qualify a bare entry name (`main`) against the root module.
 */
export function qualifyEntry(entry: string): string {
    return entry.includes("::") ? entry : `${ROOT_MODULE}::${entry}`;
}

export function run(
    program: CompiledProgram,
    entry: string,
    natives: NativeRegistry,
    options?: VmOptions,
    args: Value[] = [],
): Result<Value, PgsError> {
    try {
        const vm = new VirtualMachine(program, natives, options);
        return ok(vm.execute(qualifyEntry(entry), args));
    } catch (e) {
        if (isPgsError(e)) return err(e);
        throw e;
    }
}
