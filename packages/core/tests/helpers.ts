import { NativeRegistry, OutputStream, createStdRegistry } from "@pgscript/library";
import { parseSource } from "../src/parser/Parser";
import { resolve } from "../src/resolver/Resolver";
import { ResolvedProgram } from "../src/resolver/types";
import { Compiler } from "../src/compiler/Compiler";
import { BytecodeProgram } from "../src/compiler/Chunk";
import { PgsError } from "../src/utils/Error";

export function resolveSource(
    source: string,
    natives: NativeRegistry = createStdRegistry(),
): ResolvedProgram {
    return resolve(parseSource(source), { natives, source });
}

export function compileSource(
    source: string,
    natives: NativeRegistry = createStdRegistry(),
): BytecodeProgram {
    return new Compiler(resolveSource(source, natives)).compile();
}

/**
 * Run `fn` and return the error it throws, failing if it does not throw
 * one of the given class.
 */
export function catchError<E extends PgsError>(
    errorClass: new (...args: never[]) => E,
    fn: () => unknown,
): E {
    try {
        fn();
    } catch (e) {
        if (e instanceof errorClass) return e;
        throw e;
    }
    throw new Error(`Expected ${errorClass.name} to be thrown`);
}

export function collectOutput(): { out: OutputStream; text: () => string } {
    const chunks: string[] = [];
    return {
        out: { write: (chunk: string) => chunks.push(chunk) },
        text: () => chunks.join(""),
    };
}
