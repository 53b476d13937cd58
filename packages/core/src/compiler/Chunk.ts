import { StructLayout } from "@pgscript/library";
import { SourceLocation } from "../parser/types";
import { Instruction } from "./Instruction";

export type Constant =
    | { type: "int"; value: bigint }
    | { type: "float"; value: number }
    | { type: "string"; value: string }
    | { type: "bool"; value: boolean }
    | { type: "unit"; value: null }
    | { type: "layout"; value: StructLayout };

/**
 * A compiled function body. Immutable once the compiler hands it out.
 */
export interface Chunk {
    /** Fully-qualified function name */
    name: string;
    arity: number;
    slotCount: number;
    code: Instruction[];
    constants: Constant[];
    /** `locations[i]` is where instruction `i` came from */
    locations: SourceLocation[];
}

export interface BytecodeProgram {
    chunks: Map<string, Chunk>;
    source?: string;
}

export function constantKey(constant: Constant): string {
    switch (constant.type) {
        case "float":
            return Object.is(constant.value, -0)
                ? "float:-0"
                : `float:${constant.value}`;
        case "layout":
            return `layout:${constant.value.name}`;
        case "unit":
            return "unit";
        default:
            return `${constant.type}:${String(constant.value)}`;
    }
}
