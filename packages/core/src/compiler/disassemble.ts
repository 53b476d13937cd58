import { unify } from "@pgscript/library";
import { BytecodeProgram, Chunk, Constant } from "./Chunk";
import { Instruction } from "./Instruction";

function describeConstant(constant: Constant): string {
    switch (constant.type) {
        case "layout":
            return `layout ${constant.value.name} { ${constant.value.fields.join(", ")} }`;
        case "string":
            return `string ${JSON.stringify(constant.value)}`;
        default:
            return `${constant.type} ${unify(constant)}`;
    }
}

function describeInstruction(instruction: Instruction, chunk: Chunk): string {
    switch (instruction.op) {
        case "PushConst":
        case "NewStruct": {
            const constant = chunk.constants[instruction.index];
            const operand =
                instruction.op === "NewStruct"
                    ? `${instruction.index} ${instruction.count}`
                    : `${instruction.index}`;
            return `${instruction.op} ${operand} (${constant ? describeConstant(constant) : "?"})`;
        }
        case "LoadLocal":
        case "StoreLocal":
            return `${instruction.op} ${instruction.slot}`;
        case "LoadField":
        case "StoreField":
            return `${instruction.op} ${instruction.index} (.${instruction.name})`;
        case "Binary":
        case "Unary":
            return `${instruction.op} ${instruction.operator}`;
        case "Jump":
        case "JumpIfFalse":
            return `${instruction.op} -> ${String(instruction.target).padStart(4, "0")}`;
        case "Call":
            return `Call ${instruction.target} ${instruction.argc}`;
        case "CallNative":
            return `CallNative ${instruction.name} ${instruction.argc}`;
        default:
            return instruction.op;
    }
}

export function disassembleChunk(chunk: Chunk): string {
    const lines = [
        `== ${chunk.name} (arity ${chunk.arity}, slots ${chunk.slotCount}) ==`,
    ];
    chunk.code.forEach((instruction, ip) => {
        const line = chunk.locations[ip]?.line ?? 0;
        lines.push(
            `${String(ip).padStart(4, "0")}  ${String(line).padStart(4, " ")}  ${describeInstruction(instruction, chunk)}`,
        );
    });
    return lines.join("\n");
}

export function disassemble(program: BytecodeProgram): string {
    return [...program.chunks.values()].map(disassembleChunk).join("\n\n");
}
