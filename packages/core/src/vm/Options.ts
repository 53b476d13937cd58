import { Instruction } from "../compiler/Instruction";

export interface StepState {
    /** Function being executed */
    chunk: string;
    ip: number;
    instruction: Instruction;
    /** Instructions executed so far, this one excluded */
    steps: number;
    stackDepth: number;
    frameDepth: number;
}

export interface VmOptions {
    maxStackSize?: number;
    maxFrames?: number;
    /** Abort with `Interrupted` once this many instructions have run */
    maxInstructions?: number;
    /** Called before every instruction; returning `false` aborts with `Interrupted` */
    onStep?: (state: StepState) => boolean | void;
}

export const DEFAULT_VM_OPTIONS = {
    maxStackSize: 65536,
    maxFrames: 1024,
    maxInstructions: Infinity,
} satisfies VmOptions;
