import type { StructInstance } from "./struct";
import type { NativeHandle } from "./handle";

export type ValueKind =
    | "int"
    | "float"
    | "string"
    | "bool"
    | "unit"
    | "struct"
    | "handle";

export type Value =
    | { type: "int"; value: bigint }
    | { type: "float"; value: number }
    | { type: "string"; value: string }
    | { type: "bool"; value: boolean }
    | { type: "unit"; value: null }
    | { type: "struct"; value: StructInstance }
    | { type: "handle"; value: NativeHandle };

/**
 * The host-side representation of a value, as seen by a native function.
 */
export type NativeValue =
    | bigint
    | number
    | string
    | boolean
    | null
    | StructInstance
    | NativeHandle;

export interface NativeParam {
    name: string;
    type: ValueKind;
    description?: string;
}

export interface FunctionSignature {
    params: NativeParam[];
    returnType: ValueKind;
    description?: string;
}

export type NativeFunction = ((...args: NativeValue[]) => NativeValue) & {
    signature: FunctionSignature;
};

export const UNIT: Value = { type: "unit", value: null };

export function intValue(value: bigint | number): Value {
    return { type: "int", value: BigInt.asIntN(64, BigInt(value)) };
}

