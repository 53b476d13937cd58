import { NativeHandle } from "./handle";
import { StructInstance } from "./struct";
import { NativeValue, Value, ValueKind } from "./types";

/**
 * Convert a script value to the host representation handed to natives.
 */
export function toNative(value: Value): NativeValue {
    return value.value;
}

/**
 * Convert a host value back to a script value of the given kind.
 * Returns undefined when the host value does not have that kind; no
 * coercion is attempted.
 */
export function fromNative(
    kind: ValueKind,
    raw: NativeValue,
): Value | undefined {
    switch (kind) {
        case "int":
            return typeof raw === "bigint"
                ? { type: "int", value: BigInt.asIntN(64, raw) }
                : undefined;
        case "float":
            return typeof raw === "number"
                ? { type: "float", value: raw }
                : undefined;
        case "string":
            return typeof raw === "string"
                ? { type: "string", value: raw }
                : undefined;
        case "bool":
            return typeof raw === "boolean"
                ? { type: "bool", value: raw }
                : undefined;
        case "unit":
            return raw === null || raw === undefined
                ? { type: "unit", value: null }
                : undefined;
        case "struct":
            return raw instanceof StructInstance
                ? { type: "struct", value: raw }
                : undefined;
        case "handle":
            return raw instanceof NativeHandle
                ? { type: "handle", value: raw }
                : undefined;
    }
}

/**
 * Describe the kind of a host value, for diagnostics.
 */
export function nativeKindOf(raw: NativeValue | undefined): string {
    if (raw === null || raw === undefined) return "unit";
    if (typeof raw === "bigint") return "int";
    if (typeof raw === "number") return "float";
    if (typeof raw === "string") return "string";
    if (typeof raw === "boolean") return "bool";
    if (raw instanceof StructInstance) return "struct";
    return "handle";
}
