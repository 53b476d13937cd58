import { nativeKindOf } from "../convert";
import { NativeValue } from "../types";

// The virtual machine checks argument kinds before calling a native; these
// narrow the host value for the implementation.

export function expectInt(value: NativeValue): bigint {
    if (typeof value !== "bigint") throw kindError("int", value);
    return value;
}

export function expectFloat(value: NativeValue): number {
    if (typeof value !== "number") throw kindError("float", value);
    return value;
}

export function expectString(value: NativeValue): string {
    if (typeof value !== "string") throw kindError("string", value);
    return value;
}

function kindError(expected: string, value: NativeValue): TypeError {
    return new TypeError(
        `Expected ${expected} argument, got ${nativeKindOf(value)}`,
    );
}
