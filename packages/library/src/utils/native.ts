import { FunctionSignature, NativeFunction, NativeValue } from "../types";

/**
 * Define a native function with signature
 * @param fn Implementation, receives arguments already converted to host values
 * @param signature Declared arity, argument kinds and return kind
 */
export function native(
    fn: (...args: NativeValue[]) => NativeValue,
    signature: FunctionSignature,
): NativeFunction {
    return Object.assign(fn, { signature });
}
