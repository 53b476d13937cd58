import { createStd, OutputStream } from "./packages/std";
import { math } from "./packages/math";
import { str } from "./packages/str";
import { NativeRegistry } from "./registry";
import { NativeFunction } from "./types";

export * from "./types";
export * from "./struct";
export * from "./handle";
export * from "./convert";
export * from "./registry";
export { native } from "./utils/native";
export { unify } from "./utils/unify";
export { expectInt, expectFloat, expectString } from "./utils/args";
export { createStd } from "./packages/std";
export type { OutputStream } from "./packages/std";

export const packages: Record<string, Record<string, NativeFunction>> = {
    std: createStd(),
    math,
    str,
};

/**
 * Build a registry holding every standard native
 * @param out destination of the `std::print*` functions
 */
export function createStdRegistry(out?: OutputStream): NativeRegistry {
    return new NativeRegistry()
        .registerPackage("std", out ? createStd(out) : packages.std)
        .registerPackage("math", math)
        .registerPackage("str", str);
}
