import { native } from "../utils/native";
import { expectFloat, expectInt } from "../utils/args";

const INT64_LIMIT = 2 ** 63;

function toInt64(x: number): bigint {
    if (!Number.isFinite(x) || x < -INT64_LIMIT || x >= INT64_LIMIT) {
        throw new RangeError(`${x} does not fit in a 64-bit int`);
    }
    return BigInt(x);
}

export const math = {
    /**
     * Square root
     * @param x non-negative number
     */
    sqrt: native((x) => Math.sqrt(expectFloat(x)), {
        params: [{ name: "x", type: "float" }],
        returnType: "float",
        description: "Square root of a float",
    }),

    abs: native((x) => Math.abs(expectFloat(x)), {
        params: [{ name: "x", type: "float" }],
        returnType: "float",
        description: "Absolute value of a float",
    }),

    pow: native((base, exponent) => expectFloat(base) ** expectFloat(exponent), {
        params: [
            { name: "base", type: "float" },
            { name: "exponent", type: "float" },
        ],
        returnType: "float",
        description: "Raise base to the given power",
    }),

    /**
     * Round down to the nearest integer
     * @param x finite number
     */
    floor: native((x) => toInt64(Math.floor(expectFloat(x))), {
        params: [{ name: "x", type: "float" }],
        returnType: "int",
        description: "Largest integer less than or equal to x",
    }),

    toFloat: native((x) => Number(expectInt(x)), {
        params: [{ name: "x", type: "int" }],
        returnType: "float",
        description: "Convert an integer to a float",
    }),

    /**
     * Convert a float to an integer, truncating toward zero
     * @param x finite number
     */
    toInt: native((x) => toInt64(Math.trunc(expectFloat(x))), {
        params: [{ name: "x", type: "float" }],
        returnType: "int",
        description: "Convert a float to an integer, truncating toward zero",
    }),
};
