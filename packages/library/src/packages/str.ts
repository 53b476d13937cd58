import { native } from "../utils/native";
import { expectFloat, expectInt, expectString } from "../utils/args";

export const str = {
    len: native((s) => BigInt(expectString(s).length), {
        params: [{ name: "s", type: "string" }],
        returnType: "int",
        description: "Length of a string in UTF-16 code units",
    }),

    /**
     * Single character at the given index, or an empty string when out of range
     */
    charAt: native(
        (s, index) => {
            const i = Number(expectInt(index));
            return expectString(s).charAt(i);
        },
        {
            params: [
                { name: "s", type: "string" },
                { name: "index", type: "int" },
            ],
            returnType: "string",
            description: "Character at index",
        },
    ),

    fromInt: native((x) => expectInt(x).toString(), {
        params: [{ name: "x", type: "int" }],
        returnType: "string",
        description: "Decimal representation of an integer",
    }),

    fromFloat: native((x) => String(expectFloat(x)), {
        params: [{ name: "x", type: "float" }],
        returnType: "string",
        description: "Decimal representation of a float",
    }),
};
