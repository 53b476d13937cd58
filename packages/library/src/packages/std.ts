import { native } from "../utils/native";
import { expectFloat, expectInt, expectString } from "../utils/args";
import { NativeFunction } from "../types";

export interface OutputStream {
    write(chunk: string): unknown;
}

/**
 * Console output natives, writing to the given stream
 * @param out destination, defaults to stdout
 */
export function createStd(
    out: OutputStream = process.stdout,
): Record<string, NativeFunction> {
    return {
        /**
         * Write message to the output, without a newline
         * @param message contents
         */
        print: native(
            (message) => {
                out.write(expectString(message));
                return null;
            },
            {
                params: [{ name: "message", type: "string" }],
                returnType: "unit",
                description: "Write a string without a trailing newline",
            },
        ),

        /**
         * Write message to the output
         * @param message contents
         */
        println: native(
            (message) => {
                out.write(expectString(message) + "\n");
                return null;
            },
            {
                params: [{ name: "message", type: "string" }],
                returnType: "unit",
                description: "Write a string followed by a newline",
            },
        ),

        printi: native(
            (value) => {
                out.write(expectInt(value).toString() + "\n");
                return null;
            },
            {
                params: [{ name: "value", type: "int" }],
                returnType: "unit",
                description: "Write an integer followed by a newline",
            },
        ),

        printf: native(
            (value) => {
                out.write(String(expectFloat(value)) + "\n");
                return null;
            },
            {
                params: [{ name: "value", type: "float" }],
                returnType: "unit",
                description: "Write a float followed by a newline",
            },
        ),
    };
}
