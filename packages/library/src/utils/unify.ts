import { Value } from "../types";

/**
 * This function unifies the value to a display string
 * @param val
 */
export function unify(val: Value): string {
    switch (val.type) {
        case "string":
            return val.value;
        case "int":
            return val.value.toString();
        case "float":
            return Number.isInteger(val.value)
                ? val.value.toFixed(1)
                : String(val.value);
        case "bool":
            return val.value ? "true" : "false";
        case "unit":
            return "()";
        case "handle":
            return `<handle ${val.value.tag}>`;
        case "struct": {
            const instance = val.value;
            const shortName = instance.layout.name.split("::").pop();
            const fields = instance.layout.fields
                .map((name, i) => `${name}: ${unify(instance.fields[i])}`)
                .join(", ");
            return `${shortName} { ${fields} }`;
        }
    }
}
