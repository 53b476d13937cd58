import { FunctionSignature, ValueKind } from "@pgscript/library";

export type PrimitiveKind = "int" | "float" | "string" | "bool" | "unit" | "handle";

export type TypeDescriptor =
    | { kind: PrimitiveKind }
    /** an instance of the container with this fully-qualified name */
    | { kind: "named"; container: string }
    /** an instance of any container; only produced by natives */
    | { kind: "struct" }
    | { kind: "native"; signature: FunctionSignature };

export const PRIMITIVE_TYPES: Record<PrimitiveKind, TypeDescriptor> = {
    int: { kind: "int" },
    float: { kind: "float" },
    string: { kind: "string" },
    bool: { kind: "bool" },
    unit: { kind: "unit" },
    handle: { kind: "handle" },
};

export function isPrimitiveName(name: string): name is PrimitiveKind {
    return Object.hasOwn(PRIMITIVE_TYPES, name);
}

export function named(container: string): TypeDescriptor {
    return { kind: "named", container };
}

export function fromValueKind(kind: ValueKind): TypeDescriptor {
    return kind === "struct" ? { kind: "struct" } : PRIMITIVE_TYPES[kind];
}

export function typeToString(type: TypeDescriptor): string {
    switch (type.kind) {
        case "named":
            return type.container;
        case "native": {
            const params = type.signature.params
                .map((p) => `${p.name}: ${p.type}`)
                .join(", ");
            return `native fn(${params}) ~ ${type.signature.returnType}`;
        }
        default:
            return type.kind;
    }
}

/**
 * Whether a value of type `actual` may be stored where `expected` is declared.
 * No conversions: int never matches float.
 */
export function typesMatch(
    expected: TypeDescriptor,
    actual: TypeDescriptor,
): boolean {
    if (expected.kind === "named" && actual.kind === "named") {
        return expected.container === actual.container;
    }
    // A native's `struct` stands for any container
    if (expected.kind === "struct" || actual.kind === "struct") {
        return (
            (expected.kind === "struct" || expected.kind === "named") &&
            (actual.kind === "struct" || actual.kind === "named")
        );
    }
    if (expected.kind === "native" || actual.kind === "native") {
        return false;
    }
    return expected.kind === actual.kind;
}

export function isNumeric(type: TypeDescriptor): boolean {
    return type.kind === "int" || type.kind === "float";
}
