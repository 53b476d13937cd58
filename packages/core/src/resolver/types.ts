import { FunctionSignature, StructLayout } from "@pgscript/library";
import { Program } from "../parser/types";
import {
    CallExpression,
    Expression,
    Identifier,
    MemberExpression,
    MethodCallExpression,
    StructLiteral,
} from "../parser/expressions";
import { FunctionDeclaration } from "../parser/declarations";
import { ForStatement, VarStatement } from "../parser/statements";
import { TypeDescriptor } from "../utils/typesystem";
import { ContainerSymbol, ModuleNode } from "./ModuleTree";

export type Binding =
    | { kind: "local"; slot: number }
    /** bare field name inside a method, read through `self` in slot 0 */
    | { kind: "selfField"; index: number };

export type CallTarget =
    | { kind: "function"; name: string }
    | { kind: "native"; name: string; signature: FunctionSignature };

export interface ForLoopSlots {
    variable: number;
    counter: number;
    limit: number;
}

export interface StructConstruction {
    layout: StructLayout;
    /** initializers in layout order */
    values: Expression[];
}

export interface ResolvedFunction {
    name: string;
    decl: FunctionDeclaration;
    container?: string;
    params: { name: string; type: TypeDescriptor }[];
    returnType: TypeDescriptor;
    slotCount: number;
}

export interface ResolvedProgram {
    program: Program;
    root: ModuleNode;
    functions: ResolvedFunction[];
    containers: ContainerSymbol[];
    layouts: Map<string, StructLayout>;
    types: Map<Expression, TypeDescriptor>;
    bindings: Map<Identifier, Binding>;
    declarations: Map<VarStatement, number>;
    loops: Map<ForStatement, ForLoopSlots>;
    calls: Map<CallExpression | MethodCallExpression, CallTarget>;
    fields: Map<MemberExpression, number>;
    structs: Map<StructLiteral, StructConstruction>;
    source?: string;
}
