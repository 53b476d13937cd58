import { SourceLocation, TypeAnnotation } from "../types";
import { BlockStatement } from "../statements";

export interface ModuleDeclaration {
    kind: "ModuleDeclaration";
    name: string;
    items: Declaration[];
    loc: SourceLocation;
}

export interface FieldDeclaration {
    name: string;
    type: TypeAnnotation;
    loc: SourceLocation;
}

export interface ContainerDeclaration {
    kind: "ContainerDeclaration";
    name: string;
    fields: FieldDeclaration[];
    loc: SourceLocation;
}

export interface Parameter {
    name: string;
    type: TypeAnnotation;
    loc: SourceLocation;
}

export interface FunctionDeclaration {
    kind: "FunctionDeclaration";
    name: string;
    params: Parameter[];
    /** Absent means `unit` */
    returnType?: TypeAnnotation;
    body: BlockStatement;
    loc: SourceLocation;
}

/**
 * `impl: Vec2 { fn: ... }` binds methods to a container
 */
export interface ImplDeclaration {
    kind: "ImplDeclaration";
    target: TypeAnnotation;
    methods: FunctionDeclaration[];
    loc: SourceLocation;
}

/**
 * `import geo::Vec2 = V;`. The alias defaults to the last path segment
 */
export interface ImportDeclaration {
    kind: "ImportDeclaration";
    path: string[];
    alias: string;
    loc: SourceLocation;
}

export type Declaration =
    | ModuleDeclaration
    | ContainerDeclaration
    | ImplDeclaration
    | FunctionDeclaration
    | ImportDeclaration;
