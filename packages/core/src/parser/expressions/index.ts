import { SourceLocation } from "../types";

export type Expression =
    | IntLiteral
    | FloatLiteral
    | StringLiteral
    | BoolLiteral
    | Identifier
    | BinaryExpression
    | UnaryExpression
    | CallExpression
    | MemberExpression
    | MethodCallExpression
    | AssignmentExpression
    | StructLiteral;

export interface IntLiteral {
    type: "IntLiteral";
    value: bigint;
    loc: SourceLocation;
}

export interface FloatLiteral {
    type: "FloatLiteral";
    value: number;
    loc: SourceLocation;
}

export interface StringLiteral {
    type: "StringLiteral";
    value: string;
    loc: SourceLocation;
}

export interface BoolLiteral {
    type: "BoolLiteral";
    value: boolean;
    loc: SourceLocation;
}

/**
 * A (possibly qualified) name: `x`, `geo::origin`
 */
export interface Identifier {
    type: "Identifier";
    path: string[];
    loc: SourceLocation;
}

export type BinaryOperator =
    | "+"
    | "-"
    | "*"
    | "/"
    | "=="
    | "!="
    | "<"
    | "<="
    | ">"
    | ">=";

export type UnaryOperator = "-" | "!";

export interface BinaryExpression {
    type: "BinaryExpression";
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
    loc: SourceLocation;
}

export interface UnaryExpression {
    type: "UnaryExpression";
    operator: UnaryOperator;
    operand: Expression;
    loc: SourceLocation;
}

export interface CallExpression {
    type: "CallExpression";
    callee: Identifier;
    arguments: Expression[];
    loc: SourceLocation;
}

/**
 * Field access `object.property`
 */
export interface MemberExpression {
    type: "MemberExpression";
    object: Expression;
    property: string;
    loc: SourceLocation;
}

export interface MethodCallExpression {
    type: "MethodCallExpression";
    receiver: Expression;
    method: string;
    arguments: Expression[];
    loc: SourceLocation;
}

export interface AssignmentExpression {
    type: "AssignmentExpression";
    target: Identifier | MemberExpression;
    value: Expression;
    loc: SourceLocation;
}

export interface FieldInitializer {
    name: string;
    value: Expression;
    loc: SourceLocation;
}

export interface StructLiteral {
    type: "StructLiteral";
    name: Identifier;
    fields: FieldInitializer[];
    loc: SourceLocation;
}
