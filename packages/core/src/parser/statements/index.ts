import { VarStatement } from "./VarStatement";
import { ReturnStatement } from "./ReturnStatement";
import { IfStatement } from "./IfStatement";
import {
    WhileStatement,
    LoopStatement,
    ForStatement,
    BreakStatement,
    ContinueStatement,
} from "./LoopStatements";
import { ExpressionStatement } from "./ExpressionStatement";
import { BlockStatement } from "./BlockStatement";

export * from "./BaseStatement";
export * from "./VarStatement";
export * from "./ReturnStatement";
export * from "./IfStatement";
export * from "./LoopStatements";
export * from "./ExpressionStatement";
export * from "./BlockStatement";

export type Statement =
    | VarStatement
    | ReturnStatement
    | IfStatement
    | WhileStatement
    | LoopStatement
    | ForStatement
    | BreakStatement
    | ContinueStatement
    | ExpressionStatement
    | BlockStatement;
