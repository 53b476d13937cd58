import { BaseStatement } from "./BaseStatement";
import { BlockStatement } from "./BlockStatement";
import { Expression } from "../expressions";
import { SourceLocation } from "../types";

export class WhileStatement implements BaseStatement {
    kind: "WhileStatement" = "WhileStatement";

    constructor(
        public condition: Expression,
        public body: BlockStatement,
        public loc: SourceLocation,
    ) {}
}

export class LoopStatement implements BaseStatement {
    kind: "LoopStatement" = "LoopStatement";

    constructor(
        public body: BlockStatement,
        public loc: SourceLocation,
    ) {}
}

/**
 * `for i in n { ... }` counts `i` from 0 up to n - 1
 */
export class ForStatement implements BaseStatement {
    kind: "ForStatement" = "ForStatement";

    constructor(
        public variable: string,
        public iterable: Expression,
        public body: BlockStatement,
        public loc: SourceLocation,
    ) {}
}

export interface BreakStatement {
    kind: "BreakStatement";
    loc: SourceLocation;
}

export interface ContinueStatement {
    kind: "ContinueStatement";
    loc: SourceLocation;
}
