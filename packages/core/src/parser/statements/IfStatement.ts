import { BaseStatement } from "./BaseStatement";
import { BlockStatement } from "./BlockStatement";
import { Expression } from "../expressions";
import { SourceLocation } from "../types";

export class IfStatement implements BaseStatement {
    kind: "IfStatement" = "IfStatement";

    constructor(
        public condition: Expression,
        public thenBranch: BlockStatement,
        /** `else if` arrives here as a block wrapping the nested if */
        public elseBranch: BlockStatement | undefined,
        public loc: SourceLocation,
    ) {}
}
