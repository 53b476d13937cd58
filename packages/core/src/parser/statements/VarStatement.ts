import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { SourceLocation, TypeAnnotation } from "../types";

export class VarStatement implements BaseStatement {
    kind: "VarStatement" = "VarStatement";
    constructor(
        public name: string,
        public varType: TypeAnnotation,
        public value: Expression,
        public loc: SourceLocation,
    ) {}
}
