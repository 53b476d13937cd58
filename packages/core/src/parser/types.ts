import { Declaration } from "./declarations";
import { Statement } from "./statements";
import { Expression } from "./expressions";

export type ASTNode = Declaration | Statement | Expression;

export interface Program {
    items: Declaration[];
}

export interface SourceLocation {
    line: number;
    col: number;
    offset: number;
    len?: number;
    endLine: number;
    endCol: number;
}

/**
 * A written type: `int`, `Vec2`, `geo::Vec2`
 */
export interface TypeAnnotation {
    path: string[];
    loc: SourceLocation;
}
