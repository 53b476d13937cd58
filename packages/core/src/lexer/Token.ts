import { TokenType } from "./TokenType";

export interface Token {
    type: TokenType;
    /** Source text, or the decoded contents for string literals */
    value: string;
    line: number;
    col: number;
    offset: number;
    /** Length of the token in the source */
    length: number;
}
