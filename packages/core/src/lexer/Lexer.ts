import { Token } from "./Token";
import { TokenType } from "./TokenType";
import { LexError, LexErrorKind } from "../utils/Error";

const KEYWORDS: Record<string, TokenType> = {
    mod: TokenType.Mod,
    fn: TokenType.Fn,
    cont: TokenType.Cont,
    impl: TokenType.Impl,
    import: TokenType.Import,
    var: TokenType.Var,
    return: TokenType.Return,
    if: TokenType.If,
    else: TokenType.Else,
    while: TokenType.While,
    loop: TokenType.Loop,
    for: TokenType.For,
    in: TokenType.In,
    break: TokenType.Break,
    continue: TokenType.Continue,
    true: TokenType.True,
    false: TokenType.False,
};

const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
    "==": TokenType.Equal,
    "!=": TokenType.NotEqual,
    "<=": TokenType.LessEqual,
    ">=": TokenType.GreaterEqual,
    "::": TokenType.DoubleColon,
};

const ONE_CHAR_OPERATORS: Record<string, TokenType> = {
    "=": TokenType.Equals,
    ":": TokenType.Colon,
    "~": TokenType.Tilde,
    "+": TokenType.PlusOp,
    "-": TokenType.MinusOp,
    "*": TokenType.MultiplyOp,
    "/": TokenType.DivideOp,
    "!": TokenType.Bang,
    "<": TokenType.Less,
    ">": TokenType.Greater,
    "{": TokenType.LBrace,
    "}": TokenType.RBrace,
    "(": TokenType.LParen,
    ")": TokenType.RParen,
    ",": TokenType.Comma,
    ";": TokenType.Semicolon,
    ".": TokenType.Dot,
};

const ESCAPES: Record<string, string> = {
    n: "\n",
    t: "\t",
    r: "\r",
    "0": "\0",
    "\\": "\\",
    '"': '"',
};

const INT64_MAX = (1n << 63n) - 1n;

export class Lexer {
    private input: string;
    private position: number = 0;
    private line: number = 1;
    private col: number = 1;

    constructor(input: string) {
        this.input = input;
    }

    public tokenize(): Token[] {
        const tokens: Token[] = [];

        while (this.position < this.input.length) {
            const char = this.currentChar();

            if (this.isWhitespace(char)) {
                this.advance();
                continue;
            }

            if (char === "/" && this.peekChar() === "/") {
                this.skipComment();
                continue;
            }

            if (char === "/" && this.peekChar() === "*") {
                this.skipBlockComment();
                continue;
            }

            if (char === '"') {
                tokens.push(this.readString());
                continue;
            }

            if (this.isAlpha(char)) {
                tokens.push(this.readIdentifier());
                continue;
            }

            if (this.isDigit(char)) {
                tokens.push(this.readNumber());
                continue;
            }

            const pair = char + this.peekChar();
            const twoChar = TWO_CHAR_OPERATORS[pair];
            if (twoChar) {
                tokens.push(this.createToken(twoChar, pair));
                this.advance();
                this.advance();
                continue;
            }

            const oneChar = ONE_CHAR_OPERATORS[char];
            if (oneChar) {
                tokens.push(this.createToken(oneChar, char));
                this.advance();
                continue;
            }

            throw this.error(
                "IllegalCharacter",
                `Unexpected character '${char}'`,
            );
        }

        tokens.push(this.createToken(TokenType.EOF, ""));
        return tokens;
    }

    private createToken(type: TokenType, value: string): Token {
        return {
            type,
            value,
            line: this.line,
            col: this.col,
            offset: this.position,
            length: value.length,
        };
    }

    private advance() {
        if (this.currentChar() === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
    }

    private currentChar(): string {
        return this.input[this.position];
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    private isWhitespace(char: string): boolean {
        return /\s/.test(char);
    }

    private isAlpha(char: string): boolean {
        return /[a-zA-Z_]/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /[a-zA-Z0-9_]/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    private readNumber(): Token {
        const startLine = this.line;
        const startCol = this.col;
        const startOffset = this.position;
        let value = "";
        let isFloat = false;

        while (
            this.position < this.input.length &&
            this.isDigit(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        if (this.currentChar() === ".") {
            if (!this.isDigit(this.peekChar())) {
                throw this.error(
                    "MalformedNumber",
                    `Malformed number '${value}.': expected digits after the decimal point`,
                    startLine,
                    startCol,
                );
            }
            isFloat = true;
            value += ".";
            this.advance(); // consume dot

            while (
                this.position < this.input.length &&
                this.isDigit(this.currentChar())
            ) {
                value += this.currentChar();
                this.advance();
            }

            if (this.currentChar() === "." && this.isDigit(this.peekChar())) {
                throw this.error(
                    "MalformedNumber",
                    `Malformed number '${value}.': more than one decimal point`,
                    startLine,
                    startCol,
                );
            }
        }

        if (this.position < this.input.length && this.isAlpha(this.currentChar())) {
            throw this.error(
                "MalformedNumber",
                `Malformed number '${value}${this.currentChar()}'`,
                startLine,
                startCol,
            );
        }

        if (!isFloat && BigInt(value) > INT64_MAX) {
            throw this.error(
                "MalformedNumber",
                `Integer literal '${value}' does not fit in 64 bits`,
                startLine,
                startCol,
            );
        }

        return {
            type: isFloat ? TokenType.FloatLiteral : TokenType.IntLiteral,
            value,
            line: startLine,
            col: startCol,
            offset: startOffset,
            length: this.position - startOffset,
        };
    }

    private readString(): Token {
        const startLine = this.line;
        const startCol = this.col;
        const startOffset = this.position;
        this.advance(); // skip quote

        let value = "";
        while (
            this.position < this.input.length &&
            this.currentChar() !== '"'
        ) {
            if (this.currentChar() === "\\") {
                const escaped = ESCAPES[this.peekChar()];
                if (escaped === undefined) {
                    throw this.error(
                        "InvalidEscape",
                        `Invalid escape sequence '\\${this.peekChar()}'`,
                    );
                }
                value += escaped;
                this.advance();
                this.advance();
                continue;
            }
            value += this.currentChar();
            this.advance();
        }

        if (this.position >= this.input.length) {
            throw this.error(
                "UnterminatedString",
                "Unterminated string",
                startLine,
                startCol,
            );
        }
        this.advance(); // skip close quote

        return {
            type: TokenType.StringLiteral,
            value,
            line: startLine,
            col: startCol,
            offset: startOffset,
            length: this.position - startOffset,
        };
    }

    private readIdentifier(): Token {
        const startLine = this.line;
        const startCol = this.col;
        const startOffset = this.position;
        let value = "";

        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        const type = Object.hasOwn(KEYWORDS, value)
            ? KEYWORDS[value]
            : TokenType.Identifier;
        return {
            type,
            value,
            line: startLine,
            col: startCol,
            offset: startOffset,
            length: value.length,
        };
    }

    private skipComment() {
        while (
            this.position < this.input.length &&
            this.currentChar() !== "\n"
        ) {
            this.advance();
        }
    }

    private skipBlockComment() {
        const startLine = this.line;
        const startCol = this.col;
        this.advance();
        this.advance();

        while (this.position < this.input.length) {
            if (this.currentChar() === "*" && this.peekChar() === "/") {
                this.advance();
                this.advance();
                return;
            }
            this.advance();
        }

        throw this.error(
            "UnterminatedComment",
            "Unterminated block comment",
            startLine,
            startCol,
        );
    }

    private error(
        kind: LexErrorKind,
        message: string,
        line: number = this.line,
        col: number = this.col,
    ): LexError {
        return new LexError(kind, message, { line, col }, this.input);
    }
}

export function tokenize(source: string): Token[] {
    return new Lexer(source).tokenize();
}
