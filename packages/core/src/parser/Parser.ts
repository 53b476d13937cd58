import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { tokenize } from "../lexer/Lexer";
import { Program, SourceLocation, TypeAnnotation } from "./types";
import {
    Declaration,
    ModuleDeclaration,
    ContainerDeclaration,
    FieldDeclaration,
    ImplDeclaration,
    FunctionDeclaration,
    ImportDeclaration,
    Parameter,
} from "./declarations";
import {
    Expression,
    Identifier,
    BinaryOperator,
    CallExpression,
    FieldInitializer,
} from "./expressions";
import {
    Statement,
    BlockStatement,
    VarStatement,
    ReturnStatement,
    IfStatement,
    WhileStatement,
    LoopStatement,
    ForStatement,
} from "./statements";
import { ParseError, ParseErrorKind } from "../utils/Error";

const BINARY_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
    [TokenType.PlusOp]: "+",
    [TokenType.MinusOp]: "-",
    [TokenType.MultiplyOp]: "*",
    [TokenType.DivideOp]: "/",
    [TokenType.Equal]: "==",
    [TokenType.NotEqual]: "!=",
    [TokenType.Less]: "<",
    [TokenType.LessEqual]: "<=",
    [TokenType.Greater]: ">",
    [TokenType.GreaterEqual]: ">=",
};

const CLOSING_DELIMITERS = [TokenType.RBrace, TokenType.RParen];

export class Parser {
    private tokens: Token[];
    private source?: string;
    private current: number = 0;
    // Cleared while parsing `if`/`while`/`for` headers, where `x {` opens the body
    private allowStructLiterals: boolean = true;

    constructor(tokens: Token[], source?: string) {
        this.tokens = tokens;
        this.source = source;
    }

    public parse(): Program {
        const items: Declaration[] = [];
        while (!this.isAtEnd()) {
            items.push(this.declaration());
        }
        return { items };
    }

    private getLoc(token: Token): SourceLocation {
        const len = token.length || token.value.length || 1;
        return {
            line: token.line,
            col: token.col,
            offset: token.offset,
            len,
            endLine: token.line,
            endCol: token.col + len,
        };
    }

    private mergeLoc(start: SourceLocation, end: SourceLocation): SourceLocation {
        const len =
            start.line === end.endLine ? end.endCol - start.col : start.len;

        return {
            line: start.line,
            col: start.col,
            offset: start.offset,
            len,
            endLine: end.endLine,
            endCol: end.endCol,
        };
    }

    // Items

    private declaration(): Declaration {
        if (this.match(TokenType.Mod)) return this.moduleDeclaration();
        if (this.match(TokenType.Cont)) return this.containerDeclaration();
        if (this.match(TokenType.Impl)) return this.implDeclaration();
        if (this.match(TokenType.Fn)) return this.functionDeclaration();
        if (this.match(TokenType.Import)) return this.importDeclaration();

        const kind: ParseErrorKind = this.check(...CLOSING_DELIMITERS)
            ? "UnbalancedDelimiter"
            : "UnexpectedToken";
        throw this.error(
            kind,
            this.peek(),
            "an item (mod, cont, impl, fn or import)",
        );
    }

    private moduleDeclaration(): ModuleDeclaration {
        const keyword = this.previous();
        this.consume(TokenType.Colon, "':' after 'mod'");
        const name = this.consume(TokenType.Identifier, "module name").value;
        this.consume(TokenType.LBrace, "'{' before module body");

        const items: Declaration[] = [];
        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            items.push(this.declaration());
        }
        const end = this.consume(TokenType.RBrace, "'}' after module body");

        return {
            kind: "ModuleDeclaration",
            name,
            items,
            loc: this.mergeLoc(this.getLoc(keyword), this.getLoc(end)),
        };
    }

    private containerDeclaration(): ContainerDeclaration {
        const keyword = this.previous();
        this.consume(TokenType.Colon, "':' after 'cont'");
        const name = this.consume(TokenType.Identifier, "container name").value;
        this.consume(TokenType.LBrace, "'{' before container fields");

        const fields: FieldDeclaration[] = [];
        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            const fieldToken = this.consume(TokenType.Identifier, "field name");
            this.consume(TokenType.Colon, "':' after field name");
            const type = this.typeAnnotation();
            const end = this.consume(TokenType.Semicolon, "';' after field");
            fields.push({
                name: fieldToken.value,
                type,
                loc: this.mergeLoc(this.getLoc(fieldToken), this.getLoc(end)),
            });
        }
        const end = this.consume(TokenType.RBrace, "'}' after container fields");

        return {
            kind: "ContainerDeclaration",
            name,
            fields,
            loc: this.mergeLoc(this.getLoc(keyword), this.getLoc(end)),
        };
    }

    private implDeclaration(): ImplDeclaration {
        const keyword = this.previous();
        this.consume(TokenType.Colon, "':' after 'impl'");
        const target = this.typeAnnotation();
        this.consume(TokenType.LBrace, "'{' before impl body");

        const methods: FunctionDeclaration[] = [];
        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            this.consume(TokenType.Fn, "'fn' inside impl block");
            methods.push(this.functionDeclaration());
        }
        const end = this.consume(TokenType.RBrace, "'}' after impl body");

        return {
            kind: "ImplDeclaration",
            target,
            methods,
            loc: this.mergeLoc(this.getLoc(keyword), this.getLoc(end)),
        };
    }

    private functionDeclaration(): FunctionDeclaration {
        // fn: name(a: int, b: int) ~ int { ... }
        const keyword = this.previous();
        this.consume(TokenType.Colon, "':' after 'fn'");
        const name = this.consume(TokenType.Identifier, "function name").value;

        this.consume(TokenType.LParen, "'(' after function name");
        const params: Parameter[] = [];
        if (!this.check(TokenType.RParen)) {
            do {
                const paramToken = this.consume(
                    TokenType.Identifier,
                    "parameter name",
                );
                this.consume(TokenType.Colon, "':' after parameter name");
                const type = this.typeAnnotation();
                params.push({
                    name: paramToken.value,
                    type,
                    loc: this.mergeLoc(this.getLoc(paramToken), type.loc),
                });
            } while (this.match(TokenType.Comma));
        }
        this.consume(TokenType.RParen, "')' after parameters");

        let returnType: TypeAnnotation | undefined;
        if (this.match(TokenType.Tilde)) {
            returnType = this.typeAnnotation();
        }

        const body = this.blockStatement();

        return {
            kind: "FunctionDeclaration",
            name,
            params,
            returnType,
            body,
            loc: this.mergeLoc(this.getLoc(keyword), body.loc),
        };
    }

    private importDeclaration(): ImportDeclaration {
        const keyword = this.previous();
        const path = [this.consume(TokenType.Identifier, "import path").value];
        while (this.match(TokenType.DoubleColon)) {
            path.push(
                this.consume(TokenType.Identifier, "path segment after '::'")
                    .value,
            );
        }

        let alias = path[path.length - 1];
        if (this.match(TokenType.Equals)) {
            alias = this.consume(TokenType.Identifier, "import alias").value;
        }
        const end = this.consume(TokenType.Semicolon, "';' after import");

        return {
            kind: "ImportDeclaration",
            path,
            alias,
            loc: this.mergeLoc(this.getLoc(keyword), this.getLoc(end)),
        };
    }

    private typeAnnotation(): TypeAnnotation {
        const first = this.consume(TokenType.Identifier, "type name");
        const path = [first.value];
        let last = first;
        while (this.match(TokenType.DoubleColon)) {
            last = this.consume(TokenType.Identifier, "type name after '::'");
            path.push(last.value);
        }
        return {
            path,
            loc: this.mergeLoc(this.getLoc(first), this.getLoc(last)),
        };
    }

    // Statements

    private statement(): Statement {
        if (this.match(TokenType.Var)) return this.varStatement();
        if (this.match(TokenType.Return)) return this.returnStatement();
        if (this.match(TokenType.If)) return this.ifStatement();
        if (this.match(TokenType.While)) return this.whileStatement();
        if (this.match(TokenType.Loop)) return this.loopStatement();
        if (this.match(TokenType.For)) return this.forStatement();

        if (this.match(TokenType.Break, TokenType.Continue)) {
            const keyword = this.previous();
            const end = this.consume(
                TokenType.Semicolon,
                `';' after '${keyword.value}'`,
            );
            const loc = this.mergeLoc(this.getLoc(keyword), this.getLoc(end));
            return keyword.type === TokenType.Break
                ? { kind: "BreakStatement", loc }
                : { kind: "ContinueStatement", loc };
        }

        if (this.check(TokenType.LBrace)) {
            return this.blockStatement();
        }

        const expression = this.expression();
        const end = this.consume(TokenType.Semicolon, "';' after expression");
        return {
            kind: "ExpressionStatement",
            expression,
            loc: this.mergeLoc(expression.loc, this.getLoc(end)),
        };
    }

    private blockStatement(): BlockStatement {
        const startToken = this.consume(TokenType.LBrace, "'{'");
        const statements: Statement[] = [];

        const outer = this.allowStructLiterals;
        this.allowStructLiterals = true;
        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            statements.push(this.statement());
        }
        this.allowStructLiterals = outer;

        const endToken = this.consume(TokenType.RBrace, "'}' to close block");

        return {
            kind: "BlockStatement",
            statements,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private varStatement(): VarStatement {
        // var total: int = 0;
        const keyword = this.previous();
        const name = this.consume(TokenType.Identifier, "variable name").value;
        this.consume(TokenType.Colon, "':' after variable name");
        const varType = this.typeAnnotation();
        this.consume(TokenType.Equals, "'=' in variable declaration");
        const value = this.expression();
        const end = this.consume(TokenType.Semicolon, "';' after declaration");

        return new VarStatement(
            name,
            varType,
            value,
            this.mergeLoc(this.getLoc(keyword), this.getLoc(end)),
        );
    }

    private returnStatement(): ReturnStatement {
        const keyword = this.previous();
        let value: Expression | undefined;

        if (!this.check(TokenType.Semicolon)) {
            value = this.expression();
        }
        const end = this.consume(TokenType.Semicolon, "';' after return");

        return {
            kind: "ReturnStatement",
            value,
            loc: this.mergeLoc(this.getLoc(keyword), this.getLoc(end)),
        };
    }

    private ifStatement(): IfStatement {
        const keyword = this.previous();
        const condition = this.headerExpression();
        const thenBranch = this.blockStatement();

        let elseBranch: BlockStatement | undefined;
        if (this.match(TokenType.Else)) {
            if (this.match(TokenType.If)) {
                const nested = this.ifStatement();
                elseBranch = {
                    kind: "BlockStatement",
                    statements: [nested],
                    loc: nested.loc,
                };
            } else {
                elseBranch = this.blockStatement();
            }
        }

        return new IfStatement(
            condition,
            thenBranch,
            elseBranch,
            this.mergeLoc(
                this.getLoc(keyword),
                (elseBranch ?? thenBranch).loc,
            ),
        );
    }

    private whileStatement(): WhileStatement {
        const keyword = this.previous();
        const condition = this.headerExpression();
        const body = this.blockStatement();
        return new WhileStatement(
            condition,
            body,
            this.mergeLoc(this.getLoc(keyword), body.loc),
        );
    }

    private loopStatement(): LoopStatement {
        const keyword = this.previous();
        const body = this.blockStatement();
        return new LoopStatement(
            body,
            this.mergeLoc(this.getLoc(keyword), body.loc),
        );
    }

    private forStatement(): ForStatement {
        const keyword = this.previous();
        const variable = this.consume(
            TokenType.Identifier,
            "loop variable after 'for'",
        ).value;
        this.consume(TokenType.In, "'in' after loop variable");
        const iterable = this.headerExpression();
        const body = this.blockStatement();
        return new ForStatement(
            variable,
            iterable,
            body,
            this.mergeLoc(this.getLoc(keyword), body.loc),
        );
    }

    private headerExpression(): Expression {
        const outer = this.allowStructLiterals;
        this.allowStructLiterals = false;
        const expr = this.expression();
        this.allowStructLiterals = outer;
        return expr;
    }

    // Expressions

    private expression(): Expression {
        return this.assignment();
    }

    private assignment(): Expression {
        const target = this.equality();

        if (this.match(TokenType.Equals)) {
            const equals = this.previous();
            const value = this.assignment();

            if (
                target.type !== "Identifier" &&
                target.type !== "MemberExpression"
            ) {
                throw this.error(
                    "UnexpectedToken",
                    equals,
                    "a variable or field on the left of '='",
                );
            }

            return {
                type: "AssignmentExpression",
                target,
                value,
                loc: this.mergeLoc(target.loc, value.loc),
            };
        }

        return target;
    }

    private equality(): Expression {
        return this.binary(
            () => this.comparison(),
            TokenType.Equal,
            TokenType.NotEqual,
        );
    }

    private comparison(): Expression {
        return this.binary(
            () => this.term(),
            TokenType.Less,
            TokenType.LessEqual,
            TokenType.Greater,
            TokenType.GreaterEqual,
        );
    }

    private term(): Expression {
        return this.binary(
            () => this.factor(),
            TokenType.PlusOp,
            TokenType.MinusOp,
        );
    }

    private factor(): Expression {
        return this.binary(
            () => this.unary(),
            TokenType.MultiplyOp,
            TokenType.DivideOp,
        );
    }

    private binary(
        operand: () => Expression,
        ...operators: TokenType[]
    ): Expression {
        let left = operand();

        while (this.match(...operators)) {
            const operator = BINARY_OPERATORS[this.previous().type];
            if (!operator) {
                throw this.error("UnexpectedToken", this.previous(), "operator");
            }
            const right = operand();
            left = {
                type: "BinaryExpression",
                operator,
                left,
                right,
                loc: this.mergeLoc(left.loc, right.loc),
            };
        }

        return left;
    }

    private unary(): Expression {
        if (this.match(TokenType.MinusOp, TokenType.Bang)) {
            const operatorToken = this.previous();
            const operand = this.unary();
            return {
                type: "UnaryExpression",
                operator: operatorToken.type === TokenType.Bang ? "!" : "-",
                operand,
                loc: this.mergeLoc(this.getLoc(operatorToken), operand.loc),
            };
        }
        return this.postfix();
    }

    private postfix(): Expression {
        let expr = this.primary();

        while (this.match(TokenType.Dot)) {
            const nameToken = this.consume(
                TokenType.Identifier,
                "field or method name after '.'",
            );

            if (this.match(TokenType.LParen)) {
                const { args, end } = this.finishArguments();
                expr = {
                    type: "MethodCallExpression",
                    receiver: expr,
                    method: nameToken.value,
                    arguments: args,
                    loc: this.mergeLoc(expr.loc, this.getLoc(end)),
                };
                continue;
            }

            expr = {
                type: "MemberExpression",
                object: expr,
                property: nameToken.value,
                loc: this.mergeLoc(expr.loc, this.getLoc(nameToken)),
            };
        }

        return expr;
    }

    private primary(): Expression {
        if (this.match(TokenType.IntLiteral)) {
            const token = this.previous();
            return {
                type: "IntLiteral",
                value: BigInt(token.value),
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.FloatLiteral)) {
            const token = this.previous();
            return {
                type: "FloatLiteral",
                value: parseFloat(token.value),
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.True, TokenType.False)) {
            const token = this.previous();
            return {
                type: "BoolLiteral",
                value: token.type === TokenType.True,
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.StringLiteral)) {
            const token = this.previous();
            return {
                type: "StringLiteral",
                value: token.value,
                loc: this.getLoc(token),
            };
        }
        if (this.check(TokenType.Identifier)) {
            const path = this.path();
            if (this.match(TokenType.LParen)) {
                return this.finishCall(path);
            }
            if (this.allowStructLiterals && this.check(TokenType.LBrace)) {
                return this.structLiteral(path);
            }
            return path;
        }
        if (this.match(TokenType.LParen)) {
            const start = this.previous();
            const outer = this.allowStructLiterals;
            this.allowStructLiterals = true;
            const expr = this.expression();
            this.allowStructLiterals = outer;
            const end = this.consume(TokenType.RParen, "')' after expression");
            return {
                ...expr,
                loc: this.mergeLoc(this.getLoc(start), this.getLoc(end)),
            };
        }

        const kind: ParseErrorKind = this.check(...CLOSING_DELIMITERS)
            ? "UnbalancedDelimiter"
            : "UnexpectedToken";
        throw this.error(kind, this.peek(), "expression");
    }

    private path(): Identifier {
        const first = this.consume(TokenType.Identifier, "identifier");
        const path = [first.value];
        let last = first;
        while (this.match(TokenType.DoubleColon)) {
            last = this.consume(TokenType.Identifier, "identifier after '::'");
            path.push(last.value);
        }
        return {
            type: "Identifier",
            path,
            loc: this.mergeLoc(this.getLoc(first), this.getLoc(last)),
        };
    }

    private finishCall(callee: Identifier): CallExpression {
        const { args, end } = this.finishArguments();
        return {
            type: "CallExpression",
            callee,
            arguments: args,
            loc: this.mergeLoc(callee.loc, this.getLoc(end)),
        };
    }

    private finishArguments(): { args: Expression[]; end: Token } {
        const outer = this.allowStructLiterals;
        this.allowStructLiterals = true;
        const args: Expression[] = [];
        if (!this.check(TokenType.RParen)) {
            do {
                args.push(this.expression());
            } while (this.match(TokenType.Comma));
        }
        this.allowStructLiterals = outer;
        const end = this.consume(TokenType.RParen, "')' after arguments");
        return { args, end };
    }

    private structLiteral(name: Identifier): Expression {
        // Vec2 { x: 1.0, y: 2.0 }
        this.consume(TokenType.LBrace, "'{' after struct name");
        const fields: FieldInitializer[] = [];
        if (!this.check(TokenType.RBrace)) {
            do {
                if (this.check(TokenType.RBrace)) break; // trailing comma
                const fieldToken = this.consume(TokenType.Identifier, "field name");
                this.consume(TokenType.Colon, "':' after field name");
                const value = this.expression();
                fields.push({
                    name: fieldToken.value,
                    value,
                    loc: this.mergeLoc(this.getLoc(fieldToken), value.loc),
                });
            } while (this.match(TokenType.Comma));
        }
        const end = this.consume(TokenType.RBrace, "'}' after struct fields");

        return {
            type: "StructLiteral",
            name,
            fields,
            loc: this.mergeLoc(name.loc, this.getLoc(end)),
        };
    }

    // Token helpers

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private consume(type: TokenType, expected: string): Token {
        if (this.check(type)) return this.advance();

        let kind: ParseErrorKind = "UnexpectedToken";
        if (type === TokenType.Semicolon) {
            kind = "MissingTerminator";
        } else if (
            CLOSING_DELIMITERS.includes(type) ||
            this.check(...CLOSING_DELIMITERS) ||
            this.isAtEnd()
        ) {
            kind = "UnbalancedDelimiter";
        }
        throw this.error(kind, this.peek(), expected);
    }

    private check(...types: TokenType[]): boolean {
        if (this.isAtEnd()) return false;
        return types.includes(this.peek().type);
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    private describe(token: Token): string {
        return token.type === TokenType.EOF
            ? "end of input"
            : `'${token.value}'`;
    }

    private error(
        kind: ParseErrorKind,
        token: Token,
        expected: string,
    ): ParseError {
        const found = this.describe(token);
        return new ParseError(
            kind,
            `Expected ${expected}, found ${found}`,
            expected,
            found,
            this.getLoc(token),
            this.source,
        );
    }
}

export function parse(tokens: Token[], source?: string): Program {
    return new Parser(tokens, source).parse();
}

export function parseSource(source: string): Program {
    return parse(tokenize(source), source);
}
