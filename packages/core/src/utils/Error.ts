import chalk from "chalk";

export interface ErrorLocation {
    line: number;
    col: number;
    len?: number;
    endLine?: number;
    endCol?: number;
}

export type Stage = "lex" | "parse" | "resolve" | "compile" | "runtime";

export type LexErrorKind =
    | "UnterminatedString"
    | "UnterminatedComment"
    | "MalformedNumber"
    | "InvalidEscape"
    | "IllegalCharacter";

export type ParseErrorKind =
    | "UnexpectedToken"
    | "UnbalancedDelimiter"
    | "MissingTerminator";

export type ResolveErrorKind =
    | "UnknownSymbol"
    | "DuplicateDefinition"
    | "ImportCycle"
    | "TypeMismatch";

export type CompileErrorKind =
    | "UnreachableCode"
    | "InvalidControlFlow"
    | "MissingReturn";

export type RuntimeErrorKind =
    | "TypeMismatch"
    | "DivisionByZero"
    | "StackOverflow"
    | "UndefinedField"
    | "UndefinedFunction"
    | "NativeArityMismatch"
    | "NativeFailure"
    | "Interrupted";

/**
 * Formats a diagnostic pointing to a specific location in the source code.
 *
 * Error[kind]: message
 *    --> line 3:12
 *     |
 *   3 |     var x: int = y;
 *     |                  ^
 *     |
 *     = hint
 */
export function formatDiagnostic(
    title: string,
    message: string,
    loc?: ErrorLocation,
    source?: string,
    hint?: string,
): string {
    const errorHeader = `${chalk.red.bold(`${title}:`)} ${chalk.bold(message)}`;
    if (!loc) {
        return hint ? `${errorHeader}\n  = ${hint}` : errorHeader;
    }

    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);
    const output = [
        errorHeader,
        `${chalk.blue(padding)} ${chalk.blue("-->")} line ${loc.line}:${loc.col}`,
    ];

    const lines = source ? source.split("\n") : [];
    const lineContent = lines[loc.line - 1];
    if (lineContent !== undefined) {
        const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
        const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
        const underlineLen =
            loc.endLine === loc.line && loc.endCol !== undefined
                ? Math.max(1, loc.endCol - loc.col)
                : Math.max(1, loc.len || 1);
        const pointer = chalk.red.bold("^".repeat(underlineLen));

        output.push(
            pipeLine,
            `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`,
            `${chalk.blue(padding)} ${chalk.blue("|")} ${pointerSpace}${pointer}`,
            pipeLine,
        );
    }

    if (hint) {
        output.push(`${chalk.blue(padding)} ${chalk.blue("=")} ${hint}`);
    }

    return "\n" + output.join("\n");
}

/**
 * Base class of every error raised by the pipeline. `message` holds the
 * rendered diagnostic; the structured fields are kept for embedders.
 */
export class PgsError<K extends string = string> extends Error {
    public rawMessage: string;
    public stage: Stage;
    public kind: K;
    public loc?: ErrorLocation;
    public source?: string;
    public hint?: string;

    constructor(
        stage: Stage,
        kind: K,
        message: string,
        loc?: ErrorLocation,
        source?: string,
        hint?: string,
    ) {
        super(formatDiagnostic(`Error[${kind}]`, message, loc, source, hint));
        this.name = "PgsError";
        this.rawMessage = message;
        this.stage = stage;
        this.kind = kind;
        this.loc = loc;
        this.source = source;
        this.hint = hint;
    }
}

export class LexError extends PgsError<LexErrorKind> {
    constructor(
        kind: LexErrorKind,
        message: string,
        loc: ErrorLocation,
        source?: string,
    ) {
        super("lex", kind, message, loc, source);
        this.name = "LexError";
    }
}

export class ParseError extends PgsError<ParseErrorKind> {
    constructor(
        kind: ParseErrorKind,
        message: string,
        public expected: string,
        public found: string,
        loc: ErrorLocation,
        source?: string,
    ) {
        super("parse", kind, message, loc, source);
        this.name = "ParseError";
    }
}

export class ResolveError extends PgsError<ResolveErrorKind> {
    constructor(
        kind: ResolveErrorKind,
        message: string,
        loc: ErrorLocation,
        source?: string,
        public symbol?: string,
        hint?: string,
    ) {
        super("resolve", kind, message, loc, source, hint);
        this.name = "ResolveError";
    }
}

export class CompileError extends PgsError<CompileErrorKind> {
    constructor(
        kind: CompileErrorKind,
        message: string,
        loc: ErrorLocation,
        source?: string,
    ) {
        super("compile", kind, message, loc, source);
        this.name = "CompileError";
    }
}

export class RuntimeError extends PgsError<RuntimeErrorKind> {
    constructor(
        kind: RuntimeErrorKind,
        message: string,
        loc?: ErrorLocation,
        source?: string,
        public chunk?: string,
    ) {
        super("runtime", kind, message, loc, source);
        this.name = "RuntimeError";
    }
}

export function isPgsError(e: unknown): e is PgsError {
    return e instanceof PgsError;
}
