export enum TokenType {
    // Keywords
    Mod = "Mod", // mod
    Fn = "Fn", // fn
    Cont = "Cont", // cont
    Impl = "Impl", // impl
    Import = "Import", // import
    Var = "Var", // var
    Return = "Return", // return
    If = "If", // if
    Else = "Else", // else
    While = "While", // while
    Loop = "Loop", // loop
    For = "For", // for
    In = "In", // in
    Break = "Break", // break
    Continue = "Continue", // continue
    True = "True", // true
    False = "False", // false

    // Identifiers
    Identifier = "Identifier",

    // Operators
    Equals = "Equals", // =
    DoubleColon = "DoubleColon", // ::
    Colon = "Colon", // :
    Tilde = "Tilde", // ~
    PlusOp = "PlusOp", // +
    MinusOp = "MinusOp", // -
    MultiplyOp = "MultiplyOp", // *
    DivideOp = "DivideOp", // /
    Bang = "Bang", // !

    // Comparison
    Equal = "Equal", // ==
    NotEqual = "NotEqual", // !=
    Less = "Less", // <
    LessEqual = "LessEqual", // <=
    Greater = "Greater", // >
    GreaterEqual = "GreaterEqual", // >=

    // Punctuation
    LBrace = "LBrace", // {
    RBrace = "RBrace", // }
    LParen = "LParen", // (
    RParen = "RParen", // )
    Comma = "Comma", // ,
    Semicolon = "Semicolon", // ;
    Dot = "Dot", // .

    // Literals
    StringLiteral = "StringLiteral", // "string"
    IntLiteral = "IntLiteral", // 12345
    FloatLiteral = "FloatLiteral", // 12.345

    // End of file
    EOF = "EOF",
}
