export enum TokenType {
    // Literals
    NumberLiteral = "NumberLiteral", // 12.5

    // Math Operators
    PlusOp = "PlusOp", // +
    MinusOp = "MinusOp", // -
    MultiplyOp = "MultiplyOp", // *
    DivideOp = "DivideOp", // /

    // Grouping
    LParen = "LParen", // (
    RParen = "RParen", // )

    // End of input
    EOF = "EOF",
}
