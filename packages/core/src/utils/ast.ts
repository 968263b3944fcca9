import { BinaryOp, BinaryOperator, Expression } from "../parser/types";

export const OPERATOR_SYMBOLS: Record<BinaryOperator, string> = {
    Add: "+",
    Sub: "-",
    Mul: "*",
    Div: "/",
};

export function assertNever(value: never): never {
    throw new Error(`Unhandled AST variant: ${JSON.stringify(value)}`);
}

/**
 * Renders an expression as an S-expression, e.g. `(+ 2 (* 3 4))`.
 */
export function printExpression(expr: Expression): string {
    switch (expr.type) {
        case "NumberLiteral":
            return String(expr.value);
        case "UnaryMinus":
            return `(neg ${printExpression(expr.operand)})`;
        case "BinaryOp":
            return printBinaryChain(expr);
        default:
            return assertNever(expr);
    }
}

// Left spines grow with the number of operators, not with nesting
function printBinaryChain(expr: BinaryOp): string {
    const spine: BinaryOp[] = [];
    let node: Expression = expr;
    while (node.type === "BinaryOp") {
        spine.push(node);
        node = node.left;
    }

    let text = printExpression(node);
    for (let i = spine.length - 1; i >= 0; i--) {
        const op = spine[i];
        text = `(${OPERATOR_SYMBOLS[op.op]} ${text} ${printExpression(op.right)})`;
    }
    return text;
}

/**
 * Structural equality: same shape, same operators, same literal values.
 * Source spans are ignored.
 */
export function expressionsEqual(a: Expression, b: Expression): boolean {
    const pending: [Expression, Expression][] = [[a, b]];

    for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
        const [x, y] = pair;
        if (x.type === "NumberLiteral" && y.type === "NumberLiteral") {
            if (!Object.is(x.value, y.value)) return false;
        } else if (x.type === "UnaryMinus" && y.type === "UnaryMinus") {
            pending.push([x.operand, y.operand]);
        } else if (x.type === "BinaryOp" && y.type === "BinaryOp") {
            if (x.op !== y.op) return false;
            pending.push([x.left, y.left], [x.right, y.right]);
        } else {
            return false;
        }
    }

    return true;
}
