import { BinaryOp, BinaryOperator, Expression } from "../parser/types";
import { DivisionByZeroError } from "../utils/Error";
import { assertNever } from "../utils/ast";

export class Evaluator {
    public evaluate(expr: Expression): number {
        switch (expr.type) {
            case "NumberLiteral":
                return expr.value;
            case "UnaryMinus":
                return -this.evaluate(expr.operand);
            case "BinaryOp":
                return this.evaluateBinaryChain(expr);
            default:
                return assertNever(expr);
        }
    }

    /**
     * Operators of one precedence level fold to the left, so a long chain like
     * `1 + 2 + 3 + ...` nests down the left side. The spine is walked with a loop
     * and only right operands recurse.
     */
    private evaluateBinaryChain(root: BinaryOp): number {
        const chain: BinaryOp[] = [];
        let node: Expression = root;
        while (node.type === "BinaryOp") {
            chain.push(node);
            node = node.left;
        }

        let result = this.evaluate(node);
        for (let i = chain.length - 1; i >= 0; i--) {
            const { op, right } = chain[i];
            result = this.apply(op, result, this.evaluate(right), right);
        }
        return result;
    }

    private apply(
        op: BinaryOperator,
        left: number,
        right: number,
        rightExpr: Expression,
    ): number {
        switch (op) {
            case "Add":
                return left + right;
            case "Sub":
                return left - right;
            case "Mul":
                return left * right;
            case "Div":
                // -0 === 0, so negative zero is rejected as well
                if (right === 0) {
                    const span = rightExpr.span;
                    throw new DivisionByZeroError(
                        span?.start,
                        span ? span.end - span.start : 1,
                    );
                }
                return left / right;
            default:
                return assertNever(op);
        }
    }
}
