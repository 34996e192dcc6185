/**
 * Constant Folding
 * =================
 *
 * Expression-level simplification applied to every operator payload:
 *
 * - calls and casts over literals are evaluated
 * - `true AND x` → x, `false AND x` → false (dually for OR)
 * - `if` on a literal condition picks its branch
 * - field access on a tuple or row literal picks the field
 * - null tests on non-nullable operands become literals
 *
 * At circuit level, a Filter whose predicate folds to `true` is removed.
 *
 * @module
 */

import { EvaluationError } from '../common/errors';
import { evaluate } from '../ir/evaluate';
import {
  boolLiteral,
  cast,
  literal,
  type CallExpression,
  type Expression,
  type LiteralExpression,
  type Value,
} from '../ir/expression';
import { mapClosures, type FilterOperator, type Operator } from '../ir/operators';
import { typeEquals } from '../ir/types';
import { ExpressionRewriter } from '../visitors/inner';
import { CircuitRewriter, type RewriteContext } from '../visitors/outer';

/** Literal node, or undefined when the value cannot be computed or does not fit the type */
function tryLiteral(expr: Expression): LiteralExpression | undefined {
  let value: Value;
  try {
    value = evaluate(expr);
  } catch (error) {
    // left for the runtime to report
    if (error instanceof EvaluationError) return undefined;
    throw error;
  }
  if (value === null && !expr.type.nullable) return undefined;
  return literal(expr.type, value);
}

function isLiteralValue(expr: Expression, value: boolean): boolean {
  return expr.kind === 'literal' && expr.value === value;
}

export class ExpressionFolder extends ExpressionRewriter {
  postorder(expr: Expression): Expression {
    if (expr.type.kind === 'error') return expr;
    switch (expr.kind) {
      case 'call':
        return this.foldCall(expr);
      case 'cast':
        return expr.operand.kind === 'literal' ? tryLiteral(expr) ?? expr : expr;
      case 'if': {
        if (expr.condition.kind !== 'literal') return expr;
        // null and false both take the else branch
        const branch = expr.condition.value === true ? expr.then : expr.otherwise;
        return typeEquals(branch.type, expr.type) ? branch : this.postorder(cast(branch, expr.type));
      }
      case 'field': {
        const { target } = expr;
        if (target.kind === 'tuple') {
          const picked = target.fields[expr.index];
          return typeEquals(picked.type, expr.type) ? picked : expr;
        }
        if (target.kind === 'literal') return tryLiteral(expr) ?? expr;
        return expr;
      }
      default:
        return expr;
    }
  }

  private foldCall(expr: CallExpression): Expression {
    if (expr.args.every(a => a.kind === 'literal')) {
      return tryLiteral(expr) ?? expr;
    }
    switch (expr.op) {
      case 'and':
      case 'or': {
        const absorbing = expr.op === 'or';
        if (expr.args.some(a => isLiteralValue(a, absorbing))) {
          return boolLiteral(absorbing, expr.type.nullable);
        }
        const rest = expr.args.filter(a => !isLiteralValue(a, !absorbing));
        if (rest.length === 1 && typeEquals(rest[0].type, expr.type)) return rest[0];
        return expr;
      }
      case 'is_null':
      case 'is_not_null':
        return expr.args[0].type.nullable ? expr : boolLiteral(expr.op === 'is_not_null');
      default:
        return expr;
    }
  }
}

export class ConstantFold extends CircuitRewriter {
  readonly name = 'constant-fold';
  private folder = new ExpressionFolder();

  protected prepare(): void {
    this.folder = new ExpressionFolder();
  }

  private fold<T extends Operator>(op: T, ctx: RewriteContext): T {
    const folded = mapClosures(op, fn => this.folder.rewriteClosure(fn));
    if (folded !== op) ctx.changes++;
    return folded;
  }

  protected postorderDefault(op: Operator, ctx: RewriteContext): void {
    ctx.copy(this.fold(op, ctx));
  }

  protected postorderFilter(op: FilterOperator, ctx: RewriteContext): void {
    const folded = this.fold(op, ctx);
    if (isLiteralValue(folded.predicate.body, true)) {
      ctx.alias(op, ctx.mapped(op.inputs[0]));
      return;
    }
    ctx.copy(folded);
  }
}
