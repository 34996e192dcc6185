/**
 * Expression Rewriting
 * =====================
 *
 * Clone-and-replace traversal over expression trees:
 *
 * 1. `preorder(node)`: return false to leave the subtree untouched
 * 2. children are rewritten
 * 3. `postorder(node)` receives the node with rewritten children and
 *    returns its replacement
 *
 * Nodes are only rebuilt when a child changed, so an identity rewrite
 * returns the very same tree.
 *
 * @module
 */

import { InvariantViolationError, assertNever } from '../common/errors';
import type { ClosureExpression, Expression } from '../ir/expression';

export class ExpressionRewriter {
  private readonly cache = new Map<Expression, Expression>();

  /** Return false to skip the subtree */
  preorder(_expr: Expression): boolean {
    return true;
  }

  /** Produce the replacement for a node whose children are already rewritten */
  postorder(expr: Expression): Expression {
    return expr;
  }

  rewrite(expr: Expression): Expression {
    const cached = this.cache.get(expr);
    if (cached) return cached;
    const result = this.preorder(expr) ? this.postorder(this.rewriteChildren(expr)) : expr;
    this.cache.set(expr, result);
    return result;
  }

  /** Rewrites a closure's body, keeping its parameters */
  rewriteClosure(fn: ClosureExpression): ClosureExpression {
    const rewritten = this.rewrite(fn);
    if (rewritten.kind === 'closure') return rewritten;
    throw new InvariantViolationError(`Rewriter replaced a closure with a ${rewritten.kind}`);
  }

  private rewriteList(list: readonly Expression[]): readonly Expression[] {
    const next = list.map(e => this.rewrite(e));
    return next.every((e, i) => e === list[i]) ? list : next;
  }

  private rewriteChildren(expr: Expression): Expression {
    switch (expr.kind) {
      case 'literal':
      case 'var':
        return expr;
      case 'field': {
        const target = this.rewrite(expr.target);
        return target === expr.target ? expr : { ...expr, target };
      }
      case 'call': {
        const args = this.rewriteList(expr.args);
        return args === expr.args ? expr : { ...expr, args };
      }
      case 'cast': {
        const operand = this.rewrite(expr.operand);
        return operand === expr.operand ? expr : { ...expr, operand };
      }
      case 'if': {
        const condition = this.rewrite(expr.condition);
        const then = this.rewrite(expr.then);
        const otherwise = this.rewrite(expr.otherwise);
        return condition === expr.condition && then === expr.then && otherwise === expr.otherwise
          ? expr
          : { ...expr, condition, then, otherwise };
      }
      case 'tuple': {
        const fields = this.rewriteList(expr.fields);
        return fields === expr.fields ? expr : { ...expr, fields };
      }
      case 'closure': {
        const body = this.rewrite(expr.body);
        return body === expr.body ? expr : { ...expr, body, type: body.type };
      }
      default:
        return assertNever(expr, 'expression');
    }
  }
}

/**
 * Replaces variables by expressions. Closure parameters that shadow a
 * substituted name stop the substitution inside that closure.
 */
export class Substitution extends ExpressionRewriter {
  constructor(private readonly bindings: ReadonlyMap<string, Expression>) {
    super();
  }

  preorder(expr: Expression): boolean {
    if (expr.kind === 'closure') {
      return !expr.params.some(p => this.bindings.has(p.name));
    }
    return true;
  }

  postorder(expr: Expression): Expression {
    if (expr.kind === 'var') {
      return this.bindings.get(expr.name) ?? expr;
    }
    return expr;
  }
}

/** Names of the variables an expression reads */
export function freeVariables(expr: Expression): Set<string> {
  const found = new Set<string>();
  const walk = (e: Expression, bound: ReadonlySet<string>): void => {
    switch (e.kind) {
      case 'literal':
        return;
      case 'var':
        if (!bound.has(e.name)) found.add(e.name);
        return;
      case 'field':
        return walk(e.target, bound);
      case 'call':
        return e.args.forEach(a => walk(a, bound));
      case 'cast':
        return walk(e.operand, bound);
      case 'if':
        walk(e.condition, bound);
        walk(e.then, bound);
        return walk(e.otherwise, bound);
      case 'tuple':
        return e.fields.forEach(f => walk(f, bound));
      case 'closure':
        return walk(e.body, new Set([...bound, ...e.params.map(p => p.name)]));
      default:
        return assertNever(e, 'expression');
    }
  };
  walk(expr, new Set());
  return found;
}
