import type { Name } from "./names.js";
import type { Block, Expr, Statement, TopLevel } from "./types.js";

const union = (into: Set<Name>, from: Set<Name>) => {
  for (const name of from) into.add(name);
  return into;
};

/**
 * Free names of a telescope `(T₀ n₀, T₁ n₁, …)` followed by a body in which
 * every binder is in scope. Binder *i*'s type sees binders `0..i-1`.
 */
export function telescopeFreeVars(
  binders: [Name | null, Expr][],
  body: Expr | null,
): Set<Name> {
  const free = body ? freeVars(body) : new Set<Name>();
  for (const [name] of binders) if (name !== null) free.delete(name);

  binders.forEach(([, type], i) => {
    const fromType = freeVars(type);
    for (const [earlier] of binders.slice(0, i))
      if (earlier !== null) fromType.delete(earlier);
    union(free, fromType);
  });

  return free;
}

/**
 * Computes the set of names occurring **free** in an expression.
 *
 * **Scoping rules**
 * - `ident` → the name itself
 * - `func_type`, `lambda` → parameter *i*'s type sees parameters `0..i-1`;
 *   the return type / body sees all of them
 * - `struct` → a telescope: field *i*'s type sees fields `0..i-1`
 * - `union` → no binding at all; alternatives are independent
 * - `pack` → field names are selectors, so nothing is removed
 * - everything else → union of the children
 *
 * @example
 * ```ts
 * freeVars(lambdaExpr([["x", primExpr("u32")]], identExpr("x"))); // Set {}
 * freeVars(lambdaExpr([["x", primExpr("u32")]], identExpr("y"))); // Set { "y" }
 *
 * // struct { type T; T v; }: T is bound for v
 * freeVars(structExpr([["T", primExpr("type")], ["v", identExpr("T")]])); // Set {}
 *
 * // union { T a; }: nothing binds T
 * freeVars(unionExpr([["a", identExpr("T")]])); // Set { "T" }
 * ```
 */
export function freeVars(expr: Expr): Set<Name> {
  if ("literal" in expr) return new Set();
  if ("ident" in expr) return new Set([expr.ident]);
  if ("bin_op" in expr)
    return union(freeVars(expr.bin_op.left), freeVars(expr.bin_op.right));
  if ("if_then_else" in expr) {
    const { predicate, consequent, alternative } = expr.if_then_else;
    return union(
      union(freeVars(predicate), freeVars(consequent)),
      freeVars(alternative),
    );
  }
  if ("func_type" in expr)
    return telescopeFreeVars(expr.func_type.params, expr.func_type.ret_type);
  if ("lambda" in expr)
    return telescopeFreeVars(expr.lambda.params, expr.lambda.body);
  if ("call" in expr) {
    const free = freeVars(expr.call.func);
    for (const arg of expr.call.args) union(free, freeVars(arg));
    return free;
  }
  if ("struct" in expr) return telescopeFreeVars(expr.struct, null);
  if ("union" in expr) {
    const free = new Set<Name>();
    for (const [, type] of expr.union) union(free, freeVars(type));
    return free;
  }
  if ("pack" in expr) {
    const free = freeVars(expr.pack.type);
    for (const [, value] of expr.pack.assigns) union(free, freeVars(value));
    return free;
  }
  if ("member" in expr) return freeVars(expr.member.record);
  if ("pointer" in expr) return freeVars(expr.pointer);
  if ("reference" in expr) return freeVars(expr.reference);
  return freeVars(expr.dereference);
}

/**
 * Free names of a single statement. A `decl` contributes its type and
 * initialiser but does not remove its own name: that happens at the level
 * of the enclosing block, see {@link blockFreeVars}.
 */
export function statementFreeVars(stmt: Statement): Set<Name> {
  if ("empty" in stmt) return new Set();
  if ("expr" in stmt) return freeVars(stmt.expr);
  if ("return" in stmt) return freeVars(stmt.return);
  if ("block" in stmt) return blockFreeVars(stmt.block);
  if ("decl" in stmt) {
    const free = freeVars(stmt.decl.type);
    if (stmt.decl.init !== null) union(free, freeVars(stmt.decl.init));
    return free;
  }

  const { conditions, thens, else_block } = stmt.if_then_else;
  const free = blockFreeVars(else_block);
  for (const condition of conditions) union(free, freeVars(condition));
  for (const then of thens) union(free, blockFreeVars(then));
  return free;
}

/**
 * Free names of a block. Statements are visited last to first; when a
 * `decl` is reached its name is removed from what the later statements
 * contributed, then the `decl`'s own type and initialiser are added.
 */
export function blockFreeVars(block: Block): Set<Name> {
  const free = new Set<Name>();
  for (const stmt of [...block].reverse()) {
    if ("decl" in stmt) free.delete(stmt.decl.name);
    union(free, statementFreeVars(stmt));
  }
  return free;
}

/**
 * Free names of a top‑level declaration's **signature**: its parameter
 * types and return type, never its body.
 */
export const signatureFreeVars = (topLevel: TopLevel): Set<Name> =>
  telescopeFreeVars(topLevel.func.params, topLevel.func.ret_type);
