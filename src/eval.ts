import {
  binOpExpr,
  booleanExpr,
  callExpr,
  copyExpr,
  dereferenceExpr,
  funcTypeExpr,
  identExpr,
  ifThenElseExpr,
  integralExpr,
  lambdaExpr,
  memberExpr,
  packExpr,
  pointerExpr,
  referenceExpr,
  structExpr,
  unionExpr,
} from "./ast.js";
import { freshName, type Name, type NameSupply } from "./names.js";
import { alphaRename, substExpr } from "./subst.js";
import {
  type BinaryOp,
  type BinOpExpr,
  type CallExpr,
  type EvalConfig,
  err,
  type Expr,
  type IfThenElseExpr,
  type Literal,
  type MemberExpr,
  ok,
  type Result,
  type TypingError,
} from "./types.js";

export const defaultEvalConfig: EvalConfig = { maxSteps: 10_000 };

type EvalRun = {
  names: NameSupply;
  config: EvalConfig;
  steps: number;
};

/**
 * Reduces an expression to **normal form**.
 *
 * The only reductions the language has:
 * - `call` of a `lambda` with matching arity → beta reduction
 * - `member` of a `pack` that assigns the field → the assigned value
 * - `if_then_else` on a boolean literal → the selected branch
 * - `bin_op` on two literals → constant folding (see {@link foldBinOp})
 *
 * Everything else normalises its children and is otherwise left alone, so
 * terms with free variables evaluate to stuck terms rather than failing.
 * Evaluation is idempotent: evaluating a normal form returns an equal tree.
 *
 * Beta reductions are counted; going past `config.maxSteps` fails with
 * `evaluation_limit` instead of diverging.
 *
 * @example
 * ```ts
 * // (\(type T, T x) -> T)(u32, 5)
 * const call = callExpr(
 *   lambdaExpr([["T", typeType], ["x", identExpr("T")]], identExpr("T")),
 *   [primExpr("u32"), integralExpr(5)],
 * );
 * evaluate(freshNames(), call); // ok(u32)
 * ```
 */
export function evaluate(
  names: NameSupply,
  expr: Expr,
  config: EvalConfig = defaultEvalConfig,
): Result<TypingError, Expr> {
  return evaluateIn({ names, config, steps: 0 }, expr);
}

function evaluateIn(run: EvalRun, expr: Expr): Result<TypingError, Expr> {
  if ("literal" in expr) return ok(copyExpr(expr));
  if ("ident" in expr) return ok(identExpr(expr.ident));

  if ("bin_op" in expr) return evaluateBinOp(run, expr);
  if ("if_then_else" in expr) return evaluateIfThenElse(run, expr);
  if ("call" in expr) return evaluateCall(run, expr);
  if ("member" in expr) return evaluateMember(run, expr);

  if ("func_type" in expr) {
    const params = evaluateBinders(run, expr.func_type.params);
    if ("err" in params) return params;
    const ret = evaluateIn(run, expr.func_type.ret_type);
    if ("err" in ret) return ret;
    return ok(funcTypeExpr(ret.ok, params.ok));
  }

  if ("lambda" in expr) {
    const params = evaluateBinders(run, expr.lambda.params);
    if ("err" in params) return params;
    const body = evaluateIn(run, expr.lambda.body);
    if ("err" in body) return body;
    return ok(lambdaExpr(params.ok, body.ok));
  }

  if ("struct" in expr) {
    const fields = evaluateBinders(run, expr.struct);
    return "err" in fields ? fields : ok(structExpr(fields.ok));
  }

  if ("union" in expr) {
    const fields = evaluateBinders(run, expr.union);
    return "err" in fields ? fields : ok(unionExpr(fields.ok));
  }

  if ("pack" in expr) {
    const type = evaluateIn(run, expr.pack.type);
    if ("err" in type) return type;
    const assigns = evaluateBinders(run, expr.pack.assigns);
    if ("err" in assigns) return assigns;
    return ok(packExpr(type.ok, assigns.ok));
  }

  if ("pointer" in expr) {
    const inner = evaluateIn(run, expr.pointer);
    return "err" in inner ? inner : ok(pointerExpr(inner.ok));
  }

  if ("reference" in expr) {
    const inner = evaluateIn(run, expr.reference);
    return "err" in inner ? inner : ok(referenceExpr(inner.ok));
  }

  const inner = evaluateIn(run, expr.dereference);
  return "err" in inner ? inner : ok(dereferenceExpr(inner.ok));
}

function evaluateBinders<N extends Name | null>(
  run: EvalRun,
  binders: [N, Expr][],
): Result<TypingError, [N, Expr][]> {
  const out: [N, Expr][] = [];
  for (const [name, expr] of binders) {
    const res = evaluateIn(run, expr);
    if ("err" in res) return res;
    out.push([name, res.ok]);
  }
  return ok(out);
}

function evaluateCall(
  run: EvalRun,
  expr: CallExpr,
): Result<TypingError, Expr> {
  const func = evaluateIn(run, expr.call.func);
  if ("err" in func) return func;

  const args: Expr[] = [];
  for (const arg of expr.call.args) {
    const res = evaluateIn(run, arg);
    if ("err" in res) return res;
    args.push(res.ok);
  }

  const head = func.ok;
  if (!("lambda" in head) || head.lambda.params.length !== args.length)
    return ok(callExpr(head, args));

  if (++run.steps > run.config.maxSteps)
    return err({ evaluation_limit: { steps: run.config.maxSteps } });

  // Move every parameter to a fresh name first, so substituting one
  // argument can never touch another argument's free names.
  let body = head.lambda.body;
  const fresh: Name[] = [];
  for (const [param] of head.lambda.params) {
    const renamed = freshName(run.names, param);
    body = alphaRename(param, renamed, body);
    fresh.push(renamed);
  }

  for (const [i, arg] of args.entries()) {
    const substituted = substExpr(run.names, body, fresh[i], arg);
    if ("err" in substituted) return substituted;
    body = substituted.ok;
  }

  return evaluateIn(run, body);
}

function evaluateMember(
  run: EvalRun,
  expr: MemberExpr,
): Result<TypingError, Expr> {
  const record = evaluateIn(run, expr.member.record);
  if ("err" in record) return record;

  const { field } = expr.member;
  if ("pack" in record.ok) {
    const assigned = record.ok.pack.assigns.find(([label]) => label === field);
    if (assigned) return ok(copyExpr(assigned[1]));
  }

  return ok(memberExpr(record.ok, field));
}

function evaluateIfThenElse(
  run: EvalRun,
  expr: IfThenElseExpr,
): Result<TypingError, Expr> {
  const { predicate, consequent, alternative } = expr.if_then_else;
  const pred = evaluateIn(run, predicate);
  if ("err" in pred) return pred;

  if ("literal" in pred.ok && "boolean" in pred.ok.literal)
    return evaluateIn(run, pred.ok.literal.boolean ? consequent : alternative);

  const cons = evaluateIn(run, consequent);
  if ("err" in cons) return cons;
  const alt = evaluateIn(run, alternative);
  if ("err" in alt) return alt;
  return ok(ifThenElseExpr(pred.ok, cons.ok, alt.ok));
}

function evaluateBinOp(
  run: EvalRun,
  expr: BinOpExpr,
): Result<TypingError, Expr> {
  const { op } = expr.bin_op;
  const left = evaluateIn(run, expr.bin_op.left);
  if ("err" in left) return left;
  const right = evaluateIn(run, expr.bin_op.right);
  if ("err" in right) return right;

  if ("literal" in left.ok && "literal" in right.ok) {
    const folded = foldBinOp(op, left.ok.literal, right.ok.literal);
    if (folded) return ok(folded);
  }

  return ok(binOpExpr(op, left.ok, right.ok));
}

/**
 * Constant‑folds `left op right` over two literals, or returns `null` when
 * the operator does not apply to them (the node then stays as it is).
 *
 * - `==` / `!=` compare literals of the same kind
 * - orderings and `+` / `-` need two integrals; a `-` that would go below
 *   zero is not folded, since integral literals are unsigned
 * - `>>` discards the left operand
 */
export function foldBinOp(
  op: BinaryOp,
  left: Literal,
  right: Literal,
): Expr | null {
  if (op === ">>") return copyExpr({ literal: right });

  if (op === "==" || op === "!=") {
    const same = sameKindEqual(left, right);
    if (same === null) return null;
    return booleanExpr(op === "==" ? same : !same);
  }

  if (!("integral" in left) || !("integral" in right)) return null;
  const a = left.integral;
  const b = right.integral;

  switch (op) {
    case "<":
      return booleanExpr(a < b);
    case "<=":
      return booleanExpr(a <= b);
    case ">":
      return booleanExpr(a > b);
    case ">=":
      return booleanExpr(a >= b);
    case "+":
      return integralExpr(a + b);
    case "-":
      return a >= b ? integralExpr(a - b) : null;
  }
}

function sameKindEqual(left: Literal, right: Literal): boolean | null {
  if ("integral" in left && "integral" in right)
    return left.integral === right.integral;
  if ("boolean" in left && "boolean" in right)
    return left.boolean === right.boolean;
  if ("prim" in left && "prim" in right) return left.prim === right.prim;
  return null;
}
