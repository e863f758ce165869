import {
  binOpExpr,
  callExpr,
  copyBlock,
  copyExpr,
  copyStatement,
  declStatement,
  dereferenceExpr,
  funcTypeExpr,
  identExpr,
  ifThenElseExpr,
  lambdaExpr,
  memberExpr,
  packExpr,
  pointerExpr,
  referenceExpr,
  returnStatement,
  structExpr,
  unionExpr,
  blockStatement,
  exprStatement,
  emptyStatement,
} from "./ast.js";
import { blockFreeVars, freeVars, telescopeFreeVars } from "./free-vars.js";
import { freshName, type Name, type NameSupply } from "./names.js";
import {
  type Block,
  type Expr,
  ok,
  type Result,
  type Statement,
  type TypingError,
} from "./types.js";

/**
 * Renames free `from` to `to` through a binder list, where each binder's
 * type sees the binders before it. `shadowed` reports whether some binder
 * rebinds `from`, in which case whatever the binders scope over must be left
 * alone.
 */
export function alphaRenameBinders<N extends Name | null>(
  from: Name,
  to: Name,
  binders: [N, Expr][],
): { binders: [N, Expr][]; shadowed: boolean } {
  const out: [N, Expr][] = [];
  for (const [i, [name, type]] of binders.entries()) {
    out.push([name, alphaRename(from, to, type)]);
    if (name === from) {
      for (const [later, laterType] of binders.slice(i + 1))
        out.push([later, copyExpr(laterType)]);
      return { binders: out, shadowed: true };
    }
  }
  return { binders: out, shadowed: false };
}

/**
 * Renames every **free** occurrence of `from` to `to`, returning a new tree.
 *
 * `to` must be fresh (see {@link freshName}): since nothing binds it, the
 * renaming can never be captured and never fails. Binders named `from`
 * shadow it, so renaming stops there.
 *
 * ---------------------------------------------------------------------------
 * Used in:
 * ---------------------------------------------------------------------------
 * - {@link substExpr}: moving a binder out of the way of the replacement
 * - {@link evaluate}: renaming lambda parameters before beta reduction
 * - {@link alphaEqual}: giving both sides' binders a shared placeholder
 * - the checker: keeping context names distinct
 *
 * @example
 * ```ts
 * alphaRename("x", "x#0", binOpExpr("+", identExpr("x"), identExpr("y")));
 * // x#0 + y
 *
 * alphaRename("x", "x#0", lambdaExpr([["x", primExpr("u32")]], identExpr("x")));
 * // \(u32 x) -> x   (bound, untouched)
 * ```
 */
export function alphaRename(from: Name, to: Name, expr: Expr): Expr {
  if (from === to || "literal" in expr) return copyExpr(expr);

  if ("ident" in expr) return identExpr(expr.ident === from ? to : expr.ident);

  if ("bin_op" in expr)
    return binOpExpr(
      expr.bin_op.op,
      alphaRename(from, to, expr.bin_op.left),
      alphaRename(from, to, expr.bin_op.right),
    );

  if ("if_then_else" in expr)
    return ifThenElseExpr(
      alphaRename(from, to, expr.if_then_else.predicate),
      alphaRename(from, to, expr.if_then_else.consequent),
      alphaRename(from, to, expr.if_then_else.alternative),
    );

  if ("func_type" in expr) {
    const { binders, shadowed } = alphaRenameBinders(
      from,
      to,
      expr.func_type.params,
    );
    const ret = expr.func_type.ret_type;
    return funcTypeExpr(
      shadowed ? copyExpr(ret) : alphaRename(from, to, ret),
      binders,
    );
  }

  if ("lambda" in expr) {
    const { binders, shadowed } = alphaRenameBinders(
      from,
      to,
      expr.lambda.params,
    );
    const body = expr.lambda.body;
    return lambdaExpr(
      binders,
      shadowed ? copyExpr(body) : alphaRename(from, to, body),
    );
  }

  if ("call" in expr)
    return callExpr(
      alphaRename(from, to, expr.call.func),
      expr.call.args.map((arg) => alphaRename(from, to, arg)),
    );

  if ("struct" in expr)
    return structExpr(alphaRenameBinders(from, to, expr.struct).binders);

  if ("union" in expr)
    return unionExpr(
      expr.union.map(([label, type]): [Name, Expr] => [
        label,
        alphaRename(from, to, type),
      ]),
    );

  if ("pack" in expr)
    return packExpr(
      alphaRename(from, to, expr.pack.type),
      expr.pack.assigns.map(([label, value]): [Name, Expr] => [
        label,
        alphaRename(from, to, value),
      ]),
    );

  if ("member" in expr)
    return memberExpr(
      alphaRename(from, to, expr.member.record),
      expr.member.field,
    );

  if ("pointer" in expr) return pointerExpr(alphaRename(from, to, expr.pointer));
  if ("reference" in expr)
    return referenceExpr(alphaRename(from, to, expr.reference));
  return dereferenceExpr(alphaRename(from, to, expr.dereference));
}

export function alphaRenameStatement(
  from: Name,
  to: Name,
  stmt: Statement,
): Statement {
  if ("empty" in stmt) return emptyStatement();
  if ("expr" in stmt) return exprStatement(alphaRename(from, to, stmt.expr));
  if ("return" in stmt)
    return returnStatement(alphaRename(from, to, stmt.return));
  if ("block" in stmt)
    return blockStatement(alphaRenameBlock(from, to, stmt.block));
  if ("decl" in stmt) {
    const { type, name, init } = stmt.decl;
    return declStatement(
      alphaRename(from, to, type),
      name,
      init && alphaRename(from, to, init),
    );
  }
  return {
    if_then_else: {
      conditions: stmt.if_then_else.conditions.map((c) =>
        alphaRename(from, to, c),
      ),
      thens: stmt.if_then_else.thens.map((b) => alphaRenameBlock(from, to, b)),
      else_block: alphaRenameBlock(from, to, stmt.if_then_else.else_block),
    },
  };
}

/**
 * Block form of {@link alphaRename}. A `decl` of `from` shadows it for the
 * rest of the block, which is then copied unchanged.
 */
export function alphaRenameBlock(from: Name, to: Name, block: Block): Block {
  const out: Block = [];
  for (const [i, stmt] of block.entries()) {
    out.push(alphaRenameStatement(from, to, stmt));
    if ("decl" in stmt && stmt.decl.name === from) {
      out.push(...block.slice(i + 1).map(copyStatement));
      break;
    }
  }
  return out;
}

type SubstTarget = {
  names: NameSupply;
  name: Name;
  replacement: Expr;
  replacementFree: Set<Name>;
};

/** Outcome of walking a binder list, before the body is handled. */
type BinderScope<N extends Name | null> = {
  binders: [N, Expr][];
  /** Binder renames the body still has to receive, in order. */
  renames: [Name, Name][];
  /** `false` once the target is shadowed or no longer occurs. */
  substituteBody: boolean;
};

const mentions = (
  later: [Name | null, Expr][],
  bodyFree: Set<Name>,
  name: Name,
) =>
  telescopeFreeVars(later, null).has(name) ||
  (bodyFree.has(name) && !later.some(([binder]) => binder === name));

function substBinders(
  target: SubstTarget,
  binders: [Name, Expr][],
  bodyFree: Set<Name>,
): Result<TypingError, BinderScope<Name>>;
function substBinders(
  target: SubstTarget,
  binders: [Name | null, Expr][],
  bodyFree: Set<Name>,
): Result<TypingError, BinderScope<Name | null>>;
function substBinders(
  target: SubstTarget,
  binders: [Name | null, Expr][],
  bodyFree: Set<Name>,
): Result<TypingError, BinderScope<Name | null>> {
  const { names, name, replacementFree } = target;
  const out: [Name | null, Expr][] = [];
  const renames: [Name, Name][] = [];
  let rest = binders;

  for (let i = 0; i < rest.length; i++) {
    const [binder, type] = rest[i];
    const substituted = substIn(target, type);
    if ("err" in substituted) return substituted;
    let later = rest.slice(i + 1);

    // Shadowed here, or nothing further to replace.
    if (binder === name || !mentions(later, bodyFree, name)) {
      out.push([binder, substituted.ok]);
      for (const [laterBinder, laterType] of later)
        out.push([laterBinder, copyExpr(laterType)]);
      return ok({ binders: out, renames, substituteBody: false });
    }

    if (binder !== null && replacementFree.has(binder)) {
      const fresh = freshName(names, binder);
      const renamed = alphaRenameBinders(binder, fresh, later);
      later = renamed.binders;
      rest = [...rest.slice(0, i + 1), ...later];
      if (!renamed.shadowed) renames.push([binder, fresh]);
      out.push([fresh, substituted.ok]);
      continue;
    }

    out.push([binder, substituted.ok]);
  }

  return ok({ binders: out, renames, substituteBody: true });
}

function substBody(
  target: SubstTarget,
  scope: BinderScope<Name | null>,
  body: Expr,
): Result<TypingError, Expr> {
  let renamed = body;
  for (const [from, to] of scope.renames)
    renamed = alphaRename(from, to, renamed);
  return scope.substituteBody ? substIn(target, renamed) : ok(copyExpr(renamed));
}

function substAll(
  target: SubstTarget,
  exprs: Expr[],
): Result<TypingError, Expr[]> {
  const out: Expr[] = [];
  for (const expr of exprs) {
    const res = substIn(target, expr);
    if ("err" in res) return res;
    out.push(res.ok);
  }
  return ok(out);
}

function substLabelled(
  target: SubstTarget,
  entries: [Name, Expr][],
): Result<TypingError, [Name, Expr][]> {
  const out: [Name, Expr][] = [];
  for (const [label, expr] of entries) {
    const res = substIn(target, expr);
    if ("err" in res) return res;
    out.push([label, res.ok]);
  }
  return ok(out);
}

function substIn(target: SubstTarget, expr: Expr): Result<TypingError, Expr> {
  if ("literal" in expr) return ok(copyExpr(expr));

  // Only the identifier that *is* the target is replaced.
  if ("ident" in expr)
    return ok(
      expr.ident === target.name
        ? copyExpr(target.replacement)
        : identExpr(expr.ident),
    );

  if ("bin_op" in expr) {
    const left = substIn(target, expr.bin_op.left);
    if ("err" in left) return left;
    const right = substIn(target, expr.bin_op.right);
    if ("err" in right) return right;
    return ok(binOpExpr(expr.bin_op.op, left.ok, right.ok));
  }

  if ("if_then_else" in expr) {
    const { predicate, consequent, alternative } = expr.if_then_else;
    const p = substIn(target, predicate);
    if ("err" in p) return p;
    const c = substIn(target, consequent);
    if ("err" in c) return c;
    const a = substIn(target, alternative);
    if ("err" in a) return a;
    return ok(ifThenElseExpr(p.ok, c.ok, a.ok));
  }

  if ("func_type" in expr) {
    const { ret_type, params } = expr.func_type;
    const scope = substBinders(target, params, freeVars(ret_type));
    if ("err" in scope) return scope;
    const ret = substBody(target, scope.ok, ret_type);
    if ("err" in ret) return ret;
    return ok(funcTypeExpr(ret.ok, scope.ok.binders));
  }

  if ("lambda" in expr) {
    const { params, body } = expr.lambda;
    const scope = substBinders(target, params, freeVars(body));
    if ("err" in scope) return scope;
    const newBody = substBody(target, scope.ok, body);
    if ("err" in newBody) return newBody;
    return ok(lambdaExpr(scope.ok.binders, newBody.ok));
  }

  if ("call" in expr) {
    const func = substIn(target, expr.call.func);
    if ("err" in func) return func;
    const args = substAll(target, expr.call.args);
    if ("err" in args) return args;
    return ok(callExpr(func.ok, args.ok));
  }

  // A renamed field keeps its label, see fieldLabel.
  if ("struct" in expr) {
    const scope = substBinders(target, expr.struct, new Set());
    if ("err" in scope) return scope;
    return ok(structExpr(scope.ok.binders));
  }

  if ("union" in expr) {
    const fields = substLabelled(target, expr.union);
    if ("err" in fields) return fields;
    return ok(unionExpr(fields.ok));
  }

  // Pack labels select fields and bind nothing.
  if ("pack" in expr) {
    const type = substIn(target, expr.pack.type);
    if ("err" in type) return type;
    const assigns = substLabelled(target, expr.pack.assigns);
    if ("err" in assigns) return assigns;
    return ok(packExpr(type.ok, assigns.ok));
  }

  if ("member" in expr) {
    const record = substIn(target, expr.member.record);
    if ("err" in record) return record;
    return ok(memberExpr(record.ok, expr.member.field));
  }

  if ("pointer" in expr) {
    const inner = substIn(target, expr.pointer);
    return "err" in inner ? inner : ok(pointerExpr(inner.ok));
  }

  if ("reference" in expr) {
    const inner = substIn(target, expr.reference);
    return "err" in inner ? inner : ok(referenceExpr(inner.ok));
  }

  const inner = substIn(target, expr.dereference);
  return "err" in inner ? inner : ok(dereferenceExpr(inner.ok));
}

function substStatementIn(
  target: SubstTarget,
  stmt: Statement,
): Result<TypingError, Statement> {
  if ("empty" in stmt) return ok(emptyStatement());

  if ("expr" in stmt) {
    const expr = substIn(target, stmt.expr);
    return "err" in expr ? expr : ok(exprStatement(expr.ok));
  }

  if ("return" in stmt) {
    const expr = substIn(target, stmt.return);
    return "err" in expr ? expr : ok(returnStatement(expr.ok));
  }

  if ("block" in stmt) {
    const block = substBlockIn(target, stmt.block);
    return "err" in block ? block : ok(blockStatement(block.ok));
  }

  if ("decl" in stmt) {
    const type = substIn(target, stmt.decl.type);
    if ("err" in type) return type;
    if (stmt.decl.init === null)
      return ok(declStatement(type.ok, stmt.decl.name));
    const init = substIn(target, stmt.decl.init);
    if ("err" in init) return init;
    return ok(declStatement(type.ok, stmt.decl.name, init.ok));
  }

  const conditions = substAll(target, stmt.if_then_else.conditions);
  if ("err" in conditions) return conditions;
  const thens: Block[] = [];
  for (const then of stmt.if_then_else.thens) {
    const block = substBlockIn(target, then);
    if ("err" in block) return block;
    thens.push(block.ok);
  }
  const elseBlock = substBlockIn(target, stmt.if_then_else.else_block);
  if ("err" in elseBlock) return elseBlock;
  return ok({
    if_then_else: {
      conditions: conditions.ok,
      thens,
      else_block: elseBlock.ok,
    },
  });
}

function substBlockIn(
  target: SubstTarget,
  block: Block,
): Result<TypingError, Block> {
  const out: Block = [];
  let rest = block;

  for (let i = 0; i < rest.length; i++) {
    const stmt = rest[i];
    const substituted = substStatementIn(target, stmt);
    if ("err" in substituted) return substituted;
    if (!("decl" in stmt) || !("decl" in substituted.ok)) {
      out.push(substituted.ok);
      continue;
    }

    const declared = stmt.decl.name;
    const later = rest.slice(i + 1);
    if (declared === target.name || !blockFreeVars(later).has(target.name)) {
      out.push(substituted.ok, ...copyBlock(later));
      return ok(out);
    }

    if (target.replacementFree.has(declared)) {
      const fresh = freshName(target.names, declared);
      const { type, init } = substituted.ok.decl;
      rest = [
        ...rest.slice(0, i + 1),
        ...alphaRenameBlock(declared, fresh, later),
      ];
      out.push(declStatement(type, fresh, init));
      continue;
    }

    out.push(substituted.ok);
  }

  return ok(out);
}

const target = (
  names: NameSupply,
  name: Name,
  replacement: Expr,
): SubstTarget => ({
  names,
  name,
  replacement,
  replacementFree: freeVars(replacement),
});

/**
 * **Capture‑avoiding substitution** `expr[name := replacement]`.
 *
 * Replaces every free occurrence of `name` with a fresh copy of
 * `replacement`, and never lets a free variable of `replacement` end up
 * bound by a binder it is substituted under.
 *
 * ---------------------------------------------------------------------------
 * Binder rules (walked left to right)
 * ---------------------------------------------------------------------------
 * - a binder named `name` shadows it: the rest of its scope is copied as is
 * - a binder whose name is free in `replacement` is renamed to a fresh name
 *   throughout the rest of its scope first (`func_type`, `lambda`, struct
 *   field, block `decl`); a renamed struct field keeps its member label
 * - `union` alternatives and `pack` assignments bind nothing and are
 *   substituted independently
 *
 * The input is never mutated; the result shares no nodes with it or with
 * `replacement`.
 *
 * @example Capture avoided:
 * ```ts
 * // (\(T y) -> x)[x := y]
 * substExpr(names, lambdaExpr([["y", identExpr("T")]], identExpr("x")), "x", identExpr("y"));
 * // ok(\(T y#0) -> y)
 * ```
 *
 * @example Struct field moved, label kept:
 * ```ts
 * // struct { type T; x v; }[x := T]
 * substExpr(names, structExpr([["T", typeType], ["v", identExpr("x")]]), "x", identExpr("T"));
 * // ok(struct { type T#0; T v; }), and `.T` still selects the first field
 * ```
 */
export const substExpr = (
  names: NameSupply,
  expr: Expr,
  name: Name,
  replacement: Expr,
): Result<TypingError, Expr> =>
  substIn(target(names, name, replacement), expr);

export const substStatement = (
  names: NameSupply,
  stmt: Statement,
  name: Name,
  replacement: Expr,
): Result<TypingError, Statement> =>
  substStatementIn(target(names, name, replacement), stmt);

/**
 * Substitutes through a block. A `decl` of `name` shadows it for the
 * remaining statements; a `decl` whose name is free in `replacement` is
 * renamed for the remaining statements.
 */
export const substBlock = (
  names: NameSupply,
  block: Block,
  name: Name,
  replacement: Expr,
): Result<TypingError, Block> =>
  substBlockIn(target(names, name, replacement), block);
