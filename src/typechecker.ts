// ./src/typechecker.ts
import {
  boolType,
  copyExpr,
  declStatement,
  funcTypeExpr,
  identExpr,
  lambdaExpr,
  literalEqual,
  memberExpr,
  pointerExpr,
  primExpr,
  typeType,
} from "./ast.js";
import { evaluate } from "./eval.js";
import { freeVars, signatureFreeVars } from "./free-vars.js";
import {
  fieldLabel,
  freshName,
  type Name,
  type NameSupply,
} from "./names.js";
import {
  alphaRename,
  alphaRenameBinders,
  alphaRenameBlock,
  substExpr,
} from "./subst.js";
import type {
  BinOpExpr,
  Binding,
  Block,
  CallExpr,
  CheckerState,
  Context,
  DeclStatement,
  Expr,
  FuncTypeExpr,
  IfThenElseExpr,
  LambdaExpr,
  Literal,
  MemberExpr,
  PackExpr,
  PrimType,
  Result,
  Statement,
  TopLevel,
  TranslationUnit,
  TypingError,
} from "./types.js";
import { err, ok } from "./types.js";

export const bindingName = (binding: Binding): Name =>
  "term" in binding ? binding.term.name : binding.definition.name;

export const lookupBinding = (ctx: Context, name: Name): Binding | undefined =>
  ctx.find((binding) => bindingName(binding) === name);

const isBound = (ctx: Context, name: Name) =>
  ctx.some((binding) => bindingName(binding) === name);

/** Returns a state whose context has `binding` in front. */
export const extendContext = (
  state: CheckerState,
  binding: Binding,
): CheckerState => ({ ctx: [binding, ...state.ctx], names: state.names });

const U64_MAX = 0xffff_ffff_ffff_ffffn;

/** Largest literal each integral type can hold. Literals are unsigned. */
const integralMax: Partial<Record<PrimType, bigint>> = {
  u8: 0xffn,
  s8: 0x7fn,
  u16: 0xffffn,
  s16: 0x7fffn,
  u32: 0xffff_ffffn,
  s32: 0x7fff_ffffn,
  u64: U64_MAX,
  s64: 0x7fff_ffff_ffff_ffffn,
};

/** The range limit of a type in normal form, if it is an integral type. */
const integralLimit = (type: Expr): bigint | undefined =>
  "literal" in type && "prim" in type.literal
    ? integralMax[type.literal.prim]
    : undefined;

const isIntegralLiteral = (expr: Expr) =>
  "literal" in expr && "integral" in expr.literal;

/* ----------------------------------------------------------------------------
 * Type evaluation and equality
 * ------------------------------------------------------------------------- */

/**
 * Normalises a type in the given context.
 *
 * Every definition `name = value` whose name is free in `type` is
 * substituted first, newest binding first, so a definition's value may
 * itself mention older definitions. The result is then {@link evaluate}d.
 *
 * Term bindings stay as identifiers: their values are unknown.
 *
 * @example
 * ```ts
 * // ctx: N : u32 = 3
 * typeEval(state, binOpExpr("+", identExpr("N"), integralExpr(1))); // ok(4)
 * ```
 */
export function typeEval(
  state: CheckerState,
  type: Expr,
): Result<TypingError, Expr> {
  let expanded = type;
  for (const binding of state.ctx) {
    if (!("definition" in binding)) continue;
    const { name, value } = binding.definition;
    if (!freeVars(expanded).has(name)) continue;

    const res = substExpr(state.names, expanded, name, value);
    if ("err" in res) return res;
    expanded = res.ok;
  }
  return evaluate(state.names, expanded);
}

function renameAfter(
  from: Name,
  to: Name,
  binders: [Name | null, Expr][],
  body: Expr[],
  index: number,
): { binders: [Name | null, Expr][]; body: Expr[] } {
  const later = alphaRenameBinders(from, to, binders.slice(index + 1));
  return {
    binders: [...binders.slice(0, index + 1), ...later.binders],
    body: later.shadowed ? body : body.map((e) => alphaRename(from, to, e)),
  };
}

function binderScopesEqual(
  names: NameSupply,
  leftBinders: [Name | null, Expr][],
  leftBody: Expr[],
  rightBinders: [Name | null, Expr][],
  rightBody: Expr[],
): boolean {
  if (leftBinders.length !== rightBinders.length) return false;
  let left = { binders: leftBinders, body: leftBody };
  let right = { binders: rightBinders, body: rightBody };

  for (let i = 0; i < left.binders.length; i++) {
    const [leftName, leftType] = left.binders[i];
    const [rightName, rightType] = right.binders[i];
    if (!alphaEqual(names, leftType, rightType)) return false;
    if (leftName === null && rightName === null) continue;

    // One placeholder for both sides; an unnamed side simply has no
    // occurrences of it.
    const shared = freshName(names, leftName ?? rightName ?? "_");
    if (leftName !== null)
      left = renameAfter(leftName, shared, left.binders, left.body, i);
    if (rightName !== null)
      right = renameAfter(rightName, shared, right.binders, right.body, i);
  }

  return (
    left.body.length === right.body.length &&
    left.body.every((expr, i) => alphaEqual(names, expr, right.body[i]))
  );
}

const labelledEqual = (
  names: NameSupply,
  left: [Name, Expr][],
  right: [Name, Expr][],
) =>
  left.length === right.length &&
  left.every(
    ([label, expr], i) =>
      label === right[i][0] && alphaEqual(names, expr, right[i][1]),
  );

/**
 * Structural equality **up to renaming of bound names**.
 *
 * `func_type`, `lambda` and struct field binders are compared by giving
 * both sides one shared fresh placeholder before comparing what they scope
 * over. Struct field labels ({@link fieldLabel}), union alternatives and
 * pack labels are member selectors, so they must match exactly.
 *
 * Both sides are compared as given: callers wanting definitional equality
 * use {@link typeEqual}, which evaluates first.
 *
 * @example
 * ```ts
 * // T(type T) vs U(type U)
 * alphaEqual(
 *   names,
 *   funcTypeExpr(identExpr("T"), [["T", typeType]]),
 *   funcTypeExpr(identExpr("U"), [["U", typeType]]),
 * ); // true
 * ```
 */
export function alphaEqual(
  names: NameSupply,
  left: Expr,
  right: Expr,
): boolean {
  if ("literal" in left)
    return "literal" in right && literalEqual(left.literal, right.literal);

  if ("ident" in left) return "ident" in right && left.ident === right.ident;

  if ("bin_op" in left)
    return (
      "bin_op" in right &&
      left.bin_op.op === right.bin_op.op &&
      alphaEqual(names, left.bin_op.left, right.bin_op.left) &&
      alphaEqual(names, left.bin_op.right, right.bin_op.right)
    );

  if ("if_then_else" in left) {
    if (!("if_then_else" in right)) return false;
    const l = left.if_then_else;
    const r = right.if_then_else;
    return (
      alphaEqual(names, l.predicate, r.predicate) &&
      alphaEqual(names, l.consequent, r.consequent) &&
      alphaEqual(names, l.alternative, r.alternative)
    );
  }

  if ("func_type" in left)
    return (
      "func_type" in right &&
      binderScopesEqual(
        names,
        left.func_type.params,
        [left.func_type.ret_type],
        right.func_type.params,
        [right.func_type.ret_type],
      )
    );

  if ("lambda" in left)
    return (
      "lambda" in right &&
      binderScopesEqual(
        names,
        left.lambda.params,
        [left.lambda.body],
        right.lambda.params,
        [right.lambda.body],
      )
    );

  if ("call" in left)
    return (
      "call" in right &&
      left.call.args.length === right.call.args.length &&
      alphaEqual(names, left.call.func, right.call.func) &&
      left.call.args.every((arg, i) =>
        alphaEqual(names, arg, right.call.args[i]),
      )
    );

  // Labels must match; the binders behind them may have been renamed.
  if ("struct" in left)
    return (
      "struct" in right &&
      left.struct.length === right.struct.length &&
      left.struct.every(
        ([name], i) => fieldLabel(name) === fieldLabel(right.struct[i][0]),
      ) &&
      binderScopesEqual(names, left.struct, [], right.struct, [])
    );

  if ("union" in left)
    return "union" in right && labelledEqual(names, left.union, right.union);

  if ("pack" in left)
    return (
      "pack" in right &&
      alphaEqual(names, left.pack.type, right.pack.type) &&
      labelledEqual(names, left.pack.assigns, right.pack.assigns)
    );

  if ("member" in left)
    return (
      "member" in right &&
      left.member.field === right.member.field &&
      alphaEqual(names, left.member.record, right.member.record)
    );

  if ("pointer" in left)
    return "pointer" in right && alphaEqual(names, left.pointer, right.pointer);

  if ("reference" in left)
    return (
      "reference" in right && alphaEqual(names, left.reference, right.reference)
    );

  return (
    "dereference" in right &&
    alphaEqual(names, left.dereference, right.dereference)
  );
}

/**
 * **Definitional equality** of two types: both sides go through
 * {@link typeEval}, then {@link alphaEqual}.
 *
 * The checker never compares types any other way.
 *
 * @example
 * ```ts
 * // ctx: T : type = u32
 * typeEqual(state, identExpr("T"), primExpr("u32")); // ok(true)
 * ```
 */
export function typeEqual(
  state: CheckerState,
  left: Expr,
  right: Expr,
): Result<TypingError, boolean> {
  const l = typeEval(state, left);
  if ("err" in l) return l;
  const r = typeEval(state, right);
  if ("err" in r) return r;
  return ok(alphaEqual(state.names, l.ok, r.ok));
}

/* ----------------------------------------------------------------------------
 * Scopes
 * ------------------------------------------------------------------------- */

type Scope = {
  state: CheckerState;
  /** The binders as checked, after any renaming. */
  binders: [Name | null, Expr][];
  /** Names the named binders are in scope under, in order. */
  bound: Name[];
  /** Renames whatever the binders scope over must receive, in order. */
  renames: [Name, Name][];
};

/**
 * Checks a telescope of binders against `type` and binds each named one
 * for the binders after it.
 *
 * A binder whose name is already in the context is renamed to a fresh name
 * for the rest of the telescope; the returned `renames` let the caller
 * apply the same renaming to the body.
 */
function enterScope(
  state: CheckerState,
  binders: [Name | null, Expr][],
  node: Expr,
): Result<TypingError, Scope> {
  const seen = new Set<Name>();
  for (const [name] of binders) {
    if (name === null) continue;
    if (seen.has(name))
      return err({ duplicate_field: { field: name, expr: node } });
    seen.add(name);
  }

  let current = state;
  let rest = binders;
  const bound: Name[] = [];
  const renames: [Name, Name][] = [];

  for (let i = 0; i < rest.length; i++) {
    const [name, type] = rest[i];
    const checked = checkType(current, type, typeType);
    if ("err" in checked) return checked;
    if (name === null) continue;

    let inScope = name;
    if (isBound(current.ctx, name)) {
      inScope = freshName(current.names, name);
      const renamed: [Name, Expr] = [inScope, type];
      rest = renameAfter(name, inScope, rest, [], i).binders;
      rest[i] = renamed;
      renames.push([name, inScope]);
    }

    bound.push(inScope);
    current = extendContext(current, { term: { name: inScope, type } });
  }

  return ok({ state: current, binders: rest, bound, renames });
}

const renameAll = (renames: [Name, Name][], expr: Expr) =>
  renames.reduce((renamed, [from, to]) => alphaRename(from, to, renamed), expr);

/**
 * Instantiates `target`, which sees `binders` as bound, with `values[i]`
 * for binder *i*.
 *
 * The binders' names are first moved to fresh names and only then
 * substituted, so a value that mentions another binder's name is never
 * substituted into twice.
 */
function instantiate(
  names: NameSupply,
  binders: [Name | null, Expr][],
  target: Expr,
  values: Expr[],
): Result<TypingError, Expr> {
  let out = target;
  const pending: [Name, Expr][] = [];

  // Latest binder first, so a repeated name resolves to its innermost one.
  for (let i = binders.length - 1; i >= 0; i--) {
    const [name] = binders[i];
    if (name === null || !freeVars(out).has(name)) continue;
    const fresh = freshName(names, name);
    out = alphaRename(name, fresh, out);
    pending.push([fresh, values[i]]);
  }

  for (const [name, value] of pending) {
    const res = substExpr(names, out, name, value);
    if ("err" in res) return res;
    out = res.ok;
  }
  return ok(out);
}

/* ----------------------------------------------------------------------------
 * Inference
 * ------------------------------------------------------------------------- */

function inferLiteral(literal: Literal): Result<TypingError, Expr> {
  if ("prim" in literal) return ok(copyExpr(typeType));
  if ("boolean" in literal) return ok(copyExpr(boolType));
  if (literal.integral > U64_MAX)
    return err({
      literal_out_of_range: { value: literal.integral, type: primExpr("u64") },
    });
  return ok(primExpr("u64"));
}

/**
 * Infers both operand types. An integral literal next to a
 * non‑literal is checked against the other side's type instead of
 * defaulting to `u64`, so `x + 1` works for any integral `x`.
 */
function inferOperands(
  state: CheckerState,
  left: Expr,
  right: Expr,
): Result<TypingError, { left: Expr; right: Expr }> {
  if (isIntegralLiteral(left) && !isIntegralLiteral(right)) {
    const rightType = inferType(state, right);
    if ("err" in rightType) return rightType;
    const leftType = checkType(state, left, rightType.ok);
    if ("err" in leftType) return leftType;
    return ok({ left: leftType.ok, right: rightType.ok });
  }

  if (isIntegralLiteral(right) && !isIntegralLiteral(left)) {
    const leftType = inferType(state, left);
    if ("err" in leftType) return leftType;
    const rightType = checkType(state, right, leftType.ok);
    if ("err" in rightType) return rightType;
    return ok({ left: leftType.ok, right: rightType.ok });
  }

  const leftType = inferType(state, left);
  if ("err" in leftType) return leftType;
  const rightType = inferType(state, right);
  if ("err" in rightType) return rightType;
  return ok({ left: leftType.ok, right: rightType.ok });
}

function inferBinOp(
  state: CheckerState,
  expr: BinOpExpr,
): Result<TypingError, Expr> {
  const { op, left, right } = expr.bin_op;
  const operands = inferOperands(state, left, right);
  if ("err" in operands) return operands;
  const { left: leftType, right: rightType } = operands.ok;

  if (op === ">>") return ok(rightType);

  const same = typeEqual(state, leftType, rightType);
  if ("err" in same) return same;
  if (!same.ok)
    return err({
      type_mismatch: { expected: leftType, actual: rightType, expr: right },
    });

  const normal = typeEval(state, leftType);
  if ("err" in normal) return normal;

  if (op === "==" || op === "!=") {
    if (!("literal" in normal.ok && "prim" in normal.ok.literal))
      return err({ invalid_operand: { op, type: leftType, expr } });
    return ok(copyExpr(boolType));
  }

  if (integralLimit(normal.ok) === undefined)
    return err({ invalid_operand: { op, type: leftType, expr } });

  return ok(op === "+" || op === "-" ? leftType : copyExpr(boolType));
}

function inferIfThenElse(
  state: CheckerState,
  expr: IfThenElseExpr,
): Result<TypingError, Expr> {
  const { predicate, consequent, alternative } = expr.if_then_else;
  const pred = checkType(state, predicate, boolType);
  if ("err" in pred) return pred;

  const branches = inferOperands(state, consequent, alternative);
  if ("err" in branches) return branches;
  const { left, right } = branches.ok;

  const same = typeEqual(state, left, right);
  if ("err" in same) return same;
  if (!same.ok)
    return err({
      type_mismatch: { expected: left, actual: right, expr: alternative },
    });
  return ok(left);
}

function inferLambda(
  state: CheckerState,
  expr: LambdaExpr,
): Result<TypingError, Expr> {
  const scope = enterScope(state, expr.lambda.params, expr);
  if ("err" in scope) return scope;

  const body = renameAll(scope.ok.renames, expr.lambda.body);
  const bodyType = inferType(scope.ok.state, body);
  if ("err" in bodyType) return bodyType;

  return ok(
    funcTypeExpr(
      bodyType.ok,
      scope.ok.binders.map(([name, type]): [Name | null, Expr] => [
        name,
        copyExpr(type),
      ]),
    ),
  );
}

/**
 * Dependent application. Argument *i* is checked against parameter *i*'s
 * type with arguments `0..i-1` substituted for the parameters they
 * instantiate; the result is the return type with every argument
 * substituted.
 *
 * @example
 * ```ts
 * // id : T(type T, T x)
 * inferType(state, callExpr(identExpr("id"), [primExpr("u32"), integralExpr(5)]));
 * // ok(u32)
 * ```
 */
function inferCall(
  state: CheckerState,
  expr: CallExpr,
): Result<TypingError, Expr> {
  const { func, args } = expr.call;
  const funcType = inferType(state, func);
  if ("err" in funcType) return funcType;

  const normal = typeEval(state, funcType.ok);
  if ("err" in normal) return normal;
  if (!("func_type" in normal.ok))
    return err({ not_a_function: { type: funcType.ok, expr } });

  const { params, ret_type } = normal.ok.func_type;
  if (params.length !== args.length)
    return err({
      arity_mismatch: { expected: params.length, actual: args.length, expr },
    });

  for (const [i, arg] of args.entries()) {
    const paramType = instantiate(
      state.names,
      params.slice(0, i),
      params[i][1],
      args,
    );
    if ("err" in paramType) return paramType;
    const checked = checkType(state, arg, paramType.ok);
    if ("err" in checked) return checked;
  }

  return instantiate(state.names, params, ret_type, args);
}

/**
 * Checks a pack's assignments against `type`, which must evaluate to a
 * struct or union type.
 *
 * Struct: every field exactly once, in declaration order; each value is
 * checked against its field type with the earlier *values* substituted for
 * the earlier fields. Union: exactly one existing alternative.
 */
function checkAssignments(
  state: CheckerState,
  expr: PackExpr,
  type: Expr,
): Result<TypingError, null> {
  const normal = typeEval(state, type);
  if ("err" in normal) return normal;

  const { assigns } = expr.pack;
  const labels = assigns.map(([label]) => label);

  if ("struct" in normal.ok) {
    const fields = normal.ok.struct;
    const fieldNames = fields.map(([name]) => fieldLabel(name));

    const seen = new Set<Name>();
    for (const label of labels) {
      if (!fieldNames.includes(label))
        return err({ unknown_field: { record: type, field: label } });
      if (seen.has(label))
        return err({ duplicate_field: { field: label, expr } });
      seen.add(label);
    }

    if (
      labels.length !== fieldNames.length ||
      labels.some((label, i) => label !== fieldNames[i])
    )
      return err({
        pack_assignment: { type, expected: fieldNames, actual: labels },
      });

    const values = assigns.map(([, value]) => value);
    for (const [i, [, fieldType]] of fields.entries()) {
      const expected = instantiate(
        state.names,
        fields.slice(0, i),
        fieldType,
        values,
      );
      if ("err" in expected) return expected;
      const checked = checkType(state, values[i], expected.ok);
      if ("err" in checked) return checked;
    }
    return ok(null);
  }

  if ("union" in normal.ok) {
    const alternatives = normal.ok.union;
    if (assigns.length !== 1)
      return err({
        pack_assignment: {
          type,
          expected: alternatives.map(([name]) => name),
          actual: labels,
        },
      });

    const [[label, value]] = assigns;
    const alternative = alternatives.find(([name]) => name === label);
    if (!alternative)
      return err({ unknown_field: { record: type, field: label } });

    const checked = checkType(state, value, alternative[1]);
    return "err" in checked ? checked : ok(null);
  }

  return err({ not_a_record: { type, expr } });
}

function inferPack(
  state: CheckerState,
  expr: PackExpr,
): Result<TypingError, Expr> {
  const declared = checkType(state, expr.pack.type, typeType);
  if ("err" in declared) return declared;
  const assigned = checkAssignments(state, expr, expr.pack.type);
  if ("err" in assigned) return assigned;
  return ok(copyExpr(expr.pack.type));
}

/**
 * **Dependent projection.** `record.field` has the field's declared type
 * with every earlier field name replaced by the projection of that field
 * from the same record:
 *
 * ```
 * r : struct { type T; T v; }
 * r.v : r.T
 * ```
 *
 * When `record` is a pack, evaluation later reduces `r.T` to the packed
 * value.
 */
function inferMember(
  state: CheckerState,
  expr: MemberExpr,
): Result<TypingError, Expr> {
  const { record, field } = expr.member;
  const recordType = inferType(state, record);
  if ("err" in recordType) return recordType;

  const normal = typeEval(state, recordType.ok);
  if ("err" in normal) return normal;

  if ("struct" in normal.ok) {
    const fields = normal.ok.struct;
    const index = fields.findIndex(([name]) => fieldLabel(name) === field);
    if (index === -1) return err({ unknown_field: { record, field } });

    const projections = fields.map(([name]) =>
      memberExpr(copyExpr(record), fieldLabel(name)),
    );
    return instantiate(
      state.names,
      fields.slice(0, index),
      fields[index][1],
      projections,
    );
  }

  if ("union" in normal.ok) {
    const alternative = normal.ok.union.find(([name]) => name === field);
    if (!alternative) return err({ unknown_field: { record, field } });
    return ok(copyExpr(alternative[1]));
  }

  return err({ not_a_record: { type: recordType.ok, expr } });
}

/**
 * Infers the type of an expression.
 *
 * ---------------------------------------------------------------------------
 * Rules
 * ---------------------------------------------------------------------------
 * - type literals → `type`; integral literals → `u64`; booleans → `bool`
 * - `ident` → its type in the context, or `unbound`
 * - `bin_op` → `bool` for comparisons, the operand type for `+`/`-`, the
 *   right operand's type for `>>`
 * - `if_then_else` → the type both branches share
 * - `func_type`, `struct`, `union`, `pointer` → `type`, once every
 *   component checks against `type`
 * - `lambda` → `func_type` of the body's type over the parameters
 * - `call` → dependent application, see {@link inferCall}
 * - `pack` → its declared type, once the assignments fit it
 * - `member` → dependent projection, see {@link inferMember}
 * - `reference e` → `T*` for `e : T`; `dereference e` → `T` for `e : T*`
 *
 * ---------------------------------------------------------------------------
 * Errors
 * ---------------------------------------------------------------------------
 * Fail‑fast: the first failing subexpression's error is returned.
 *
 * @example
 * ```ts
 * inferType(freshState(), lambdaExpr([["x", primExpr("u32")]], identExpr("x")));
 * // ok(u32(u32 x))
 * ```
 */
export function inferType(
  state: CheckerState,
  expr: Expr,
): Result<TypingError, Expr> {
  if ("literal" in expr) return inferLiteral(expr.literal);

  if ("ident" in expr) {
    const binding = lookupBinding(state.ctx, expr.ident);
    if (!binding) return err({ unbound: expr.ident });
    return ok(
      copyExpr("term" in binding ? binding.term.type : binding.definition.type),
    );
  }

  if ("bin_op" in expr) return inferBinOp(state, expr);
  if ("if_then_else" in expr) return inferIfThenElse(state, expr);

  if ("func_type" in expr) {
    const scope = enterScope(state, expr.func_type.params, expr);
    if ("err" in scope) return scope;
    const ret = renameAll(scope.ok.renames, expr.func_type.ret_type);
    const checked = checkType(scope.ok.state, ret, typeType);
    return "err" in checked ? checked : ok(copyExpr(typeType));
  }

  if ("lambda" in expr) return inferLambda(state, expr);
  if ("call" in expr) return inferCall(state, expr);

  if ("struct" in expr) {
    const labels = new Set<string>();
    for (const [name] of expr.struct) {
      const label = fieldLabel(name);
      if (labels.has(label))
        return err({ duplicate_field: { field: label, expr } });
      labels.add(label);
    }
    const scope = enterScope(state, expr.struct, expr);
    return "err" in scope ? scope : ok(copyExpr(typeType));
  }

  if ("union" in expr) {
    const seen = new Set<Name>();
    for (const [label, type] of expr.union) {
      if (seen.has(label))
        return err({ duplicate_field: { field: label, expr } });
      seen.add(label);
      const checked = checkType(state, type, typeType);
      if ("err" in checked) return checked;
    }
    return ok(copyExpr(typeType));
  }

  if ("pack" in expr) return inferPack(state, expr);
  if ("member" in expr) return inferMember(state, expr);

  if ("pointer" in expr) {
    const checked = checkType(state, expr.pointer, typeType);
    return "err" in checked ? checked : ok(copyExpr(typeType));
  }

  if ("reference" in expr) {
    const inner = inferType(state, expr.reference);
    return "err" in inner ? inner : ok(pointerExpr(inner.ok));
  }

  const inner = inferType(state, expr.dereference);
  if ("err" in inner) return inner;
  const normal = typeEval(state, inner.ok);
  if ("err" in normal) return normal;
  if (!("pointer" in normal.ok))
    return err({ not_a_pointer: { type: inner.ok, expr } });
  return ok(normal.ok.pointer);
}

/* ----------------------------------------------------------------------------
 * Checking
 * ------------------------------------------------------------------------- */

function checkLambda(
  state: CheckerState,
  expr: LambdaExpr,
  expected: FuncTypeExpr,
): Result<TypingError, null> {
  const { params, body } = expr.lambda;
  const want = expected.func_type;
  if (params.length !== want.params.length)
    return err({
      arity_mismatch: {
        expected: want.params.length,
        actual: params.length,
        expr,
      },
    });

  const scope = enterScope(state, params, expr);
  if ("err" in scope) return scope;

  // Expected parameter names are aligned to the lambda's.
  const idents = scope.ok.bound.map((name) => identExpr(name));
  for (const [i, [, paramType]] of scope.ok.binders.entries()) {
    const wanted = instantiate(
      state.names,
      want.params.slice(0, i),
      want.params[i][1],
      idents,
    );
    if ("err" in wanted) return wanted;
    const same = typeEqual(scope.ok.state, paramType, wanted.ok);
    if ("err" in same) return same;
    if (!same.ok)
      return err({
        type_mismatch: { expected: wanted.ok, actual: paramType, expr },
      });
  }

  const ret = instantiate(state.names, want.params, want.ret_type, idents);
  if ("err" in ret) return ret;
  const checked = checkType(
    scope.ok.state,
    renameAll(scope.ok.renames, body),
    ret.ok,
  );
  return "err" in checked ? checked : ok(null);
}

/**
 * Checks an expression against an expected type, returning that type.
 *
 * Falls back to {@link inferType} plus {@link typeEqual}, except for:
 * - `lambda` against a function type: parameters are compared one by one
 *   and the body is checked against the return type, so parameter names
 *   may differ from the expected type's
 * - `pack`: its declared type must equal the expected one, then the
 *   assignments are checked against the expected type
 * - integral literal against an integral type: a range check instead of
 *   defaulting to `u64`
 * - `if_then_else`: both branches are checked against the expected type
 */
export function checkType(
  state: CheckerState,
  expr: Expr,
  expected: Expr,
): Result<TypingError, Expr> {
  if ("lambda" in expr) {
    const normal = typeEval(state, expected);
    if ("err" in normal) return normal;
    if ("func_type" in normal.ok) {
      const checked = checkLambda(state, expr, normal.ok);
      return "err" in checked ? checked : ok(copyExpr(expected));
    }
  }

  if ("pack" in expr) {
    const declared = checkType(state, expr.pack.type, typeType);
    if ("err" in declared) return declared;
    const same = typeEqual(state, expr.pack.type, expected);
    if ("err" in same) return same;
    if (!same.ok)
      return err({
        type_mismatch: { expected, actual: expr.pack.type, expr },
      });
    const assigned = checkAssignments(state, expr, expected);
    return "err" in assigned ? assigned : ok(copyExpr(expected));
  }

  if ("literal" in expr && "integral" in expr.literal) {
    const normal = typeEval(state, expected);
    if ("err" in normal) return normal;
    const limit = integralLimit(normal.ok);
    if (limit !== undefined) {
      const value = expr.literal.integral;
      if (value > limit)
        return err({ literal_out_of_range: { value, type: expected } });
      return ok(copyExpr(expected));
    }
  }

  if ("if_then_else" in expr) {
    const { predicate, consequent, alternative } = expr.if_then_else;
    const pred = checkType(state, predicate, boolType);
    if ("err" in pred) return pred;
    const cons = checkType(state, consequent, expected);
    if ("err" in cons) return cons;
    const alt = checkType(state, alternative, expected);
    return "err" in alt ? alt : ok(copyExpr(expected));
  }

  const inferred = inferType(state, expr);
  if ("err" in inferred) return inferred;
  const same = typeEqual(state, inferred.ok, expected);
  if ("err" in same) return same;
  if (!same.ok)
    return err({ type_mismatch: { expected, actual: inferred.ok, expr } });
  return ok(copyExpr(expected));
}

/* ----------------------------------------------------------------------------
 * Statements
 * ------------------------------------------------------------------------- */

function checkDecl(
  state: CheckerState,
  stmt: DeclStatement,
): Result<TypingError, CheckerState> {
  const { type, name, init } = stmt.decl;
  const checked = checkType(state, type, typeType);
  if ("err" in checked) return checked;

  if (init === null) return ok(extendContext(state, { term: { name, type } }));

  const value = checkType(state, init, type);
  if ("err" in value) return value;
  const normal = typeEval(state, init);
  if ("err" in normal) return normal;
  return ok(
    extendContext(state, { definition: { name, type, value: normal.ok } }),
  );
}

/**
 * Checks one statement inside a function returning `retType`, and returns
 * the state the statements after it see: extended by a `decl`, unchanged
 * otherwise.
 *
 * A `decl` of a name that is already bound is renamed by
 * {@link checkBlock}; called on its own, such a `decl` shadows the outer
 * binding.
 */
export function checkStatement(
  state: CheckerState,
  stmt: Statement,
  retType: Expr,
): Result<TypingError, CheckerState> {
  if ("empty" in stmt) return ok(state);

  if ("expr" in stmt) {
    const inferred = inferType(state, stmt.expr);
    return "err" in inferred ? inferred : ok(state);
  }

  if ("return" in stmt) {
    const checked = checkType(state, stmt.return, retType);
    return "err" in checked ? checked : ok(state);
  }

  if ("block" in stmt) {
    const inner = checkBlock(state, stmt.block, retType);
    return "err" in inner ? inner : ok(state);
  }

  if ("decl" in stmt) return checkDecl(state, stmt);

  const { conditions, thens, else_block } = stmt.if_then_else;
  for (const [i, condition] of conditions.entries()) {
    const checked = checkType(state, condition, boolType);
    if ("err" in checked) return checked;
    const then = checkBlock(state, thens[i], retType);
    if ("err" in then) return then;
  }
  const elseBlock = checkBlock(state, else_block, retType);
  return "err" in elseBlock ? elseBlock : ok(state);
}

/**
 * Checks a block in order. Each `decl` is visible to the statements after
 * it; one that reuses a bound name is renamed to a fresh name for the rest
 * of the block, so the context never holds two bindings of one name.
 *
 * Returns the state at the end of the block.
 */
export function checkBlock(
  state: CheckerState,
  block: Block,
  retType: Expr,
): Result<TypingError, CheckerState> {
  let current = state;
  let rest = block;

  for (let i = 0; i < rest.length; i++) {
    let stmt = rest[i];
    if ("decl" in stmt && isBound(current.ctx, stmt.decl.name)) {
      const { type, name, init } = stmt.decl;
      const fresh = freshName(current.names, name);
      stmt = declStatement(type, fresh, init);
      rest = [
        ...rest.slice(0, i),
        stmt,
        ...alphaRenameBlock(name, fresh, rest.slice(i + 1)),
      ];
    }

    const next = checkStatement(current, stmt, retType);
    if ("err" in next) return next;
    current = next.ok;
  }

  return ok(current);
}

/* ----------------------------------------------------------------------------
 * Top levels
 * ------------------------------------------------------------------------- */

/** The `func_type` a top‑level function has, built from its signature. */
export const signatureType = (topLevel: TopLevel): Expr =>
  funcTypeExpr(
    copyExpr(topLevel.func.ret_type),
    topLevel.func.params.map(([name, type]): [Name | null, Expr] => [
      name,
      copyExpr(type),
    ]),
  );

/**
 * Checks a top‑level function's parameter types and return type and
 * returns its function type. The body is not looked at.
 */
export function checkSignature(
  state: CheckerState,
  topLevel: TopLevel,
): Result<TypingError, Expr> {
  const type = signatureType(topLevel);
  const checked = inferType(state, type);
  return "err" in checked ? checked : ok(type);
}

/**
 * Checks a top‑level signature and binds the function's name to its type,
 * so later signatures and every body can refer to it.
 */
export function addTopLevel(
  state: CheckerState,
  topLevel: TopLevel,
): Result<TypingError, CheckerState> {
  const { name } = topLevel.func;
  if (isBound(state.ctx, name)) return err({ duplicate_declaration: name });

  const type = checkSignature(state, topLevel);
  if ("err" in type) return type;
  return ok(extendContext(state, { term: { name, type: type.ok } }));
}

/**
 * Checks a top‑level function completely: signature, then body with the
 * parameters bound, against the return type.
 *
 * The function may call itself: if its name is not bound yet it is bound
 * for the body. Returns the state with the function bound.
 *
 * @example
 * ```ts
 * // u32 id(u32 x) { return x; }
 * typeCheckTopLevel(
 *   freshState(),
 *   funcTopLevel("id", primExpr("u32"), [["x", primExpr("u32")]], [
 *     returnStatement(identExpr("x")),
 *   ]),
 * ); // ok(state with id : u32(u32 x))
 * ```
 */
export function typeCheckTopLevel(
  state: CheckerState,
  topLevel: TopLevel,
): Result<TypingError, CheckerState> {
  const { name, params, ret_type, body } = topLevel.func;
  const type = checkSignature(state, topLevel);
  if ("err" in type) return type;

  const withSelf = isBound(state.ctx, name)
    ? state
    : extendContext(state, { term: { name, type: type.ok } });

  const scope = enterScope(withSelf, params, type.ok);
  if ("err" in scope) return scope;

  let scopedBody = body;
  let scopedRet = ret_type;
  for (const [from, to] of scope.ok.renames) {
    scopedBody = alphaRenameBlock(from, to, scopedBody);
    scopedRet = alphaRename(from, to, scopedRet);
  }

  const checked = checkBlock(scope.ok.state, scopedBody, scopedRet);
  return "err" in checked ? checked : ok(withSelf);
}

/* ----------------------------------------------------------------------------
 * Declaration order
 * ------------------------------------------------------------------------- */

/**
 * Orders top‑level declarations so that each one comes after every
 * declaration its **signature** mentions. Bodies are ignored: they are
 * checked once all signatures are bound, so recursion through bodies is
 * fine.
 *
 * ---------------------------------------------------------------------------
 * Algorithm
 * ---------------------------------------------------------------------------
 * Depth‑first search from each declaration in declaration order, visiting
 * dependencies in declaration order too, and emitting in post‑order. A
 * `visiting` stack detects back edges; the declarations on the stack from
 * the repeated one onward form the reported cycle.
 *
 * @returns indices into `topLevels` in checking order, or
 * `cyclic_signature` / `duplicate_declaration`
 *
 * @example
 * ```ts
 * // 0: C A()   1: u32 B()   2: B C()   (signatures mention C, -, B)
 * topologicalSort(unit); // ok([1, 2, 0])
 *
 * // 0: B A()   1: A B()
 * topologicalSort(unit); // err({ cyclic_signature: { names: ["A", "B"] } })
 * ```
 */
export function topologicalSort(
  topLevels: TopLevel[],
): Result<TypingError, number[]> {
  const declared = new Set<Name>();
  for (const { func } of topLevels) {
    if (declared.has(func.name))
      return err({ duplicate_declaration: func.name });
    declared.add(func.name);
  }

  const visited = new Set<number>();
  const visiting: number[] = []; // stack for cycle detection
  const order: number[] = [];

  function dfs(index: number): Result<TypingError, null> {
    if (visited.has(index)) return ok(null);

    if (visiting.includes(index)) {
      const cycle = visiting.slice(visiting.indexOf(index));
      return err({
        cyclic_signature: { names: cycle.map((i) => topLevels[i].func.name) },
      });
    }

    visiting.push(index);

    const mentioned = signatureFreeVars(topLevels[index]);
    for (const [dependency, other] of topLevels.entries()) {
      if (!mentioned.has(other.func.name)) continue;
      const r = dfs(dependency);
      if ("err" in r) return r;
    }

    visiting.pop();
    visited.add(index);
    order.push(index);
    return ok(null);
  }

  for (const index of topLevels.keys()) {
    const r = dfs(index);
    if ("err" in r) return r;
  }

  return ok(order);
}

/** A top‑level declaration that failed to check. */
export type UnitFailure = { name: Name; error: TypingError };

export type CheckedUnit = {
  /** Checking order, as indices into the unit. */
  order: number[];
  /** The final state, holding every declaration that checked. */
  state: CheckerState;
  failures: UnitFailure[];
};

/**
 * The value a top‑level function unfolds to in types: a lambda over its
 * returned expression. Only a body that is a single `return` not mentioning
 * the function itself unfolds; an unnamed parameter gets a fresh name.
 */
function unfolding(names: NameSupply, topLevel: TopLevel): Expr | null {
  const { name, params, body } = topLevel.func;
  if (body.length !== 1) return null;
  const [stmt] = body;
  if (!("return" in stmt)) return null;

  const value = lambdaExpr(
    params.map(([param, type]): [Name, Expr] => [
      param ?? freshName(names, "_"),
      copyExpr(type),
    ]),
    copyExpr(stmt.return),
  );
  return freeVars(value).has(name) ? null : value;
}

/**
 * Checks a whole translation unit.
 *
 * 1. {@link topologicalSort} decides the checking order; its errors are
 *    returned as they are.
 * 2. Every signature is bound in that order ({@link addTopLevel}). A
 *    function whose body is a single `return` of names already bound is
 *    checked right away and rebound as a definition of its
 *    {@link unfolding}, so later signatures and bodies can compute with it:
 *
 *    ```
 *    type Num() { return u32; }
 *    Num() same(Num() x) { return x; }   // same(5) checks: Num() is u32
 *    ```
 * 3. Every other body is checked against the full set of signatures
 *    ({@link typeCheckTopLevel}), so bodies may be mutually recursive.
 *
 * A declaration that fails is recorded in `failures` and left out of the
 * final context; the others keep being checked.
 */
export function typeCheckTranslationUnit(
  state: CheckerState,
  unit: TranslationUnit,
): Result<TypingError, CheckedUnit> {
  const order = topologicalSort(unit);
  if ("err" in order) return order;

  const failures: UnitFailure[] = [];
  const failed = new Set<Name>();
  const pending: TopLevel[] = [];
  let current = state;

  for (const index of order.ok) {
    const topLevel = unit[index];
    const { name } = topLevel.func;
    const added = addTopLevel(current, topLevel);
    if ("err" in added) {
      failures.push({ name, error: added.err });
      continue;
    }
    current = added.ok;

    const value = unfolding(current.names, topLevel);
    const ready =
      value !== null &&
      [...freeVars(value)].every((free) => isBound(current.ctx, free));
    if (value === null || !ready) {
      pending.push(topLevel);
      continue;
    }

    const checked = typeCheckTopLevel(current, topLevel);
    if ("err" in checked) {
      failures.push({ name, error: checked.err });
      failed.add(name);
      continue;
    }
    const normal = typeEval(current, value);
    if ("err" in normal) {
      failures.push({ name, error: normal.err });
      failed.add(name);
      continue;
    }

    const definition: Binding = {
      definition: { name, type: signatureType(topLevel), value: normal.ok },
    };
    current = {
      ctx: current.ctx.map((binding) =>
        bindingName(binding) === name ? definition : binding,
      ),
      names: current.names,
    };
  }

  for (const topLevel of pending) {
    const checked = typeCheckTopLevel(current, topLevel);
    if ("err" in checked) {
      failures.push({ name: topLevel.func.name, error: checked.err });
      failed.add(topLevel.func.name);
    }
  }

  return ok({
    order: order.ok,
    state: {
      ctx: current.ctx.filter((binding) => !failed.has(bindingName(binding))),
      names: current.names,
    },
    failures,
  });
}
