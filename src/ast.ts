import type { Name } from "./names.js";
import type {
  BinaryOp,
  Block,
  Expr,
  Literal,
  PrimType,
  Statement,
  TopLevel,
  TranslationUnit,
} from "./types.js";

// Constructors

export const primExpr = (prim: PrimType): Expr => ({ literal: { prim } });

export const integralExpr = (integral: bigint | number): Expr => ({
  literal: { integral: BigInt(integral) },
});

export const booleanExpr = (boolean: boolean): Expr => ({
  literal: { boolean },
});

export const identExpr = (ident: Name): Expr => ({ ident });

export const binOpExpr = (op: BinaryOp, left: Expr, right: Expr): Expr => ({
  bin_op: { op, left, right },
});

export const ifThenElseExpr = (
  predicate: Expr,
  consequent: Expr,
  alternative: Expr,
): Expr => ({ if_then_else: { predicate, consequent, alternative } });

/**
 * Builds a dependent function type. Parameters are `[name, type]` pairs;
 * pass `null` for an unnamed parameter.
 *
 * ```ts
 * // T(type T, T x)
 * funcTypeExpr(identExpr("T"), [["T", primExpr("type")], ["x", identExpr("T")]]);
 * ```
 */
export const funcTypeExpr = (
  ret_type: Expr,
  params: [Name | null, Expr][],
): Expr => ({ func_type: { ret_type, params } });

export const lambdaExpr = (params: [Name, Expr][], body: Expr): Expr => ({
  lambda: { params, body },
});

export const callExpr = (func: Expr, args: Expr[]): Expr => ({
  call: { func, args },
});

export const structExpr = (fields: [Name, Expr][]): Expr => ({
  struct: fields,
});

export const unionExpr = (fields: [Name, Expr][]): Expr => ({ union: fields });

/**
 * Builds a pack `(type){ .f₀ = v₀, … }`.
 *
 * ```ts
 * packExpr(structExpr([["a", primExpr("u32")]]), [["a", integralExpr(1)]]);
 * ```
 */
export const packExpr = (type: Expr, assigns: [Name, Expr][]): Expr => ({
  pack: { type, assigns },
});

export const memberExpr = (record: Expr, field: Name): Expr => ({
  member: { record, field },
});

export const pointerExpr = (pointer: Expr): Expr => ({ pointer });

export const referenceExpr = (reference: Expr): Expr => ({ reference });

export const dereferenceExpr = (dereference: Expr): Expr => ({ dereference });

export const emptyStatement = (): Statement => ({ empty: null });

export const exprStatement = (expr: Expr): Statement => ({ expr });

export const returnStatement = (expr: Expr): Statement => ({ return: expr });

export const blockStatement = (block: Block): Statement => ({ block });

export const declStatement = (
  type: Expr,
  name: Name,
  init: Expr | null = null,
): Statement => ({ decl: { type, name, init } });

/**
 * Builds `if (c₀) {…} else if (c₁) {…} else {…}` from `[condition, block]`
 * branches and the final else block.
 */
export const ifThenElseStatement = (
  branches: [Expr, Block][],
  else_block: Block = [],
): Statement => ({
  if_then_else: {
    conditions: branches.map(([condition]) => condition),
    thens: branches.map(([, block]) => block),
    else_block,
  },
});

export const funcTopLevel = (
  name: Name,
  ret_type: Expr,
  params: [Name | null, Expr][],
  body: Block,
): TopLevel => ({ func: { name, ret_type, params, body } });

/** The type of types. */
export const typeType: Expr = primExpr("type");

export const boolType: Expr = primExpr("bool");

// Deep copy

const copyLiteral = (lit: Literal): Literal => ({ ...lit });

const copyBinders = <N extends Name | null>(binders: [N, Expr][]) =>
  binders.map(([name, type]): [N, Expr] => [name, copyExpr(type)]);

/**
 * Makes a fully independent duplicate of an expression, arrays included.
 *
 * The result shares no mutable storage with the input: freeing or
 * mutating one never affects the other, and `exprEqual(copyExpr(e), e)`
 * always holds.
 */
export function copyExpr(expr: Expr): Expr {
  if ("literal" in expr) return { literal: copyLiteral(expr.literal) };
  if ("ident" in expr) return { ident: expr.ident };
  if ("bin_op" in expr)
    return binOpExpr(
      expr.bin_op.op,
      copyExpr(expr.bin_op.left),
      copyExpr(expr.bin_op.right),
    );
  if ("if_then_else" in expr)
    return ifThenElseExpr(
      copyExpr(expr.if_then_else.predicate),
      copyExpr(expr.if_then_else.consequent),
      copyExpr(expr.if_then_else.alternative),
    );
  if ("func_type" in expr)
    return funcTypeExpr(
      copyExpr(expr.func_type.ret_type),
      copyBinders(expr.func_type.params),
    );
  if ("lambda" in expr)
    return lambdaExpr(
      copyBinders(expr.lambda.params),
      copyExpr(expr.lambda.body),
    );
  if ("call" in expr)
    return callExpr(copyExpr(expr.call.func), expr.call.args.map(copyExpr));
  if ("struct" in expr) return structExpr(copyBinders(expr.struct));
  if ("union" in expr) return unionExpr(copyBinders(expr.union));
  if ("pack" in expr)
    return packExpr(copyExpr(expr.pack.type), copyBinders(expr.pack.assigns));
  if ("member" in expr)
    return memberExpr(copyExpr(expr.member.record), expr.member.field);
  if ("pointer" in expr) return pointerExpr(copyExpr(expr.pointer));
  if ("reference" in expr) return referenceExpr(copyExpr(expr.reference));
  return dereferenceExpr(copyExpr(expr.dereference));
}

export function copyStatement(stmt: Statement): Statement {
  if ("empty" in stmt) return emptyStatement();
  if ("expr" in stmt) return exprStatement(copyExpr(stmt.expr));
  if ("return" in stmt) return returnStatement(copyExpr(stmt.return));
  if ("block" in stmt) return blockStatement(copyBlock(stmt.block));
  if ("decl" in stmt) {
    const { type, name, init } = stmt.decl;
    return declStatement(copyExpr(type), name, init && copyExpr(init));
  }
  return {
    if_then_else: {
      conditions: stmt.if_then_else.conditions.map(copyExpr),
      thens: stmt.if_then_else.thens.map(copyBlock),
      else_block: copyBlock(stmt.if_then_else.else_block),
    },
  };
}

export const copyBlock = (block: Block): Block => block.map(copyStatement);

export const copyTopLevel = (topLevel: TopLevel): TopLevel =>
  funcTopLevel(
    topLevel.func.name,
    copyExpr(topLevel.func.ret_type),
    copyBinders(topLevel.func.params),
    copyBlock(topLevel.func.body),
  );

export const copyTranslationUnit = (unit: TranslationUnit): TranslationUnit =>
  unit.map(copyTopLevel);

// Strict structural equality

export function literalEqual(left: Literal, right: Literal): boolean {
  if ("prim" in left) return "prim" in right && left.prim === right.prim;
  if ("integral" in left)
    return "integral" in right && left.integral === right.integral;
  return "boolean" in right && left.boolean === right.boolean;
}

const bindersEqual = <N extends Name | null>(
  left: [N, Expr][],
  right: [N, Expr][],
) =>
  left.length === right.length &&
  left.every(([name, type], i) => {
    const other = right[i];
    return (
      other !== undefined && name === other[0] && exprEqual(type, other[1])
    );
  });

const listEqual = <T>(
  left: T[],
  right: T[],
  eq: (left: T, right: T) => boolean,
) =>
  left.length === right.length &&
  left.every((item, i) => {
    const other = right[i];
    return other !== undefined && eq(item, other);
  });

/**
 * Strict structural equality: same variants all the way down, same names,
 * same literals.
 *
 * This does **not** identify alpha‑equivalent terms: `\(u32 x) -> x` and
 * `\(u32 y) -> y` compare unequal. The checker never uses this to compare
 * types; it goes through {@link typeEqual}.
 */
export function exprEqual(left: Expr, right: Expr): boolean {
  if ("literal" in left)
    return "literal" in right && literalEqual(left.literal, right.literal);
  if ("ident" in left) return "ident" in right && left.ident === right.ident;
  if ("bin_op" in left)
    return (
      "bin_op" in right &&
      left.bin_op.op === right.bin_op.op &&
      exprEqual(left.bin_op.left, right.bin_op.left) &&
      exprEqual(left.bin_op.right, right.bin_op.right)
    );
  if ("if_then_else" in left)
    return (
      "if_then_else" in right &&
      exprEqual(left.if_then_else.predicate, right.if_then_else.predicate) &&
      exprEqual(left.if_then_else.consequent, right.if_then_else.consequent) &&
      exprEqual(left.if_then_else.alternative, right.if_then_else.alternative)
    );
  if ("func_type" in left)
    return (
      "func_type" in right &&
      exprEqual(left.func_type.ret_type, right.func_type.ret_type) &&
      bindersEqual(left.func_type.params, right.func_type.params)
    );
  if ("lambda" in left)
    return (
      "lambda" in right &&
      bindersEqual(left.lambda.params, right.lambda.params) &&
      exprEqual(left.lambda.body, right.lambda.body)
    );
  if ("call" in left)
    return (
      "call" in right &&
      exprEqual(left.call.func, right.call.func) &&
      listEqual(left.call.args, right.call.args, exprEqual)
    );
  if ("struct" in left)
    return "struct" in right && bindersEqual(left.struct, right.struct);
  if ("union" in left)
    return "union" in right && bindersEqual(left.union, right.union);
  if ("pack" in left)
    return (
      "pack" in right &&
      exprEqual(left.pack.type, right.pack.type) &&
      bindersEqual(left.pack.assigns, right.pack.assigns)
    );
  if ("member" in left)
    return (
      "member" in right &&
      left.member.field === right.member.field &&
      exprEqual(left.member.record, right.member.record)
    );
  if ("pointer" in left)
    return "pointer" in right && exprEqual(left.pointer, right.pointer);
  if ("reference" in left)
    return "reference" in right && exprEqual(left.reference, right.reference);
  return (
    "dereference" in right && exprEqual(left.dereference, right.dereference)
  );
}

export function statementEqual(left: Statement, right: Statement): boolean {
  if ("empty" in left) return "empty" in right;
  if ("expr" in left) return "expr" in right && exprEqual(left.expr, right.expr);
  if ("return" in left)
    return "return" in right && exprEqual(left.return, right.return);
  if ("block" in left)
    return "block" in right && blockEqual(left.block, right.block);
  if ("decl" in left) {
    if (!("decl" in right)) return false;
    const l = left.decl;
    const r = right.decl;
    if (l.name !== r.name || !exprEqual(l.type, r.type)) return false;
    if (l.init === null || r.init === null) return l.init === r.init;
    return exprEqual(l.init, r.init);
  }
  return (
    "if_then_else" in right &&
    listEqual(
      left.if_then_else.conditions,
      right.if_then_else.conditions,
      exprEqual,
    ) &&
    listEqual(left.if_then_else.thens, right.if_then_else.thens, blockEqual) &&
    blockEqual(left.if_then_else.else_block, right.if_then_else.else_block)
  );
}

export const blockEqual = (left: Block, right: Block): boolean =>
  listEqual(left, right, statementEqual);

export const topLevelEqual = (left: TopLevel, right: TopLevel): boolean =>
  left.func.name === right.func.name &&
  exprEqual(left.func.ret_type, right.func.ret_type) &&
  bindersEqual(left.func.params, right.func.params) &&
  blockEqual(left.func.body, right.func.body);

// Release

const freeBinders = (binders: [Name | null, Expr][]) => {
  for (const [, type] of binders) freeExpr(type);
  binders.length = 0;
};

/**
 * Releases an expression's owned children bottom‑up and empties its arrays.
 *
 * Memory itself is reclaimed by the garbage collector; what this guarantees
 * is that the tree is left as an emptied placeholder and that nothing it
 * owned stays reachable through it. Because trees never share children,
 * freeing one tree can never affect another, in particular not the source
 * of a {@link copyExpr}.
 */
export function freeExpr(expr: Expr): void {
  if ("literal" in expr || "ident" in expr) return;
  if ("bin_op" in expr) {
    freeExpr(expr.bin_op.left);
    freeExpr(expr.bin_op.right);
    return;
  }
  if ("if_then_else" in expr) {
    freeExpr(expr.if_then_else.predicate);
    freeExpr(expr.if_then_else.consequent);
    freeExpr(expr.if_then_else.alternative);
    return;
  }
  if ("func_type" in expr) {
    freeExpr(expr.func_type.ret_type);
    freeBinders(expr.func_type.params);
    return;
  }
  if ("lambda" in expr) {
    freeBinders(expr.lambda.params);
    freeExpr(expr.lambda.body);
    return;
  }
  if ("call" in expr) {
    freeExpr(expr.call.func);
    for (const arg of expr.call.args) freeExpr(arg);
    expr.call.args.length = 0;
    return;
  }
  if ("struct" in expr) return freeBinders(expr.struct);
  if ("union" in expr) return freeBinders(expr.union);
  if ("pack" in expr) {
    freeExpr(expr.pack.type);
    freeBinders(expr.pack.assigns);
    return;
  }
  if ("member" in expr) return freeExpr(expr.member.record);
  if ("pointer" in expr) return freeExpr(expr.pointer);
  if ("reference" in expr) return freeExpr(expr.reference);
  freeExpr(expr.dereference);
}

export function freeStatement(stmt: Statement): void {
  if ("empty" in stmt) return;
  if ("expr" in stmt) return freeExpr(stmt.expr);
  if ("return" in stmt) return freeExpr(stmt.return);
  if ("block" in stmt) return freeBlock(stmt.block);
  if ("decl" in stmt) {
    freeExpr(stmt.decl.type);
    if (stmt.decl.init !== null) freeExpr(stmt.decl.init);
    return;
  }
  for (const condition of stmt.if_then_else.conditions) freeExpr(condition);
  for (const then of stmt.if_then_else.thens) freeBlock(then);
  freeBlock(stmt.if_then_else.else_block);
  stmt.if_then_else.conditions.length = 0;
  stmt.if_then_else.thens.length = 0;
}

export function freeBlock(block: Block): void {
  for (const stmt of block) freeStatement(stmt);
  block.length = 0;
}

export function freeTopLevel(topLevel: TopLevel): void {
  freeExpr(topLevel.func.ret_type);
  freeBinders(topLevel.func.params);
  freeBlock(topLevel.func.body);
}

export function freeTranslationUnit(unit: TranslationUnit): void {
  for (const topLevel of unit) freeTopLevel(topLevel);
  unit.length = 0;
}
