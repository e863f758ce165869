import type { Name, NameSupply } from "./names.js";
import { freshNames } from "./names.js";

/**
 * The primitive type constants of the language.
 *
 * `type` is the type of types (so `u32 : type` and `type : type`), `void` is
 * the empty return type, the sized integers are C's fixed‑width integers and
 * `bool` is the type of the two boolean constants.
 */
export type PrimType =
  | "type"
  | "void"
  | "u8"
  | "s8"
  | "u16"
  | "s16"
  | "u32"
  | "s32"
  | "u64"
  | "s64"
  | "bool";

/** A primitive type constant, e.g. `u32`. */
export type PrimLiteral = { prim: PrimType };

/** An unsigned integral constant of arbitrary width, e.g. `42`. */
export type IntegralLiteral = { integral: bigint };

/** `true` or `false`. */
export type BooleanLiteral = { boolean: boolean };

/**
 * A literal: either a primitive type constant or a value constant.
 *
 * Literals are immutable and copied by value. Structural equality
 * distinguishes value literals from type literals, so `{ integral: 0n }`
 * never equals `{ prim: "u8" }`.
 */
export type Literal = PrimLiteral | IntegralLiteral | BooleanLiteral;

/** Binary operators. `>>` is sequencing: evaluate the left, keep the right. */
export type BinaryOp = "==" | "!=" | "<" | "<=" | ">" | ">=" | "+" | "-" | ">>";

export type LiteralExpr = { literal: Literal };

export type IdentExpr = { ident: Name };

export type BinOpExpr = {
  bin_op: { op: BinaryOp; left: Expr; right: Expr };
};

/** Expression‑level conditional `if p then a else b`. */
export type IfThenElseExpr = {
  if_then_else: { predicate: Expr; consequent: Expr; alternative: Expr };
};

/**
 * A **dependent function type** `R(T₀ x₀, T₁ x₁, …)`.
 *
 * **What it represents**
 * The parameters form a telescope: parameter *i*'s type may mention the
 * names of parameters `0..i-1`, and the return type may mention all of them.
 * Parameter names are optional; an unnamed parameter cannot be referred to.
 *
 * **Examples**
 * ```ts
 * // T(type T, T x): the identity's type
 * funcTypeExpr(identExpr("T"), [
 *   ["T", primExpr("type")],
 *   ["x", identExpr("T")],
 * ]);
 *
 * // u32(u32, u32): nothing depends on anything
 * funcTypeExpr(primExpr("u32"), [
 *   [null, primExpr("u32")],
 *   [null, primExpr("u32")],
 * ]);
 * ```
 */
export type FuncTypeExpr = {
  func_type: { ret_type: Expr; params: [Name | null, Expr][] };
};

/**
 * A function value `\(T₀ x₀, …) -> body`. Unlike {@link FuncTypeExpr},
 * every parameter is named.
 */
export type LambdaExpr = {
  lambda: { params: [Name, Expr][]; body: Expr };
};

export type CallExpr = { call: { func: Expr; args: Expr[] } };

/**
 * A **dependent struct type** `struct { T₀ f₀; T₁ f₁; … }`.
 *
 * The fields form a telescope: field *i*'s type may mention fields
 * `0..i-1`. Field names are at the same time binders (for later field types)
 * and member labels (for {@link MemberExpr}). A binder renamed to avoid
 * capture keeps its label: `T#3` is still selected by `.T` (see
 * {@link fieldLabel}).
 *
 * ```ts
 * // struct { type T; T v; }
 * structExpr([
 *   ["T", primExpr("type")],
 *   ["v", identExpr("T")],
 * ]);
 * ```
 */
export type StructExpr = { struct: [Name, Expr][] };

/**
 * A union type `union { T₀ a₀; T₁ a₁; … }`. Alternatives are independent:
 * no alternative's type can see a sibling's name.
 */
export type UnionExpr = { union: [Name, Expr][] };

/**
 * Constructs a struct or union value: `(T){ .a = 1, .b = 2 }`.
 *
 * The field names are selectors, not binders. Against a struct type every
 * field is assigned exactly once in field order; against a union type
 * exactly one alternative is assigned.
 */
export type PackExpr = {
  pack: { type: Expr; assigns: [Name, Expr][] };
};

/** Projection `record.field`. */
export type MemberExpr = { member: { record: Expr; field: Name } };

/** The pointer type `T*`. */
export type PointerExpr = { pointer: Expr };

/** Address‑of `&e`. */
export type ReferenceExpr = { reference: Expr };

/** Dereference `*e`. */
export type DereferenceExpr = { dereference: Expr };

/**
 * Every expression of the language. Types are expressions too: `u32`,
 * `struct { … }` and `R(T x)` are all `Expr`s whose type is `type`.
 */
export type Expr =
  | LiteralExpr
  | IdentExpr
  | BinOpExpr
  | IfThenElseExpr
  | FuncTypeExpr
  | LambdaExpr
  | CallExpr
  | StructExpr
  | UnionExpr
  | PackExpr
  | MemberExpr
  | PointerExpr
  | ReferenceExpr
  | DereferenceExpr;

export type EmptyStatement = { empty: null };

export type ExprStatement = { expr: Expr };

export type ReturnStatement = { return: Expr };

export type BlockStatement = { block: Block };

/**
 * `T name;` or `T name = init;`. The name is visible to the statements that
 * follow it in the same block, and nowhere else.
 */
export type DeclStatement = {
  decl: { type: Expr; name: Name; init: Expr | null };
};

/**
 * A chained `if (c₀) {…} else if (c₁) {…} else {…}`. `conditions[i]` guards
 * `thens[i]`; the arrays always have the same length.
 */
export type IfThenElseStatement = {
  if_then_else: { conditions: Expr[]; thens: Block[]; else_block: Block };
};

export type Statement =
  | EmptyStatement
  | ExprStatement
  | ReturnStatement
  | BlockStatement
  | DeclStatement
  | IfThenElseStatement;

/** An ordered sequence of statements forming one lexical scope. */
export type Block = Statement[];

/**
 * A named top‑level function `R name(T₀ x₀, …) { body }`.
 *
 * Its *signature* is the return type together with the parameter types; the
 * declaration order resolver only looks at the signature.
 */
export type FuncTopLevel = {
  func: {
    name: Name;
    ret_type: Expr;
    params: [Name | null, Expr][];
    body: Block;
  };
};

export type TopLevel = FuncTopLevel;

/** Top‑level declarations in the order they were written. */
export type TranslationUnit = TopLevel[];

/** A parameter, local or top‑level signature whose value is unknown. */
export type TermBinding = { term: { name: Name; type: Expr } };

/**
 * An initialised declaration `T name = value;`. Declarations are immutable,
 * so `name` is definitionally equal to `value`, which is stored in normal
 * form.
 */
export type DefinitionBinding = {
  definition: { name: Name; type: Expr; value: Expr };
};

export type Binding = TermBinding | DefinitionBinding;

/**
 * The typing context, **newest binding first**. Extending a scope builds a
 * new array; leaving it reuses the outer one.
 */
export type Context = Binding[];

/**
 * Everything the checker threads through its calls.
 *
 * - `ctx`: the typing context, see {@link Context}
 * - `names`: the name table used for fresh names, see {@link NameSupply}
 *
 * The context is never mutated in place; the name table only grows.
 */
export type CheckerState = {
  ctx: Context;
  names: NameSupply;
};

export const freshState = (
  ctx: Context = [],
  names: NameSupply = freshNames(),
): CheckerState => ({ ctx, names }) satisfies CheckerState;

/** Options for {@link evaluate}. */
export type EvalConfig = {
  /** Maximum number of beta reductions before evaluation gives up. */
  maxSteps: number;
};

export type UnboundNameError = { unbound: Name };

export type ArityMismatchError = {
  arity_mismatch: { expected: number; actual: number; expr: Expr };
};

/**
 * Raised when an expression's type is not definitionally equal to the type
 * required of it.
 *
 * Both types are carried as expressions so {@link showError} can print them:
 *
 * ```
 * Type mismatch in 5:
 *   Expected: bool
 *   Actual:   u64
 * ```
 */
export type TypeMismatchError = {
  type_mismatch: { expected: Expr; actual: Expr; expr: Expr };
};

export type NotAFunctionTypeError = {
  not_a_function: { type: Expr; expr: Expr };
};

export type NotARecordTypeError = {
  not_a_record: { type: Expr; expr: Expr };
};

export type NotAPointerTypeError = {
  not_a_pointer: { type: Expr; expr: Expr };
};

export type UnknownFieldError = {
  unknown_field: { record: Expr; field: Name };
};

/** A field, alternative or parameter name used twice in one list. */
export type DuplicateFieldError = {
  duplicate_field: { field: Name; expr: Expr };
};

/**
 * A pack that does not assign exactly the struct's fields in order, or that
 * assigns other than one alternative of a union.
 */
export type PackAssignmentError = {
  pack_assignment: { type: Expr; expected: Name[]; actual: Name[] };
};

export type InvalidOperandError = {
  invalid_operand: { op: BinaryOp; type: Expr; expr: Expr };
};

export type LiteralOutOfRangeError = {
  literal_out_of_range: { value: bigint; type: Expr };
};

export type EvaluationLimitError = { evaluation_limit: { steps: number } };

/** Top‑level declarations whose signatures depend on each other. */
export type CyclicSignatureError = { cyclic_signature: { names: Name[] } };

export type DuplicateDeclarationError = { duplicate_declaration: Name };

export type TypingError =
  | UnboundNameError
  | ArityMismatchError
  | TypeMismatchError
  | NotAFunctionTypeError
  | NotARecordTypeError
  | NotAPointerTypeError
  | UnknownFieldError
  | DuplicateFieldError
  | PackAssignmentError
  | InvalidOperandError
  | LiteralOutOfRangeError
  | EvaluationLimitError
  | CyclicSignatureError
  | DuplicateDeclarationError;

/**
 * Success or failure of a checking operation.
 *
 * Every operation of the checker returns a `Result` instead of throwing.
 * Callers test with `"err" in result` and return early:
 *
 * ```ts
 * const fnType = inferType(state, call.func);
 * if ("err" in fnType) return fnType;
 * ```
 */
export type Result<TErr, TOk> = { ok: TOk } | { err: TErr };

export const ok = <T>(val: T) => ({ ok: val });

export const err = <T>(val: T) => ({ err: val });

/**
 * Extracts the success value, throwing an `Error` with {@link showError}'s
 * text otherwise. Meant for examples and scripts, not for the checker
 * itself.
 */
export const unwrap = <TOk = unknown>(
  result: Result<TypingError, TOk>,
  msg: string = "Failed",
): TOk => {
  if ("ok" in result) return result.ok;
  throw new Error(`${msg}: ${showError(result.err)}`);
};

export function showLiteral(lit: Literal): string {
  if ("prim" in lit) return lit.prim;
  if ("integral" in lit) return lit.integral.toString();
  return lit.boolean ? "true" : "false";
}

const isSimple = (expr: Expr) =>
  "literal" in expr || "ident" in expr || "struct" in expr || "union" in expr;

const showOperand = (expr: Expr) =>
  isSimple(expr) ? showExpr(expr) : `(${showExpr(expr)})`;

const showParam = ([name, type]: [Name | null, Expr]) =>
  name === null ? showExpr(type) : `${showExpr(type)} ${name}`;

const showFields = (fields: [Name, Expr][]) =>
  fields.map(([name, type]) => `${showExpr(type)} ${name}; `).join("");

/**
 * Pretty‑prints an expression in the language's own surface syntax.
 *
 * Operands that are not atoms are parenthesised, so the output always
 * re‑reads unambiguously.
 *
 * @example
 * ```ts
 * showExpr(structExpr([["T", primExpr("type")], ["v", identExpr("T")]]));
 * // "struct { type T; T v; }"
 *
 * showExpr(memberExpr(identExpr("r"), "v"));               // "r.v"
 * showExpr(binOpExpr("+", identExpr("x"), integralExpr(1n))); // "x + 1"
 * ```
 */
export function showExpr(expr: Expr): string {
  if ("literal" in expr) return showLiteral(expr.literal);
  if ("ident" in expr) return expr.ident;
  if ("bin_op" in expr) {
    const { op, left, right } = expr.bin_op;
    return `${showOperand(left)} ${op} ${showOperand(right)}`;
  }
  if ("if_then_else" in expr) {
    const { predicate, consequent, alternative } = expr.if_then_else;
    return `if ${showExpr(predicate)} then ${showExpr(consequent)} else ${showExpr(alternative)}`;
  }
  if ("func_type" in expr)
    return `${showOperand(expr.func_type.ret_type)}(${expr.func_type.params.map(showParam).join(", ")})`;
  if ("lambda" in expr)
    return `\\(${expr.lambda.params.map(showParam).join(", ")}) -> ${showExpr(expr.lambda.body)}`;
  if ("call" in expr)
    return `${showOperand(expr.call.func)}(${expr.call.args.map(showExpr).join(", ")})`;
  if ("struct" in expr) return `struct { ${showFields(expr.struct)}}`;
  if ("union" in expr) return `union { ${showFields(expr.union)}}`;
  if ("pack" in expr) {
    const assigns = expr.pack.assigns
      .map(([field, value]) => `.${field} = ${showExpr(value)}`)
      .join(", ");
    return `(${showExpr(expr.pack.type)}){ ${assigns} }`;
  }
  if ("member" in expr)
    return `${showOperand(expr.member.record)}.${expr.member.field}`;
  if ("pointer" in expr) return `${showOperand(expr.pointer)}*`;
  if ("reference" in expr) return `&${showOperand(expr.reference)}`;
  return `*${showOperand(expr.dereference)}`;
}

const indent = (nesting: number) => "    ".repeat(nesting);

export function showBlock(block: Block, nesting: number = 0): string {
  return block.map((s) => showStatement(s, nesting)).join("");
}

/** Pretty‑prints a statement, one line per statement, four‑space indents. */
export function showStatement(stmt: Statement, nesting: number = 0): string {
  const pad = indent(nesting);
  if ("empty" in stmt) return `${pad};\n`;
  if ("expr" in stmt) return `${pad}${showExpr(stmt.expr)};\n`;
  if ("return" in stmt) return `${pad}return ${showExpr(stmt.return)};\n`;
  if ("block" in stmt)
    return `${pad}{\n${showBlock(stmt.block, nesting + 1)}${pad}}\n`;
  if ("decl" in stmt) {
    const { type, name, init } = stmt.decl;
    const rhs = init === null ? "" : ` = ${showExpr(init)}`;
    return `${pad}${showExpr(type)} ${name}${rhs};\n`;
  }

  const { conditions, thens, else_block } = stmt.if_then_else;
  let out = "";
  conditions.forEach((condition, i) => {
    out += i === 0 ? pad : `${pad}} else `;
    out += `if (${showExpr(condition)}) {\n`;
    out += showBlock(thens[i] ?? [], nesting + 1);
  });
  out += `${pad}} else {\n${showBlock(else_block, nesting + 1)}${pad}}\n`;
  return out;
}

export function showTopLevel(topLevel: TopLevel): string {
  const { name, ret_type, params, body } = topLevel.func;
  return `${showExpr(ret_type)} ${name}(${params.map(showParam).join(", ")}) {\n${showBlock(body, 1)}}\n`;
}

export const showTranslationUnit = (unit: TranslationUnit) =>
  unit.map(showTopLevel).join("\n");

export const showBinding = (bind: Binding) => {
  if ("term" in bind) return `${bind.term.name} : ${showExpr(bind.term.type)}`;
  const { name, type, value } = bind.definition;
  return `${name} : ${showExpr(type)} = ${showExpr(value)}`;
};

/** One binding per line, newest first. */
export const showContext = (context: Context) =>
  context.map(showBinding).join("\n");

/**
 * Renders a {@link TypingError} as a human‑readable, possibly multi‑line
 * message. Destination and formatting beyond this text belong to the
 * caller.
 */
export function showError(error: TypingError): string {
  if ("unbound" in error) return `Unbound name: ${error.unbound}`;

  if ("arity_mismatch" in error) {
    const { expected, actual, expr } = error.arity_mismatch;
    return `Arity mismatch in ${showExpr(expr)}:\n  Expected: ${expected}\n  Actual:   ${actual}`;
  }

  if ("type_mismatch" in error) {
    const { expected, actual, expr } = error.type_mismatch;
    return `Type mismatch in ${showExpr(expr)}:\n  Expected: ${showExpr(expected)}\n  Actual:   ${showExpr(actual)}`;
  }

  if ("not_a_function" in error) {
    const { type, expr } = error.not_a_function;
    return `Not a function type:\n  ${showExpr(expr)} : ${showExpr(type)}`;
  }

  if ("not_a_record" in error) {
    const { type, expr } = error.not_a_record;
    return `Not a struct or union type:\n  ${showExpr(expr)} : ${showExpr(type)}`;
  }

  if ("not_a_pointer" in error) {
    const { type, expr } = error.not_a_pointer;
    return `Not a pointer type:\n  ${showExpr(expr)} : ${showExpr(type)}`;
  }

  if ("unknown_field" in error) {
    const { record, field } = error.unknown_field;
    return `Unknown field '${field}' in:\n  ${showExpr(record)}`;
  }

  if ("duplicate_field" in error) {
    const { field, expr } = error.duplicate_field;
    return `Duplicate field '${field}' in:\n  ${showExpr(expr)}`;
  }

  if ("pack_assignment" in error) {
    const { type, expected, actual } = error.pack_assignment;
    return (
      `Pack does not match ${showExpr(type)}:\n` +
      `  Expected: ${expected.join(", ")}\n` +
      `  Actual:   ${actual.join(", ")}`
    );
  }

  if ("invalid_operand" in error) {
    const { op, type, expr } = error.invalid_operand;
    return `Invalid operand for '${op}':\n  ${showExpr(expr)} : ${showExpr(type)}`;
  }

  if ("literal_out_of_range" in error) {
    const { value, type } = error.literal_out_of_range;
    return `Literal ${value} does not fit in ${showExpr(type)}`;
  }

  if ("evaluation_limit" in error)
    return `Evaluation exceeded ${error.evaluation_limit.steps} steps`;

  if ("cyclic_signature" in error)
    return `Cyclic signature dependency: ${error.cyclic_signature.names.join(" → ")}`;

  return `Duplicate declaration: ${error.duplicate_declaration}`;
}
