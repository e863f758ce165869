import { describe, expect, it } from "vitest";
import {
  binOpExpr,
  booleanExpr,
  boolType,
  callExpr,
  declStatement,
  dereferenceExpr,
  exprEqual,
  exprStatement,
  funcTopLevel,
  funcTypeExpr,
  identExpr,
  ifThenElseExpr,
  ifThenElseStatement,
  integralExpr,
  lambdaExpr,
  memberExpr,
  packExpr,
  pointerExpr,
  referenceExpr,
  returnStatement,
  structExpr,
  typeType,
  unionExpr,
} from "../src/ast.js";
import { evaluate } from "../src/eval.js";
import {
  bindingName,
  checkBlock,
  checkType,
  inferType,
  typeCheckTopLevel,
  typeCheckTranslationUnit,
  typeEqual,
  typeEval,
} from "../src/typechecker.js";
import { type Expr, freshState, showExpr } from "../src/types.js";
import { expectErr, expectOk, u8, u32, u64 } from "./helpers.js";

// struct { type T; T v; }
const boxType = () =>
  structExpr([
    ["T", typeType],
    ["v", identExpr("T")],
  ]);

const pairType = () =>
  structExpr([
    ["a", u32],
    ["b", u32],
  ]);

const eitherType = () =>
  unionExpr([
    ["a", u32],
    ["b", boolType],
  ]);

const withTerms = (...terms: [string, Expr][]) =>
  freshState(terms.map(([name, type]) => ({ term: { name, type } })));

describe("literals and names", () => {
  it("infers literal types", () => {
    const state = freshState();
    expect(expectOk(inferType(state, u32))).toEqual(typeType);
    expect(expectOk(inferType(state, integralExpr(5)))).toEqual(u64);
    expect(expectOk(inferType(state, booleanExpr(true)))).toEqual(boolType);
  });

  it("rejects integral literals wider than 64 bits", () => {
    const error = expectErr(inferType(freshState(), integralExpr(2n ** 64n)));
    expect(error).toEqual({
      literal_out_of_range: { value: 2n ** 64n, type: u64 },
    });
  });

  it("range-checks a literal against an integral type", () => {
    const state = freshState();
    expect(expectOk(checkType(state, integralExpr(255), u8))).toEqual(u8);
    expect(expectErr(checkType(state, integralExpr(300), u8))).toEqual({
      literal_out_of_range: { value: 300n, type: u8 },
    });
  });

  it("reports unbound names", () => {
    expect(expectErr(inferType(freshState(), identExpr("x")))).toEqual({
      unbound: "x",
    });
  });
});

describe("operators and conditionals", () => {
  const state = withTerms(["x", u32]);

  it("checks an integral literal against the other operand", () => {
    const sum = expectOk(
      inferType(state, binOpExpr("+", identExpr("x"), integralExpr(1))),
    );
    expect(sum).toEqual(u32);
    const less = expectOk(
      inferType(state, binOpExpr("<", integralExpr(1), identExpr("x"))),
    );
    expect(less).toEqual(boolType);
  });

  it("requires both operands to have one type", () => {
    const error = expectErr(
      inferType(state, binOpExpr("+", identExpr("x"), booleanExpr(true))),
    );
    expect(error).toEqual({
      type_mismatch: { expected: u32, actual: boolType, expr: booleanExpr(true) },
    });
  });

  it("requires integral operands for arithmetic", () => {
    const sum = binOpExpr("+", booleanExpr(true), booleanExpr(false));
    expect(expectErr(inferType(state, sum))).toEqual({
      invalid_operand: { op: "+", type: boolType, expr: sum },
    });
  });

  it("compares types for equality", () => {
    expect(expectOk(inferType(state, binOpExpr("==", u32, u8)))).toEqual(
      boolType,
    );
  });

  it("types a conditional by its branches", () => {
    const cond = ifThenElseExpr(booleanExpr(true), integralExpr(1), identExpr("x"));
    expect(expectOk(inferType(state, cond))).toEqual(u32);

    const bad = ifThenElseExpr(integralExpr(1), integralExpr(1), integralExpr(2));
    expect(expectErr(inferType(state, bad))).toEqual({
      type_mismatch: { expected: boolType, actual: u64, expr: integralExpr(1) },
    });
  });
});

describe("functions", () => {
  it("infers a lambda's function type", () => {
    const id = lambdaExpr([["x", u32]], identExpr("x"));
    expect(showExpr(expectOk(inferType(freshState(), id)))).toBe("u32(u32 x)");
  });

  it("substitutes arguments into a dependent call", () => {
    const state = freshState();
    // (\(type T, T x) -> T)(u32, 5)
    const call = callExpr(
      lambdaExpr(
        [
          ["T", typeType],
          ["x", identExpr("T")],
        ],
        identExpr("T"),
      ),
      [u32, integralExpr(5)],
    );
    expect(expectOk(inferType(state, call))).toEqual(typeType);
    expect(expectOk(evaluate(state.names, call))).toEqual(u32);
  });

  it("checks later arguments against earlier ones", () => {
    // id : T(type T, T x)
    const state = withTerms([
      "id",
      funcTypeExpr(identExpr("T"), [
        ["T", typeType],
        ["x", identExpr("T")],
      ]),
    ]);
    const ok = callExpr(identExpr("id"), [boolType, booleanExpr(false)]);
    expect(expectOk(inferType(state, ok))).toEqual(boolType);

    const bad = callExpr(identExpr("id"), [boolType, integralExpr(3)]);
    expect(expectErr(inferType(state, bad))).toEqual({
      type_mismatch: { expected: boolType, actual: u64, expr: integralExpr(3) },
    });
  });

  it("reports arity and non-function calls", () => {
    const state = withTerms(
      ["f", funcTypeExpr(u32, [["x", u32]])],
      ["n", u32],
    );
    const tooMany = callExpr(identExpr("f"), [integralExpr(1), integralExpr(2)]);
    expect(expectErr(inferType(state, tooMany))).toEqual({
      arity_mismatch: { expected: 1, actual: 2, expr: tooMany },
    });

    const notAFunction = callExpr(identExpr("n"), []);
    expect(expectErr(inferType(state, notAFunction))).toEqual({
      not_a_function: { type: u32, expr: notAFunction },
    });
  });

  it("checks a lambda against a type with other parameter names", () => {
    const expected = funcTypeExpr(identExpr("T"), [
      ["T", typeType],
      ["x", identExpr("T")],
    ]);
    const id = lambdaExpr(
      [
        ["U", typeType],
        ["y", identExpr("U")],
      ],
      identExpr("y"),
    );
    expect(expectOk(checkType(freshState(), id, expected))).toEqual(expected);

    const wrong = lambdaExpr(
      [
        ["U", typeType],
        ["y", identExpr("U")],
      ],
      identExpr("U"),
    );
    const error = expectErr(checkType(freshState(), wrong, expected));
    expect("type_mismatch" in error).toBe(true);
  });

  it("compares function types up to parameter names", () => {
    const state = freshState();
    const byT = funcTypeExpr(identExpr("T"), [["T", typeType]]);
    const byU = funcTypeExpr(identExpr("U"), [["U", typeType]]);
    expect(exprEqual(byT, byU)).toBe(false);
    expect(expectOk(typeEqual(state, byT, byU))).toBe(true);
    expect(
      expectOk(typeEqual(state, byT, funcTypeExpr(u32, [["U", typeType]]))),
    ).toBe(false);
  });
});

describe("records", () => {
  it("projects a packed dependent field at the packed type", () => {
    const state = freshState();
    const pack = packExpr(boxType(), [
      ["T", u32],
      ["v", integralExpr(5)],
    ]);
    const type = expectOk(inferType(state, memberExpr(pack, "v")));
    expect(expectOk(typeEqual(state, type, u32))).toBe(true);
  });

  it("projects an opaque dependent field through the record", () => {
    const state = withTerms(["r", boxType()]);
    const type = expectOk(inferType(state, memberExpr(identExpr("r"), "v")));
    expect(exprEqual(type, memberExpr(identExpr("r"), "T"))).toBe(true);
    expect(
      expectOk(inferType(state, memberExpr(identExpr("r"), "T"))),
    ).toEqual(typeType);
  });

  it("checks pack values against earlier values", () => {
    const pack = packExpr(boxType(), [
      ["T", boolType],
      ["v", integralExpr(5)],
    ]);
    expect(expectErr(inferType(freshState(), pack))).toEqual({
      type_mismatch: { expected: boolType, actual: u64, expr: integralExpr(5) },
    });
  });

  it("requires every struct field exactly once and in order", () => {
    const state = freshState();
    const missing = packExpr(pairType(), [["a", integralExpr(1)]]);
    expect(expectErr(inferType(state, missing))).toEqual({
      pack_assignment: { type: pairType(), expected: ["a", "b"], actual: ["a"] },
    });

    const swapped = packExpr(pairType(), [
      ["b", integralExpr(1)],
      ["a", integralExpr(2)],
    ]);
    expect(expectErr(inferType(state, swapped))).toEqual({
      pack_assignment: {
        type: pairType(),
        expected: ["a", "b"],
        actual: ["b", "a"],
      },
    });

    const unknown = packExpr(pairType(), [["c", integralExpr(1)]]);
    expect(expectErr(inferType(state, unknown))).toEqual({
      unknown_field: { record: pairType(), field: "c" },
    });
  });

  it("requires exactly one union alternative", () => {
    const state = freshState();
    const one = packExpr(eitherType(), [["b", booleanExpr(true)]]);
    expect(expectOk(inferType(state, one))).toEqual(eitherType());

    const two = packExpr(eitherType(), [
      ["a", integralExpr(1)],
      ["b", booleanExpr(true)],
    ]);
    expect(expectErr(inferType(state, two))).toEqual({
      pack_assignment: {
        type: eitherType(),
        expected: ["a", "b"],
        actual: ["a", "b"],
      },
    });
  });

  it("checks a pack against an expected type", () => {
    const state = withTerms(["S", typeType]);
    const pack = packExpr(pairType(), [
      ["a", integralExpr(1)],
      ["b", integralExpr(2)],
    ]);
    expect(expectOk(checkType(state, pack, pairType()))).toEqual(pairType());
    expect(expectErr(checkType(state, pack, identExpr("S")))).toEqual({
      type_mismatch: { expected: identExpr("S"), actual: pairType(), expr: pack },
    });
  });

  it("rejects repeated field names", () => {
    const struct = structExpr([
      ["a", u32],
      ["a", u8],
    ]);
    expect(expectErr(inferType(freshState(), struct))).toEqual({
      duplicate_field: { field: "a", expr: struct },
    });
  });

  it("reports projections from non-records", () => {
    const state = withTerms(["n", u32]);
    const member = memberExpr(identExpr("n"), "a");
    expect(expectErr(inferType(state, member))).toEqual({
      not_a_record: { type: u32, expr: member },
    });
  });
});

describe("renamed struct fields", () => {
  // struct { type T; X v; }
  const shadowing = () =>
    structExpr([
      ["T", typeType],
      ["v", identExpr("X")],
    ]);

  it("projects through a struct whose field shadows a definition's name", () => {
    const state = freshState([
      { term: { name: "s", type: shadowing() } },
      { definition: { name: "X", type: typeType, value: identExpr("T") } },
      { term: { name: "T", type: typeType } },
    ]);
    const v = expectOk(inferType(state, memberExpr(identExpr("s"), "v")));
    expect(exprEqual(v, identExpr("T"))).toBe(true);
    expect(
      expectOk(inferType(state, memberExpr(identExpr("s"), "T"))),
    ).toEqual(typeType);
  });

  it("checks a function declaring such a struct", () => {
    // u32 f(type T) { type X = T; struct { type T; X v; } s; s.v; return 0; }
    const f = funcTopLevel(
      "f",
      u32,
      [["T", typeType]],
      [
        declStatement(typeType, "X", identExpr("T")),
        declStatement(shadowing(), "s"),
        exprStatement(memberExpr(identExpr("s"), "v")),
        returnStatement(integralExpr(0)),
      ],
    );
    const state = expectOk(typeCheckTopLevel(freshState(), f));
    expect(state.ctx.map(bindingName)).toEqual(["f"]);
  });

  it("selects and compares fields by label", () => {
    const state = freshState();
    // struct { type T#0; T#0 v; }
    const renamed = structExpr([
      ["T#0", typeType],
      ["v", identExpr("T#0")],
    ]);
    expect(expectOk(typeEqual(state, renamed, boxType()))).toBe(true);
    expect(
      expectOk(
        typeEqual(
          state,
          renamed,
          structExpr([
            ["U", typeType],
            ["v", identExpr("U")],
          ]),
        ),
      ),
    ).toBe(false);

    const pack = packExpr(renamed, [
      ["T", u32],
      ["v", integralExpr(5)],
    ]);
    expect(expectOk(inferType(state, pack))).toEqual(renamed);
  });
});

describe("pointers", () => {
  const state = withTerms(["x", u32]);

  it("references and dereferences", () => {
    expect(expectOk(inferType(state, pointerExpr(u32)))).toEqual(typeType);
    expect(
      expectOk(inferType(state, referenceExpr(identExpr("x")))),
    ).toEqual(pointerExpr(u32));
    expect(
      expectOk(
        inferType(state, dereferenceExpr(referenceExpr(identExpr("x")))),
      ),
    ).toEqual(u32);
  });

  it("refuses to dereference a non-pointer", () => {
    const deref = dereferenceExpr(identExpr("x"));
    expect(expectErr(inferType(state, deref))).toEqual({
      not_a_pointer: { type: u32, expr: deref },
    });
  });
});

describe("definitions", () => {
  it("expands definitions during type evaluation", () => {
    const state = freshState([
      { definition: { name: "N", type: u32, value: integralExpr(3) } },
      { definition: { name: "T", type: typeType, value: u32 } },
    ]);
    expect(
      expectOk(typeEval(state, binOpExpr("+", identExpr("N"), integralExpr(1)))),
    ).toEqual(integralExpr(4));
    expect(expectOk(typeEqual(state, identExpr("T"), u32))).toBe(true);
  });

  it("lets a declaration reuse a bound name", () => {
    const state = withTerms(["x", u32]);
    // type x = bool; x b = true; return x;
    const block = [
      declStatement(typeType, "x", boolType),
      declStatement(identExpr("x"), "b", booleanExpr(true)),
      returnStatement(identExpr("b")),
    ];
    const after = expectOk(checkBlock(state, block, boolType));
    expect(after.ctx.map(bindingName)).toEqual(["b", "x#0", "x"]);
  });
});

describe("top levels", () => {
  it("checks a body against the return type", () => {
    // u32 next(u32 n) { u32 m = n + 1; if (m > 10) { return m; } else { return 0; } }
    const next = funcTopLevel(
      "next",
      u32,
      [["n", u32]],
      [
        declStatement(u32, "m", binOpExpr("+", identExpr("n"), integralExpr(1))),
        ifThenElseStatement(
          [
            [
              binOpExpr(">", identExpr("m"), integralExpr(10)),
              [returnStatement(identExpr("m"))],
            ],
          ],
          [returnStatement(integralExpr(0))],
        ),
      ],
    );
    const state = expectOk(typeCheckTopLevel(freshState(), next));
    expect(state.ctx.map(bindingName)).toEqual(["next"]);
  });

  it("reports a return of the wrong type", () => {
    const bad = funcTopLevel("bad", boolType, [], [
      returnStatement(integralExpr(1)),
    ]);
    expect(expectErr(typeCheckTopLevel(freshState(), bad))).toEqual({
      type_mismatch: { expected: boolType, actual: u64, expr: integralExpr(1) },
    });
  });

  it("lets a function call itself", () => {
    const loop = funcTopLevel(
      "loop",
      u32,
      [["n", u32]],
      [returnStatement(callExpr(identExpr("loop"), [identExpr("n")]))],
    );
    expectOk(typeCheckTopLevel(freshState(), loop));
  });

  it("checks a translation unit in signature order", () => {
    // type Num() { return u32; }   Num() same(Num() x) { return x; }
    const num = callExpr(identExpr("Num"), []);
    const unit = [
      funcTopLevel("same", num, [["x", num]], [returnStatement(identExpr("x"))]),
      funcTopLevel("Num", typeType, [], [returnStatement(u32)]),
    ];
    const checked = expectOk(typeCheckTranslationUnit(freshState(), unit));
    expect(checked.order).toEqual([1, 0]);
    expect(checked.failures).toEqual([]);
    expect(checked.state.ctx.map(bindingName)).toEqual(["same", "Num"]);
  });

  it("keeps checking after a failed declaration", () => {
    const unit = [
      funcTopLevel("bad", boolType, [], [returnStatement(integralExpr(1))]),
      funcTopLevel("good", u32, [], [returnStatement(integralExpr(2))]),
      funcTopLevel("lost", identExpr("Missing"), [], []),
    ];
    const checked = expectOk(typeCheckTranslationUnit(freshState(), unit));
    // bad's body is a single return, so it is checked with its signature.
    expect(checked.failures.map(({ name }) => name)).toEqual(["bad", "lost"]);
    expect(checked.failures[1].error).toEqual({ unbound: "Missing" });
    expect(checked.state.ctx.map(bindingName)).toEqual(["good"]);
  });

  it("unfolds a function that computes a type", () => {
    // type Num() { return u32; }
    // Num() same(Num() x) { return x; }
    // u32 useSame() { return same(5); }
    const num = callExpr(identExpr("Num"), []);
    const unit = [
      funcTopLevel("same", num, [["x", num]], [returnStatement(identExpr("x"))]),
      funcTopLevel("Num", typeType, [], [returnStatement(u32)]),
      funcTopLevel("useSame", u32, [], [
        returnStatement(callExpr(identExpr("same"), [integralExpr(5)])),
      ]),
    ];
    const checked = expectOk(typeCheckTranslationUnit(freshState(), unit));
    expect(checked.failures).toEqual([]);
    expect(expectOk(typeEval(checked.state, num))).toEqual(u32);
    expect(
      expectOk(typeEval(checked.state, callExpr(identExpr("useSame"), []))),
    ).toEqual(integralExpr(5));
  });

  it("keeps a function with a longer body opaque", () => {
    // type Num() { type T = u32; return T; }
    const unit = [
      funcTopLevel("Num", typeType, [], [
        declStatement(typeType, "T", u32),
        returnStatement(identExpr("T")),
      ]),
    ];
    const checked = expectOk(typeCheckTranslationUnit(freshState(), unit));
    const num = callExpr(identExpr("Num"), []);
    expect(expectOk(typeEval(checked.state, num))).toEqual(num);
  });

  it("checks mutually recursive bodies", () => {
    const even = funcTopLevel(
      "even",
      boolType,
      [["n", u32]],
      [returnStatement(callExpr(identExpr("odd"), [identExpr("n")]))],
    );
    const odd = funcTopLevel(
      "odd",
      boolType,
      [["n", u32]],
      [returnStatement(callExpr(identExpr("even"), [identExpr("n")]))],
    );
    const checked = expectOk(typeCheckTranslationUnit(freshState(), [even, odd]));
    expect(checked.failures).toEqual([]);
  });
});
