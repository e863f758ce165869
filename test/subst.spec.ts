import { describe, expect, it } from "vitest";
import {
  binOpExpr,
  blockEqual,
  booleanExpr,
  callExpr,
  copyExpr,
  declStatement,
  exprEqual,
  funcTypeExpr,
  identExpr,
  ifThenElseStatement,
  integralExpr,
  lambdaExpr,
  packExpr,
  returnStatement,
  statementEqual,
  structExpr,
  typeType,
  unionExpr,
} from "../src/ast.js";
import { evaluate } from "../src/eval.js";
import { fieldLabel, freshNames } from "../src/names.js";
import {
  alphaRename,
  substBlock,
  substExpr,
  substStatement,
} from "../src/subst.js";
import { expectOk, u32 } from "./helpers.js";

describe("substExpr", () => {
  it("leaves a tree without the name structurally unchanged", () => {
    const names = freshNames();
    const tree = lambdaExpr(
      [
        ["T", typeType],
        ["x", identExpr("T")],
      ],
      callExpr(identExpr("f"), [identExpr("x"), identExpr("y")]),
    );
    const result = expectOk(substExpr(names, tree, "z", integralExpr(1)));
    expect(exprEqual(result, tree)).toBe(true);
  });

  it("replaces only identifiers equal to the name", () => {
    const names = freshNames();
    const result = expectOk(
      substExpr(
        names,
        binOpExpr("+", identExpr("x"), identExpr("y")),
        "x",
        integralExpr(1),
      ),
    );
    expect(
      exprEqual(result, binOpExpr("+", integralExpr(1), identExpr("y"))),
    ).toBe(true);
  });

  it("stops at a binder that shadows the name", () => {
    const names = freshNames();
    const tree = lambdaExpr([["x", u32]], identExpr("x"));
    const result = expectOk(substExpr(names, tree, "x", integralExpr(1)));
    expect(exprEqual(result, tree)).toBe(true);
  });

  it("renames a lambda parameter that would capture the replacement", () => {
    const names = freshNames();
    // (\(T y) -> x)[x := y]
    const tree = lambdaExpr([["y", identExpr("T")]], identExpr("x"));
    const result = expectOk(substExpr(names, tree, "x", identExpr("y")));

    expect(
      exprEqual(result, lambdaExpr([["y#0", identExpr("T")]], identExpr("y"))),
    ).toBe(true);

    // (\(u32 y) -> result(1))(2) still returns the outer y.
    const closed = callExpr(
      lambdaExpr([["y", u32]], callExpr(result, [integralExpr(1)])),
      [integralExpr(2)],
    );
    const value = expectOk(evaluate(names, closed));
    expect(exprEqual(value, integralExpr(2))).toBe(true);
  });

  it("renames a function type binder for the return type", () => {
    const names = freshNames();
    // x(type T)[x := T]
    const tree = funcTypeExpr(identExpr("x"), [["T", typeType]]);
    const result = expectOk(substExpr(names, tree, "x", identExpr("T")));
    expect(
      exprEqual(result, funcTypeExpr(identExpr("T"), [["T#0", typeType]])),
    ).toBe(true);
  });

  it("does not rename when the name is not used after the binder", () => {
    const names = freshNames();
    // u32(x, type T)[x := T]: nothing after T mentions x
    const tree = funcTypeExpr(u32, [
      [null, identExpr("x")],
      ["T", typeType],
    ]);
    const result = expectOk(substExpr(names, tree, "x", identExpr("T")));
    expect(
      exprEqual(
        result,
        funcTypeExpr(u32, [
          [null, identExpr("T")],
          ["T", typeType],
        ]),
      ),
    ).toBe(true);
  });

  it("renames a struct field binder that would capture", () => {
    const names = freshNames();
    // struct { type T; x v; }[x := T]
    const tree = structExpr([
      ["T", typeType],
      ["v", identExpr("x")],
    ]);
    const result = expectOk(substExpr(names, tree, "x", identExpr("T")));
    expect(
      exprEqual(
        result,
        structExpr([
          ["T#0", typeType],
          ["v", identExpr("T")],
        ]),
      ),
    ).toBe(true);
    expect("struct" in result && fieldLabel(result.struct[0][0])).toBe("T");
  });

  it("substitutes into struct fields when nothing is captured", () => {
    const names = freshNames();
    const tree = structExpr([
      ["T", typeType],
      ["v", identExpr("x")],
    ]);
    const result = expectOk(substExpr(names, tree, "x", u32));
    expect(
      exprEqual(
        result,
        structExpr([
          ["T", typeType],
          ["v", u32],
        ]),
      ),
    ).toBe(true);
  });

  it("substitutes union alternatives independently", () => {
    const names = freshNames();
    const tree = unionExpr([
      ["x", identExpr("x")],
      ["b", identExpr("T")],
    ]);
    const result = expectOk(substExpr(names, tree, "x", u32));
    expect(
      exprEqual(
        result,
        unionExpr([
          ["x", u32],
          ["b", identExpr("T")],
        ]),
      ),
    ).toBe(true);
  });

  it("substitutes pack values but never pack labels", () => {
    const names = freshNames();
    const tree = packExpr(identExpr("S"), [["x", identExpr("x")]]);
    const result = expectOk(substExpr(names, tree, "x", integralExpr(1)));
    expect(
      exprEqual(result, packExpr(identExpr("S"), [["x", integralExpr(1)]])),
    ).toBe(true);
  });

  it("never mutates its input", () => {
    const names = freshNames();
    const tree = lambdaExpr([["y", u32]], identExpr("x"));
    const before = copyExpr(tree);
    expectOk(substExpr(names, tree, "x", identExpr("y")));
    expect(exprEqual(tree, before)).toBe(true);
  });
});

describe("substBlock", () => {
  it("renames a declaration that would capture the replacement", () => {
    const names = freshNames();
    const block = [
      declStatement(u32, "y", identExpr("x")),
      returnStatement(binOpExpr("+", identExpr("x"), identExpr("y"))),
    ];
    const result = expectOk(substBlock(names, block, "x", identExpr("y")));
    expect(
      blockEqual(result, [
        declStatement(u32, "y#0", identExpr("y")),
        returnStatement(binOpExpr("+", identExpr("y"), identExpr("y#0"))),
      ]),
    ).toBe(true);
  });

  it("stops at a declaration of the name", () => {
    const names = freshNames();
    const block = [
      declStatement(u32, "x", integralExpr(1)),
      returnStatement(identExpr("x")),
    ];
    const result = expectOk(substBlock(names, block, "x", integralExpr(5)));
    expect(blockEqual(result, block)).toBe(true);
  });
});

describe("substStatement", () => {
  it("substitutes a declaration's type and initialiser", () => {
    const names = freshNames();
    const stmt = declStatement(identExpr("x"), "y", identExpr("x"));
    const result = expectOk(substStatement(names, stmt, "x", u32));
    expect(statementEqual(result, declStatement(u32, "y", u32))).toBe(true);
  });

  it("substitutes every branch of a conditional up to shadowing", () => {
    const names = freshNames();
    // if (x) { return x; } else if (c) { u32 x = 1; return x; } else { return x; }
    const stmt = ifThenElseStatement(
      [
        [identExpr("x"), [returnStatement(identExpr("x"))]],
        [
          identExpr("c"),
          [
            declStatement(u32, "x", integralExpr(1)),
            returnStatement(identExpr("x")),
          ],
        ],
      ],
      [returnStatement(identExpr("x"))],
    );
    const result = expectOk(substStatement(names, stmt, "x", booleanExpr(true)));
    expect(
      statementEqual(
        result,
        ifThenElseStatement(
          [
            [booleanExpr(true), [returnStatement(booleanExpr(true))]],
            [
              identExpr("c"),
              [
                declStatement(u32, "x", integralExpr(1)),
                returnStatement(identExpr("x")),
              ],
            ],
          ],
          [returnStatement(booleanExpr(true))],
        ),
      ),
    ).toBe(true);
  });
});

describe("alphaRename", () => {
  it("renames free occurrences and stops at a shadowing binder", () => {
    const tree = binOpExpr(
      ">>",
      identExpr("x"),
      lambdaExpr([["x", identExpr("x")]], identExpr("x")),
    );
    expect(
      exprEqual(
        alphaRename("x", "z", tree),
        binOpExpr(
          ">>",
          identExpr("z"),
          lambdaExpr([["x", identExpr("z")]], identExpr("x")),
        ),
      ),
    ).toBe(true);
  });
});
