// examples/translation-unit.ts
import {
  binOpExpr,
  callExpr,
  funcTopLevel,
  freshState,
  identExpr,
  integralExpr,
  primExpr,
  returnStatement,
  showContext,
  showError,
  showTranslationUnit,
  typeCheckTranslationUnit,
  typeType,
} from "../src/index.js";

const u32 = primExpr("u32");
const Num = callExpr(identExpr("Num"), []);

const unit = [
  // Num() same(Num() x) { return x; }
  funcTopLevel("same", Num, [["x", Num]], [returnStatement(identExpr("x"))]),
  // type Num() { return u32; }
  funcTopLevel("Num", typeType, [], [returnStatement(u32)]),
  // u32 inc(u32 n) { return n + 1; }
  funcTopLevel(
    "inc",
    u32,
    [["n", u32]],
    [returnStatement(binOpExpr("+", identExpr("n"), integralExpr(1)))],
  ),
  // bool broken() { return inc(2); }
  funcTopLevel("broken", primExpr("bool"), [], [
    returnStatement(callExpr(identExpr("inc"), [integralExpr(2)])),
  ]),
];

console.log(showTranslationUnit(unit));

const checked = typeCheckTranslationUnit(freshState(), unit);
if ("err" in checked) {
  console.error(showError(checked.err));
  process.exitCode = 1;
} else {
  const { order, state, failures } = checked.ok;
  console.log("Checking order:", order.map((i) => unit[i].func.name).join(", "));
  console.log("\nContext:\n" + showContext(state.ctx));
  for (const { name, error } of failures)
    console.error(`\n${name}: ${showError(error)}`);
  if (failures.length > 0) process.exitCode = 1;
}
