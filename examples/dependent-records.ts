// examples/dependent-records.ts
import {
  freshState,
  identExpr,
  inferType,
  integralExpr,
  memberExpr,
  packExpr,
  primExpr,
  showExpr,
  structExpr,
  typeEval,
  typeType,
  unwrap,
} from "../src/index.js";

// struct { type T; T v; }
const Box = structExpr([
  ["T", typeType],
  ["v", identExpr("T")],
]);

const state = freshState([{ term: { name: "r", type: Box } }]);

// (Box){ .T = u32, .v = 7 }
const boxed = packExpr(Box, [
  ["T", primExpr("u32")],
  ["v", integralExpr(7)],
]);
console.log(`${showExpr(boxed)} : ${showExpr(unwrap(inferType(state, boxed)))}`);

// The field's type mentions the record it came from...
const packedField = unwrap(inferType(state, memberExpr(boxed, "v")));
console.log("\nboxed.v :", showExpr(packedField));
// ...and normalises to the packed type.
console.log("  which is", showExpr(unwrap(typeEval(state, packedField))));

// An opaque record keeps the projection.
const opaqueField = unwrap(inferType(state, memberExpr(identExpr("r"), "v")));
console.log("\nr.v :", showExpr(opaqueField)); // "r.T"
