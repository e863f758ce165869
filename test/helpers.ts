// test/helpers.ts
import { primExpr } from "../src/ast.js";
import { type Result, showError, type TypingError } from "../src/types.js";

export const u8 = primExpr("u8");
export const u32 = primExpr("u32");
export const u64 = primExpr("u64");

export function expectOk<T>(result: Result<TypingError, T>): T {
  if ("err" in result)
    throw new Error(`expected ok, got error:\n${showError(result.err)}`);
  return result.ok;
}

export function expectErr<T>(result: Result<TypingError, T>): TypingError {
  if ("ok" in result) throw new Error("expected an error, got ok");
  return result.err;
}
