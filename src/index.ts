export * from "./ast.js";
export * from "./eval.js";
export * from "./free-vars.js";
export * from "./names.js";
export * from "./subst.js";
export * from "./typechecker.js";
export * from "./types.js";
