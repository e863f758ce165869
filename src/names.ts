/**
 * A name as the checker sees it.
 *
 * Names are plain strings: two identifiers with the same spelling are the
 * same name, and comparison is `===`. Fresh names minted by
 * {@link freshName} carry a `#N` suffix, which no parsed identifier can
 * contain.
 */
export type Name = string;

/**
 * The process‑wide **name table** used for interning and fresh‑name
 * generation.
 *
 * **What it represents**
 * A `NameSupply` remembers every name handed out so far (`used`) and a
 * monotonically increasing counter. It only ever grows: names are never
 * removed, so a fresh name stays distinct for the whole compilation run.
 *
 * **Used by**
 * - {@link substExpr}: renames binders that would capture a free variable
 * - {@link evaluate}: renames lambda parameters before beta reduction
 * - {@link alphaEqual}: shared placeholders for bound names
 * - the checker, to keep context names distinct
 *
 * @example
 * ```ts
 * const names = freshNames();
 * intern(names, "x");        // "x"
 * freshName(names, "x");     // "x#0"
 * freshName(names, "x#0");   // "x#1"
 * ```
 */
export type NameSupply = {
  used: Set<Name>;
  counter: number;
};

/** Creates an empty name table. */
export const freshNames = (): NameSupply => ({
  used: new Set(),
  counter: 0,
});

/**
 * Returns the canonical name for `text` and records it as used.
 *
 * Interning is idempotent: the same text always yields the same name.
 */
export function intern(names: NameSupply, text: string): Name {
  names.used.add(text);
  return text;
}

/** Strips a previous `#N` suffix so fresh names do not pile up suffixes. */
export const baseName = (name: Name): string => {
  const hash = name.indexOf("#");
  return hash === -1 ? name : name.slice(0, hash);
};

/**
 * Mints a name derived from `base` that differs from every name interned or
 * freshened so far.
 *
 * @example
 * ```ts
 * const names = freshNames();
 * intern(names, "T#0");
 * freshName(names, "T"); // "T#1" ("T#0" is taken)
 * ```
 */
export function freshName(names: NameSupply, base: Name): Name {
  const stem = baseName(base);
  let name = `${stem}#${names.counter++}`;
  while (names.used.has(name)) name = `${stem}#${names.counter++}`;
  names.used.add(name);
  return name;
}

/**
 * The member label of a struct field bound under `name`.
 *
 * A struct field is both a binder and a label. Substitution may move the
 * binder to a fresh name (`T` to `T#3`); the label stays `T`, so `r.T`
 * still selects it.
 */
export const fieldLabel = (name: Name): string => baseName(name);
