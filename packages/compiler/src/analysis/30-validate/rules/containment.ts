import type { SequenceDef, TypeDef, TypeRef } from "../../../model/types.js";
import { describeDef, type ValidateContext, type ValidationRule } from "../context.js";

/**
 * A type must not contain itself by value without a base case.
 *
 * Computes the least fixpoint of "has a finite value": scalars start finite,
 * and composites become finite as their parts do. Whatever is left over after
 * the fixpoint recurses with no way out. Only named definitions can close a
 * cycle, so each leftover named record, sequence or union is reported once.
 */
export const containmentRule: ValidationRule = {
  name: "containment",
  run(ctx) {
    const finite = new Set<TypeDef>();
    const pending: TypeDef[] = [];
    for (const def of ctx.defs) {
      if (isComposite(def)) pending.push(def);
      else finite.add(def);
    }

    const refFinite = (ref: TypeRef): boolean => {
      const target = ctx.target(ref);
      // Unresolved markers never reach validation; treat as a base case.
      return target === null || finite.has(target);
    };

    let changed = true;
    while (changed) {
      changed = false;
      for (let i = pending.length - 1; i >= 0; i--) {
        const def = pending[i];
        if (!def || !hasFiniteValue(def, refFinite)) continue;
        finite.add(def);
        pending.splice(i, 1);
        changed = true;
      }
    }

    for (const def of pending) {
      if (def.name === undefined) continue;
      ctx.diagnostics.emit("itl/infinite-type", {
        message: `Type ${describeDef(def)} contains itself by value with no base case, so it has no finite value`,
        path: def.loc.path,
        span: def.loc.span,
        data: { name: def.name },
      });
    }
  },
};

function isComposite(def: TypeDef): boolean {
  return def.kind === "record" || def.kind === "sequence" || def.kind === "union";
}

function hasFiniteValue(def: TypeDef, refFinite: (ref: TypeRef) => boolean): boolean {
  switch (def.kind) {
    case "sequence":
      return mayBeEmpty(def) || refFinite(def.type);
    case "record":
      return def.fields.every((f) => f.optional || refFinite(f.type));
    case "union":
      // An empty union is reported by the unions rule.
      return def.fields.length === 0 || def.fields.some((f) => refFinite(f.type));
    default:
      return true;
  }
}

/** A sequence with no fixed size, or a zero dimension, has an empty value. */
function mayBeEmpty(def: SequenceDef): boolean {
  const { size } = def;
  if (size === undefined) return true;
  if (typeof size === "number") return size <= 0;
  return size.some((dim) => dim <= 0);
}
