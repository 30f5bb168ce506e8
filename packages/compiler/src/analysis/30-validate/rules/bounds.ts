import type { SequenceDef, StringDef } from "../../../model/types.js";
import { describeDef, memberPath, type ValidateContext, type ValidationRule } from "../context.js";

/**
 * Size and capacity of strings and sequences.
 *
 * `size` is authoritative and `capacity` an advisory upper bound, so the only
 * cross-check is `size <= capacity` when both are scalars. Multi-dimensional
 * sizes are checked per dimension and exempt from the capacity check.
 */
export const boundsRule: ValidationRule = {
  name: "bounds",
  run(ctx) {
    for (const def of ctx.defs) {
      if (def.kind === "string" || def.kind === "sequence") checkBounds(ctx, def);
    }
  },
};

function checkBounds(ctx: ValidateContext, def: StringDef | SequenceDef): void {
  const { size, capacity } = def;
  const span = def.loc.span;

  if (capacity !== undefined && capacity < 0) {
    ctx.diagnostics.emit("itl/invalid-capacity", {
      message: `Capacity of ${describeDef(def)} must not be negative, got ${capacity}`,
      path: memberPath(def.loc.path, "capacity"),
      span,
      data: { value: String(capacity) },
    });
  }

  if (size === undefined) return;

  if (typeof size !== "number") {
    const sizePath = memberPath(def.loc.path, "size");
    if (size.length === 0) {
      ctx.diagnostics.emit("itl/invalid-dimension", {
        message: `Size of ${describeDef(def)} must list at least one dimension`,
        path: sizePath,
        span,
      });
    }
    size.forEach((dim, i) => {
      if (dim > 0) return;
      ctx.diagnostics.emit("itl/invalid-dimension", {
        message: `Dimension ${i} of ${describeDef(def)} must be a positive integer, got ${dim}`,
        path: memberPath(sizePath, i),
        span,
        data: { value: String(dim) },
      });
    });
    return;
  }

  if (size < 0) {
    ctx.diagnostics.emit("itl/invalid-size", {
      message: `Size of ${describeDef(def)} must not be negative, got ${size}`,
      path: memberPath(def.loc.path, "size"),
      span,
      data: { value: String(size) },
    });
    return;
  }

  if (capacity !== undefined && capacity >= 0 && size > capacity) {
    ctx.diagnostics.emit("itl/size-exceeds-capacity", {
      message: `Size ${size} of ${describeDef(def)} exceeds its capacity ${capacity}`,
      path: memberPath(def.loc.path, "size"),
      span,
      data: { value: String(size) },
    });
  }
}
