import type { FixedDef } from "../../../model/types.js";
import { describeDef, memberPath, type ValidateContext, type ValidationRule } from "../context.js";

/** Fixed-point parameters and int bit widths. */
export const numericRule: ValidationRule = {
  name: "numeric",
  run(ctx) {
    for (const def of ctx.defs) {
      if (def.kind === "fixed") {
        checkFixed(ctx, def);
      } else if (def.kind === "int" && def.bits !== undefined && def.bits <= 0) {
        ctx.diagnostics.emit("itl/invalid-int-bits", {
          message: `Bit width of ${describeDef(def)} must be positive, got ${def.bits}`,
          path: memberPath(def.loc.path, "bits"),
          span: def.loc.span,
          data: { value: String(def.bits) },
        });
      }
    }
  },
};

function checkFixed(ctx: ValidateContext, def: FixedDef): void {
  const fail = (key: "base" | "digits" | "scale", message: string): void => {
    ctx.diagnostics.emit("itl/invalid-fixed", {
      message: `${message} in ${describeDef(def)}`,
      path: memberPath(def.loc.path, key),
      span: def.loc.span,
      data: { value: String(def[key]) },
    });
  };

  if (def.base < 2) fail("base", `Fixed base must be at least 2, got ${def.base}`);
  if (def.digits <= 0) fail("digits", `Fixed digits must be positive, got ${def.digits}`);
  if (def.scale < 0) fail("scale", `Fixed scale must not be negative, got ${def.scale}`);
  else if (def.digits > 0 && def.scale > def.digits) {
    fail("scale", `Fixed scale ${def.scale} exceeds digits ${def.digits}`);
  }
}
