import type { BitValue, BitsetDef, EnumDef, EnumValue } from "../../../model/types.js";
import { describeDef, type ValidateContext, type ValidationRule } from "../context.js";

/** First-generation kinds: enum values and bit positions. */
export const legacyRule: ValidationRule = {
  name: "legacy",
  run(ctx) {
    for (const def of ctx.defs) {
      if (def.kind === "enum") checkEnum(ctx, def);
      else if (def.kind === "bitset") checkBitset(ctx, def);
    }
  },
};

function checkEnum(ctx: ValidateContext, def: EnumDef): void {
  const seen = new Map<bigint, EnumValue>();
  for (const v of def.values) {
    const first = seen.get(v.value);
    if (!first) {
      seen.set(v.value, v);
      continue;
    }
    ctx.diagnostics.emit("itl/duplicate-enum-value", {
      message: `Value '${v.name}' of ${describeDef(def)} resolves to ${v.value}, already taken by '${first.name}'`,
      path: v.loc.path,
      span: v.loc.span,
      related: [{ message: `'${first.name}' = ${first.value}`, path: first.loc.path, span: first.loc.span }],
      data: { name: v.name, other: first.name, value: v.value.toString() },
    });
  }
}

function checkBitset(ctx: ValidateContext, def: BitsetDef): void {
  const seen = new Map<bigint, BitValue>();
  for (const v of def.values) {
    if (v.bit < 0n) {
      ctx.diagnostics.emit("itl/invalid-bit", {
        message: `Bit position of '${v.name}' in ${describeDef(def)} must not be negative, got ${v.bit}`,
        path: v.loc.path,
        span: v.loc.span,
        data: { name: v.name, value: v.bit.toString() },
      });
      continue;
    }
    const first = seen.get(v.bit);
    if (!first) {
      seen.set(v.bit, v);
      continue;
    }
    ctx.diagnostics.emit("itl/duplicate-bit", {
      message: `Bit ${v.bit} of ${describeDef(def)} is claimed by both '${first.name}' and '${v.name}'`,
      path: v.loc.path,
      span: v.loc.span,
      related: [{ message: `'${first.name}' uses bit ${first.bit}`, path: first.loc.path, span: first.loc.span }],
      data: { name: v.name, other: first.name, value: v.bit.toString() },
    });
  }
}
