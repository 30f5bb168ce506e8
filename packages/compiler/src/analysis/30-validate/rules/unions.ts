import type { Label, UnionDef, UnionField } from "../../../model/types.js";
import { domainOf, labelText, type LabelDomain } from "../domain.js";
import { describeDef, memberPath, type ValidateContext, type ValidationRule } from "../context.js";

/**
 * Union well-formedness:
 * - at least one field, at most one default (empty `labels`)
 * - the discriminator has a label domain and every label is one of its values
 * - no label repeated within a field, label sets pairwise disjoint
 */
export const unionsRule: ValidationRule = {
  name: "unions",
  run(ctx) {
    for (const def of ctx.defs) {
      if (def.kind === "union") checkUnion(ctx, def);
    }
  },
};

function checkUnion(ctx: ValidateContext, def: UnionDef): void {
  if (def.fields.length === 0) {
    ctx.diagnostics.emit("itl/empty-union", {
      message: `Union ${describeDef(def)} declares no fields`,
      path: memberPath(def.loc.path, "fields"),
      span: def.loc.span,
    });
    return;
  }

  const defaults = def.fields.filter((f) => f.isDefault);
  if (defaults.length > 1) {
    ctx.diagnostics.emit("itl/multiple-default-fields", {
      message: `Union ${describeDef(def)} has ${defaults.length} default fields (${defaults.map((f) => `'${f.name}'`).join(", ")}); at most one field may have empty labels`,
      path: def.loc.path,
      span: def.loc.span,
      related: defaults.map((f) => ({ message: `Default field '${f.name}'`, path: f.loc.path, span: f.loc.span })),
    });
  }

  const discriminator = ctx.target(def.discriminator);
  if (!discriminator) return;
  const domain = domainOf(discriminator);
  if (!domain) {
    ctx.diagnostics.emit("itl/invalid-discriminator", {
      message: `Discriminator of union ${describeDef(def)} must be an int, byte, bool, enum, rune or string, got ${discriminator.kind}`,
      path: memberPath(def.loc.path, "discriminator"),
      span: def.loc.span,
      data: { value: discriminator.kind },
    });
    return;
  }

  const keyed = def.fields.map((field) => ({ field, keys: fieldKeys(ctx, def, field, domain) }));

  for (let i = 0; i < keyed.length; i++) {
    const a = keyed[i];
    if (!a) continue;
    for (let j = i + 1; j < keyed.length; j++) {
      const b = keyed[j];
      if (!b) continue;
      const shared = [...b.keys].filter(([key]) => a.keys.has(key)).map(([, label]) => labelText(label));
      if (shared.length === 0) continue;
      ctx.diagnostics.emit("itl/overlapping-labels", {
        message: `Fields '${a.field.name}' (${a.field.loc.path}) and '${b.field.name}' (${b.field.loc.path}) of union ${describeDef(def)} share label${shared.length > 1 ? "s" : ""} ${shared.join(", ")}`,
        path: b.field.loc.path,
        span: b.field.loc.span,
        related: [{ message: `Labels of field '${a.field.name}'`, path: a.field.loc.path, span: a.field.loc.span }],
        data: { name: b.field.name, other: a.field.name, labels: shared },
      });
    }
  }
}

/** Canonical label keys of one field; reports illegal and repeated labels. */
function fieldKeys(ctx: ValidateContext, def: UnionDef, field: UnionField, domain: LabelDomain): Map<string, Label> {
  const keys = new Map<string, Label>();
  for (const label of field.labels) {
    const key = domain.canonical(label);
    if (key === null) {
      ctx.diagnostics.emit("itl/invalid-label", {
        message: `Label ${labelText(label)} of field '${field.name}' is not a legal discriminator value of union ${describeDef(def)}; expected ${domain.description}`,
        path: label.loc.path,
        span: label.loc.span,
        data: { value: labelText(label) },
      });
      continue;
    }
    const first = keys.get(key);
    if (first) {
      ctx.diagnostics.emit("itl/duplicate-label", {
        message: `Label ${labelText(label)} is listed more than once in field '${field.name}'`,
        path: label.loc.path,
        span: label.loc.span,
        related: [{ message: "First occurrence", path: first.loc.path, span: first.loc.span }],
        data: { value: labelText(label) },
      });
      continue;
    }
    keys.set(key, label);
  }
  return keys;
}
