import type { BitValue, EnumValue, Field, NodeLoc, UnionField } from "../../../model/types.js";
import { describeDef, type ValidationRule } from "../context.js";

interface Named {
  readonly name: string;
  readonly loc: NodeLoc;
}

/** Field names unique per record/union; value names unique per enum/bitset. */
export const namesRule: ValidationRule = {
  name: "names",
  run(ctx) {
    for (const def of ctx.defs) {
      switch (def.kind) {
        case "record":
        case "union":
          reportDuplicates<Field | UnionField>(def.fields, (item, first) => {
            ctx.diagnostics.emit("itl/duplicate-field-name", {
              message: `Field '${item.name}' of ${describeDef(def)} is already declared at ${first.loc.path}`,
              path: item.loc.path,
              span: item.loc.span,
              related: [{ message: "First declaration", path: first.loc.path, span: first.loc.span }],
              data: { name: item.name, other: first.loc.path },
            });
          });
          break;
        case "enum":
        case "bitset":
          reportDuplicates<EnumValue | BitValue>(def.values, (item, first) => {
            ctx.diagnostics.emit("itl/duplicate-value-name", {
              message: `Value '${item.name}' of ${describeDef(def)} is already declared at ${first.loc.path}`,
              path: item.loc.path,
              span: item.loc.span,
              related: [{ message: "First declaration", path: first.loc.path, span: first.loc.span }],
              data: { name: item.name, other: first.loc.path },
            });
          });
          break;
        default:
          break;
      }
    }
  },
};

function reportDuplicates<T extends Named>(
  items: readonly T[],
  report: (item: T, first: T) => void,
): void {
  const seen = new Map<string, T>();
  for (const item of items) {
    const first = seen.get(item.name);
    if (first) report(item, first);
    else seen.set(item.name, item);
  }
}
