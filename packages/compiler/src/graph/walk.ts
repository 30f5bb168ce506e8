import type { ReadonlyTypeRegistry } from "../analysis/20-build/registry.js";
import type { TypeDef, TypeRef } from "../model/types.js";

export type TypeVisitor = (def: TypeDef) => void;

export interface WalkOptions {
  /** When given, named links are followed into the registry (each target once). */
  registry?: ReadonlyTypeRegistry;
}

/** Type positions directly under a definition, in document order. */
export function childRefs(def: TypeDef): TypeRef[] {
  switch (def.kind) {
    case "sequence":
      return [def.type];
    case "record":
      return def.fields.map((f) => f.type);
    case "union":
      return [def.discriminator, ...def.fields.map((f) => f.type)];
    default:
      return [];
  }
}

/**
 * Pre-order walk over `defs` and the definitions nested in them. Inline
 * definitions are always entered; named links only with `options.registry`.
 * Every definition is visited at most once.
 */
export function walkTypes(defs: TypeDef | readonly TypeDef[], visitor: TypeVisitor, options: WalkOptions = {}): void {
  const start: readonly TypeDef[] = "kind" in defs ? [defs] : defs;
  const seen = new Set<TypeDef>();
  const stack: TypeDef[] = [...start].reverse();

  while (stack.length > 0) {
    const def = stack.pop();
    if (!def || seen.has(def)) continue;
    seen.add(def);
    visitor(def);

    const children = childRefs(def);
    for (let i = children.length - 1; i >= 0; i--) {
      const ref = children[i];
      if (ref?.kind === "inline") stack.push(ref.def);
      else if (ref?.kind === "named" && options.registry) stack.push(options.registry.get(ref.id));
    }
  }
}
