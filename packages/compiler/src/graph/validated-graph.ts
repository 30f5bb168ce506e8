import type { DefinitionEntry, ReadonlyTypeRegistry } from "../analysis/20-build/registry.js";
import type { LinkedGraph } from "../analysis/20-build/build.js";
import {
  isNamed,
  type NamedTypeDef,
  type Note,
  type TypeDef,
  type TypeId,
  type TypeRef,
  type UnionDef,
  type UnionField,
} from "../model/types.js";
import { walkTypes, type TypeVisitor } from "./walk.js";

/**
 * Read-only view of a document that passed every stage.
 *
 * Only the validator constructs one. Every definition reachable from it is
 * deep-frozen, and `resolve` hands back the registry's own objects, so a
 * named link and a lookup by the same name yield the identical definition.
 */
export class ValidatedGraph {
  /** Top-level named definitions, in declaration order. */
  readonly types: readonly NamedTypeDef[];
  /** Every top-level definition, named or not. */
  readonly roots: readonly TypeDef[];
  readonly note: Note | undefined;
  readonly #registry: ReadonlyTypeRegistry;

  constructor(linked: LinkedGraph) {
    this.#registry = linked.registry;
    this.roots = linked.roots;
    this.types = Object.freeze(linked.roots.filter(isNamed));
    this.note = linked.note;
    Object.freeze(this);
  }

  /** Every registered name (top-level and named inline), in declaration order. */
  names(): readonly string[] {
    return this.#registry.names();
  }

  has(name: string): boolean {
    return this.#registry.idOf(name) !== undefined;
  }

  lookup(name: string): NamedTypeDef | undefined {
    return this.#registry.lookup(name);
  }

  idOf(name: string): TypeId | undefined {
    return this.#registry.idOf(name);
  }

  /** Where a name was declared. */
  definition(name: string): DefinitionEntry | undefined {
    return this.#registry.entry(name);
  }

  node(id: TypeId): NamedTypeDef {
    return this.#registry.get(id);
  }

  resolve(ref: TypeRef): TypeDef {
    switch (ref.kind) {
      case "named":
        return this.#registry.get(ref.id);
      case "inline":
        return ref.def;
      case "unresolved":
        throw new Error(`Unresolved reference '${ref.name}' in a validated graph`);
    }
  }

  /** The field selected when no label matches, if the union has one. */
  defaultField(union: UnionDef): UnionField | undefined {
    return union.fields.find((f) => f.isDefault);
  }

  /** Visit every definition once, following named links. */
  walk(visitor: TypeVisitor): void {
    walkTypes(this.roots, visitor, { registry: this.#registry });
  }
}
