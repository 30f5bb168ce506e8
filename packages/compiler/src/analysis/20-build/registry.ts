import type { SourceSpan } from "../../model/span.js";
import { asTypeId, type NamedTypeDef, type NodeLoc, type TypeId } from "../../model/types.js";
import { deepFreeze } from "../../shared/freeze.js";

/** Where a name was declared; available even when the build fails. */
export interface DefinitionEntry {
  readonly name: string;
  readonly id: TypeId;
  /** Location of the whole definition object. */
  readonly loc: NodeLoc;
  /** Span of the `name` string value. */
  readonly nameSpan: SourceSpan;
  readonly topLevel: boolean;
}

export type DeclareResult =
  | { readonly ok: true; readonly entry: DefinitionEntry }
  | { readonly ok: false; readonly existing: DefinitionEntry };

/** Read-only view of the registry handed to consumers. */
export interface ReadonlyTypeRegistry {
  readonly size: number;
  get(id: TypeId): NamedTypeDef;
  lookup(name: string): NamedTypeDef | undefined;
  idOf(name: string): TypeId | undefined;
  entry(name: string): DefinitionEntry | undefined;
  /** Every registered name in declaration order (pre-order through the document). */
  names(): readonly string[];
  entries(): readonly DefinitionEntry[];
}

/**
 * Arena of named definitions. Ids are allocated while collecting names
 * (so forward references resolve), slots are filled while building, and the
 * whole arena is frozen before validation.
 */
export class TypeRegistry implements ReadonlyTypeRegistry {
  readonly #entries: DefinitionEntry[] = [];
  readonly #byName = new Map<string, DefinitionEntry>();
  readonly #defs: (NamedTypeDef | undefined)[] = [];
  #frozen = false;

  get size(): number {
    return this.#entries.length;
  }

  get frozen(): boolean {
    return this.#frozen;
  }

  declare(name: string, loc: NodeLoc, nameSpan: SourceSpan, topLevel: boolean): DeclareResult {
    this.#assertMutable();
    const existing = this.#byName.get(name);
    if (existing) return { ok: false, existing };
    const entry: DefinitionEntry = { name, id: asTypeId(this.#entries.length), loc, nameSpan, topLevel };
    this.#entries.push(entry);
    this.#byName.set(name, entry);
    this.#defs.push(undefined);
    return { ok: true, entry };
  }

  define(id: TypeId, def: NamedTypeDef): void {
    this.#assertMutable();
    const entry = this.#entries[id];
    if (!entry) throw new Error(`TypeId ${id} was never declared`);
    if (entry.name !== def.name) {
      throw new Error(`TypeId ${id} is declared as '${entry.name}', not '${def.name}'`);
    }
    if (this.#defs[id]) throw new Error(`Type '${def.name}' is already defined`);
    this.#defs[id] = def;
  }

  /** True once every declared slot holds a definition. */
  isComplete(): boolean {
    return this.#defs.every((d) => d !== undefined);
  }

  get(id: TypeId): NamedTypeDef {
    const def = this.#defs[id];
    if (!def) throw new Error(`TypeId ${id} has no definition`);
    return def;
  }

  lookup(name: string): NamedTypeDef | undefined {
    const entry = this.#byName.get(name);
    return entry ? this.#defs[entry.id] : undefined;
  }

  idOf(name: string): TypeId | undefined {
    return this.#byName.get(name)?.id;
  }

  entry(name: string): DefinitionEntry | undefined {
    return this.#byName.get(name);
  }

  names(): readonly string[] {
    return this.#entries.map((e) => e.name);
  }

  entries(): readonly DefinitionEntry[] {
    return this.#entries;
  }

  /** Deep-freeze the arena. Requires every slot to be defined. */
  freeze(): this {
    if (this.#frozen) return this;
    if (!this.isComplete()) throw new Error("Cannot freeze a registry with undefined slots");
    deepFreeze(this.#entries);
    deepFreeze(this.#defs);
    this.#frozen = true;
    return this;
  }

  #assertMutable(): void {
    if (this.#frozen) throw new Error("Type registry is frozen");
  }
}
