/* =============================================================================
 * PHASE 20: BUILD (Type Graph)
 * JSON tree -> LinkedGraph (pure, deterministic)
 * - Pass 1 (collect.ts): allocate a TypeId for every named definition
 * - Pass 2 (here): check each object's shape and construct typed nodes
 * - String references become non-owning `named` links into the registry;
 *   unknown names become `unresolved` markers plus a StructuralError
 * - Errors never stop the walk: siblings are still checked, so one run
 *   reports every structural problem in the document
 *
 * The registry and reference list are returned even when the build fails,
 * for editor features on broken documents.
 * ============================================================================= */

import type { z } from "zod/v4";
import { describeJsonKind, getMember, integerOf, type JsonNode, type JsonObjectNode, type JsonStringNode } from "../../model/json.js";
import { childPath, formatPath, type JsonPath } from "../../model/path.js";
import {
  CURRENT_KINDS,
  LEGACY_KINDS,
  FLOAT_MODELS,
  isCurrentKind,
  isLegacyKind,
  isNamed,
  assertNever,
  type BitValue,
  type EnumValue,
  type Field,
  type Label,
  type NodeLoc,
  type Note,
  type TypeDef,
  type TypeId,
  type TypeKind,
  type TypeRef,
  type UnionField,
} from "../../model/types.js";
import type { GrammarProfile } from "../../config/options.js";
import { debug } from "../../shared/debug.js";
import { deepFreeze } from "../../shared/freeze.js";
import { findBestMatch, formatSuggestion } from "../../shared/suggestions.js";
import { collectNames, type CollectedIds } from "./collect.js";
import { TypeRegistry, type ReadonlyTypeRegistry } from "./registry.js";
import {
  bitValueSchema,
  compatDefinitionSchema,
  currentDefinitionSchema,
  DEFINITION_KEYS,
  enumValueSchema,
  fieldSchema,
  rootOutlineSchema,
  rootSchema,
  unionFieldSchema,
  type DefinitionData,
} from "./grammar.js";
import { checkObject, readNote, type BuildDiagnosticEmitter, type ObjectGrammar } from "./shape.js";

// ============================================================================
// Public surface
// ============================================================================

/** A string type reference as written, with the definition it resolved to. */
export interface ReferenceSite {
  readonly name: string;
  readonly loc: NodeLoc;
  readonly target: TypeId | null;
}

/** Fully linked, deep-frozen graph. Input to validation. */
export interface LinkedGraph {
  readonly registry: ReadonlyTypeRegistry;
  /** Every top-level definition, in document order. */
  readonly roots: readonly TypeDef[];
  readonly note?: Note;
}

export interface BuildResult {
  /** Null when any StructuralError was reported. */
  readonly graph: LinkedGraph | null;
  /** Definition index: every declared name with its location. */
  readonly registry: ReadonlyTypeRegistry;
  readonly references: readonly ReferenceSite[];
}

export interface BuildTypeGraphOptions {
  grammar?: GrammarProfile;
  diagnostics: BuildDiagnosticEmitter;
}

// ============================================================================
// Grammar objects
// ============================================================================

const ROOT_KEYS = Object.keys(rootSchema.shape);
const ROOT_GRAMMAR = { schema: rootSchema, keys: ROOT_KEYS };
const ROOT_OUTLINE_GRAMMAR = { schema: rootOutlineSchema, keys: ROOT_KEYS };
const FIELD_GRAMMAR = { schema: fieldSchema, keys: Object.keys(fieldSchema.shape) };
const UNION_FIELD_GRAMMAR = { schema: unionFieldSchema, keys: Object.keys(unionFieldSchema.shape) };
const ENUM_VALUE_GRAMMAR = { schema: enumValueSchema, keys: Object.keys(enumValueSchema.shape) };
const BIT_VALUE_GRAMMAR = { schema: bitValueSchema, keys: Object.keys(bitValueSchema.shape) };

/** Name-only view of an enum or bitset member; its ordinal is re-read exactly from the tree. */
type MemberGrammar = ObjectGrammar<{ readonly name: string }>;

function definitionGrammar(kind: TypeKind, compat: boolean): ObjectGrammar<DefinitionData> {
  const keys = DEFINITION_KEYS[kind];
  const schema: z.ZodType<DefinitionData> = compat ? compatDefinitionSchema : currentDefinitionSchema;
  return {
    schema,
    keys: compat ? keys.compat : keys.current,
    compatOnly: keys.compat.filter((key) => !keys.current.includes(key)),
    ...(kind === "sequence" ? { expected: { size: "an integer or an array of integers" } } : {}),
    ...(kind === "float" ? { choices: { model: FLOAT_MODELS } } : {}),
  };
}

interface DefCommon {
  readonly name?: string;
  readonly note?: Note;
  readonly loc: NodeLoc;
}

// ============================================================================
// Entry point
// ============================================================================

export function buildTypeGraph(root: JsonNode, options: BuildTypeGraphOptions): BuildResult {
  const compat = (options.grammar ?? "current") === "compat";
  const registry = new TypeRegistry();

  let errors = 0;
  const diagnostics: BuildDiagnosticEmitter = {
    stage: options.diagnostics.stage,
    emit: (code, input) => {
      const diag = options.diagnostics.emit(code, input);
      if (diag.severity === "error") errors += 1;
      return diag;
    },
  };

  if (root.kind !== "object") {
    diagnostics.emit("itl/invalid-root", {
      message: `Document root must be an object with a 'types' array, got ${describeJsonKind(root.kind)}`,
      path: "$",
      span: root.span,
    });
    return { graph: null, registry, references: [] };
  }

  const typesMember = getMember(root, "types");
  if (!typesMember || typesMember.value.kind !== "array") {
    diagnostics.emit("itl/invalid-root", {
      message: typesMember
        ? `'types' must be an array, got ${describeJsonKind(typesMember.value.kind)}`
        : "Document root has no 'types' array",
      path: typesMember ? "types" : "$",
      span: typesMember ? typesMember.value.span : root.span,
      data: { property: "types" },
    });
    checkObject(root, [], ROOT_OUTLINE_GRAMMAR, diagnostics, compat);
    return { graph: null, registry, references: [] };
  }

  const rootData = checkObject(root, [], ROOT_GRAMMAR, diagnostics, compat);
  const note = rootData ? readNote(root) : undefined;
  const items = typesMember.value.items;
  const ids = collectNames(items, registry, diagnostics);
  const builder = new GraphBuilder(registry, ids, diagnostics, compat);

  const roots: TypeDef[] = [];
  items.forEach((item, i) => {
    // Non-object items were reported by the root schema.
    if (item.kind !== "object") return;
    const def = builder.definition(item, ["types", i]);
    if (def) roots.push(def);
  });

  debug.build("done", { roots: roots.length, names: registry.size, references: builder.references.length, errors });

  if (errors > 0) {
    return { graph: null, registry, references: builder.references };
  }

  registry.freeze();
  const graph: LinkedGraph = deepFreeze(note ? { registry, roots, note } : { registry, roots });
  return { graph, registry, references: builder.references };
}

// ============================================================================
// Pass 2
// ============================================================================

class GraphBuilder {
  readonly references: ReferenceSite[] = [];

  constructor(
    private readonly registry: TypeRegistry,
    private readonly ids: CollectedIds,
    private readonly diagnostics: BuildDiagnosticEmitter,
    private readonly compat: boolean,
  ) {}

  definition(node: JsonObjectNode, path: JsonPath): TypeDef | null {
    const kindNode = getMember(node, "kind")?.value;
    if (kindNode?.kind !== "string") {
      this.diagnostics.emit("itl/missing-kind", {
        message: kindNode
          ? `'kind' must be a string, got ${describeJsonKind(kindNode.kind)}`
          : "Type definition has no 'kind'",
        path: formatPath(kindNode ? childPath(path, "kind") : path),
        span: kindNode ? kindNode.span : node.span,
        data: { property: "kind" },
      });
      return null;
    }
    const kind = this.kindOf(kindNode, childPath(path, "kind"));
    if (!kind) return null;

    const data = checkObject(node, path, definitionGrammar(kind, this.compat), this.diagnostics, this.compat);
    if (!data) {
      this.visitNested(kind, node, path);
      return null;
    }
    const def = this.body(data, node, path);
    if (!def) return null;

    if (isNamed(def)) {
      const id = this.ids.get(node);
      // Duplicate name: reported in pass 1, the first definition owns the id.
      if (id === undefined) return null;
      this.registry.define(id, def);
      debug.build("define", { name: def.name, id, kind });
    }
    return def;
  }

  private kindOf(node: JsonStringNode, path: JsonPath): TypeKind | null {
    const value = node.value;
    if (isCurrentKind(value)) return value;
    if (isLegacyKind(value)) {
      if (this.compat) return value;
      this.diagnostics.emit("itl/unknown-kind", {
        message: `Kind '${value}' requires the compat grammar`,
        path: formatPath(path),
        span: node.span,
        data: { kind: value },
      });
      return null;
    }
    const known: readonly string[] = this.compat ? [...CURRENT_KINDS, ...LEGACY_KINDS] : CURRENT_KINDS;
    const suggestion = findBestMatch(value, known);
    this.diagnostics.emit("itl/unknown-kind", {
      message: `Unknown kind '${value}'.${formatSuggestion(suggestion)}`,
      path: formatPath(path),
      span: node.span,
      data: suggestion ? { kind: value, suggestion } : { kind: value },
    });
    return null;
  }

  private body(data: DefinitionData, node: JsonObjectNode, path: JsonPath): TypeDef | null {
    const note = readNote(node);
    const common: DefCommon = {
      ...(data.name === undefined ? {} : { name: data.name }),
      ...(note ? { note } : {}),
      loc: { path: formatPath(path), span: node.span },
    };

    switch (data.kind) {
      case "byte":
        return { kind: "byte", ...common };
      case "bool":
        return { kind: "bool", ...common };
      case "int":
        return {
          kind: "int",
          ...common,
          ...(data.bits === undefined ? {} : { bits: data.bits }),
          unsigned: data.unsigned ?? false,
          ...(data.encoding === undefined ? {} : { encoding: data.encoding }),
        };
      case "float":
        return {
          kind: "float",
          ...common,
          ...(data.model === undefined ? {} : { model: data.model }),
          ...(data.encoding === undefined ? {} : { encoding: data.encoding }),
        };
      case "fixed":
        return {
          kind: "fixed",
          ...common,
          base: data.base,
          digits: data.digits,
          scale: data.scale,
          ...(data.encoding === undefined ? {} : { encoding: data.encoding }),
        };
      case "sequence": {
        const type = this.typeAt(node, path, "type");
        if (!type) return null;
        return {
          kind: "sequence",
          ...common,
          type,
          ...(data.size === undefined ? {} : { size: data.size }),
          ...(data.capacity === undefined ? {} : { capacity: data.capacity }),
        };
      }
      case "string":
        return {
          kind: "string",
          ...common,
          ...(data.size === undefined ? {} : { size: data.size }),
          ...(data.capacity === undefined ? {} : { capacity: data.capacity }),
          ...(data.encoding === undefined ? {} : { encoding: data.encoding }),
        };
      case "record": {
        const fields = this.each(node, path, "fields", (item, itemPath) => this.field(item, itemPath));
        return fields ? { kind: "record", ...common, fields } : null;
      }
      case "union": {
        const discriminator = this.typeAt(node, path, "discriminator");
        const fields = this.each(node, path, "fields", (item, itemPath) => this.unionField(item, itemPath));
        if (!discriminator || !fields) return null;
        return { kind: "union", ...common, discriminator, fields };
      }
      case "rune":
        return { kind: "rune", ...common, ...(data.encoding === undefined ? {} : { encoding: data.encoding }) };
      case "enum": {
        const values = this.enumValues(node, path);
        return values ? { kind: "enum", ...common, values } : null;
      }
      case "bitset": {
        const values = this.bitValues(node, path);
        return values ? { kind: "bitset", ...common, values } : null;
      }
      default:
        return assertNever(data, "type kind");
    }
  }

  /** A definition failed its schema: still check the grammar objects nested in it. */
  private visitNested(kind: TypeKind, node: JsonObjectNode, path: JsonPath): void {
    switch (kind) {
      case "sequence":
        this.typeAt(node, path, "type");
        break;
      case "record":
        this.each(node, path, "fields", (item, itemPath) => this.field(item, itemPath));
        break;
      case "union":
        this.typeAt(node, path, "discriminator");
        this.each(node, path, "fields", (item, itemPath) => this.unionField(item, itemPath));
        break;
      case "enum":
        this.members(node, path, ENUM_VALUE_GRAMMAR, "value");
        break;
      case "bitset":
        this.members(node, path, BIT_VALUE_GRAMMAR, "bit");
        break;
      default:
        break;
    }
  }

  // --------------------------------------------------------------------------
  // References
  // --------------------------------------------------------------------------

  /** Type position `key`; values that are neither a name nor an object were reported by the schema. */
  private typeAt(node: JsonObjectNode, path: JsonPath, key: string): TypeRef | null {
    const value = getMember(node, key)?.value;
    const refPath = childPath(path, key);
    if (value?.kind === "string") return this.reference(value, refPath);
    if (value?.kind === "object") {
      const def = this.definition(value, refPath);
      return def ? { kind: "inline", def } : null;
    }
    return null;
  }

  private reference(node: JsonStringNode, path: JsonPath): TypeRef {
    const name = node.value;
    const loc: NodeLoc = { path: formatPath(path), span: node.span };
    const id = this.registry.idOf(name);
    this.references.push({ name, loc, target: id ?? null });
    if (id !== undefined) {
      debug.build("resolve", { name, id, at: loc.path });
      return { kind: "named", name, id, loc };
    }
    const suggestion = findBestMatch(name, this.registry.names());
    this.diagnostics.emit("itl/unknown-type-reference", {
      message: `Unknown type '${name}'.${formatSuggestion(suggestion)}`,
      path: loc.path,
      span: node.span,
      data: suggestion ? { name, suggestion } : { name },
    });
    return { kind: "unresolved", name, loc };
  }

  // --------------------------------------------------------------------------
  // Members
  // --------------------------------------------------------------------------

  /** Build every object item of array `key`; null when any item failed, after all were checked. */
  private each<T>(
    node: JsonObjectNode,
    path: JsonPath,
    key: string,
    build: (item: JsonObjectNode, path: JsonPath) => T | null,
  ): T[] | null {
    const array = getMember(node, key)?.value;
    if (array?.kind !== "array") return null;
    const out: T[] = [];
    let ok = true;
    for (const [i, item] of array.items.entries()) {
      if (item.kind !== "object") {
        ok = false;
        continue;
      }
      const built = build(item, childPath(path, key, i));
      if (built === null) ok = false;
      else out.push(built);
    }
    return ok ? out : null;
  }

  private field(node: JsonObjectNode, path: JsonPath): Field | null {
    const data = checkObject(node, path, FIELD_GRAMMAR, this.diagnostics, this.compat);
    const type = this.typeAt(node, path, "type");
    if (!data || !type) return null;
    const note = readNote(node);
    return {
      name: data.name,
      type,
      optional: data.optional ?? false,
      ...(note ? { note } : {}),
      loc: { path: formatPath(path), span: node.span },
    };
  }

  private unionField(node: JsonObjectNode, path: JsonPath): UnionField | null {
    const data = checkObject(node, path, UNION_FIELD_GRAMMAR, this.diagnostics, this.compat);
    const type = this.typeAt(node, path, "type");
    if (!data || !type) return null;
    const labels = this.labels(node, path);
    const note = readNote(node);
    return {
      name: data.name,
      type,
      labels,
      isDefault: labels.length === 0,
      ...(note ? { note } : {}),
      loc: { path: formatPath(path), span: node.span },
    };
  }

  /** Labels of a field that passed its schema, with integers read exactly. */
  private labels(node: JsonObjectNode, path: JsonPath): Label[] {
    const array = getMember(node, "labels")?.value;
    if (array?.kind !== "array") return [];
    const labels: Label[] = [];
    array.items.forEach((item, i) => {
      const loc: NodeLoc = { path: formatPath(childPath(path, "labels", i)), span: item.span };
      if (item.kind === "number") labels.push({ value: item.value, integer: integerOf(item), loc });
      else if (item.kind === "string" || item.kind === "boolean") labels.push({ value: item.value, integer: null, loc });
    });
    return labels;
  }

  // --------------------------------------------------------------------------
  // Legacy kinds
  // --------------------------------------------------------------------------

  private enumValues(node: JsonObjectNode, path: JsonPath): EnumValue[] | null {
    const members = this.members(node, path, ENUM_VALUE_GRAMMAR, "value");
    if (!members) return null;
    let next = 0n;
    return members.map((member) => {
      const value = member.ordinal ?? next;
      next = value + 1n;
      return {
        name: member.name,
        value,
        explicit: member.ordinal !== undefined,
        ...(member.note ? { note: member.note } : {}),
        loc: member.loc,
      };
    });
  }

  private bitValues(node: JsonObjectNode, path: JsonPath): BitValue[] | null {
    const members = this.members(node, path, BIT_VALUE_GRAMMAR, "bit");
    if (!members) return null;
    let next = 0n;
    return members.map((member) => {
      const bit = member.ordinal ?? next;
      next = bit + 1n;
      return {
        name: member.name,
        bit,
        explicit: member.ordinal !== undefined,
        ...(member.note ? { note: member.note } : {}),
        loc: member.loc,
      };
    });
  }

  /** Enum or bitset members: bare names, or `{ name, value? }` / `{ name, bit? }` objects. */
  private members(
    node: JsonObjectNode,
    path: JsonPath,
    grammar: MemberGrammar,
    ordinalKey: "value" | "bit",
  ): { name: string; ordinal?: bigint; note?: Note; loc: NodeLoc }[] | null {
    const array = getMember(node, "values")?.value;
    if (array?.kind !== "array") return null;
    const out: { name: string; ordinal?: bigint; note?: Note; loc: NodeLoc }[] = [];
    let ok = true;
    for (const [i, item] of array.items.entries()) {
      const itemPath = childPath(path, "values", i);
      const loc: NodeLoc = { path: formatPath(itemPath), span: item.span };
      // Empty names and other item kinds were reported by the definition's schema.
      if (item.kind === "string" && item.value.length > 0) {
        out.push({ name: item.value, loc });
        continue;
      }
      if (item.kind !== "object") {
        ok = false;
        continue;
      }
      const data = checkObject(item, itemPath, grammar, this.diagnostics, this.compat);
      if (!data) {
        ok = false;
        continue;
      }
      const ordinal = exactInteger(getMember(item, ordinalKey)?.value);
      const note = readNote(item);
      out.push({
        name: data.name,
        ...(ordinal === undefined ? {} : { ordinal }),
        ...(note ? { note } : {}),
        loc,
      });
    }
    return ok ? out : null;
  }
}

/** Exact value of an integral number node; the member schemas reject anything else. */
function exactInteger(node: JsonNode | undefined): bigint | undefined {
  if (node?.kind !== "number") return undefined;
  return integerOf(node) ?? undefined;
}
