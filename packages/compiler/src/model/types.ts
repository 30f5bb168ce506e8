/* =======================================================================================
 * ITL TYPE MODEL
 * ---------------------------------------------------------------------------------------
 * Closed, kind-discriminated TypeDef union plus the reference forms that link it into
 * a graph. Named links are ids into the registry arena, never owned subtrees, so
 * self and mutual references need no ownership cycles.
 * ======================================================================================= */

import type { JsonObject, JsonScalar } from "./json.js";
import type { SourceSpan } from "./span.js";

/** Stable index of a named definition in the registry arena. */
export type TypeId = number & { readonly __brand: "TypeId" };

export function asTypeId(index: number): TypeId {
  return index as TypeId;
}

/** Where a node was written: rendered JSON path plus source span. */
export interface NodeLoc {
  readonly path: string;
  readonly span: SourceSpan;
}

/** Opaque annotation tree. Never interpreted, preserved verbatim. */
export type Note = JsonObject;

export type FloatModel =
  | "binary16"
  | "binary32"
  | "binary64"
  | "binary128"
  | "decimal32"
  | "decimal64"
  | "decimal128";

export const FLOAT_MODELS: readonly FloatModel[] = [
  "binary16",
  "binary32",
  "binary64",
  "binary128",
  "decimal32",
  "decimal64",
  "decimal128",
];

/** Kinds of the current (model-centric) grammar. */
export const CURRENT_KINDS = ["byte", "bool", "int", "float", "fixed", "sequence", "string", "record", "union"] as const;
/** First-generation kinds, accepted only under the compat grammar. */
export const LEGACY_KINDS = ["rune", "enum", "bitset"] as const;

export type CurrentKind = (typeof CURRENT_KINDS)[number];
export type LegacyKind = (typeof LEGACY_KINDS)[number];
export type TypeKind = CurrentKind | LegacyKind;

// ============================================================================
// References
// ============================================================================

export interface NamedTypeRef {
  readonly kind: "named";
  readonly name: string;
  readonly id: TypeId;
  readonly loc: NodeLoc;
}

export interface InlineTypeRef {
  readonly kind: "inline";
  readonly def: TypeDef;
}

/** A string reference whose name is not registered. Never survives into a validated graph. */
export interface UnresolvedTypeRef {
  readonly kind: "unresolved";
  readonly name: string;
  readonly loc: NodeLoc;
}

export type TypeRef = NamedTypeRef | InlineTypeRef | UnresolvedTypeRef;

// ============================================================================
// Definitions
// ============================================================================

interface TypeDefBase {
  readonly name?: string;
  readonly note?: Note;
  readonly loc: NodeLoc;
}

export interface ByteDef extends TypeDefBase {
  readonly kind: "byte";
}

export interface BoolDef extends TypeDefBase {
  readonly kind: "bool";
}

export interface IntDef extends TypeDefBase {
  readonly kind: "int";
  /** Absent means arbitrary precision. */
  readonly bits?: number;
  readonly unsigned: boolean;
  /** First-generation encoding hint (compat grammar only). */
  readonly encoding?: string;
}

export interface FloatDef extends TypeDefBase {
  readonly kind: "float";
  readonly model?: FloatModel;
  readonly encoding?: string;
}

export interface FixedDef extends TypeDefBase {
  readonly kind: "fixed";
  readonly base: number;
  readonly digits: number;
  readonly scale: number;
  readonly encoding?: string;
}

/** Scalar length, or one length per dimension. */
export type SequenceSize = number | readonly number[];

export interface SequenceDef extends TypeDefBase {
  readonly kind: "sequence";
  readonly type: TypeRef;
  /** Authoritative for allocation sizing. */
  readonly size?: SequenceSize;
  /** Advisory upper bound. */
  readonly capacity?: number;
}

export interface StringDef extends TypeDefBase {
  readonly kind: "string";
  readonly size?: number;
  readonly capacity?: number;
  readonly encoding?: string;
}

export interface Field {
  readonly name: string;
  readonly type: TypeRef;
  readonly optional: boolean;
  readonly note?: Note;
  readonly loc: NodeLoc;
}

export interface RecordDef extends TypeDefBase {
  readonly kind: "record";
  readonly fields: readonly Field[];
}

export interface Label {
  /** Value as written. */
  readonly value: JsonScalar;
  /** Exact integer value when the label is an integral number. */
  readonly integer: bigint | null;
  readonly loc: NodeLoc;
}

export interface UnionField {
  readonly name: string;
  readonly type: TypeRef;
  readonly labels: readonly Label[];
  /** True when `labels` is empty: the field selected when no other label matches. */
  readonly isDefault: boolean;
  readonly note?: Note;
  readonly loc: NodeLoc;
}

export interface UnionDef extends TypeDefBase {
  readonly kind: "union";
  readonly discriminator: TypeRef;
  readonly fields: readonly UnionField[];
}

export interface RuneDef extends TypeDefBase {
  readonly kind: "rune";
  readonly encoding?: string;
}

export interface EnumValue {
  readonly name: string;
  readonly value: bigint;
  /** False when the value was assigned implicitly (previous + 1). */
  readonly explicit: boolean;
  readonly note?: Note;
  readonly loc: NodeLoc;
}

export interface EnumDef extends TypeDefBase {
  readonly kind: "enum";
  readonly values: readonly EnumValue[];
}

export interface BitValue {
  readonly name: string;
  readonly bit: bigint;
  readonly explicit: boolean;
  readonly note?: Note;
  readonly loc: NodeLoc;
}

export interface BitsetDef extends TypeDefBase {
  readonly kind: "bitset";
  readonly values: readonly BitValue[];
}

export type TypeDef =
  | ByteDef
  | BoolDef
  | IntDef
  | FloatDef
  | FixedDef
  | SequenceDef
  | StringDef
  | RecordDef
  | UnionDef
  | RuneDef
  | EnumDef
  | BitsetDef;

export type TypeDefOf<K extends TypeKind> = Extract<TypeDef, { kind: K }>;

/** A definition that carries a name (top-level or named inline). */
export type NamedTypeDef = TypeDef & { readonly name: string };

export function isNamed(def: TypeDef): def is NamedTypeDef {
  return typeof def.name === "string";
}

export function isLegacyKind(kind: string): kind is LegacyKind {
  return (LEGACY_KINDS as readonly string[]).includes(kind);
}

export function isCurrentKind(kind: string): kind is CurrentKind {
  return (CURRENT_KINDS as readonly string[]).includes(kind);
}

/** Exhaustiveness guard for switches over closed unions. */
export function assertNever(value: never, context = "value"): never {
  const v: unknown = value;
  const kind = typeof v === "object" && v !== null && "kind" in v ? String(v.kind) : String(v);
  throw new Error(`Unexpected ${context}: ${kind}`);
}
