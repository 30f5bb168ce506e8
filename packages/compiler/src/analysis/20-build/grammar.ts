/* =============================================================================
 * ITL grammar as zod schemas.
 *
 * One strict object schema per grammar object: the document root, each
 * definition kind, record and union fields, enum and bitset members. Type
 * positions, fields and members are accepted here as plain strings or
 * objects and checked by their own schema when the builder reaches them, so
 * an issue path never reaches past the object being checked.
 *
 * Each definition kind has a current and a compat schema; the compat one
 * adds the `encoding` hints and the first-generation kinds.
 * ============================================================================= */

import { z } from "zod/v4";
import { FLOAT_MODELS, type TypeKind } from "../../model/types.js";

// ============================================================================
// Building blocks
// ============================================================================

/** Any JSON object. Its own grammar is checked where it is used. */
const object = z.record(z.string(), z.unknown());

/** Integral JSON number that a JS number holds exactly. */
const integer = z.number().refine(Number.isSafeInteger);

/** Integral JSON number of any magnitude; the builder re-reads it exactly from the source text. */
const ordinal = z.number().refine(Number.isInteger);

const name = z.string().min(1);

/** A type name, or an inline definition. */
const typeRef = z.union([z.string(), object]);

const label = z.union([z.string(), z.number(), z.boolean()]);

const common = {
  name: name.optional(),
  note: object.optional(),
};

const encoding = {
  encoding: z.string().optional(),
};

// ============================================================================
// Definitions
// ============================================================================

const byteDef = z.strictObject({ kind: z.literal("byte"), ...common });
const boolDef = z.strictObject({ kind: z.literal("bool"), ...common });

const intDef = z.strictObject({
  kind: z.literal("int"),
  ...common,
  bits: integer.optional(),
  unsigned: z.boolean().optional(),
});

const floatDef = z.strictObject({
  kind: z.literal("float"),
  ...common,
  model: z.enum(FLOAT_MODELS).optional(),
});

const fixedDef = z.strictObject({
  kind: z.literal("fixed"),
  ...common,
  base: integer,
  digits: integer,
  scale: integer,
});

const sequenceDef = z.strictObject({
  kind: z.literal("sequence"),
  ...common,
  type: typeRef,
  size: z.union([integer, z.array(integer)]).optional(),
  capacity: integer.optional(),
});

const stringDef = z.strictObject({
  kind: z.literal("string"),
  ...common,
  size: integer.optional(),
  capacity: integer.optional(),
});

const recordDef = z.strictObject({
  kind: z.literal("record"),
  ...common,
  fields: z.array(object),
});

const unionDef = z.strictObject({
  kind: z.literal("union"),
  ...common,
  discriminator: typeRef,
  fields: z.array(object),
});

// Compat grammar: encoding hints on the scalar kinds, plus rune, enum and bitset.

const compatIntDef = z.strictObject({ ...intDef.shape, ...encoding });
const compatFloatDef = z.strictObject({ ...floatDef.shape, ...encoding });
const compatFixedDef = z.strictObject({ ...fixedDef.shape, ...encoding });
const compatStringDef = z.strictObject({ ...stringDef.shape, ...encoding });

const runeDef = z.strictObject({ kind: z.literal("rune"), ...common, ...encoding });

/** Enum and bitset members: a bare name, or an object checked by its own schema. */
const member = z.union([name, object]);

const enumDef = z.strictObject({ kind: z.literal("enum"), ...common, values: z.array(member) });
const bitsetDef = z.strictObject({ kind: z.literal("bitset"), ...common, values: z.array(member) });

export const currentDefinitionSchema = z.discriminatedUnion("kind", [
  byteDef,
  boolDef,
  intDef,
  floatDef,
  fixedDef,
  sequenceDef,
  stringDef,
  recordDef,
  unionDef,
]);

export const compatDefinitionSchema = z.discriminatedUnion("kind", [
  byteDef,
  boolDef,
  compatIntDef,
  compatFloatDef,
  compatFixedDef,
  sequenceDef,
  compatStringDef,
  recordDef,
  unionDef,
  runeDef,
  enumDef,
  bitsetDef,
]);

/** A definition object that passed its schema, before its type positions are linked. */
export type DefinitionData = z.infer<typeof compatDefinitionSchema>;

interface KindKeys {
  readonly current: readonly string[];
  readonly compat: readonly string[];
}

function keysOf(current: { readonly shape: object } | null, compat: { readonly shape: object }): KindKeys {
  return { current: current ? Object.keys(current.shape) : [], compat: Object.keys(compat.shape) };
}

/** Property names per kind and grammar, for suggestions and compat hints. */
export const DEFINITION_KEYS: Readonly<Record<TypeKind, KindKeys>> = {
  byte: keysOf(byteDef, byteDef),
  bool: keysOf(boolDef, boolDef),
  int: keysOf(intDef, compatIntDef),
  float: keysOf(floatDef, compatFloatDef),
  fixed: keysOf(fixedDef, compatFixedDef),
  sequence: keysOf(sequenceDef, sequenceDef),
  string: keysOf(stringDef, compatStringDef),
  record: keysOf(recordDef, recordDef),
  union: keysOf(unionDef, unionDef),
  rune: keysOf(null, runeDef),
  enum: keysOf(null, enumDef),
  bitset: keysOf(null, bitsetDef),
};

// ============================================================================
// Other grammar objects
// ============================================================================

export const rootSchema = z.strictObject({
  types: z.array(object),
  note: object.optional(),
});

/** Root keys only, for documents whose `types` is missing or malformed. */
export const rootOutlineSchema = z.strictObject({
  types: z.unknown().optional(),
  note: object.optional(),
});

export const fieldSchema = z.strictObject({
  name,
  type: typeRef,
  optional: z.boolean().optional(),
  note: object.optional(),
});

export const unionFieldSchema = z.strictObject({
  name,
  type: typeRef,
  labels: z.array(label).optional(),
  note: object.optional(),
});

export const enumValueSchema = z.strictObject({
  name,
  value: ordinal.optional(),
  note: object.optional(),
});

export const bitValueSchema = z.strictObject({
  name,
  bit: ordinal.optional(),
  note: object.optional(),
});
