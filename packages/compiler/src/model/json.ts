/* =======================================================================================
 * JSON TREE
 * ---------------------------------------------------------------------------------------
 * Output of the parse stage: a span-carrying JSON tree. Object members keep their
 * authored order (and duplicates) so the builder can report shape errors precisely.
 * ======================================================================================= */

import type { SourceSpan } from "./span.js";

export type JsonScalar = string | number | boolean | null;
export type JsonValue = JsonScalar | readonly JsonValue[] | JsonObject;
export interface JsonObject {
  readonly [key: string]: JsonValue;
}

export type JsonNode =
  | JsonObjectNode
  | JsonArrayNode
  | JsonStringNode
  | JsonNumberNode
  | JsonBooleanNode
  | JsonNullNode;

export type JsonNodeKind = JsonNode["kind"];

export interface JsonObjectNode {
  readonly kind: "object";
  readonly span: SourceSpan;
  readonly members: readonly JsonMember[];
}

export interface JsonMember {
  readonly key: string;
  readonly keySpan: SourceSpan;
  readonly value: JsonNode;
}

export interface JsonArrayNode {
  readonly kind: "array";
  readonly span: SourceSpan;
  readonly items: readonly JsonNode[];
}

export interface JsonStringNode {
  readonly kind: "string";
  readonly span: SourceSpan;
  readonly value: string;
}

export interface JsonNumberNode {
  readonly kind: "number";
  readonly span: SourceSpan;
  readonly value: number;
  /** Literal as written, kept so integers beyond 2^53 stay exact. */
  readonly raw: string;
}

export interface JsonBooleanNode {
  readonly kind: "boolean";
  readonly span: SourceSpan;
  readonly value: boolean;
}

export interface JsonNullNode {
  readonly kind: "null";
  readonly span: SourceSpan;
}

/** Last member wins, matching JSON.parse. */
export function getMember(node: JsonObjectNode, key: string): JsonMember | undefined {
  let found: JsonMember | undefined;
  for (const member of node.members) {
    if (member.key === key) found = member;
  }
  return found;
}

export function toJsonValue(node: JsonNode): JsonValue {
  switch (node.kind) {
    case "object":
      // fromEntries defines own properties, so a "__proto__" key stays plain data.
      return Object.fromEntries(node.members.map((member) => [member.key, toJsonValue(member.value)]));
    case "array":
      return node.items.map(toJsonValue);
    case "string":
    case "number":
    case "boolean":
      return node.value;
    case "null":
      return null;
  }
}

/** Exact integer value of a number literal, or null when it is not integral. */
export function integerOf(node: JsonNumberNode): bigint | null {
  if (/^-?(0|[1-9]\d*)$/.test(node.raw)) return BigInt(node.raw);
  if (Number.isInteger(node.value)) return BigInt(node.value);
  return null;
}

/** Readable name for a node kind, used in shape diagnostics. */
export function describeJsonKind(kind: JsonNodeKind): string {
  switch (kind) {
    case "object":
      return "an object";
    case "array":
      return "an array";
    case "string":
      return "a string";
    case "number":
      return "a number";
    case "boolean":
      return "a boolean";
    case "null":
      return "null";
  }
}
